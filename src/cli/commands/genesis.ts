import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import path from "node:path";
import type { ChainSpec } from "../../core/interfaces/chain-spec";
import type { ModuleManager } from "../../core/interfaces/module-manager";
import type { GenesisError } from "../../core/types/errors";
import { genesisFile, readGenesis, validateGenesisDoc } from "../../genesis/genesis";
import type { CommandEnv } from "../command-env";
import { printOutput } from "../print";

/**
 * Validate a genesis file; defaults to the one in the node's config directory
 */
export function genesisValidateCommand(
  env: CommandEnv,
  moduleManager: ModuleManager,
  chainSpec: ChainSpec,
  file?: string,
): Effect.Effect<void, GenesisError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const target = file ? path.resolve(file) : genesisFile(env.server.homeDir);
    const doc = yield* readGenesis(target);
    yield* validateGenesisDoc(doc, chainSpec, moduleManager);
    printOutput(env.command, env.client.outputFormat, { file: target, valid: true }, () =>
      `File at ${target} is a valid genesis file`,
    );
  });
}
