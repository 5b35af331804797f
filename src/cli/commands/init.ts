import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import path from "node:path";
import type { ChainSpec } from "../../core/interfaces/chain-spec";
import type { ModuleManager } from "../../core/interfaces/module-manager";
import { ConfigurationError, GenesisError } from "../../core/types/errors";
import { consensusConfigTemplate } from "../../components/consensus-config";
import { CONSENSUS_CONFIG_FILE } from "../../config/intercept";
import { renderTemplate } from "../../config/template";
import { genesisFile, makeGenesisDoc, writeGenesis } from "../../genesis/genesis";
import type { CommandEnv } from "../command-env";
import { printOutput } from "../print";

export interface InitOptions {
  readonly moniker: string;
  readonly overwrite: boolean;
}

export interface InitResult {
  readonly moniker: string;
  readonly chainId: string;
  readonly home: string;
  readonly genesis: string;
}

/**
 * Set the node's moniker and write a default genesis file
 */
export function initCommand(
  env: CommandEnv,
  moduleManager: ModuleManager,
  chainSpec: ChainSpec,
  options: InitOptions,
): Effect.Effect<InitResult, ConfigurationError | GenesisError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const moniker = options.moniker.trim();
    if (moniker === "") {
      return yield* Effect.fail(
        new ConfigurationError({
          file: CONSENSUS_CONFIG_FILE,
          field: "moniker",
          message: "moniker must not be empty",
        }),
      );
    }

    const genesis = genesisFile(env.server.homeDir);
    const exists = yield* fs.exists(genesis).pipe(
      Effect.mapError(
        (error) => new GenesisError({ module: "genesis", path: genesis, message: String(error) }),
      ),
    );
    if (exists && !options.overwrite) {
      return yield* Effect.fail(
        new GenesisError({
          module: "genesis",
          path: genesis,
          message: `genesis file ${genesis} already exists`,
          suggestion: "Pass --overwrite to replace it",
        }),
      );
    }

    const configFile = path.join(env.server.configDir, CONSENSUS_CONFIG_FILE);
    const rendered = yield* renderTemplate(configFile, consensusConfigTemplate().template, {
      ...env.server.consensusConfig,
      moniker,
    });
    yield* fs.writeFileString(configFile, rendered).pipe(
      Effect.mapError(
        (error) =>
          new ConfigurationError({
            file: configFile,
            field: "",
            message: `cannot write ${configFile}: ${String(error)}`,
          }),
      ),
    );

    const chainId = env.client.chainId || chainSpec.chainId;
    yield* writeGenesis(genesis, makeGenesisDoc(chainId, chainSpec, moduleManager));
    yield* env.server.logger.info("initialized node", { moniker, chainId });

    const result: InitResult = { moniker, chainId, home: env.server.homeDir, genesis };
    printOutput(env.command, env.client.outputFormat, result, () =>
      [`moniker:  ${moniker}`, `chain-id: ${chainId}`, `genesis:  ${genesis}`].join("\n"),
    );
    return result;
  });
}
