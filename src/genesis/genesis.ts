import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import path from "node:path";
import { z } from "zod";
import type { ChainSpec } from "../core/interfaces/chain-spec";
import type { ModuleManager } from "../core/interfaces/module-manager";
import { GenesisError } from "../core/types/errors";
import { parseJson, toPrettyJson } from "../core/utils/json";
import { configDirectory } from "../config/files";

/**
 * Genesis documents: `<home>/config/genesis.json`
 */

export const GENESIS_FILE = "genesis.json";

export const genesisDocSchema = z.object({
  chainId: z.string().min(1, "chain id must not be empty"),
  chainSpec: z.string().min(1),
  genesisTime: z.string().datetime({ message: "expected an ISO-8601 timestamp" }),
  initialHeight: z.number().int().positive(),
  appState: z.record(z.unknown()),
});

export type GenesisDoc = z.infer<typeof genesisDocSchema>;

export function genesisFile(homeDir: string): string {
  return path.join(configDirectory(homeDir), GENESIS_FILE);
}

export function makeGenesisDoc(
  chainId: string,
  chainSpec: ChainSpec,
  moduleManager: ModuleManager,
  now: Date = new Date(),
): GenesisDoc {
  return {
    chainId,
    chainSpec: chainSpec.name,
    genesisTime: now.toISOString(),
    initialHeight: 1,
    appState: moduleManager.defaultGenesis(chainSpec),
  };
}

/**
 * Read and structurally validate a genesis file
 */
export function readGenesis(file: string): Effect.Effect<GenesisDoc, GenesisError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const exists = yield* fs.exists(file).pipe(Effect.mapError(ioError(file)));
    if (!exists) {
      return yield* Effect.fail(
        new GenesisError({
          module: "genesis",
          path: file,
          message: `genesis file ${file} does not exist`,
          suggestion: "Create it with the `init` command",
        }),
      );
    }
    const content = yield* fs.readFileString(file).pipe(Effect.mapError(ioError(file)));
    const parsed = yield* parseJson(content).pipe(
      Effect.mapError(
        (error) =>
          new GenesisError({ module: "genesis", path: file, message: `invalid JSON: ${error.message}` }),
      ),
    );
    const result = genesisDocSchema.safeParse(parsed);
    if (!result.success) {
      const [issue] = result.error.issues;
      return yield* Effect.fail(
        new GenesisError({
          module: "genesis",
          path: file,
          message: issue ? `${issue.path.join(".") || "document"}: ${issue.message}` : "invalid genesis",
        }),
      );
    }
    return result.data;
  });
}

/**
 * Check a genesis document against the chain spec and every module
 */
export function validateGenesisDoc(
  doc: GenesisDoc,
  chainSpec: ChainSpec,
  moduleManager: ModuleManager,
): Effect.Effect<void, GenesisError> {
  if (doc.chainSpec !== chainSpec.name) {
    return Effect.fail(
      new GenesisError({
        module: "genesis",
        message: `genesis was created for chain spec "${doc.chainSpec}", node runs "${chainSpec.name}"`,
        suggestion: "Set CHAIN_SPEC to the chain spec the genesis was created for",
      }),
    );
  }
  return moduleManager.validateGenesis(doc.appState, chainSpec);
}

export function writeGenesis(
  file: string,
  doc: GenesisDoc,
): Effect.Effect<void, GenesisError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.makeDirectory(path.dirname(file), { recursive: true }).pipe(Effect.mapError(ioError(file)));
    yield* fs.writeFileString(file, toPrettyJson(doc)).pipe(Effect.mapError(ioError(file)));
  });
}

function ioError(file: string) {
  return (error: unknown) =>
    new GenesisError({ module: "genesis", path: file, message: `cannot access ${file}: ${String(error)}` });
}
