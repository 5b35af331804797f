import type { FileSystem } from "@effect/platform";
import { Effect, Option } from "effect";
import type { AppCreator } from "../../core/interfaces/application";
import type { ChainSpec } from "../../core/interfaces/chain-spec";
import type { ModuleManager } from "../../core/interfaces/module-manager";
import type { NodeError } from "../../core/types/errors";
import { genesisFile, readGenesis, validateGenesisDoc } from "../../genesis/genesis";
import type { CommandEnv } from "../command-env";
import { errOrStderr } from "../command-output";
import { untilInterrupted } from "../run-command";

/**
 * Run the node application until it stops or the process is signalled
 */
export function startCommand(
  env: CommandEnv,
  moduleManager: ModuleManager,
  appCreator: AppCreator,
  chainSpec: ChainSpec,
): Effect.Effect<void, NodeError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const { logger, settings, homeDir } = env.server;
    const doc = yield* readGenesis(genesisFile(homeDir));
    yield* validateGenesisDoc(doc, chainSpec, moduleManager);

    yield* logger.info("starting node", {
      chainId: doc.chainId,
      chainSpec: chainSpec.name,
      modules: moduleManager.moduleNames().join(","),
    });

    const outcome = yield* Effect.acquireUseRelease(
      appCreator({ logger, settings, homeDir, moduleManager, chainSpec }),
      (app) =>
        untilInterrupted(app.start(), (message) => {
          errOrStderr(env.command).write(`\n${message}\n`);
        }),
      (app) => app.close(),
    );

    if (Option.isNone(outcome)) {
      yield* logger.info("node stopped");
    }
  });
}
