#!/usr/bin/env node

import { Cause, Effect, Exit, Option } from "effect";
import { appDependencyConfig } from "./app/components";
import { newNodeBuilder } from "./builder/builder";
import { withDependencyConfig, withDescription, withName } from "./builder/options";
import { handleError } from "./core/utils/error-handler";
import { newNode } from "./node/node";

/**
 * Main entry point for the nodekitd example node
 */

export const NODE_NAME = "nodekitd";

async function main(): Promise<void> {
  const builder = newNodeBuilder(
    newNode,
    withName(NODE_NAME),
    withDescription("nodekit example node with beacon and staking modules"),
    withDependencyConfig(appDependencyConfig()),
  );

  const exit = await Effect.runPromiseExit(builder.build());
  if (Exit.isFailure(exit)) {
    const failure = Cause.failureOption(exit.cause);
    await Effect.runPromise(
      handleError(
        Option.isSome(failure) ? failure.value : Cause.squash(exit.cause),
        process.stderr,
        NODE_NAME,
      ),
    );
    process.exitCode = 1;
    return;
  }

  try {
    await exit.value.run(process.argv);
  } catch (error) {
    await Effect.runPromise(handleError(error, process.stderr, NODE_NAME));
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error("Fatal error:", error);
  process.exitCode = 1;
});
