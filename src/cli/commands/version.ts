import { Effect } from "effect";
import { VERSION } from "../../version";
import type { CommandEnv } from "../command-env";
import { printOutput } from "../print";

/**
 * Print the node version
 */
export function versionCommand(env: CommandEnv, name: string): Effect.Effect<void> {
  return Effect.sync(() =>
    printOutput(env.command, env.client.outputFormat, { name, version: VERSION }, () => VERSION),
  );
}
