import { Effect } from "effect";
import { stringify } from "smol-toml";
import type { CommandEnv } from "../command-env";
import { printOutput } from "../print";

/**
 * Print the effective settings: config.toml and app.toml merged, as written
 * on disk, plus the resolved home directory
 */
export function configShowCommand(env: CommandEnv): Effect.Effect<void> {
  return Effect.sync(() => {
    const settings = env.server.settings.snapshot();
    printOutput(env.command, env.client.outputFormat, settings, () => stringify(settings));
  });
}
