import type { FileSystem } from "@effect/platform";
import type { Command } from "commander";
import { Effect } from "effect";
import { resolveCommandOutput, setCommandOutput } from "../cli/command-output";
import { readPersistentCommandFlags, setCommandClientContext } from "../client/context";
import { createClientConfig } from "../config/client-config";
import { interceptConfigs } from "../config/intercept";
import type { ClientContext } from "../core/interfaces/client-context";
import type { SettingsStore } from "../core/interfaces/settings";
import type {
  AppConfig,
  ClientConfig,
  ConfigTemplate,
  ConsensusConfig,
} from "../core/types/config";
import type { ConfigurationError, FlagParseError } from "../core/types/errors";
import type { ServerContext } from "../server/context";

export interface PreRunOptions {
  /** Resolved client context every invocation starts from */
  readonly baseContext: ClientContext;
  readonly clientConfig: () => ConfigTemplate<ClientConfig>;
  readonly appConfig: () => ConfigTemplate<AppConfig>;
  readonly consensusConfig: () => ConfigTemplate<ConsensusConfig>;
  readonly settings: SettingsStore;
  readonly envPrefix: string;
}

/**
 * Prepare an action command before it runs: bind its output streams, apply
 * persistent flags and client.toml to the base client context, install that
 * context, then load config.toml and app.toml into a server context.
 *
 * The base context is never modified, so every invocation starts from the
 * same state.
 */
export function preRun(
  command: Command,
  options: PreRunOptions,
): Effect.Effect<ServerContext, FlagParseError | ConfigurationError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    setCommandOutput(command, resolveCommandOutput(command));

    const withFlags = yield* readPersistentCommandFlags(options.baseContext, command);
    const ctx = yield* createClientConfig(withFlags, options.clientConfig());
    yield* setCommandClientContext(ctx, command);

    return yield* interceptConfigs(command, ctx.homeDir, {
      appConfig: options.appConfig(),
      consensusConfig: options.consensusConfig(),
      settings: options.settings,
      envPrefix: options.envPrefix,
    });
  });
}

/**
 * Environment variable prefix for a node name: "nodekitd" -> "NODEKITD"
 */
export function envPrefixFor(name: string): string {
  return name.replace(/[^A-Za-z0-9]+/g, "_").toUpperCase();
}
