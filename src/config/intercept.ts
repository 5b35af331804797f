import type { FileSystem } from "@effect/platform";
import type { Command } from "commander";
import { Effect, Option } from "effect";
import path from "node:path";
import { errOrStderr } from "../cli/command-output";
import { LOG_FORMAT_FLAG, LOG_LEVEL_FLAG, lookupFlag } from "../client/flags";
import type { LogFormat, LogLevel } from "../core/interfaces/logger";
import type { SettingsStore } from "../core/interfaces/settings";
import type { AppConfig, ConfigTemplate, ConsensusConfig } from "../core/types/config";
import { type ConfigurationError, FlagParseError } from "../core/types/errors";
import { setServerContext, type ServerContext } from "../server/context";
import { createStreamLogger, parseLogLevel } from "../services/logger";
import { configDirectory, loadOrWriteConfig } from "./files";
import { appConfigSchema, consensusConfigSchema } from "./schemas";

export const CONSENSUS_CONFIG_FILE = "config.toml";
export const APP_CONFIG_FILE = "app.toml";

export interface InterceptOptions {
  readonly appConfig: ConfigTemplate<AppConfig>;
  readonly consensusConfig: ConfigTemplate<ConsensusConfig>;
  readonly settings: SettingsStore;
  /** Prefix of environment variables overriding settings, e.g. NODEKITD */
  readonly envPrefix: string;
}

/**
 * Load config.toml and app.toml from `<home>/config`, writing either from its
 * template when absent, and install the resulting server context on `command`.
 *
 * Both documents are merged into the settings store as written on disk. The
 * server logger takes its level and format from --log-level and --log-format,
 * falling back to the [logger] section of app.toml.
 */
export function interceptConfigs(
  command: Command,
  homeDir: string,
  options: InterceptOptions,
): Effect.Effect<ServerContext, ConfigurationError | FlagParseError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const configDir = configDirectory(homeDir);

    const consensus = yield* loadOrWriteConfig({
      file: path.join(configDir, CONSENSUS_CONFIG_FILE),
      template: options.consensusConfig,
      schema: consensusConfigSchema,
      keyStyle: "snake",
    });
    const app = yield* loadOrWriteConfig({
      file: path.join(configDir, APP_CONFIG_FILE),
      template: options.appConfig,
      schema: appConfigSchema,
      keyStyle: "kebab",
    });

    const { settings } = options;
    settings.setEnvPrefix(options.envPrefix);
    settings.merge(consensus.raw);
    settings.merge(app.raw);
    settings.set("home", homeDir);

    const level = yield* resolveLogLevel(
      command,
      settings.getString("logger.log-level", app.value.logger.logLevel),
    );
    const format = yield* resolveLogFormat(
      command,
      settings.getString("logger.style", app.value.logger.style),
    );

    const logger = createStreamLogger(errOrStderr(command), { level, format }).withModule("server");
    if (consensus.created || app.created) {
      yield* logger.info("wrote default configuration", {
        dir: configDir,
        files: [consensus.created ? CONSENSUS_CONFIG_FILE : "", app.created ? APP_CONFIG_FILE : ""]
          .filter(Boolean)
          .join(","),
      });
    }

    const ctx: ServerContext = {
      logger,
      settings,
      appConfig: app.value,
      consensusConfig: consensus.value,
      homeDir,
      configDir,
    };
    setServerContext(command, ctx);
    return ctx;
  });
}

function resolveLogLevel(command: Command, fallback: string): Effect.Effect<LogLevel, FlagParseError> {
  const found = lookupFlag(command, LOG_LEVEL_FLAG.attribute);
  const raw = found && typeof found.value === "string" ? found.value : fallback;
  return Option.match(parseLogLevel(raw), {
    onNone: () =>
      Effect.fail(
        new FlagParseError({
          flag: "log-level",
          value: raw,
          message: `invalid log level "${raw}"`,
          suggestion: "Use one of debug, info, warn, error",
        }),
      ),
    onSome: (level) => Effect.succeed(level),
  });
}

function resolveLogFormat(command: Command, fallback: string): Effect.Effect<LogFormat, FlagParseError> {
  const found = lookupFlag(command, LOG_FORMAT_FLAG.attribute);
  const raw = found && typeof found.value === "string" ? found.value : fallback;
  if (raw === "pretty" || raw === "json") {
    return Effect.succeed(raw);
  }
  return Effect.fail(
    new FlagParseError({
      flag: "log-format",
      value: raw,
      message: `invalid log format "${raw}"`,
      suggestion: "Use one of pretty, json",
    }),
  );
}
