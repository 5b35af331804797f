import chalk from "chalk";
import { Effect, Option } from "effect";
import type { LogFormat, LoggerService, LogLevel } from "../core/interfaces/logger";
import type { OutputSink } from "../core/interfaces/output-sink";
import { formatMeta, jsonBigIntReplacer } from "../core/utils/logging-helpers";

/**
 * Logger writing formatted lines to an output sink
 */

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_LABEL: Record<LogLevel, string> = {
  debug: "DBG",
  info: "INF",
  warn: "WRN",
  error: "ERR",
};

export interface StreamLoggerOptions {
  readonly level?: LogLevel | undefined;
  readonly format?: LogFormat | undefined;
  /** Colour pretty output; defaults to whether the sink is a TTY */
  readonly colors?: boolean | undefined;
  readonly now?: (() => Date) | undefined;
}

export interface LogEntry {
  readonly time: Date;
  readonly level: LogLevel;
  readonly message: string;
  readonly module?: string | undefined;
  readonly meta?: Readonly<Record<string, unknown>> | undefined;
}

export class StreamLoggerService implements LoggerService {
  private readonly palette: chalk.Chalk;

  constructor(
    private readonly sink: OutputSink,
    readonly level: LogLevel,
    private readonly format: LogFormat,
    private readonly colors: boolean,
    private readonly now: () => Date,
    private readonly module?: string,
  ) {
    this.palette = new chalk.Instance({ level: colors ? 1 : 0 });
  }

  debug(message: string, meta?: Record<string, unknown>): Effect.Effect<void, never> {
    return this.write("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): Effect.Effect<void, never> {
    return this.write("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): Effect.Effect<void, never> {
    return this.write("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): Effect.Effect<void, never> {
    return this.write("error", message, meta);
  }

  withModule(module: string): LoggerService {
    return new StreamLoggerService(
      this.sink,
      this.level,
      this.format,
      this.colors,
      this.now,
      module,
    );
  }

  private write(
    level: LogLevel,
    message: string,
    meta?: Record<string, unknown>,
  ): Effect.Effect<void, never> {
    return Effect.sync(() => {
      if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
        return;
      }
      const entry: LogEntry = { time: this.now(), level, message, module: this.module, meta };
      this.sink.write(
        this.format === "json" ? formatJsonLine(entry) : formatPrettyLine(entry, this.palette),
      );
    });
  }
}

/**
 * Format a log entry as a single JSON object line
 */
export function formatJsonLine(entry: LogEntry): string {
  const record: Record<string, unknown> = {
    time: entry.time.toISOString(),
    level: entry.level,
    ...(entry.module ? { module: entry.module } : {}),
    msg: entry.message,
    ...(entry.meta ?? {}),
  };
  return `${JSON.stringify(record, jsonBigIntReplacer)}\n`;
}

/**
 * Format a log entry for humans: `<time> <LVL> [module] message key=value`
 */
export function formatPrettyLine(entry: LogEntry, palette: chalk.Chalk = chalk): string {
  const label = LEVEL_LABEL[entry.level];
  const coloured =
    entry.level === "error"
      ? palette.red(label)
      : entry.level === "warn"
        ? palette.yellow(label)
        : entry.level === "info"
          ? palette.green(label)
          : palette.gray(label);
  const module = entry.module ? ` ${palette.cyan(`[${entry.module}]`)}` : "";
  const meta = entry.meta && Object.keys(entry.meta).length > 0 ? ` ${formatMeta(entry.meta)}` : "";
  return `${palette.gray(entry.time.toISOString())} ${coloured}${module} ${entry.message}${meta}\n`;
}

/**
 * Parse a log level name, accepting upper case and common aliases.
 */
export function parseLogLevel(value: string): Option.Option<LogLevel> {
  switch (value.trim().toLowerCase()) {
    case "debug":
    case "trace":
      return Option.some("debug");
    case "info":
      return Option.some("info");
    case "warn":
    case "warning":
      return Option.some("warn");
    case "error":
      return Option.some("error");
    default:
      return Option.none();
  }
}

/**
 * Create a logger writing to the given sink
 */
export function createStreamLogger(
  sink: OutputSink,
  options: StreamLoggerOptions = {},
): LoggerService {
  return new StreamLoggerService(
    sink,
    options.level ?? "info",
    options.format ?? "pretty",
    options.colors ?? sink.isTTY === true,
    options.now ?? (() => new Date()),
  );
}
