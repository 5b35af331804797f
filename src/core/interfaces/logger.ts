import { Context, Effect } from "effect";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFormat = "pretty" | "json";

export interface LoggerService {
  /** Minimum level written by this logger. */
  readonly level: LogLevel;
  /** Logs a debug message with optional metadata. */
  readonly debug: (message: string, meta?: Record<string, unknown>) => Effect.Effect<void, never>;
  /** Logs an info message with optional metadata. */
  readonly info: (message: string, meta?: Record<string, unknown>) => Effect.Effect<void, never>;
  /** Logs a warning message with optional metadata. */
  readonly warn: (message: string, meta?: Record<string, unknown>) => Effect.Effect<void, never>;
  /** Logs an error message with optional metadata. */
  readonly error: (message: string, meta?: Record<string, unknown>) => Effect.Effect<void, never>;
  /**
   * Derive a logger that prefixes every entry with the given module name
   */
  readonly withModule: (module: string) => LoggerService;
}

export const LoggerServiceTag = Context.GenericTag<LoggerService>("LoggerService");
