import { Data } from "effect";

/**
 * Tagged error types for the node builder and its CLI
 * Using Effect's Data.TaggedError for proper error handling
 */

// Dependency resolution
export type ResolutionFailure = "missing" | "duplicate" | "cycle" | "provider-failed";

export class ResolutionError extends Data.TaggedError("ResolutionError")<{
  readonly dependency: string;
  readonly reason: ResolutionFailure;
  readonly path: readonly string[];
  readonly message: string;
  readonly cause?: unknown;
  readonly suggestion?: string;
}> {}

// Command tree assembly
export class EnhancementError extends Data.TaggedError("EnhancementError")<{
  readonly command: string;
  readonly message: string;
  readonly suggestion?: string;
}> {}

// Configuration Errors
export class ConfigurationError extends Data.TaggedError("ConfigurationError")<{
  readonly file: string;
  readonly field: string;
  readonly message: string;
  readonly value?: unknown;
  readonly suggestion?: string;
}> {}

export class FlagParseError extends Data.TaggedError("FlagParseError")<{
  readonly flag: string;
  readonly value: unknown;
  readonly message: string;
  readonly suggestion?: string;
}> {}

// Keyring Errors
export class KeyringError extends Data.TaggedError("KeyringError")<{
  readonly backend: string;
  readonly operation: string;
  readonly message: string;
  readonly keyName?: string;
  readonly suggestion?: string;
}> {}

// Genesis Errors
export class GenesisError extends Data.TaggedError("GenesisError")<{
  readonly module: string;
  readonly message: string;
  readonly path?: string;
  readonly suggestion?: string;
}> {}

// File System Errors
export class FileSystemError extends Data.TaggedError("FileSystemError")<{
  readonly path: string;
  readonly operation: string;
  readonly reason: string;
  readonly suggestion?: string;
}> {}

// Generic Errors
export class InternalError extends Data.TaggedError("InternalError")<{
  readonly component: string;
  readonly message: string;
  readonly cause?: unknown;
  readonly suggestion?: string;
}> {}

export type NodeError =
  | ResolutionError
  | EnhancementError
  | ConfigurationError
  | FlagParseError
  | KeyringError
  | GenesisError
  | FileSystemError
  | InternalError;

/**
 * Narrow an unknown thrown value to a NodeError by its tag.
 */
export function isNodeError(error: unknown): error is NodeError {
  if (typeof error !== "object" || error === null || !("_tag" in error)) {
    return false;
  }
  switch (error._tag) {
    case "ResolutionError":
    case "EnhancementError":
    case "ConfigurationError":
    case "FlagParseError":
    case "KeyringError":
    case "GenesisError":
    case "FileSystemError":
    case "InternalError":
      return true;
    default:
      return false;
  }
}
