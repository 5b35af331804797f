import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import path from "node:path";
import { parse, TomlError } from "smol-toml";
import type { z } from "zod";
import type { ConfigTemplate } from "../core/types/config";
import { ConfigurationError } from "../core/types/errors";
import { camelCaseKeys, filePath, type KeyStyle } from "./keys";
import { renderTemplate } from "./template";

/**
 * Loading and defaulting of TOML config files
 */

export interface LoadedConfig<T> {
  readonly file: string;
  /** The document as written on disk, keys untouched */
  readonly raw: Record<string, unknown>;
  readonly value: T;
  /** True when the file did not exist and was written from the template */
  readonly created: boolean;
}

export interface ConfigFileSpec<T> {
  readonly file: string;
  readonly template: ConfigTemplate<T>;
  readonly schema: z.ZodType<T>;
  readonly keyStyle: KeyStyle;
}

/**
 * Directory holding a node's config files
 */
export function configDirectory(homeDir: string): string {
  return path.join(homeDir, "config");
}

/**
 * Parse TOML text into a plain object
 */
export function parseToml(file: string, content: string): Effect.Effect<Record<string, unknown>, ConfigurationError> {
  return Effect.try({
    try: () => parse(content),
    catch: (error) =>
      new ConfigurationError({
        file,
        field: "",
        message:
          error instanceof TomlError
            ? `invalid TOML at line ${error.line}, column ${error.column}: ${firstLine(error.message)}`
            : `invalid TOML: ${String(error)}`,
      }),
  });
}

/**
 * Validate a parsed document, reporting the first issue with the key spelled
 * as in the file.
 */
export function validateConfig<T>(
  file: string,
  raw: Record<string, unknown>,
  schema: z.ZodType<T>,
  keyStyle: KeyStyle,
): Effect.Effect<T, ConfigurationError> {
  const result = schema.safeParse(camelCaseKeys(raw));
  if (result.success) {
    return Effect.succeed(result.data);
  }
  const [issue] = result.error.issues;
  const field = issue ? filePath(issue.path, keyStyle) : "";
  return Effect.fail(
    new ConfigurationError({
      file,
      field,
      message: issue?.message ?? "invalid configuration",
      suggestion: `Fix "${field}" in ${file} or delete the file to regenerate defaults`,
    }),
  );
}

/**
 * Read a config file, writing it from its template first when it does not exist.
 */
export function loadOrWriteConfig<T>(
  spec: ConfigFileSpec<T>,
): Effect.Effect<LoadedConfig<T>, ConfigurationError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const { file } = spec;
    const ioError = (operation: string) => (error: unknown) =>
      new ConfigurationError({
        file,
        field: "",
        message: `cannot ${operation} ${file}: ${String(error)}`,
      });

    const exists = yield* fs.exists(file).pipe(Effect.mapError(ioError("stat")));
    if (!exists) {
      const rendered = yield* renderTemplate(file, spec.template.template, spec.template.defaults);
      yield* fs
        .makeDirectory(path.dirname(file), { recursive: true })
        .pipe(Effect.mapError(ioError("create directory for")));
      yield* fs.writeFileString(file, rendered).pipe(Effect.mapError(ioError("write")));
    }

    const content = yield* fs.readFileString(file).pipe(Effect.mapError(ioError("read")));
    const raw = yield* parseToml(file, content);
    const value = yield* validateConfig(file, raw, spec.schema, spec.keyStyle);
    return { file, raw, value, created: !exists };
  });
}

function firstLine(message: string): string {
  return message.split("\n")[0] ?? message;
}
