import { Effect } from "effect";

/**
 * Utility functions for safe JSON handling
 */

/**
 * Parse JSON string as an Effect, failing with a descriptive error on parse failure.
 *
 * @example
 * ```ts
 * const parsed = yield* parseJson(jsonString);
 * ```
 */
export function parseJson(text: string): Effect.Effect<unknown, Error> {
  return Effect.try({
    try: (): unknown => JSON.parse(text),
    catch: (error) => {
      const message =
        error instanceof Error
          ? error.message
          : typeof error === "string"
            ? error
            : "Unknown parse error";
      return new Error(`Failed to parse JSON: ${message}`);
    },
  });
}

/**
 * True for non-null, non-array objects
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Stable, indented JSON for files and command output
 */
export function toPrettyJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

/**
 * Overlay `override` onto `base`, recursing into objects present in both.
 * Neither argument is modified.
 */
export function overlay(base: unknown, override: unknown): unknown {
  if (override === undefined) {
    return base;
  }
  if (!isPlainObject(base) || !isPlainObject(override)) {
    return override;
  }
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    result[key] = overlay(base[key], value);
  }
  return result;
}
