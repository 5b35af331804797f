import { Effect } from "effect";
import { ConfigurationError } from "../core/types/errors";
import { isPlainObject } from "../core/utils/json";

/**
 * Config file templates.
 *
 * A template is TOML text with `{{ .path.to.value }}` placeholders. Each
 * placeholder is replaced by the TOML literal of the value found at that path
 * in the defaults object.
 */

const PLACEHOLDER = /\{\{\s*\.([A-Za-z0-9_.]+)\s*\}\}/g;

/**
 * Encode a value as a TOML literal. Strings use basic-string escaping, which
 * JSON string escaping is a subset of.
 */
export function tomlLiteral(value: unknown): string | undefined {
  switch (typeof value) {
    case "string":
      return JSON.stringify(value);
    case "number":
      return Number.isFinite(value) ? String(value) : undefined;
    case "bigint":
      return value.toString();
    case "boolean":
      return value ? "true" : "false";
    default:
      break;
  }
  if (Array.isArray(value)) {
    const items = value.map(tomlLiteral);
    return items.every((item): item is string => item !== undefined)
      ? `[${items.join(", ")}]`
      : undefined;
  }
  return undefined;
}

function valueAt(values: unknown, path: string): unknown {
  let cur: unknown = values;
  for (const part of path.split(".")) {
    if (!isPlainObject(cur) || !(part in cur)) {
      return undefined;
    }
    cur = cur[part];
  }
  return cur;
}

/**
 * Render a template. Fails when a placeholder has no value or the value has no
 * TOML literal form (objects, null, non-finite numbers).
 */
export function renderTemplate(
  file: string,
  template: string,
  values: unknown,
): Effect.Effect<string, ConfigurationError> {
  return Effect.suspend(() => {
    const failures: string[] = [];
    const rendered = template.replace(PLACEHOLDER, (match, path: string) => {
      const literal = tomlLiteral(valueAt(values, path));
      if (literal === undefined) {
        failures.push(path);
        return match;
      }
      return literal;
    });

    const [first] = failures;
    if (first !== undefined) {
      return Effect.fail(
        new ConfigurationError({
          file,
          field: first,
          message: `template placeholder "${first}" has no renderable value`,
        }),
      );
    }
    return Effect.succeed(rendered);
  });
}
