/**
 * Helpers shared by the logger and command output
 */

/**
 * Custom replacer for JSON.stringify to handle BigInt values
 */
export function jsonBigIntReplacer(_key: string, value: unknown): unknown {
  if (typeof value === "bigint") {
    return value.toString();
  }
  return value;
}

/**
 * Render metadata as space separated key=value pairs. Strings containing
 * whitespace are quoted.
 */
export function formatMeta(meta: Readonly<Record<string, unknown>>): string {
  return Object.entries(meta)
    .map(([key, value]) => `${key}=${formatMetaValue(value)}`)
    .join(" ");
}

function formatMetaValue(value: unknown): string {
  if (typeof value === "string") {
    return /\s/.test(value) || value === "" ? JSON.stringify(value) : value;
  }
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (value === undefined) {
    return "undefined";
  }
  return JSON.stringify(value, jsonBigIntReplacer) ?? String(value);
}
