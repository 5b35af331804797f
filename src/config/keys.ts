import { isPlainObject } from "../core/utils/json";

/**
 * Key style conversion between config files and typed config objects
 */

export type KeyStyle = "kebab" | "snake";

export function camelCaseKey(key: string): string {
  return key.replace(/[-_]([a-z0-9])/g, (_, char: string) => char.toUpperCase());
}

export function fileKey(key: string, style: KeyStyle): string {
  const separator = style === "kebab" ? "-" : "_";
  return key.replace(/[A-Z]/g, (char) => `${separator}${char.toLowerCase()}`);
}

/**
 * Recursively camel-case the keys of a parsed config document. Arrays are
 * copied element-wise.
 */
export function camelCaseKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(camelCaseKeys);
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [camelCaseKey(key), camelCaseKeys(entry)]),
    );
  }
  return value;
}

/**
 * Render a typed config path ("engine.rpcDialUrl") the way the file spells it
 * ("engine.rpc-dial-url").
 */
export function filePath(path: readonly (string | number)[], style: KeyStyle): string {
  return path.map((part) => (typeof part === "number" ? `${part}` : fileKey(part, style))).join(".");
}
