import { Option } from "effect";
import type { SettingsStore } from "../core/interfaces/settings";

/**
 * In-memory settings store with environment overrides
 */

export class SettingsStoreImpl implements SettingsStore {
  private values: Record<string, unknown>;
  private envPrefix = "";

  constructor(
    initial: Readonly<Record<string, unknown>> = {},
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {
    this.values = structuredClone({ ...initial });
  }

  get(key: string): Option.Option<unknown> {
    const fromEnv = this.envValue(key);
    if (Option.isSome(fromEnv)) {
      return fromEnv;
    }
    const value = deepGet(this.values, key);
    return value === undefined || value === null ? Option.none() : Option.some(value);
  }

  getString(key: string, fallback: string): string {
    return Option.match(this.get(key), {
      onNone: () => fallback,
      onSome: (value) => (typeof value === "string" ? value : fallback),
    });
  }

  has(key: string): boolean {
    return Option.isSome(this.get(key));
  }

  set(key: string, value: unknown): void {
    deepSet(this.values, key, value);
  }

  merge(values: Readonly<Record<string, unknown>>): void {
    deepMerge(this.values, values);
  }

  setEnvPrefix(prefix: string): void {
    this.envPrefix = prefix;
  }

  snapshot(): Record<string, unknown> {
    return structuredClone(this.values);
  }

  private envValue(key: string): Option.Option<string> {
    if (!this.envPrefix) {
      return Option.none();
    }
    const value = this.env[envVariableName(this.envPrefix, key)];
    return value === undefined ? Option.none() : Option.some(value);
  }
}

/**
 * Environment variable consulted for a key: `<PREFIX>_<KEY>` upper-cased, with
 * dots and dashes mapped to underscores.
 */
export function envVariableName(prefix: string, key: string): string {
  return `${prefix}_${key}`.replace(/[.-]/g, "_").toUpperCase();
}

let globalSettings: SettingsStore | undefined;

/**
 * The process-wide settings store
 */
export function getGlobalSettings(): SettingsStore {
  if (!globalSettings) {
    globalSettings = new SettingsStoreImpl();
  }
  return globalSettings;
}

// -----------------
// Internal helpers
// -----------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep object property access using dot notation paths.
 *
 * - "halt-height" -> obj["halt-height"]
 * - "engine.rpc-dial-url" -> obj.engine["rpc-dial-url"]
 */
function deepGet(obj: Record<string, unknown>, path: string): unknown {
  const parts = path.split(".").filter(Boolean);
  let cur: unknown = obj;
  for (const part of parts) {
    if (isRecord(cur) && part in cur) {
      cur = cur[part];
    } else {
      return undefined;
    }
  }
  return cur;
}

/**
 * Sets a value at the given dot notation path, creating intermediate objects as needed.
 */
function deepSet(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".").filter(Boolean);
  let cur: Record<string, unknown> = obj;
  parts.forEach((key, i) => {
    if (i === parts.length - 1) {
      cur[key] = value;
      return;
    }
    const next = cur[key];
    if (isRecord(next)) {
      cur = next;
    } else {
      const created: Record<string, unknown> = {};
      cur[key] = created;
      cur = created;
    }
  });
}

function deepMerge(target: Record<string, unknown>, source: Readonly<Record<string, unknown>>): void {
  for (const [key, value] of Object.entries(source)) {
    const existing = target[key];
    if (isRecord(value) && isRecord(existing)) {
      deepMerge(existing, value);
    } else {
      target[key] = isRecord(value) ? structuredClone(value) : value;
    }
  }
}
