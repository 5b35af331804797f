import { Context, Option } from "effect";

/**
 * Process-wide key/value settings.
 *
 * Keys use dot notation ("engine.rpc-dial-url"). When an environment prefix is
 * set, `<PREFIX>_<KEY>` environment variables take precedence over stored values,
 * with dots and dashes in the key mapped to underscores.
 */
export interface SettingsStore {
  /** Gets a value by key. */
  readonly get: (key: string) => Option.Option<unknown>;
  /** Gets a string value by key, or the fallback if unset or not a string. */
  readonly getString: (key: string, fallback: string) => string;
  /** Checks if a key resolves to a value. */
  readonly has: (key: string) => boolean;
  /** Sets a value for the given key. */
  readonly set: (key: string, value: unknown) => void;
  /** Deep-merges a nested object into the store; existing keys are overwritten. */
  readonly merge: (values: Readonly<Record<string, unknown>>) => void;
  /** Sets the prefix used for environment overrides; an empty prefix disables them. */
  readonly setEnvPrefix: (prefix: string) => void;
  /** A deep copy of every stored value. */
  readonly snapshot: () => Record<string, unknown>;
}

export const SettingsStoreTag = Context.GenericTag<SettingsStore>("SettingsStore");
