import { Context, Effect } from "effect";
import type { KeyringError } from "../types/errors";

export type KeyringBackend = "memory" | "test";

export const KEYRING_BACKENDS: readonly KeyringBackend[] = ["memory", "test"];

export interface KeyRecord {
  readonly name: string;
  readonly algorithm: "ed25519";
  readonly address: string;
  /** Raw public key, hex encoded */
  readonly publicKey: string;
  readonly createdAt: string;
}

export interface Keyring {
  readonly backend: KeyringBackend;
  /** Directory holding key files; empty for the memory backend. */
  readonly dir: string;
  readonly list: () => Effect.Effect<readonly KeyRecord[], KeyringError>;
  readonly get: (name: string) => Effect.Effect<KeyRecord, KeyringError>;
  readonly add: (name: string) => Effect.Effect<KeyRecord, KeyringError>;
  readonly remove: (name: string) => Effect.Effect<void, KeyringError>;
}

export const KeyringTag = Context.GenericTag<Keyring>("Keyring");
