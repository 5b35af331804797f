import { Context } from "effect";
import type { KeyringBackend } from "./keyring";
import type { TxConfig } from "./tx-config";

export type OutputFormat = "text" | "json";

export type BroadcastMode = "sync" | "async";

/**
 * Persistent flags that can override client context fields.
 */
export type ClientFlag =
  | "home"
  | "chain-id"
  | "keyring-backend"
  | "keyring-dir"
  | "node"
  | "output"
  | "from"
  | "offline";

/**
 * Client state threaded through command invocations. Values are never mutated;
 * every step derives a new context.
 */
export interface ClientContext {
  readonly homeDir: string;
  readonly chainId: string;
  readonly keyringBackend: KeyringBackend;
  /** Keyring directory; defaults to the home directory when empty */
  readonly keyringDir: string;
  readonly nodeUri: string;
  readonly outputFormat: OutputFormat;
  readonly broadcastMode: BroadcastMode;
  readonly fromName: string;
  readonly offline: boolean;
  /** Fields explicitly set on the command line; config files do not override these */
  readonly flagOverrides: readonly ClientFlag[];
  readonly txConfig: TxConfig;
}

export const ClientContextTag = Context.GenericTag<ClientContext>("ClientContext");
