import { Context } from "effect";

/**
 * Transaction encoding configuration handed to the client context.
 */
export interface TxConfig {
  readonly name: string;
  readonly signModes: readonly string[];
  readonly encode: (tx: unknown) => Uint8Array;
  readonly decode: (bytes: Uint8Array) => unknown;
}

export const TxConfigTag = Context.GenericTag<TxConfig>("TxConfig");
