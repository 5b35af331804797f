import { Context } from "effect";

export type ChainSpecName = "mainnet" | "testnet" | "devnet";

/**
 * Network parameters resolved once at startup.
 */
export interface ChainSpec {
  readonly name: ChainSpecName;
  readonly chainId: string;
  readonly evmChainId: number;
  readonly slotsPerEpoch: number;
  readonly validatorSetCap: number;
  /** Gwei */
  readonly maxEffectiveBalance: number;
  /** Gwei */
  readonly minDepositAmount: number;
  readonly depositContractAddress: string;
  readonly genesisForkVersion: string;
}

export const ChainSpecTag = Context.GenericTag<ChainSpec>("ChainSpec");
