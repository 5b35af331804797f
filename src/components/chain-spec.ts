import { Effect } from "effect";
import type { ChainSpec, ChainSpecName } from "../core/interfaces/chain-spec";
import { InternalError } from "../core/types/errors";

/**
 * Built-in network parameters
 */

export const CHAIN_SPEC_ENV = "CHAIN_SPEC";

const DEPOSIT_CONTRACT = "0x4242424242424242424242424242424242424242";

export const CHAIN_SPECS: Readonly<Record<ChainSpecName, ChainSpec>> = {
  mainnet: {
    name: "mainnet",
    chainId: "nodekit-mainnet-1",
    evmChainId: 7000,
    slotsPerEpoch: 192,
    validatorSetCap: 256,
    maxEffectiveBalance: 10_000_000 * 1e9,
    minDepositAmount: 1e9,
    depositContractAddress: DEPOSIT_CONTRACT,
    genesisForkVersion: "0x04000000",
  },
  testnet: {
    name: "testnet",
    chainId: "nodekit-testnet-1",
    evmChainId: 7001,
    slotsPerEpoch: 32,
    validatorSetCap: 256,
    maxEffectiveBalance: 10_000_000 * 1e9,
    minDepositAmount: 1e9,
    depositContractAddress: DEPOSIT_CONTRACT,
    genesisForkVersion: "0x04000001",
  },
  devnet: {
    name: "devnet",
    chainId: "nodekit-devnet-1",
    evmChainId: 7002,
    slotsPerEpoch: 8,
    validatorSetCap: 8,
    maxEffectiveBalance: 32 * 1e9,
    minDepositAmount: 1e9,
    depositContractAddress: DEPOSIT_CONTRACT,
    genesisForkVersion: "0x04000002",
  },
};

function isChainSpecName(value: string): value is ChainSpecName {
  return value in CHAIN_SPECS;
}

/**
 * Look up a chain spec by name; an empty or missing name selects testnet.
 */
export function chainSpecByName(name: string | undefined): Effect.Effect<ChainSpec, InternalError> {
  const normalized = (name ?? "").trim().toLowerCase();
  if (normalized === "") {
    return Effect.succeed(CHAIN_SPECS.testnet);
  }
  if (isChainSpecName(normalized)) {
    return Effect.succeed(CHAIN_SPECS[normalized]);
  }
  return Effect.fail(
    new InternalError({
      component: "chain-spec",
      message: `unknown chain spec "${name ?? ""}"`,
      suggestion: `Set ${CHAIN_SPEC_ENV} to one of: ${Object.keys(CHAIN_SPECS).join(", ")}`,
    }),
  );
}
