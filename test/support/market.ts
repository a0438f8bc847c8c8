import { vi } from "vitest";
import type { Address } from "viem";
import { Market } from "../../src/engine/market.js";
import { SandboxChain } from "../../src/sandbox/chain.js";
import type { SandboxAsset } from "../../src/sandbox/asset.js";
import type { SandboxOutcomeSet } from "../../src/sandbox/outcome-set.js";
import type { MarketState } from "../../src/types/market.js";

export const DEPLOYER: Address = "0x00000000000000000000000000000000000000d0";
export const MARKET: Address = "0x00000000000000000000000000000000000000e0";
export const REGISTRY: Address = "0x00000000000000000000000000000000000000f0";
export const CREATOR: Address = "0x00000000000000000000000000000000000000c1";
export const TRADER: Address = "0x00000000000000000000000000000000000000a1";
export const OTHER: Address = "0x00000000000000000000000000000000000000b2";

export const STARTING_BALANCE = 10_000n;

type PriceFn = (state: MarketState, outcomeIndex: number, count: bigint) => bigint;

/** Oracle whose quotes are set per test with mockReturnValue. */
export function mockOracle(cost = 0n, profit = 0n) {
  return {
    calcCost: vi.fn<PriceFn>().mockReturnValue(cost),
    calcProfit: vi.fn<PriceFn>().mockReturnValue(profit),
  };
}

export interface MarketSetup {
  chain: SandboxChain;
  collateral: SandboxAsset;
  outcomeSet: SandboxOutcomeSet;
  oracle: ReturnType<typeof mockOracle>;
  market: Market;
}

/**
 * Two-outcome sandbox market. Creator and trader start with STARTING_BALANCE collateral,
 * both already approved to the market.
 */
export function setupMarket(options: { feeFraction?: bigint; outcomes?: number } = {}): MarketSetup {
  const chain = new SandboxChain(DEPLOYER);
  const collateral = chain.deployAsset("USDC");
  const outcomeSet = chain.deployOutcomeSet(collateral, options.outcomes ?? 2);
  const oracle = mockOracle();
  const market = new Market({
    address: MARKET,
    creator: CREATOR,
    outcomeSet,
    oracle,
    host: chain,
    feeFraction: options.feeFraction ?? 20_000n,
  });
  for (const account of [CREATOR, TRADER]) {
    collateral.mint(account, STARTING_BALANCE);
    collateral.approve(account, MARKET, STARTING_BALANCE);
  }
  return { chain, collateral, outcomeSet, oracle, market };
}
