/**
 * Capability interfaces for the collaborators a market trades through.
 * `caller` stands in for the host's message sender: the identity on whose behalf
 * the call is made.
 */

import type { Address } from "viem";
import type { MarketState } from "./market.js";

/** Balance ledger for one asset (collateral or a single outcome token). */
export interface AssetLedger {
  readonly address: Address;
  transfer(caller: Address, to: Address, amount: bigint): boolean;
  transferFrom(caller: Address, from: Address, to: Address, amount: bigint): boolean;
  approve(caller: Address, spender: Address, amount: bigint): boolean;
  balanceOf(owner: Address): bigint;
}

/**
 * Mints and burns full outcome sets 1:1 against collateral.
 * buyAllOutcomes draws `amount` collateral from the caller (which must have approved
 * this manager) and credits `amount` of every outcome token; sellAllOutcomes is the inverse.
 * Both throw when the underlying transfers fail.
 */
export interface OutcomeSetManager {
  readonly address: Address;
  outcomeCount(): number;
  collateralAsset(): AssetLedger;
  outcomeAsset(index: number): AssetLedger;
  buyAllOutcomes(caller: Address, amount: bigint): void;
  sellAllOutcomes(caller: Address, amount: bigint): void;
}

/** Prices trades from the current market state. The formula is opaque to the market. */
export interface PricingOracle {
  calcCost(state: MarketState, outcomeIndex: number, count: bigint): bigint;
  calcProfit(state: MarketState, outcomeIndex: number, count: bigint): bigint;
}

export interface Checkpoint {
  revert(): void;
}

/** Owner of collaborator state; reverts everything since a checkpoint on failure. */
export interface TransactionHost {
  checkpoint(): Checkpoint;
}
