import type { Address } from "viem";

/** Read-only view handed to the pricing oracle. */
export interface MarketState {
  readonly address: Address;
  readonly funding: bigint;
  readonly feeFraction: bigint;
  readonly outcomeCount: number;
  /** Copy of the per-outcome net exposure; mutating it has no effect on the market. */
  netExposure(): bigint[];
}

export type MarketEvent =
  | { type: "MarketFunding"; market: Address; funder: Address; amount: bigint }
  | { type: "MarketClosing"; market: Address; creator: Address; amounts: bigint[] }
  | { type: "FeeWithdrawal"; market: Address; creator: Address; amount: bigint }
  | {
      type: "OutcomeTokenPurchase";
      market: Address;
      buyer: Address;
      outcomeIndex: number;
      count: bigint;
      outcomeTokenCost: bigint;
      fee: bigint;
    }
  | {
      type: "OutcomeTokenSale";
      market: Address;
      seller: Address;
      outcomeIndex: number;
      count: bigint;
      outcomeTokenProfit: bigint;
      fee: bigint;
    }
  | {
      type: "OutcomeTokenShortSale";
      market: Address;
      buyer: Address;
      outcomeIndex: number;
      count: bigint;
      cost: bigint;
    };

export type MarketEventType = MarketEvent["type"];

export type MarketEventListener = (event: MarketEvent) => void;

/** JSON-safe summary; amounts are decimal strings. */
export interface MarketSnapshot {
  address: Address;
  creator: Address;
  createdAt: string;
  outcomeSet: Address;
  outcomeCount: number;
  feeFraction: string;
  /** Fee as a percentage, e.g. "2" for 20_000 / 1_000_000. */
  feePercent: string;
  funding: string;
  netExposure: string[];
}
