/**
 * Market core: trades outcome tokens against a pricing oracle, collects a proportional
 * fee and tracks net exposure per outcome.
 *
 * ATOMICITY: every public operation runs inside `atomically()`. The market snapshots its
 * own state and takes a host checkpoint; if any step throws, both are reverted and the
 * error is rethrown. Events raised during the operation are delivered only after commit.
 * Operations are synchronous, so two operations on one market never interleave; a
 * collaborator calling back into the market mid-operation gets ReentrantCall.
 * Callers are checksummed on entry, so event identities match `creator` and `address`.
 */

import { getAddress, isAddress, isAddressEqual, type Address } from "viem";
import type { Logger } from "pino";
import { marketLogger } from "../lib/logger.js";
import { marketParamsSchema } from "../schemas/market.schema.js";
import type {
  AssetLedger,
  OutcomeSetManager,
  PricingOracle,
  TransactionHost,
} from "../types/collaborators.js";
import type {
  MarketEvent,
  MarketEventListener,
  MarketSnapshot,
  MarketState,
} from "../types/market.js";
import { MarketError, isMarketError, requireTransfer } from "./errors.js";
import { assertFeeFraction, calcMarketFee, feeFractionToPercent } from "./fees.js";
import { addUint256, checkInt256, checkUint256, subUint256, toInt256 } from "./int256.js";

export interface MarketParams {
  address: Address;
  creator: Address;
  outcomeSet: OutcomeSetManager;
  oracle: PricingOracle;
  host: TransactionHost;
  feeFraction: bigint;
  createdAt?: Date;
  logger?: Logger;
}

interface SaleQuote {
  outcomeTokenProfit: bigint;
  fee: bigint;
  profit: bigint;
}

const OUTCOME_SET_METHODS = [
  "outcomeCount",
  "collateralAsset",
  "outcomeAsset",
  "buyAllOutcomes",
  "sellAllOutcomes",
] as const;
const ORACLE_METHODS = ["calcCost", "calcProfit"] as const;
const HOST_METHODS = ["checkpoint"] as const;

function hasMethods(value: unknown, methods: readonly string[]): boolean {
  return (
    typeof value === "object" &&
    value !== null &&
    methods.every((m) => typeof Reflect.get(value, m) === "function")
  );
}

export class Market {
  readonly address: Address;
  readonly creator: Address;
  readonly createdAt: Date;
  readonly outcomeSet: OutcomeSetManager;
  readonly oracle: PricingOracle;
  readonly feeFraction: bigint;
  private readonly host: TransactionHost;
  private readonly log: Logger;
  private fundingTotal = 0n;
  private exposure: bigint[];
  private readonly listeners = new Set<MarketEventListener>();
  /** Events raised by the operation in progress. */
  private pending: MarketEvent[] = [];
  /** Operation in progress, if any. */
  private active: string | null = null;

  constructor(params: MarketParams) {
    const parsed = marketParamsSchema.safeParse(params);
    if (!parsed.success) {
      throw new MarketError("InvalidConstruction", parsed.error.issues.map((i) => i.message).join("; "));
    }
    if (!hasMethods(params.outcomeSet, OUTCOME_SET_METHODS)) {
      throw new MarketError("InvalidConstruction", "outcome set manager is missing or incomplete");
    }
    if (!hasMethods(params.oracle, ORACLE_METHODS)) {
      throw new MarketError("InvalidConstruction", "pricing oracle is missing or incomplete");
    }
    if (!hasMethods(params.host, HOST_METHODS)) {
      throw new MarketError("InvalidConstruction", "transaction host is missing or incomplete");
    }
    const outcomeCount = params.outcomeSet.outcomeCount();
    if (!Number.isInteger(outcomeCount) || outcomeCount < 2) {
      throw new MarketError("InvalidConstruction", `outcome count must be an integer >= 2, got ${outcomeCount}`);
    }

    this.address = parsed.data.address;
    this.creator = parsed.data.creator;
    this.createdAt = parsed.data.createdAt ?? new Date();
    this.feeFraction = assertFeeFraction(parsed.data.feeFraction);
    this.outcomeSet = params.outcomeSet;
    this.oracle = params.oracle;
    this.host = params.host;
    this.exposure = Array.from({ length: outcomeCount }, () => 0n);
    this.log = params.logger ?? marketLogger(this.address);
  }

  /** Cumulative collateral contributed via fund(). */
  get funding(): bigint {
    return this.fundingTotal;
  }

  get outcomeCount(): number {
    return this.exposure.length;
  }

  netExposure(): bigint[] {
    return [...this.exposure];
  }

  calcMarketFee(amount: bigint): bigint {
    return calcMarketFee(amount, this.feeFraction);
  }

  /** Subscribe to committed market events. Returns an unsubscribe function. */
  onEvent(listener: MarketEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Creator-only: pull collateral and convert it into a full outcome set held by the market. */
  fund(caller: Address, amount: bigint): void {
    this.atomically("fund", caller, (caller) => {
      this.requireCreator(caller, "fund");
      checkUint256(amount, "funding amount");
      const collateral = this.outcomeSet.collateralAsset();
      requireTransfer(
        collateral.transferFrom(this.address, caller, this.address, amount),
        "collateral pull from creator"
      );
      this.mintOutcomeSet(collateral, amount);
      this.fundingTotal = addUint256(this.fundingTotal, amount, "funding");
      this.emit({ type: "MarketFunding", market: this.address, funder: caller, amount });
    });
  }

  /**
   * Buy `count` tokens of one outcome for at most `maxCost` collateral.
   * Only the oracle cost is converted into outcome tokens; the fee stays with the market.
   */
  buy(caller: Address, outcomeIndex: number, count: bigint, maxCost: bigint): bigint {
    return this.atomically("buy", caller, (caller) => {
      this.requireOutcome(outcomeIndex);
      this.requirePositive(count, "count");
      checkUint256(maxCost, "max cost");

      const outcomeTokenCost = checkUint256(
        this.oracle.calcCost(this.state(), outcomeIndex, count),
        "outcome token cost"
      );
      const fee = this.calcMarketFee(outcomeTokenCost);
      const cost = addUint256(outcomeTokenCost, fee, "cost");
      if (cost <= 0n) throw new MarketError("NonPositiveAmount", "trade cost must be positive");
      if (cost > maxCost) {
        throw new MarketError("SlippageExceeded", `cost ${cost} exceeds max cost ${maxCost}`);
      }

      const collateral = this.outcomeSet.collateralAsset();
      requireTransfer(
        collateral.transferFrom(this.address, caller, this.address, cost),
        "collateral pull from buyer"
      );
      this.mintOutcomeSet(collateral, outcomeTokenCost);
      requireTransfer(
        this.outcomeSet.outcomeAsset(outcomeIndex).transfer(this.address, caller, count),
        "outcome token payout to buyer"
      );
      this.adjustExposure(outcomeIndex, toInt256(count, "count"));
      this.emit({
        type: "OutcomeTokenPurchase",
        market: this.address,
        buyer: caller,
        outcomeIndex,
        count,
        outcomeTokenCost,
        fee,
      });
      return cost;
    });
  }

  /** Sell `count` tokens of one outcome (pre-approved to the market) for at least `minProfit`. */
  sell(caller: Address, outcomeIndex: number, count: bigint, minProfit: bigint): bigint {
    return this.atomically("sell", caller, (caller) => {
      this.requireOutcome(outcomeIndex);
      this.requirePositive(count, "count");
      checkUint256(minProfit, "min profit");

      const quote = this.quoteSale(outcomeIndex, count, minProfit);
      requireTransfer(
        this.outcomeSet.outcomeAsset(outcomeIndex).transferFrom(this.address, caller, this.address, count),
        "outcome token pull from seller"
      );
      this.settleSale(caller, outcomeIndex, count, quote);
      requireTransfer(
        this.outcomeSet.collateralAsset().transfer(this.address, caller, quote.profit),
        "collateral payout to seller"
      );
      return quote.profit;
    });
  }

  /**
   * Short one outcome: mint `count` full sets from the caller's collateral, sell the
   * shorted outcome back to the market and hand over every other outcome plus the
   * sale proceeds. Returns the net collateral cost, `count - profit`.
   */
  shortSell(caller: Address, outcomeIndex: number, count: bigint, minProfit: bigint): bigint {
    return this.atomically("shortSell", caller, (caller) => {
      this.requireOutcome(outcomeIndex);
      this.requirePositive(count, "count");
      checkUint256(minProfit, "min profit");

      const collateral = this.outcomeSet.collateralAsset();
      requireTransfer(
        collateral.transferFrom(this.address, caller, this.address, count),
        "collateral pull from short seller"
      );
      this.mintOutcomeSet(collateral, count);

      // The minted outcome tokens are already in custody: sell them without a transfer.
      const quote = this.quoteSale(outcomeIndex, count, minProfit);
      this.settleSale(this.address, outcomeIndex, count, quote);
      const cost = subUint256(count, quote.profit, "short sell cost");

      for (let i = 0; i < this.outcomeCount; i++) {
        if (i === outcomeIndex) continue;
        requireTransfer(
          this.outcomeSet.outcomeAsset(i).transfer(this.address, caller, count),
          `outcome ${i} payout to short seller`
        );
      }
      requireTransfer(collateral.transfer(this.address, caller, quote.profit), "collateral change to short seller");
      this.emit({
        type: "OutcomeTokenShortSale",
        market: this.address,
        buyer: caller,
        outcomeIndex,
        count,
        cost,
      });
      return cost;
    });
  }

  /**
   * Creator-only: hand every outcome token the market holds to the creator.
   * Net exposure is left as is. Returns the amounts moved per outcome.
   */
  close(caller: Address): bigint[] {
    return this.atomically("close", caller, (caller) => {
      this.requireCreator(caller, "close");
      const amounts: bigint[] = [];
      for (let i = 0; i < this.outcomeCount; i++) {
        const asset = this.outcomeSet.outcomeAsset(i);
        const balance = asset.balanceOf(this.address);
        requireTransfer(asset.transfer(this.address, this.creator, balance), `outcome ${i} transfer to creator`);
        amounts.push(balance);
      }
      this.emit({ type: "MarketClosing", market: this.address, creator: this.creator, amounts });
      return amounts;
    });
  }

  /** Creator-only: transfer the market's whole collateral balance to the creator. */
  withdrawFees(caller: Address): bigint {
    return this.atomically("withdrawFees", caller, (caller) => {
      this.requireCreator(caller, "withdrawFees");
      const collateral = this.outcomeSet.collateralAsset();
      const amount = collateral.balanceOf(this.address);
      requireTransfer(collateral.transfer(this.address, this.creator, amount), "fee transfer to creator");
      this.emit({ type: "FeeWithdrawal", market: this.address, creator: this.creator, amount });
      return amount;
    });
  }

  snapshot(): MarketSnapshot {
    return {
      address: this.address,
      creator: this.creator,
      createdAt: this.createdAt.toISOString(),
      outcomeSet: this.outcomeSet.address,
      outcomeCount: this.outcomeCount,
      feeFraction: this.feeFraction.toString(),
      feePercent: feeFractionToPercent(this.feeFraction),
      funding: this.fundingTotal.toString(),
      netExposure: this.exposure.map((e) => e.toString()),
    };
  }

  private state(): MarketState {
    const exposure = [...this.exposure];
    return {
      address: this.address,
      funding: this.fundingTotal,
      feeFraction: this.feeFraction,
      outcomeCount: this.outcomeCount,
      netExposure: () => [...exposure],
    };
  }

  private atomically<T>(operation: string, caller: Address, run: (caller: Address) => T): T {
    if (this.active !== null) {
      throw new MarketError("ReentrantCall", `${operation} called while ${this.active} is in progress`);
    }
    if (!isAddress(caller, { strict: false })) {
      throw new MarketError("Unauthorized", `caller ${caller} is not an address`);
    }
    const who = getAddress(caller);
    const checkpoint = this.host.checkpoint();
    const funding = this.fundingTotal;
    const exposure = [...this.exposure];
    this.pending = [];
    this.active = operation;
    let result: T;
    try {
      result = run(who);
    } catch (err) {
      this.active = null;
      checkpoint.revert();
      this.fundingTotal = funding;
      this.exposure = exposure;
      this.pending = [];
      this.log.warn(
        { operation, caller: who, kind: isMarketError(err) ? err.kind : undefined, err },
        "market operation reverted"
      );
      throw err;
    }
    this.active = null;
    const events = this.pending;
    this.pending = [];
    this.log.debug({ operation, caller: who }, "market operation committed");
    for (const event of events) this.deliver(event);
    return result;
  }

  private deliver(event: MarketEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.log.error({ err, event: event.type }, "market event listener failed");
      }
    }
  }

  private emit(event: MarketEvent): void {
    this.pending.push(event);
  }

  private requireCreator(caller: Address, operation: string): void {
    if (!isAddressEqual(caller, this.creator)) {
      throw new MarketError("Unauthorized", `${operation} is restricted to the market creator`);
    }
  }

  private requireOutcome(outcomeIndex: number): void {
    if (!Number.isInteger(outcomeIndex) || outcomeIndex < 0 || outcomeIndex >= this.outcomeCount) {
      throw new MarketError(
        "InvalidOutcomeIndex",
        `outcome index must be 0..${this.outcomeCount - 1}, got ${outcomeIndex}`
      );
    }
  }

  private requirePositive(amount: bigint, label: string): void {
    checkUint256(amount, label);
    if (amount === 0n) throw new MarketError("NonPositiveAmount", `${label} must be positive`);
  }

  /** Approve the outcome set manager for `amount` collateral and mint a full set into custody. */
  private mintOutcomeSet(collateral: AssetLedger, amount: bigint): void {
    requireTransfer(
      collateral.approve(this.address, this.outcomeSet.address, amount),
      "collateral approval for outcome set manager"
    );
    this.outcomeSet.buyAllOutcomes(this.address, amount);
  }

  private quoteSale(outcomeIndex: number, count: bigint, minProfit: bigint): SaleQuote {
    const outcomeTokenProfit = checkUint256(
      this.oracle.calcProfit(this.state(), outcomeIndex, count),
      "outcome token profit"
    );
    const fee = this.calcMarketFee(outcomeTokenProfit);
    const profit = outcomeTokenProfit - fee;
    if (profit <= 0n) throw new MarketError("NonPositiveAmount", "trade profit must be positive");
    if (profit < minProfit) {
      throw new MarketError("SlippageExceeded", `profit ${profit} is below min profit ${minProfit}`);
    }
    return { outcomeTokenProfit, fee, profit };
  }

  /** Redeem full sets for the gross profit and book the sale. The fee stays as collateral. */
  private settleSale(seller: Address, outcomeIndex: number, count: bigint, quote: SaleQuote): void {
    this.outcomeSet.sellAllOutcomes(this.address, quote.outcomeTokenProfit);
    this.adjustExposure(outcomeIndex, -toInt256(count, "count"));
    this.emit({
      type: "OutcomeTokenSale",
      market: this.address,
      seller,
      outcomeIndex,
      count,
      outcomeTokenProfit: quote.outcomeTokenProfit,
      fee: quote.fee,
    });
  }

  private adjustExposure(outcomeIndex: number, delta: bigint): void {
    this.exposure[outcomeIndex] = checkInt256(
      this.exposure[outcomeIndex] + delta,
      `net exposure of outcome ${outcomeIndex}`
    );
  }
}
