/**
 * Market factory and lookup. Market addresses are derived like contract deployments:
 * CREATE address of (registry address, nonce).
 */

import { getAddress, getContractAddress, type Address } from "viem";
import type { Logger } from "pino";
import { config } from "../config/index.js";
import { logger as rootLogger, marketLogger } from "../lib/logger.js";
import type { OutcomeSetManager, PricingOracle, TransactionHost } from "../types/collaborators.js";
import { MarketError } from "./errors.js";
import { Market } from "./market.js";

export interface MarketRegistryOptions {
  address: Address;
  host: TransactionHost;
  /** Fee for markets created without one; defaults to MARKET_FEE_PERCENT. */
  defaultFeeFraction?: bigint;
  logger?: Logger;
}

export interface CreateMarketParams {
  creator: Address;
  outcomeSet: OutcomeSetManager;
  oracle: PricingOracle;
  feeFraction?: bigint;
  createdAt?: Date;
}

export class MarketRegistry {
  readonly address: Address;
  private readonly host: TransactionHost;
  private readonly defaultFeeFraction: bigint | undefined;
  private readonly log: Logger;
  private readonly markets = new Map<string, Market>();
  private nonce = 0n;

  constructor(options: MarketRegistryOptions) {
    this.address = getAddress(options.address);
    this.host = options.host;
    this.defaultFeeFraction = options.defaultFeeFraction;
    this.log = options.logger ?? rootLogger.child({ registry: this.address });
  }

  createMarket(params: CreateMarketParams): Market {
    const address = getContractAddress({ from: this.address, nonce: this.nonce });
    const market = new Market({
      address,
      creator: params.creator,
      outcomeSet: params.outcomeSet,
      oracle: params.oracle,
      host: this.host,
      feeFraction: params.feeFraction ?? this.defaultFeeFraction ?? config.defaultFeeFraction,
      createdAt: params.createdAt,
      logger: marketLogger(address),
    });
    this.nonce += 1n;
    this.markets.set(address.toLowerCase(), market);
    this.log.info(
      { market: address, creator: market.creator, outcomeCount: market.outcomeCount, feeFraction: market.feeFraction.toString() },
      "market created"
    );
    return market;
  }

  get(address: Address): Market {
    const market = this.markets.get(address.toLowerCase());
    if (market === undefined) throw new MarketError("MarketNotFound", `no market at ${address}`);
    return market;
  }

  has(address: Address): boolean {
    return this.markets.has(address.toLowerCase());
  }

  list(): Market[] {
    return [...this.markets.values()];
  }
}
