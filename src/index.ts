export * from "./engine/index.js";
export * from "./sandbox/index.js";
export { buildApp, type BuildAppOptions } from "./app.js";
export { config } from "./config/index.js";
export { logger, marketLogger } from "./lib/logger.js";
export type {
  AssetLedger,
  OutcomeSetManager,
  PricingOracle,
  TransactionHost,
  Checkpoint,
} from "./types/collaborators.js";
export type {
  MarketState,
  MarketEvent,
  MarketEventType,
  MarketEventListener,
  MarketSnapshot,
} from "./types/market.js";
