export { Market, type MarketParams } from "./market.js";
export { MarketRegistry, type MarketRegistryOptions, type CreateMarketParams } from "./registry.js";
export { MarketError, isMarketError, type MarketErrorKind } from "./errors.js";
export {
  FEE_RANGE,
  calcMarketFee,
  assertFeeFraction,
  feePercentToFraction,
  feeFractionToPercent,
} from "./fees.js";
export { toInt256, checkInt256, checkUint256 } from "./int256.js";
