import { Decimal } from "decimal.js";
import { MarketError } from "./errors.js";
import { checkUint256 } from "./int256.js";

/** Denominator of the fee fraction: 1_000_000 = 100%. */
export const FEE_RANGE = 1_000_000n;

export function assertFeeFraction(feeFraction: bigint): bigint {
  if (feeFraction < 0n || feeFraction >= FEE_RANGE) {
    throw new MarketError(
      "InvalidConstruction",
      `fee fraction must be in [0, ${FEE_RANGE}), got ${feeFraction}`
    );
  }
  return feeFraction;
}

/**
 * Fee charged on a gross trade amount: floor(amount * feeFraction / FEE_RANGE).
 * Same rule on the buy and sell side.
 */
export function calcMarketFee(amount: bigint, feeFraction: bigint): bigint {
  checkUint256(amount, "fee base");
  return (amount * feeFraction) / FEE_RANGE;
}

/**
 * Parse a decimal percent ("2", "0.25") into a fee fraction over FEE_RANGE.
 * Percents finer than FEE_RANGE resolves (four decimal places) are rejected.
 */
export function feePercentToFraction(percent: string): bigint {
  let d: Decimal;
  try {
    d = new Decimal(percent.trim());
  } catch {
    throw new MarketError("InvalidConstruction", `fee percent is not a number: "${percent}"`);
  }
  if (!d.isFinite()) {
    throw new MarketError("InvalidConstruction", `fee percent is not finite: "${percent}"`);
  }
  const fraction = d.times(FEE_RANGE.toString()).div(100);
  if (!fraction.isInteger()) {
    throw new MarketError("InvalidConstruction", `fee percent has too many decimals: "${percent}"`);
  }
  return assertFeeFraction(BigInt(fraction.toFixed(0)));
}

export function feeFractionToPercent(feeFraction: bigint): string {
  return new Decimal(feeFraction.toString()).times(100).div(FEE_RANGE.toString()).toString();
}
