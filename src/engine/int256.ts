/**
 * Checked 256-bit integer arithmetic for market amounts (unsigned) and net exposure
 * (signed). Values outside the range raise ArithmeticOverflow instead of wrapping.
 */

import { maxInt256, maxUint256, minInt256 } from "viem";
import { MarketError } from "./errors.js";

export function checkUint256(value: bigint, label: string): bigint {
  if (value < 0n || value > maxUint256) {
    throw new MarketError("ArithmeticOverflow", `${label} out of uint256 range: ${value}`);
  }
  return value;
}

/** Widen an unsigned amount to a signed one; fails when it does not fit in int256. */
export function toInt256(value: bigint, label: string): bigint {
  checkUint256(value, label);
  if (value > maxInt256) {
    throw new MarketError("ArithmeticOverflow", `${label} does not fit in int256: ${value}`);
  }
  return value;
}

export function checkInt256(value: bigint, label: string): bigint {
  if (value < minInt256 || value > maxInt256) {
    throw new MarketError("ArithmeticOverflow", `${label} out of int256 range: ${value}`);
  }
  return value;
}

export function addUint256(a: bigint, b: bigint, label: string): bigint {
  return checkUint256(a + b, label);
}

export function subUint256(a: bigint, b: bigint, label: string): bigint {
  return checkUint256(a - b, label);
}
