import { describe, it, expect } from "vitest";
import {
  FEE_RANGE,
  assertFeeFraction,
  calcMarketFee,
  feeFractionToPercent,
  feePercentToFraction,
} from "./fees.js";
import { MarketError } from "./errors.js";

const TWO_PERCENT = 20_000n;

describe("market fee", () => {
  describe("calcMarketFee", () => {
    it("takes 2% of 1000 as 20", () => {
      expect(calcMarketFee(1000n, TWO_PERCENT)).toBe(20n);
    });

    it("is 0 for a zero amount", () => {
      expect(calcMarketFee(0n, TWO_PERCENT)).toBe(0n);
    });

    it("truncates toward zero", () => {
      expect(calcMarketFee(49n, TWO_PERCENT)).toBe(0n);
      expect(calcMarketFee(50n, TWO_PERCENT)).toBe(1n);
      expect(calcMarketFee(99n, TWO_PERCENT)).toBe(1n);
    });

    it("is non-decreasing in the amount", () => {
      let previous = 0n;
      for (let amount = 0n; amount <= 500n; amount += 7n) {
        const fee = calcMarketFee(amount, 333_333n);
        expect(fee).toBeGreaterThanOrEqual(previous);
        previous = fee;
      }
    });

    it("charges nothing with a zero fee fraction", () => {
      expect(calcMarketFee(1_000_000_000n, 0n)).toBe(0n);
    });

    it("rejects a negative amount", () => {
      expect(() => calcMarketFee(-1n, TWO_PERCENT)).toThrow(MarketError);
    });
  });

  describe("assertFeeFraction", () => {
    it("accepts 0 and FEE_RANGE - 1", () => {
      expect(assertFeeFraction(0n)).toBe(0n);
      expect(assertFeeFraction(FEE_RANGE - 1n)).toBe(999_999n);
    });

    it("rejects FEE_RANGE and negatives", () => {
      expect(() => assertFeeFraction(FEE_RANGE)).toThrow("InvalidConstruction");
      expect(() => assertFeeFraction(-1n)).toThrow("InvalidConstruction");
    });
  });

  describe("percent conversion", () => {
    it("parses decimal percents exactly", () => {
      expect(feePercentToFraction("2")).toBe(20_000n);
      expect(feePercentToFraction("0.25")).toBe(2_500n);
      expect(feePercentToFraction(" 0.0001 ")).toBe(1n);
      expect(feePercentToFraction("0")).toBe(0n);
    });

    it("rejects percents finer than the fee range", () => {
      expect(() => feePercentToFraction("0.00001")).toThrow("too many decimals");
    });

    it("rejects 100% and above, negatives and non-numbers", () => {
      expect(() => feePercentToFraction("100")).toThrow(MarketError);
      expect(() => feePercentToFraction("-1")).toThrow(MarketError);
      expect(() => feePercentToFraction("two")).toThrow("not a number");
      expect(() => feePercentToFraction("Infinity")).toThrow("not finite");
    });

    it("formats fractions as percents", () => {
      expect(feeFractionToPercent(20_000n)).toBe("2");
      expect(feeFractionToPercent(2_500n)).toBe("0.25");
      expect(feeFractionToPercent(0n)).toBe("0");
    });
  });
});
