import { describe, it, expect, beforeEach } from "vitest";
import { getAddress } from "viem";
import { SandboxChain } from "../../src/sandbox/chain.js";
import type { SandboxAsset } from "../../src/sandbox/asset.js";
import type { SandboxOutcomeSet } from "../../src/sandbox/outcome-set.js";
import { isMarketError } from "../../src/engine/errors.js";
import { DEPLOYER, OTHER, TRADER } from "../support/market.js";

describe("sandbox chain", () => {
  let chain: SandboxChain;
  let usdc: SandboxAsset;

  beforeEach(() => {
    chain = new SandboxChain(DEPLOYER);
    usdc = chain.deployAsset("USDC");
    usdc.mint(TRADER, 500n);
  });

  describe("asset", () => {
    it("moves balances on transfer and refuses overdrafts", () => {
      expect(usdc.transfer(TRADER, OTHER, 200n)).toBe(true);
      expect(usdc.balanceOf(TRADER)).toBe(300n);
      expect(usdc.balanceOf(OTHER)).toBe(200n);
      expect(usdc.transfer(TRADER, OTHER, 301n)).toBe(false);
      expect(usdc.balanceOf(TRADER)).toBe(300n);
    });

    it("spends allowance on transferFrom", () => {
      expect(usdc.transferFrom(OTHER, TRADER, OTHER, 1n)).toBe(false);
      usdc.approve(TRADER, OTHER, 150n);
      expect(usdc.transferFrom(OTHER, TRADER, OTHER, 100n)).toBe(true);
      expect(usdc.allowance(TRADER, OTHER)).toBe(50n);
      expect(usdc.transferFrom(OTHER, TRADER, OTHER, 51n)).toBe(false);
      expect(usdc.balanceOf(OTHER)).toBe(100n);
    });

    it("treats addresses case-insensitively", () => {
      expect(usdc.balanceOf(getAddress(TRADER))).toBe(500n);
      expect(usdc.balanceOf(`0x${TRADER.slice(2).toUpperCase()}`)).toBe(500n);
    });
  });

  describe("checkpoint", () => {
    it("restores balances and allowances on revert", () => {
      const checkpoint = chain.checkpoint();
      usdc.transfer(TRADER, OTHER, 100n);
      usdc.approve(TRADER, OTHER, 7n);
      checkpoint.revert();
      expect(usdc.balanceOf(TRADER)).toBe(500n);
      expect(usdc.balanceOf(OTHER)).toBe(0n);
      expect(usdc.allowance(TRADER, OTHER)).toBe(0n);
    });

    it("can be reverted twice to the same state", () => {
      const checkpoint = chain.checkpoint();
      usdc.transfer(TRADER, OTHER, 100n);
      checkpoint.revert();
      usdc.transfer(TRADER, OTHER, 300n);
      checkpoint.revert();
      expect(usdc.balanceOf(OTHER)).toBe(0n);
    });

    it("gives each deployment a fresh address", () => {
      const other = chain.deployAsset("DAI");
      expect(other.address).not.toBe(usdc.address);
    });
  });

  describe("outcome set", () => {
    let outcomes: SandboxOutcomeSet;

    beforeEach(() => {
      outcomes = chain.deployOutcomeSet(usdc, 3);
    });

    it("mints a full set against approved collateral", () => {
      usdc.approve(TRADER, outcomes.address, 100n);
      outcomes.buyAllOutcomes(TRADER, 100n);
      expect(usdc.balanceOf(TRADER)).toBe(400n);
      expect(usdc.balanceOf(outcomes.address)).toBe(100n);
      for (let i = 0; i < 3; i++) expect(outcomes.outcomeAsset(i).balanceOf(TRADER)).toBe(100n);
    });

    it("throws TransferFailure without approval", () => {
      let caught: unknown;
      try {
        outcomes.buyAllOutcomes(TRADER, 100n);
      } catch (err) {
        caught = err;
      }
      expect(isMarketError(caught, "TransferFailure")).toBe(true);
      expect(outcomes.outcomeAsset(0).balanceOf(TRADER)).toBe(0n);
    });

    it("burns a full set back into collateral", () => {
      usdc.approve(TRADER, outcomes.address, 100n);
      outcomes.buyAllOutcomes(TRADER, 100n);
      outcomes.sellAllOutcomes(TRADER, 60n);
      expect(usdc.balanceOf(TRADER)).toBe(460n);
      expect(outcomes.outcomeAsset(2).balanceOf(TRADER)).toBe(40n);
    });

    it("burns nothing when one outcome is short", () => {
      usdc.approve(TRADER, outcomes.address, 100n);
      outcomes.buyAllOutcomes(TRADER, 100n);
      outcomes.outcomeAsset(2).transfer(TRADER, OTHER, 50n);

      expect(() => outcomes.sellAllOutcomes(TRADER, 60n)).toThrow("TransferFailure");
      expect(outcomes.outcomeAsset(0).balanceOf(TRADER)).toBe(100n);
      expect(outcomes.outcomeAsset(1).balanceOf(TRADER)).toBe(100n);
      expect(usdc.balanceOf(TRADER)).toBe(400n);
    });

    it("rejects an outcome index past the end", () => {
      expect(() => outcomes.outcomeAsset(3)).toThrow(RangeError);
    });
  });
});
