import type { Address } from "viem";
import { requireTransfer } from "../engine/errors.js";
import type { OutcomeSetManager } from "../types/collaborators.js";
import type { SandboxAsset } from "./asset.js";
import type { SandboxChain } from "./chain.js";

/** Mints and burns full outcome sets 1:1 against a sandbox collateral asset. */
export class SandboxOutcomeSet implements OutcomeSetManager {
  readonly address: Address;
  private readonly chain: SandboxChain;
  private readonly collateral: SandboxAsset;
  private readonly outcomes: SandboxAsset[];

  constructor(chain: SandboxChain, address: Address, collateral: SandboxAsset, outcomes: SandboxAsset[]) {
    this.chain = chain;
    this.address = address;
    this.collateral = collateral;
    this.outcomes = outcomes;
  }

  outcomeCount(): number {
    return this.outcomes.length;
  }

  collateralAsset(): SandboxAsset {
    return this.collateral;
  }

  outcomeAsset(index: number): SandboxAsset {
    const asset = this.outcomes[index];
    if (asset === undefined) throw new RangeError(`No outcome asset at index ${index}`);
    return asset;
  }

  buyAllOutcomes(caller: Address, amount: bigint): void {
    this.chain.atomically(() => {
      requireTransfer(
        this.collateral.transferFrom(this.address, caller, this.address, amount),
        "collateral pull for full outcome set"
      );
      for (const outcome of this.outcomes) outcome.mint(caller, amount);
    });
  }

  sellAllOutcomes(caller: Address, amount: bigint): void {
    this.chain.atomically(() => {
      this.outcomes.forEach((outcome, i) => {
        requireTransfer(outcome.burn(caller, amount), `burn of outcome ${i} for full outcome set`);
      });
      requireTransfer(this.collateral.transfer(this.address, caller, amount), "collateral payout for full outcome set");
    });
  }
}
