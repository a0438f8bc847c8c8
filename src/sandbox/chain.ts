/**
 * In-process simulation host. Holds the balances and allowances of every sandbox asset
 * and implements TransactionHost by snapshotting that state.
 */

import { getContractAddress, type Address } from "viem";
import type { Checkpoint, TransactionHost } from "../types/collaborators.js";
import { SandboxAsset } from "./asset.js";
import { SandboxOutcomeSet } from "./outcome-set.js";

interface LedgerState {
  /** asset -> owner -> balance */
  balances: Map<string, Map<string, bigint>>;
  /** asset -> "owner:spender" -> allowance */
  allowances: Map<string, Map<string, bigint>>;
}

const key = (address: Address): string => address.toLowerCase();

export class SandboxChain implements TransactionHost {
  readonly deployer: Address;
  private nonce = 0n;
  private state: LedgerState = { balances: new Map(), allowances: new Map() };

  constructor(deployer: Address) {
    this.deployer = deployer;
  }

  checkpoint(): Checkpoint {
    const saved = structuredClone(this.state);
    return {
      revert: () => {
        this.state = structuredClone(saved);
      },
    };
  }

  /** Run `fn` and roll sandbox state back if it throws. */
  atomically<T>(fn: () => T): T {
    const checkpoint = this.checkpoint();
    try {
      return fn();
    } catch (err) {
      checkpoint.revert();
      throw err;
    }
  }

  /** Next CREATE address for the deployer. */
  nextAddress(): Address {
    const address = getContractAddress({ from: this.deployer, nonce: this.nonce });
    this.nonce += 1n;
    return address;
  }

  deployAsset(symbol: string): SandboxAsset {
    return new SandboxAsset(this, this.nextAddress(), symbol);
  }

  deployOutcomeSet(collateral: SandboxAsset, outcomeCount: number): SandboxOutcomeSet {
    const address = this.nextAddress();
    const outcomes = Array.from({ length: outcomeCount }, (_, i) => this.deployAsset(`OUTCOME-${i}`));
    return new SandboxOutcomeSet(this, address, collateral, outcomes);
  }

  balanceOf(asset: Address, owner: Address): bigint {
    return this.state.balances.get(key(asset))?.get(key(owner)) ?? 0n;
  }

  setBalance(asset: Address, owner: Address, amount: bigint): void {
    let balances = this.state.balances.get(key(asset));
    if (balances === undefined) {
      balances = new Map();
      this.state.balances.set(key(asset), balances);
    }
    balances.set(key(owner), amount);
  }

  allowance(asset: Address, owner: Address, spender: Address): bigint {
    return this.state.allowances.get(key(asset))?.get(`${key(owner)}:${key(spender)}`) ?? 0n;
  }

  setAllowance(asset: Address, owner: Address, spender: Address, amount: bigint): void {
    let allowances = this.state.allowances.get(key(asset));
    if (allowances === undefined) {
      allowances = new Map();
      this.state.allowances.set(key(asset), allowances);
    }
    allowances.set(`${key(owner)}:${key(spender)}`, amount);
  }
}
