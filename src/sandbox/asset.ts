import type { Address } from "viem";
import type { AssetLedger } from "../types/collaborators.js";
import type { SandboxChain } from "./chain.js";

/** Fungible token with ERC-20 transfer and allowance rules, stored on a SandboxChain. */
export class SandboxAsset implements AssetLedger {
  readonly address: Address;
  readonly symbol: string;
  private readonly chain: SandboxChain;

  constructor(chain: SandboxChain, address: Address, symbol: string) {
    this.chain = chain;
    this.address = address;
    this.symbol = symbol;
  }

  balanceOf(owner: Address): bigint {
    return this.chain.balanceOf(this.address, owner);
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.chain.allowance(this.address, owner, spender);
  }

  transfer(caller: Address, to: Address, amount: bigint): boolean {
    return this.move(caller, to, amount);
  }

  transferFrom(caller: Address, from: Address, to: Address, amount: bigint): boolean {
    const allowed = this.allowance(from, caller);
    if (amount < 0n || allowed < amount || this.balanceOf(from) < amount) return false;
    this.chain.setAllowance(this.address, from, caller, allowed - amount);
    return this.move(from, to, amount);
  }

  approve(caller: Address, spender: Address, amount: bigint): boolean {
    if (amount < 0n) return false;
    this.chain.setAllowance(this.address, caller, spender, amount);
    return true;
  }

  /** Credit `amount` out of thin air; used to seed sandbox accounts. */
  mint(to: Address, amount: bigint): void {
    if (amount < 0n) throw new RangeError(`${this.symbol}: cannot mint a negative amount`);
    this.chain.setBalance(this.address, to, this.balanceOf(to) + amount);
  }

  burn(from: Address, amount: bigint): boolean {
    const balance = this.balanceOf(from);
    if (amount < 0n || balance < amount) return false;
    this.chain.setBalance(this.address, from, balance - amount);
    return true;
  }

  private move(from: Address, to: Address, amount: bigint): boolean {
    const balance = this.balanceOf(from);
    if (amount < 0n || balance < amount) return false;
    this.chain.setBalance(this.address, from, balance - amount);
    this.chain.setBalance(this.address, to, this.balanceOf(to) + amount);
    return true;
  }
}
