/**
 * In-memory custody.
 *
 * Stands in for the token ledger: holders have balances, `transferIn` moves
 * tokens from a holder into the custody account and `transferOut` moves them
 * back out. A transfer that would overdraw either side resolves false.
 */

import type { TokenVault } from '../types';

export class InMemoryTokenVault implements TokenVault {
  private balances: Map<string, bigint> = new Map();

  constructor(readonly custody: string) {}

  /** Credit `holder` out of thin air (faucet / test funding) */
  mint(holder: string, amount: bigint): void {
    this.balances.set(holder, this.read(holder) + amount);
  }

  async transferIn(from: string, amount: bigint): Promise<boolean> {
    return this.move(from, this.custody, amount);
  }

  async transferOut(to: string, amount: bigint): Promise<boolean> {
    return this.move(this.custody, to, amount);
  }

  async balanceOf(holder: string): Promise<bigint> {
    return this.read(holder);
  }

  private read(holder: string): bigint {
    return this.balances.get(holder) ?? 0n;
  }

  private move(from: string, to: string, amount: bigint): boolean {
    if (amount < 0n || this.read(from) < amount) return false;
    this.balances.set(from, this.read(from) - amount);
    this.balances.set(to, this.read(to) + amount);
    return true;
  }
}
