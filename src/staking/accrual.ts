/**
 * Reward Accrual
 *
 * Reward-per-share accounting. `rewardPerUnitStored` accumulates, at 1e18
 * scale, the reward each staked unit has earned since inception; an account's
 * reward is its balance times the growth of that accumulator since it was last
 * settled, plus whatever it had already banked.
 *
 * Every operation that touches a balance, the total or the rate must call
 * `settle` first. Ledger and controller mutations take the returned
 * Settlement as proof that it happened at the current timestamp.
 */

import { SCALE, add, mul, mulDiv, sub } from '../math/uint';
import { getAccount, type Account, type GlobalState, type LedgerState } from './state';

// ============ Reads ============

export function rewardPerUnit(global: GlobalState, now: bigint): bigint {
  if (global.totalStaked === 0n || now <= global.lastUpdateTime) {
    return global.rewardPerUnitStored;
  }
  const elapsed = sub(now, global.lastUpdateTime);
  return add(
    global.rewardPerUnitStored,
    mulDiv(mul(elapsed, global.rewardRate), SCALE, global.totalStaked),
  );
}

export function earned(global: GlobalState, account: Account, now: bigint): bigint {
  const delta = sub(rewardPerUnit(global, now), account.rewardPerUnitPaid);
  return add(mulDiv(account.balance, delta, SCALE), account.pendingReward);
}

// ============ Settlement ============

export class Settlement {
  private constructor(
    readonly state: LedgerState,
    readonly at: bigint,
    readonly accountId: string | null,
  ) {}

  /**
   * Roll the accumulator forward to `now` and, when an account is given,
   * bank its earned reward and re-snapshot its paid-up point.
   */
  static settle(state: LedgerState, now: bigint, accountId: string | null = null): Settlement {
    const global = state.global;
    global.rewardPerUnitStored = rewardPerUnit(global, now);
    if (now > global.lastUpdateTime) global.lastUpdateTime = now;

    if (accountId !== null) {
      const account = getAccount(state, accountId);
      account.pendingReward = earned(global, account, now);
      account.rewardPerUnitPaid = global.rewardPerUnitStored;
    }
    return new Settlement(state, now, accountId);
  }

  /** Account this settlement covers; fails if it was global-only or for someone else */
  account(id: string): Account {
    if (this.accountId !== id) {
      throw new Error(`account ${id} was not settled`);
    }
    return getAccount(this.state, id);
  }
}

export function settle(state: LedgerState, now: bigint, accountId: string | null = null): Settlement {
  return Settlement.settle(state, now, accountId);
}
