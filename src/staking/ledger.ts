/**
 * Stake Ledger
 *
 * Balance mutations. Each function takes the Settlement produced for the
 * account at the current timestamp, updates balances, totals and weighted
 * stake time, and returns the numbers the engine needs for transfers and
 * notifications. No custody calls happen here.
 */

import { StakingError } from '../errors';
import { add, div, mul, sub } from '../math/uint';
import { splitFee, type FeeSchedule, type FeeSplit } from './fees';
import type { Settlement } from './accrual';
import type { Account, LedgerState } from './state';

// ============ Types ============

export interface StakeOutcome extends FeeSplit {
  fee: bigint;
  netAmount: bigint;
  weightedStakeTime: bigint;
}

export interface WithdrawOutcome extends FeeSplit {
  duration: bigint;
  feeBps: bigint;
  fee: bigint;
  netAmount: bigint;
}

// ============ Helpers ============

/**
 * Blend the existing entry time with `now`, weighted by the new deposit's
 * share of the resulting balance.
 */
export function blendStakeTime(account: Account, netAmount: bigint, now: bigint): bigint {
  if (account.balance === 0n) return now;
  const total = add(account.balance, netAmount);
  if (total === 0n) return now;
  return div(
    add(mul(account.weightedStakeTime, account.balance), mul(now, netAmount)),
    total,
  );
}

export function stakeDuration(account: Account, now: bigint): bigint {
  if (account.balance === 0n || now <= account.weightedStakeTime) return 0n;
  return now - account.weightedStakeTime;
}

// ============ Mutations ============

export function applyStake(
  state: LedgerState,
  settlement: Settlement,
  accountId: string,
  amount: bigint,
  fees: FeeSchedule,
): StakeOutcome {
  if (amount < state.global.minimumStake) {
    throw new StakingError(
      'BelowMinimumStake',
      `stake of ${amount} is below the minimum of ${state.global.minimumStake}`,
    );
  }
  const account = settlement.account(accountId);
  const now = settlement.at;

  const fee = fees.stakeFee(amount);
  const netAmount = sub(amount, fee);

  account.weightedStakeTime = blendStakeTime(account, netAmount, now);
  account.balance = add(account.balance, netAmount);
  state.global.totalStaked = add(state.global.totalStaked, netAmount);
  state.global.totalFeesCollected = add(state.global.totalFeesCollected, fee);

  return {
    fee,
    netAmount,
    weightedStakeTime: account.weightedStakeTime,
    ...splitFee(fee),
  };
}

/**
 * The fee comes out of the gross amount. Weighted stake time is left alone,
 * so the remaining balance keeps its tier.
 */
export function applyWithdraw(
  state: LedgerState,
  settlement: Settlement,
  accountId: string,
  amount: bigint,
  fees: FeeSchedule,
): WithdrawOutcome {
  if (amount <= 0n) {
    throw new StakingError('ZeroAmount', 'withdraw amount must be positive');
  }
  const account = settlement.account(accountId);
  if (amount > account.balance) {
    throw new StakingError(
      'InsufficientBalance',
      `withdraw of ${amount} exceeds balance of ${account.balance}`,
    );
  }
  const now = settlement.at;

  const duration = stakeDuration(account, now);
  const { feeBps, fee } = fees.exitFee(amount, duration);
  const netAmount = sub(amount, fee);

  account.balance = sub(account.balance, amount);
  state.global.totalStaked = sub(state.global.totalStaked, amount);
  state.global.totalFeesCollected = add(state.global.totalFeesCollected, fee);

  return { duration, feeBps, fee, netAmount, ...splitFee(fee) };
}

/** Zero the account's banked reward and return it */
export function applyClaim(state: LedgerState, settlement: Settlement, accountId: string): bigint {
  const account = settlement.account(accountId);
  const reward = account.pendingReward;
  if (reward === 0n) return 0n;

  account.pendingReward = 0n;
  state.global.totalRewardsDistributed = add(state.global.totalRewardsDistributed, reward);
  return reward;
}
