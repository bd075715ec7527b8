/**
 * Ledger State
 *
 * The global accumulator/controller state plus the per-account map. Only the
 * operations in accrual, ledger and controller write to it, and only through
 * the engine, which snapshots it before each operation and restores the
 * snapshot if the operation fails.
 */

import type { RateAdjustmentReason } from '../types';
import type { Policy } from './policy';

// ============ Types ============

export interface Account {
  /** Staked amount, net of the entry fee */
  balance: bigint;
  /** rewardPerUnitStored at this account's last settlement */
  rewardPerUnitPaid: bigint;
  pendingReward: bigint;
  /** Amount-weighted average of stake entry times */
  weightedStakeTime: bigint;
}

export interface GlobalState extends Policy {
  totalStaked: bigint;
  rewardRate: bigint;
  rewardPerUnitStored: bigint;
  lastUpdateTime: bigint;
  lastRateAdjustmentTime: bigint;
  lastAdjustmentReason: RateAdjustmentReason | null;
  totalFeesCollected: bigint;
  totalRewardsDistributed: bigint;
  totalRewardsAdded: bigint;
}

export interface LedgerState {
  global: GlobalState;
  accounts: Map<string, Account>;
}

// ============ Construction ============

export function createLedgerState(policy: Policy, rewardRate: bigint, now: bigint): LedgerState {
  return {
    global: {
      ...policy,
      totalStaked: 0n,
      rewardRate,
      rewardPerUnitStored: 0n,
      lastUpdateTime: now,
      lastRateAdjustmentTime: now,
      lastAdjustmentReason: null,
      totalFeesCollected: 0n,
      totalRewardsDistributed: 0n,
      totalRewardsAdded: 0n,
    },
    accounts: new Map(),
  };
}

export function emptyAccount(): Account {
  return {
    balance: 0n,
    rewardPerUnitPaid: 0n,
    pendingReward: 0n,
    weightedStakeTime: 0n,
  };
}

/** Read an account without creating it */
export function peekAccount(state: LedgerState, id: string): Account {
  return state.accounts.get(id) ?? emptyAccount();
}

/** Fetch an account, creating it on first touch */
export function getAccount(state: LedgerState, id: string): Account {
  let account = state.accounts.get(id);
  if (!account) {
    account = emptyAccount();
    state.accounts.set(id, account);
  }
  return account;
}

// ============ Rollback ============

export function snapshotState(state: LedgerState): LedgerState {
  return structuredClone(state);
}

export function restoreState(state: LedgerState, snapshot: LedgerState): void {
  Object.assign(state.global, snapshot.global);
  state.accounts.clear();
  for (const [id, account] of snapshot.accounts) {
    state.accounts.set(id, { ...account });
  }
}
