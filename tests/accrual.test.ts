import { describe, it, expect } from 'vitest';
import { earned, rewardPerUnit, settle } from '../src/staking/accrual';
import { resolvePolicy } from '../src/staking/policy';
import { createLedgerState, getAccount, type LedgerState } from '../src/staking/state';
import { SCALE } from '../src/math/uint';

function ledger(rate: bigint): LedgerState {
  return createLedgerState(resolvePolicy(), rate, 0n);
}

describe('rewardPerUnit', () => {
  it('should not accrue with nothing staked', () => {
    const state = ledger(10n);
    expect(rewardPerUnit(state.global, 1_000n)).toBe(0n);
  });

  it('should grow by elapsed * rate * SCALE / totalStaked', () => {
    const state = ledger(10n);
    state.global.totalStaked = 500n;
    expect(rewardPerUnit(state.global, 1_000n)).toBe((1_000n * 10n * SCALE) / 500n);
  });

  it('should be idempotent between settlements', () => {
    const state = ledger(7n);
    state.global.totalStaked = 3n;
    const first = rewardPerUnit(state.global, 50n);
    const second = rewardPerUnit(state.global, 50n);
    expect(second).toBe(first);
  });
});

describe('settle', () => {
  it('should bank earned reward and snapshot the paid-up point', () => {
    const state = ledger(10n);
    getAccount(state, 'alice').balance = 500n;
    state.global.totalStaked = 500n;

    settle(state, 1_000n, 'alice');

    const alice = getAccount(state, 'alice');
    expect(alice.pendingReward).toBe(10_000n);
    expect(alice.rewardPerUnitPaid).toBe(state.global.rewardPerUnitStored);
    expect(state.global.lastUpdateTime).toBe(1_000n);
    expect(earned(state.global, alice, 1_000n)).toBe(10_000n);
  });

  it('should never decrease pending reward or the accumulator', () => {
    const state = ledger(3n);
    getAccount(state, 'alice').balance = 3n;
    state.global.totalStaked = 3n;

    let lastPending = 0n;
    let lastStored = 0n;
    for (let t = 1n; t <= 20n; t++) {
      const before = earned(state.global, getAccount(state, 'alice'), t * 13n);
      expect(before).toBeGreaterThanOrEqual(getAccount(state, 'alice').pendingReward);
      settle(state, t * 13n, 'alice');
      const alice = getAccount(state, 'alice');
      expect(alice.pendingReward).toBeGreaterThanOrEqual(lastPending);
      expect(state.global.rewardPerUnitStored).toBeGreaterThanOrEqual(lastStored);
      lastPending = alice.pendingReward;
      lastStored = state.global.rewardPerUnitStored;
    }
    // 20 * 13 seconds at 3 per second, one staker takes it all
    expect(lastPending).toBe(780n);
  });

  it('should only hand out the account it settled', () => {
    const state = ledger(1n);
    const settlement = settle(state, 5n, 'alice');
    expect(settlement.account('alice').balance).toBe(0n);
    expect(() => settlement.account('bob')).toThrow('not settled');
    expect(() => settle(state, 5n).account('alice')).toThrow('not settled');
  });
});
