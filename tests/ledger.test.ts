import { describe, it, expect, beforeEach } from 'vitest';
import { isStakingError } from '../src/errors';
import { DAY, setup, type Harness } from './helpers';

async function codeOf(promise: Promise<unknown>): Promise<string | null> {
  try {
    await promise;
    return null;
  } catch (error) {
    return isStakingError(error) ? error.code : 'other';
  }
}

describe('stake', () => {
  let h: Harness;

  beforeEach(() => {
    h = setup();
    h.vault.mint('alice', 100_000n);
    h.vault.mint('bob', 100_000n);
  });

  it('should take a 1% entry fee and start the stake clock', async () => {
    const receipt = await h.engine.stake('alice', 1000n);

    expect(receipt).toEqual({ amount: 1000n, fee: 10n, netAmount: 990n, weightedStakeTime: 0n });
    expect(h.engine.stats().totalStaked).toBe(990n);
    expect(h.engine.stakeInfo('alice').balance).toBe(990n);
    expect(await h.vault.balanceOf('alice')).toBe(99_000n);
    // 30% of the 10 fee leaves custody, 7 stays as pool reward
    expect(await h.vault.balanceOf('treasury')).toBe(3n);
    expect(await h.vault.balanceOf('custody')).toBe(997n);
    expect(await h.engine.availableRewards()).toBe(7n);
  });

  it('should reject stakes under the minimum', async () => {
    expect(await codeOf(h.engine.stake('alice', 99n))).toBe('BelowMinimumStake');
    expect(h.engine.stats().totalStaked).toBe(0n);
  });

  it('should blend weighted stake time by deposit share', async () => {
    await h.engine.stake('alice', 1010n);
    h.clock.advance(1000n);
    const receipt = await h.engine.stake('alice', 1010n);

    // (0 * 1000 + 1000 * 1000) / 2000
    expect(receipt.weightedStakeTime).toBe(500n);
    expect(h.engine.stakeInfo('alice').weightedStakeTime).toBe(500n);
  });

  it('should weight a small top-up lightly', async () => {
    await h.engine.stake('alice', 10_100n);
    h.clock.advance(1100n);
    await h.engine.stake('alice', 1010n);

    // 10100 nets 9999: (0 * 9999 + 1100 * 1000) / 10999, floored
    expect(h.engine.stakeInfo('alice').weightedStakeTime).toBe(100n);
  });

  it('should emit stake and fee notifications with the values used', async () => {
    await h.engine.stake('alice', 1000n);

    expect(h.sink.ofType('staked')).toEqual([
      {
        type: 'staked',
        account: 'alice',
        amount: 1000n,
        fee: 10n,
        netAmount: 990n,
        weightedStakeTime: 0n,
        timestamp: 0n,
      },
    ]);
    expect(h.sink.ofType('fee_distributed')).toEqual([
      {
        type: 'fee_distributed',
        source: 'stake',
        totalFee: 10n,
        poolShare: 7n,
        recipientShare: 3n,
        recipient: 'treasury',
        timestamp: 0n,
      },
    ]);
  });
});

describe('withdraw', () => {
  let h: Harness;

  beforeEach(() => {
    h = setup();
    h.vault.mint('alice', 100_000n);
  });

  it('should charge the 7-14 day tier on a 10 day hold', async () => {
    await h.engine.stake('alice', 1000n);
    h.clock.advance(10n * DAY);

    const receipt = await h.engine.withdraw('alice', 990n);

    expect(receipt).toEqual({
      amount: 990n,
      duration: 10n * DAY,
      feeBps: 350n,
      fee: 34n,
      netAmount: 956n,
    });
    expect(h.engine.stats().totalStaked).toBe(0n);
    expect(await h.vault.balanceOf('alice')).toBe(99_000n + 956n);
    expect(await h.vault.balanceOf('treasury')).toBe(3n + 10n);
  });

  it('should charge 350 bp at exactly 7 days', async () => {
    await h.engine.stake('alice', 1010n);
    h.clock.advance(7n * DAY);

    const receipt = await h.engine.withdraw('alice', 1000n);
    expect(receipt.feeBps).toBe(350n);
    expect(receipt.fee).toBe(35n);
    expect(receipt.netAmount).toBe(965n);
  });

  it('should charge 100 bp at exactly 30 days', async () => {
    await h.engine.stake('alice', 1010n);
    h.clock.advance(30n * DAY);

    const receipt = await h.engine.withdraw('alice', 1000n);
    expect(receipt.feeBps).toBe(100n);
    expect(receipt.fee).toBe(10n);
  });

  it('should keep weighted stake time on partial withdrawal', async () => {
    await h.engine.stake('alice', 10_100n);
    h.clock.advance(20n * DAY);
    await h.engine.withdraw('alice', 9_000n);

    const info = h.engine.stakeInfo('alice');
    expect(info.balance).toBe(999n);
    expect(info.weightedStakeTime).toBe(0n);
    expect(info.feeBps).toBe(200n);
  });

  it('should reject zero and oversized withdrawals', async () => {
    await h.engine.stake('alice', 1000n);
    expect(await codeOf(h.engine.withdraw('alice', 0n))).toBe('ZeroAmount');
    expect(await codeOf(h.engine.withdraw('alice', 991n))).toBe('InsufficientBalance');
    expect(await codeOf(h.engine.withdraw('nobody', 1n))).toBe('InsufficientBalance');
    expect(h.engine.stats().totalStaked).toBe(990n);
  });

  it('should report the fee tier it applied', async () => {
    await h.engine.stake('alice', 1000n);
    h.clock.advance(DAY);
    await h.engine.withdraw('alice', 100n);

    expect(h.sink.ofType('duration_fee_applied')).toEqual([
      {
        type: 'duration_fee_applied',
        account: 'alice',
        duration: DAY,
        feeBps: 500n,
        fee: 5n,
        timestamp: DAY,
      },
    ]);
  });
});

describe('rewards', () => {
  let h: Harness;

  beforeEach(async () => {
    h = setup({ initialRewardRate: 10n });
    h.vault.mint('alice', 100_000n);
    h.vault.mint('bob', 100_000n);
    h.vault.mint('funder', 10_000_000n);
    await h.engine.addRewards('funder', 1_000_000n);
  });

  it('should split reward evenly between equal stakes regardless of claim order', async () => {
    await h.engine.stake('alice', 505n);
    await h.engine.stake('bob', 505n);
    h.clock.advance(1000n);

    expect(h.engine.earned('alice')).toBe(5000n);
    expect(h.engine.earned('bob')).toBe(5000n);

    expect(await h.engine.claim('bob')).toBe(5000n);
    expect(await h.engine.claim('alice')).toBe(5000n);
    expect(h.engine.stats().totalRewardsDistributed).toBe(10_000n);
  });

  it('should zero pending reward on claim', async () => {
    await h.engine.stake('alice', 505n);
    h.clock.advance(100n);

    expect(await h.engine.claim('alice')).toBe(1000n);
    expect(h.engine.earned('alice')).toBe(0n);
    expect(await h.engine.claim('alice')).toBe(0n);
    expect(h.sink.ofType('reward_claimed')).toHaveLength(1);
  });

  it('should stop accruing once nothing is staked', async () => {
    await h.engine.stake('alice', 505n);
    h.clock.advance(100n);
    await h.engine.withdraw('alice', 500n);
    const stored = h.engine.rewardPerUnit();

    h.clock.advance(5000n);
    expect(h.engine.rewardPerUnit()).toBe(stored);
    expect(h.engine.earned('alice')).toBe(1000n);
  });

  it('should exit with principal and reward in one call', async () => {
    await h.engine.stake('alice', 505n);
    h.clock.advance(1000n);

    const receipt = await h.engine.exit('alice');

    expect(receipt).toEqual({
      withdrawal: { amount: 500n, duration: 1000n, feeBps: 500n, fee: 25n, netAmount: 475n },
      reward: 10_000n,
    });
    expect(h.engine.stakeInfo('alice').balance).toBe(0n);
    expect(await h.vault.balanceOf('alice')).toBe(100_000n - 505n + 475n + 10_000n);
  });

  it('should make exit a no-op for an empty account', async () => {
    expect(await h.engine.exit('nobody')).toEqual({ withdrawal: null, reward: 0n });
  });

  it('should reject zero reward deposits', async () => {
    expect(await codeOf(h.engine.addRewards('funder', 0n))).toBe('ZeroAmount');
  });
});

describe('ledger invariants', () => {
  it('should keep totalStaked equal to the sum of balances across mixed traffic', async () => {
    const h = setup({ initialRewardRate: 3n });
    const wallets = ['alice', 'bob', 'carol'];
    for (const w of wallets) h.vault.mint(w, 1_000_000n);
    h.vault.mint('funder', 10_000_000n);
    await h.engine.addRewards('funder', 5_000_000n);

    const sumBalances = () =>
      h.engine.accounts().reduce((sum, id) => sum + h.engine.stakeInfo(id).balance, 0n);

    let lastAccumulator = h.engine.stats().rewardPerUnitStored;
    const steps: [string, 'stake' | 'withdraw' | 'claim' | 'exit', bigint][] = [
      ['alice', 'stake', 1_000n],
      ['bob', 'stake', 2_500n],
      ['alice', 'withdraw', 300n],
      ['carol', 'stake', 777n],
      ['bob', 'claim', 0n],
      ['alice', 'stake', 4_040n],
      ['carol', 'exit', 0n],
      ['bob', 'withdraw', 1_000n],
      ['alice', 'exit', 0n],
    ];

    for (const [wallet, action, amount] of steps) {
      h.clock.advance(3_333n);
      if (action === 'stake') await h.engine.stake(wallet, amount);
      if (action === 'withdraw') await h.engine.withdraw(wallet, amount);
      if (action === 'claim') await h.engine.claim(wallet);
      if (action === 'exit') await h.engine.exit(wallet);

      const stats = h.engine.stats();
      expect(stats.totalStaked).toBe(sumBalances());
      expect(stats.rewardPerUnitStored).toBeGreaterThanOrEqual(lastAccumulator);
      lastAccumulator = stats.rewardPerUnitStored;
    }
  });

  it('should return the same reward-per-unit on repeated reads', async () => {
    const h = setup({ initialRewardRate: 10n });
    h.vault.mint('alice', 10_000n);
    await h.engine.stake('alice', 1_000n);
    h.clock.advance(77n);
    expect(h.engine.rewardPerUnit()).toBe(h.engine.rewardPerUnit());
  });
});
