/**
 * Staking Engine
 *
 * The one place the ledger is driven from. Every mutating call:
 *   1. rejects re-entry while another mutation is in flight
 *   2. settles accrual for the affected account (or globally)
 *   3. lets the rate controller run if its period has elapsed
 *   4. mutates the ledger
 *   5. moves tokens through the vault
 * and either commits all of it or restores the pre-call state and refunds
 * anything it pulled in. Payouts are checked against custody before the first
 * one leaves; once one has gone out the operation commits, and any later
 * payout the vault refuses stays owed. Notifications go out only after a commit.
 */

import { StakingError } from '../errors';
import { add, isUint, sub } from '../math/uint';
import logger from '../utils/logger';
import {
  systemClock,
  type Authorizer,
  type Clock,
  type EventSink,
  type PolicyField,
  type StakingEvent,
  type TokenVault,
} from '../types';
import { earned, rewardPerUnit, settle, type Settlement } from './accrual';
import {
  availableRewards,
  checkAdjustment,
  commitRate,
  currentAPR,
  sustainabilityDays,
  type AdjustmentProposal,
} from './controller';
import { FeeSchedule, type FeeTier } from './fees';
import { applyClaim, applyStake, applyWithdraw, stakeDuration } from './ledger';
import { resolvePolicy, validatePolicyValue, type Policy } from './policy';
import {
  createLedgerState,
  peekAccount,
  restoreState,
  snapshotState,
  type GlobalState,
  type LedgerState,
} from './state';

// ============ Types ============

export interface StakingEngineOptions {
  vault: TokenVault;
  authorizer: Authorizer;
  /** Custody account whose vault balance backs stakes and rewards */
  custodyAccount: string;
  /** Receives the 30% share of every fee */
  feeRecipient: string;
  sink?: EventSink;
  clock?: Clock;
  policy?: Partial<Policy>;
  /** Starting emission rate; defaults to the policy's minRewardRate */
  initialRewardRate?: bigint;
  feeTiers?: readonly FeeTier[];
}

export interface StakeInfo {
  account: string;
  balance: bigint;
  earned: bigint;
  pendingReward: bigint;
  weightedStakeTime: bigint;
  /** Seconds since the weighted stake time; 0 with no balance */
  duration: bigint;
  /** Exit fee tier that a withdrawal right now would pay */
  feeBps: bigint;
}

export interface StakeReceipt {
  amount: bigint;
  fee: bigint;
  netAmount: bigint;
  weightedStakeTime: bigint;
}

export interface WithdrawReceipt {
  amount: bigint;
  duration: bigint;
  feeBps: bigint;
  fee: bigint;
  netAmount: bigint;
}

export interface ExitReceipt {
  withdrawal: WithdrawReceipt | null;
  reward: bigint;
}

export type EngineStats = Readonly<GlobalState> & {
  rewardPerUnit: bigint;
  currentAPR: bigint;
  accountCount: number;
};

interface Operation {
  now: bigint;
  events: StakingEvent[];
  pulled: { from: string; amount: bigint }[];
  /** Set once a payout has left custody; the operation can no longer roll back */
  committed: boolean;
}

interface Payout {
  to: string;
  amount: bigint;
  /** Rewards come only out of custody above staked principal */
  reward: boolean;
  /** Keeps the amount owed when the vault refuses it after an earlier payout */
  retain?: () => void;
}

// ============ Engine ============

export class StakingEngine {
  readonly fees: FeeSchedule;
  readonly custodyAccount: string;
  readonly feeRecipient: string;

  private readonly state: LedgerState;
  private readonly vault: TokenVault;
  private readonly authorizer: Authorizer;
  private readonly sink: EventSink | null;
  private readonly clock: Clock;
  private busy = false;

  constructor(options: StakingEngineOptions) {
    const policy = resolvePolicy(options.policy);
    const initialRate = options.initialRewardRate ?? policy.minRewardRate;
    if (!isUint(initialRate) || initialRate < policy.minRewardRate) {
      throw new StakingError(
        'InvalidConfiguration',
        `initial reward rate ${initialRate} is below minRewardRate ${policy.minRewardRate}`,
      );
    }

    this.vault = options.vault;
    this.authorizer = options.authorizer;
    this.sink = options.sink ?? null;
    this.clock = options.clock ?? systemClock;
    this.custodyAccount = options.custodyAccount;
    this.feeRecipient = options.feeRecipient;
    this.fees = new FeeSchedule(options.feeTiers);
    this.state = createLedgerState(policy, initialRate, this.clock.now());
  }

  // ============ Staker Operations ============

  async stake(account: string, amount: bigint): Promise<StakeReceipt> {
    return this.mutate(`stake ${account} ${amount}`, async (op) => {
      const settlement = settle(this.state, op.now, account);
      await this.maybeAdjust(op);

      const outcome = applyStake(this.state, settlement, account, amount, this.fees);

      await this.pull(op, account, amount);
      await this.payOut(op, [{ to: this.feeRecipient, amount: outcome.recipientShare, reward: false }]);

      op.events.push({
        type: 'staked',
        account,
        amount,
        fee: outcome.fee,
        netAmount: outcome.netAmount,
        weightedStakeTime: outcome.weightedStakeTime,
        timestamp: op.now,
      });
      this.recordFee(op, 'stake', outcome);

      return {
        amount,
        fee: outcome.fee,
        netAmount: outcome.netAmount,
        weightedStakeTime: outcome.weightedStakeTime,
      };
    });
  }

  async withdraw(account: string, amount: bigint): Promise<WithdrawReceipt> {
    return this.mutate(`withdraw ${account} ${amount}`, async (op) => {
      const settlement = settle(this.state, op.now, account);
      await this.maybeAdjust(op);

      const withdrawal = this.debit(op, settlement, account, amount);
      await this.payOut(op, [withdrawal.payout, withdrawal.feeShare]);
      return withdrawal.receipt;
    });
  }

  async claim(account: string): Promise<bigint> {
    return this.mutate(`claim ${account}`, async (op) => {
      const settlement = settle(this.state, op.now, account);
      await this.maybeAdjust(op);

      const claim = this.release(op, settlement, account);
      await this.payOut(op, claim.payouts);
      return claim.reward;
    });
  }

  /** Withdraw the whole balance and claim, in one settlement pass */
  async exit(account: string): Promise<ExitReceipt> {
    return this.mutate(`exit ${account}`, async (op) => {
      const settlement = settle(this.state, op.now, account);
      await this.maybeAdjust(op);

      const balance = settlement.account(account).balance;
      const withdrawal = balance > 0n ? this.debit(op, settlement, account, balance) : null;
      const claim = this.release(op, settlement, account);

      // Principal first, so a refused reward or fee share can be kept owed
      await this.payOut(
        op,
        withdrawal
          ? [withdrawal.payout, ...claim.payouts, withdrawal.feeShare]
          : claim.payouts,
      );
      return { withdrawal: withdrawal?.receipt ?? null, reward: claim.reward };
    });
  }

  /** Fund the reward pool. Open to anyone. */
  async addRewards(from: string, amount: bigint): Promise<void> {
    return this.mutate(`addRewards ${from} ${amount}`, async (op) => {
      if (amount <= 0n) {
        throw new StakingError('ZeroAmount', 'reward amount must be positive');
      }
      settle(this.state, op.now);
      await this.maybeAdjust(op);

      this.state.global.totalRewardsAdded = add(this.state.global.totalRewardsAdded, amount);
      await this.pull(op, from, amount);
      op.events.push({ type: 'rewards_added', from, amount, timestamp: op.now });
    });
  }

  /** Run the controller now; resolves true if the rate changed */
  async adjustRewardRate(): Promise<boolean> {
    return this.mutate('adjustRewardRate', async (op) => {
      settle(this.state, op.now);
      return this.maybeAdjust(op);
    });
  }

  // ============ Admin Operations ============

  async setRewardRate(caller: string, rate: bigint): Promise<void> {
    return this.mutate(`setRewardRate ${rate}`, async (op) => {
      await this.requireAdmin(caller);
      if (!isUint(rate) || rate < this.state.global.minRewardRate) {
        throw new StakingError(
          'InvalidConfiguration',
          `reward rate ${rate} is below minRewardRate ${this.state.global.minRewardRate}`,
        );
      }
      const settlement = settle(this.state, op.now);
      await this.maybeAdjust(op);

      const days = await this.currentSustainabilityDays();
      const change = commitRate(settlement, rate, 'manual');
      op.events.push({
        type: 'reward_rate_adjusted',
        ...change,
        sustainabilityDays: days,
        timestamp: op.now,
      });
    });
  }

  async setMinRewardRate(caller: string, value: bigint): Promise<void> {
    return this.updatePolicy(caller, 'minRewardRate', value);
  }

  async setRateAdjustmentPeriod(caller: string, value: bigint): Promise<void> {
    return this.updatePolicy(caller, 'rateAdjustmentPeriod', value);
  }

  async setMaxAPR(caller: string, value: bigint): Promise<void> {
    return this.updatePolicy(caller, 'maxAPR', value);
  }

  async setMinimumStake(caller: string, value: bigint): Promise<void> {
    return this.updatePolicy(caller, 'minimumStake', value);
  }

  async setTargetSustainabilityDays(caller: string, value: bigint): Promise<void> {
    return this.updatePolicy(caller, 'targetSustainabilityDays', value);
  }

  async updatePolicy(caller: string, field: PolicyField, value: bigint): Promise<void> {
    return this.mutate(`set ${field} ${value}`, async (op) => {
      await this.requireAdmin(caller);
      const newValue = validatePolicyValue(field, value);
      const settlement = settle(this.state, op.now);

      const global = this.state.global;
      const oldValue = global[field];
      global[field] = newValue;

      if (field === 'targetSustainabilityDays') {
        op.events.push({
          type: 'sustainability_target_updated',
          oldTarget: oldValue,
          newTarget: newValue,
          timestamp: op.now,
        });
      } else {
        op.events.push({ type: 'config_updated', field, oldValue, newValue, timestamp: op.now });
      }

      // A raised floor applies to the live rate immediately
      if (field === 'minRewardRate' && global.rewardRate < newValue) {
        const days = await this.currentSustainabilityDays();
        const change = commitRate(settlement, newValue, 'floor-forced');
        op.events.push({
          type: 'reward_rate_adjusted',
          ...change,
          sustainabilityDays: days,
          timestamp: op.now,
        });
      }
    });
  }

  // ============ Queries ============

  rewardPerUnit(): bigint {
    return rewardPerUnit(this.state.global, this.clock.now());
  }

  earned(account: string): bigint {
    return earned(this.state.global, peekAccount(this.state, account), this.clock.now());
  }

  currentAPR(): bigint {
    return currentAPR(this.state.global);
  }

  async availableRewards(): Promise<bigint> {
    return availableRewards(this.state.global, await this.vault.balanceOf(this.custodyAccount));
  }

  async sustainabilityDays(): Promise<bigint> {
    return this.currentSustainabilityDays();
  }

  async checkAdjustment(): Promise<AdjustmentProposal> {
    return checkAdjustment(this.state.global, await this.availableRewards(), this.clock.now());
  }

  stakeInfo(account: string): StakeInfo {
    const now = this.clock.now();
    const position = peekAccount(this.state, account);
    const duration = stakeDuration(position, now);
    return {
      account,
      balance: position.balance,
      earned: earned(this.state.global, position, now),
      pendingReward: position.pendingReward,
      weightedStakeTime: position.weightedStakeTime,
      duration,
      feeBps: this.fees.tierFor(duration),
    };
  }

  stats(): EngineStats {
    return {
      ...this.state.global,
      rewardPerUnit: this.rewardPerUnit(),
      currentAPR: this.currentAPR(),
      accountCount: this.state.accounts.size,
    };
  }

  /** Identities of every account the ledger has touched */
  accounts(): string[] {
    return Array.from(this.state.accounts.keys());
  }

  // ============ Internals ============

  private async mutate<T>(label: string, run: (op: Operation) => Promise<T>): Promise<T> {
    if (this.busy) {
      throw new StakingError('ReentrantCall', `${label} entered while another operation is in progress`);
    }
    this.busy = true;

    const snapshot = snapshotState(this.state);
    const op: Operation = {
      now: this.clock.now(),
      events: [],
      pulled: [],
      committed: false,
    };

    try {
      const result = await run(op);
      logger.debug(`[ENGINE] ${label} committed at ${op.now}`);
      this.publish(op.events);
      return result;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      if (op.committed) {
        logger.error(`[ENGINE] ${label} committed with unpaid transfers: ${reason}`);
        this.publish(op.events);
        throw error;
      }
      restoreState(this.state, snapshot);
      await this.refund(op);
      logger.warn(`[ENGINE] ${label} rolled back: ${reason}`);
      throw error;
    } finally {
      this.busy = false;
    }
  }

  private async maybeAdjust(op: Operation): Promise<boolean> {
    const available = await this.availableRewards();
    const proposal = checkAdjustment(this.state.global, available, op.now);
    if (!proposal.shouldAdjust || proposal.reason === null) return false;

    const settlement = settle(this.state, op.now);
    const change = commitRate(settlement, proposal.proposedRate, proposal.reason);
    logger.info(
      `[CONTROLLER] rate ${change.oldRate} -> ${change.newRate} (${change.reason}, ${proposal.sustainabilityDays} days)`,
    );
    op.events.push({
      type: 'reward_rate_adjusted',
      ...change,
      sustainabilityDays: proposal.sustainabilityDays,
      timestamp: op.now,
    });
    return true;
  }

  /** Ledger side of a withdrawal */
  private debit(
    op: Operation,
    settlement: Settlement,
    account: string,
    amount: bigint,
  ): { receipt: WithdrawReceipt; payout: Payout; feeShare: Payout } {
    const outcome = applyWithdraw(this.state, settlement, account, amount, this.fees);

    op.events.push({
      type: 'duration_fee_applied',
      account,
      duration: outcome.duration,
      feeBps: outcome.feeBps,
      fee: outcome.fee,
      timestamp: op.now,
    });
    this.recordFee(op, 'withdraw', outcome);
    op.events.push({
      type: 'withdrawn',
      account,
      amount,
      fee: outcome.fee,
      netAmount: outcome.netAmount,
      timestamp: op.now,
    });

    return {
      receipt: {
        amount,
        duration: outcome.duration,
        feeBps: outcome.feeBps,
        fee: outcome.fee,
        netAmount: outcome.netAmount,
      },
      payout: { to: account, amount: outcome.netAmount, reward: false },
      feeShare: {
        to: this.feeRecipient,
        amount: outcome.recipientShare,
        reward: false,
        // An unpaid recipient share stays in custody as pool reward
        retain: () => {
          op.events = op.events.map((event) =>
            event.type === 'fee_distributed' && event.source === 'withdraw'
              ? {
                  ...event,
                  poolShare: add(event.poolShare, event.recipientShare),
                  recipientShare: 0n,
                }
              : event,
          );
        },
      },
    };
  }

  /** Ledger side of a claim */
  private release(
    op: Operation,
    settlement: Settlement,
    account: string,
  ): { reward: bigint; payouts: Payout[] } {
    const reward = applyClaim(this.state, settlement, account);
    if (reward === 0n) return { reward, payouts: [] };

    op.events.push({ type: 'reward_claimed', account, reward, timestamp: op.now });
    return {
      reward,
      payouts: [
        {
          to: account,
          amount: reward,
          reward: true,
          retain: () => {
            const position = settlement.account(account);
            position.pendingReward = add(position.pendingReward, reward);
            const global = this.state.global;
            global.totalRewardsDistributed = sub(global.totalRewardsDistributed, reward);
            op.events = op.events.filter((event) => event.type !== 'reward_claimed');
          },
        },
      ],
    };
  }

  private recordFee(
    op: Operation,
    source: 'stake' | 'withdraw',
    split: { fee: bigint; poolShare: bigint; recipientShare: bigint },
  ): void {
    if (split.fee === 0n) return;
    op.events.push({
      type: 'fee_distributed',
      source,
      totalFee: split.fee,
      poolShare: split.poolShare,
      recipientShare: split.recipientShare,
      recipient: this.feeRecipient,
      timestamp: op.now,
    });
  }

  private async currentSustainabilityDays(): Promise<bigint> {
    return sustainabilityDays(this.state.global, await this.availableRewards());
  }

  private async requireAdmin(caller: string): Promise<void> {
    if (!(await this.authorizer.isAuthorized(caller))) {
      throw new StakingError('Unauthorized', `${caller} may not change configuration`);
    }
  }

  private async pull(op: Operation, from: string, amount: bigint): Promise<void> {
    if (amount === 0n) return;
    if (!(await this.vault.transferIn(from, amount))) {
      throw new StakingError('TransferFailed', `transfer of ${amount} from ${from} failed`);
    }
    op.pulled.push({ from, amount });
  }

  /**
   * Send payouts in order. Custody must cover all of them, and rewards only
   * out of the balance above staked principal, before anything leaves. A
   * refusal before the first transfer aborts the operation; after it, the
   * refused payout is retained and the operation commits.
   */
  private async payOut(op: Operation, payouts: Payout[]): Promise<void> {
    const due = payouts.filter((payout) => payout.amount > 0n);
    if (due.length === 0) return;

    let principal = 0n;
    let rewards = 0n;
    for (const payout of due) {
      if (payout.reward) rewards = add(rewards, payout.amount);
      else principal = add(principal, payout.amount);
    }

    const custody = await this.vault.balanceOf(this.custodyAccount);
    if (custody < principal) {
      throw new StakingError('TransferFailed', `custody holds ${custody}, ${principal} is due`);
    }
    const available = availableRewards(this.state.global, custody - principal);
    if (rewards > available) {
      throw new StakingError(
        'TransferFailed',
        `reward of ${rewards} exceeds the ${available} available in the pool`,
      );
    }

    const unpaid: Payout[] = [];
    for (const payout of due) {
      let sent = false;
      try {
        sent = await this.vault.transferOut(payout.to, payout.amount);
      } catch (error) {
        if (!op.committed) throw error;
        const reason = error instanceof Error ? error.message : String(error);
        logger.error(`[ENGINE] transfer of ${payout.amount} to ${payout.to} threw: ${reason}`);
      }

      if (sent) {
        op.committed = true;
        continue;
      }
      if (!op.committed) {
        throw new StakingError('TransferFailed', `transfer of ${payout.amount} to ${payout.to} failed`);
      }
      payout.retain?.();
      unpaid.push(payout);
    }

    if (unpaid.length > 0) {
      const list = unpaid.map((payout) => `${payout.amount} to ${payout.to}`).join(', ');
      throw new StakingError('TransferFailed', `transfer of ${list} failed after earlier payouts; kept owed`);
    }
  }

  /** Return funds pulled in by an operation that is being rolled back */
  private async refund(op: Operation): Promise<void> {
    for (const { from, amount } of op.pulled) {
      try {
        const ok = await this.vault.transferOut(from, amount);
        if (!ok) logger.error(`[ENGINE] refund of ${amount} to ${from} failed`);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        logger.error(`[ENGINE] refund of ${amount} to ${from} threw: ${reason}`);
      }
    }
  }

  private publish(events: StakingEvent[]): void {
    if (!this.sink) return;
    for (const event of events) {
      try {
        this.sink.emit(event);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        logger.error(`[ENGINE] event sink rejected ${event.type}: ${reason}`);
      }
    }
  }
}
