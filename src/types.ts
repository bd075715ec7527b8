/**
 * Shared types for the staking ledger and its collaborators.
 *
 * The ledger owns its state; everything it talks to (custody, admin checks,
 * telemetry, time) is reached through the interfaces declared here.
 */

// ============ Time ============

export const SECONDS_PER_DAY = 86_400n;
export const SECONDS_PER_YEAR = 365n * SECONDS_PER_DAY;

export interface Clock {
  /** Current time in whole seconds */
  now(): bigint;
}

export const systemClock: Clock = {
  now: () => BigInt(Math.floor(Date.now() / 1000)),
};

// ============ Collaborators ============

export interface TokenVault {
  /** Pull `amount` from `from` into custody. Resolves false on failure. */
  transferIn(from: string, amount: bigint): Promise<boolean>;
  /** Push `amount` out of custody to `to`. Resolves false on failure. */
  transferOut(to: string, amount: bigint): Promise<boolean>;
  balanceOf(holder: string): Promise<bigint>;
}

export interface Authorizer {
  isAuthorized(caller: string): boolean | Promise<boolean>;
}

export interface EventSink {
  emit(event: StakingEvent): void;
}

// ============ Notifications ============

export type RateAdjustmentReason =
  | 'floor-forced'
  | 'decreased-low-sustainability'
  | 'increased-high-sustainability'
  | 'manual';

export type FeeSource = 'stake' | 'withdraw';

export type PolicyField =
  | 'minRewardRate'
  | 'rateAdjustmentPeriod'
  | 'maxAPR'
  | 'minimumStake'
  | 'targetSustainabilityDays';

export type StakingEvent =
  | {
      type: 'staked';
      account: string;
      amount: bigint;
      fee: bigint;
      netAmount: bigint;
      weightedStakeTime: bigint;
      timestamp: bigint;
    }
  | {
      type: 'withdrawn';
      account: string;
      amount: bigint;
      fee: bigint;
      netAmount: bigint;
      timestamp: bigint;
    }
  | {
      type: 'reward_claimed';
      account: string;
      reward: bigint;
      timestamp: bigint;
    }
  | {
      type: 'fee_distributed';
      source: FeeSource;
      totalFee: bigint;
      poolShare: bigint;
      recipientShare: bigint;
      recipient: string;
      timestamp: bigint;
    }
  | {
      type: 'reward_rate_adjusted';
      oldRate: bigint;
      newRate: bigint;
      reason: RateAdjustmentReason;
      sustainabilityDays: bigint;
      timestamp: bigint;
    }
  | {
      type: 'sustainability_target_updated';
      oldTarget: bigint;
      newTarget: bigint;
      timestamp: bigint;
    }
  | {
      type: 'duration_fee_applied';
      account: string;
      duration: bigint;
      feeBps: bigint;
      fee: bigint;
      timestamp: bigint;
    }
  | {
      type: 'rewards_added';
      from: string;
      amount: bigint;
      timestamp: bigint;
    }
  | {
      type: 'config_updated';
      field: PolicyField;
      oldValue: bigint;
      newValue: bigint;
      timestamp: bigint;
    };

export type StakingEventType = StakingEvent['type'];
