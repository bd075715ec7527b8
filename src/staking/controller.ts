/**
 * Rate Controller
 *
 * Dead-band controller on the emission rate. Once per adjustment period it
 * compares how many days the reward pool can sustain the current rate against
 * the target:
 *   below 90% of target   -> rate - 10% (never below minRewardRate)
 *   above 150% of target  -> rate + 10%, capped at the rate implied by maxAPR
 *   in between (inclusive) -> unchanged
 * An empty pool or an empty stake forces the floor.
 *
 * It only ever looks at the custody balance, total stake and the rate.
 */

import { BPS_DENOMINATOR, div, max, min, mul, mulDiv, sub } from '../math/uint';
import { SECONDS_PER_DAY, SECONDS_PER_YEAR, type RateAdjustmentReason } from '../types';
import type { Settlement } from './accrual';
import type { GlobalState } from './state';

// ============ Types ============

export interface AdjustmentProposal {
  shouldAdjust: boolean;
  proposedRate: bigint;
  reason: RateAdjustmentReason | null;
  sustainabilityDays: bigint;
}

export interface RateChange {
  oldRate: bigint;
  newRate: bigint;
  reason: RateAdjustmentReason;
}

// ============ Configuration ============

export const LOW_BAND_PERCENT = 90n;
export const HIGH_BAND_PERCENT = 150n;
export const DECREASE_PERCENT = 90n;
export const INCREASE_PERCENT = 110n;

// ============ Metrics ============

/** Custody balance beyond staked principal */
export function availableRewards(global: GlobalState, custodyBalance: bigint): bigint {
  return custodyBalance > global.totalStaked ? custodyBalance - global.totalStaked : 0n;
}

export function sustainabilityDays(global: GlobalState, available: bigint): bigint {
  if (global.rewardRate === 0n || available === 0n) return 0n;
  return div(div(available, global.rewardRate), SECONDS_PER_DAY);
}

/** Annualised emission over total stake, in basis points */
export function currentAPR(global: GlobalState): bigint {
  if (global.totalStaked === 0n) return 0n;
  return mulDiv(mul(global.rewardRate, SECONDS_PER_YEAR), BPS_DENOMINATOR, global.totalStaked);
}

/** Highest rate whose implied APR does not exceed maxAPR */
export function maxRateForAPR(global: GlobalState): bigint {
  return mulDiv(global.maxAPR, global.totalStaked, mul(BPS_DENOMINATOR, SECONDS_PER_YEAR));
}

export function adjustmentDue(global: GlobalState, now: bigint): boolean {
  return now >= global.lastRateAdjustmentTime &&
    sub(now, global.lastRateAdjustmentTime) >= global.rateAdjustmentPeriod;
}

// ============ Control ============

export function checkAdjustment(
  global: GlobalState,
  available: bigint,
  now: bigint,
): AdjustmentProposal {
  const current = global.rewardRate;
  const days = sustainabilityDays(global, available);
  const hold: AdjustmentProposal = {
    shouldAdjust: false,
    proposedRate: current,
    reason: null,
    sustainabilityDays: days,
  };

  if (!adjustmentDue(global, now)) return hold;

  let proposedRate = current;
  let reason: RateAdjustmentReason | null = null;

  if (available === 0n || global.totalStaked === 0n) {
    proposedRate = global.minRewardRate;
    reason = 'floor-forced';
  } else {
    const scaledDays = mul(days, 100n);
    if (scaledDays < mul(global.targetSustainabilityDays, LOW_BAND_PERCENT)) {
      proposedRate = max(mulDiv(current, DECREASE_PERCENT, 100n), global.minRewardRate);
      reason = 'decreased-low-sustainability';
    } else if (scaledDays > mul(global.targetSustainabilityDays, HIGH_BAND_PERCENT)) {
      const stepped = mulDiv(current, INCREASE_PERCENT, 100n);
      proposedRate = max(min(stepped, maxRateForAPR(global)), global.minRewardRate);
      reason = 'increased-high-sustainability';
    }
  }

  if (proposedRate === current) return hold;
  return { shouldAdjust: true, proposedRate, reason, sustainabilityDays: days };
}

/**
 * Commit a rate. Requires a settlement at the current timestamp so that the
 * old rate has been fully accrued before the new one takes over.
 */
export function commitRate(
  settlement: Settlement,
  newRate: bigint,
  reason: RateAdjustmentReason,
): RateChange {
  const global = settlement.state.global;
  const oldRate = global.rewardRate;
  global.rewardRate = newRate;
  global.lastRateAdjustmentTime = settlement.at;
  global.lastAdjustmentReason = reason;
  return { oldRate, newRate, reason };
}
