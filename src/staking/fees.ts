/**
 * Fee Schedule
 *
 * Exit fees fall the longer a stake is held:
 *   < 7 days   5.00%
 *   7-14 days  3.50%
 *   14-30 days 2.00%
 *   30+ days   1.00%
 *
 * Each tier covers [minDuration, next tier's minDuration). Deposits pay a flat
 * 1% regardless of duration. Every fee splits 70% to the reward pool (it stays
 * in custody) and 30% to the fee recipient; both shares are floored and the
 * rounding residue stays with the pool.
 */

import { StakingError } from '../errors';
import { BPS_DENOMINATOR, mulDiv } from '../math/uint';
import { SECONDS_PER_DAY } from '../types';

// ============ Types ============

export interface FeeTier {
  /** Holding duration in seconds at which this tier starts */
  minDuration: bigint;
  feeBps: bigint;
}

export interface FeeSplit {
  poolShare: bigint;
  recipientShare: bigint;
}

// ============ Configuration ============

export const DEFAULT_FEE_TIERS: readonly FeeTier[] = [
  { minDuration: 0n, feeBps: 500n },
  { minDuration: 7n * SECONDS_PER_DAY, feeBps: 350n },
  { minDuration: 14n * SECONDS_PER_DAY, feeBps: 200n },
  { minDuration: 30n * SECONDS_PER_DAY, feeBps: 100n },
];

export const STAKE_FEE_BPS = 100n;
export const POOL_SHARE_PERCENT = 70n;
export const RECIPIENT_SHARE_PERCENT = 30n;

// ============ Schedule ============

export class FeeSchedule {
  readonly tiers: readonly FeeTier[];

  constructor(tiers: readonly FeeTier[] = DEFAULT_FEE_TIERS) {
    FeeSchedule.validate(tiers);
    this.tiers = tiers.map((t) => ({ ...t }));
  }

  /**
   * Tiers must start at zero duration, strictly grow in duration and never
   * grow in fee.
   */
  static validate(tiers: readonly FeeTier[]): void {
    const first = tiers[0];
    if (!first || first.minDuration !== 0n) {
      throw new StakingError('InvalidConfiguration', 'fee tiers must start at duration 0');
    }
    for (let i = 0; i < tiers.length; i++) {
      const tier = tiers[i];
      if (tier.feeBps < 0n || tier.feeBps > BPS_DENOMINATOR) {
        throw new StakingError('InvalidConfiguration', `fee tier ${i} bps out of range`);
      }
      const prev = tiers[i - 1];
      if (prev && (tier.minDuration <= prev.minDuration || tier.feeBps > prev.feeBps)) {
        throw new StakingError('InvalidConfiguration', `fee tier ${i} out of order`);
      }
    }
  }

  tierFor(duration: bigint): bigint {
    let bps = this.tiers[0].feeBps;
    for (const tier of this.tiers) {
      if (duration >= tier.minDuration) bps = tier.feeBps;
    }
    return bps;
  }

  exitFee(amount: bigint, duration: bigint): { feeBps: bigint; fee: bigint } {
    const feeBps = this.tierFor(duration);
    return { feeBps, fee: feeFor(amount, feeBps) };
  }

  stakeFee(amount: bigint): bigint {
    return feeFor(amount, STAKE_FEE_BPS);
  }
}

export function feeFor(amount: bigint, bps: bigint): bigint {
  return mulDiv(amount, bps, BPS_DENOMINATOR);
}

export function splitFee(fee: bigint): FeeSplit {
  return {
    poolShare: mulDiv(fee, POOL_SHARE_PERCENT, 100n),
    recipientShare: mulDiv(fee, RECIPIENT_SHARE_PERCENT, 100n),
  };
}
