/**
 * Policy bounds.
 *
 * The five administrative knobs of the ledger and the range each one must
 * fall in. The env parser and the admin setters validate through the same
 * schema, so a value that boots the service is a value an admin could set.
 */

import { z } from 'zod';
import { StakingError } from '../errors';
import { MAX_UINT256 } from '../math/uint';
import { SECONDS_PER_DAY, type PolicyField } from '../types';

// ============ Types ============

export interface Policy {
  /** Floor the controller never adjusts below */
  minRewardRate: bigint;
  /** Seconds between controller evaluations */
  rateAdjustmentPeriod: bigint;
  /** Ceiling on implied APR, in basis points */
  maxAPR: bigint;
  /** Days of emission the pool should be able to cover */
  targetSustainabilityDays: bigint;
  minimumStake: bigint;
}

// ============ Configuration ============

export const POLICY_BOUNDS: Record<PolicyField, { min: bigint; max: bigint }> = {
  minRewardRate: { min: 1n, max: MAX_UINT256 },
  rateAdjustmentPeriod: { min: 3_600n, max: 30n * SECONDS_PER_DAY },
  maxAPR: { min: 1n, max: 100_000n },
  targetSustainabilityDays: { min: 1n, max: 3_650n },
  minimumStake: { min: 1n, max: MAX_UINT256 },
};

export const DEFAULT_POLICY: Policy = {
  minRewardRate: 1n,
  rateAdjustmentPeriod: SECONDS_PER_DAY,
  maxAPR: 5_000n,
  targetSustainabilityDays: 90n,
  minimumStake: 100n,
};

export const POLICY_FIELDS: readonly PolicyField[] = [
  'minRewardRate',
  'rateAdjustmentPeriod',
  'maxAPR',
  'targetSustainabilityDays',
  'minimumStake',
];

function bounded(field: PolicyField) {
  const { min, max } = POLICY_BOUNDS[field];
  return z.bigint().gte(min).lte(max);
}

export const policySchema = z.object({
  minRewardRate: bounded('minRewardRate'),
  rateAdjustmentPeriod: bounded('rateAdjustmentPeriod'),
  maxAPR: bounded('maxAPR'),
  targetSustainabilityDays: bounded('targetSustainabilityDays'),
  minimumStake: bounded('minimumStake'),
});

// ============ Validation ============

export function validatePolicyValue(field: PolicyField, value: bigint): bigint {
  const parsed = policySchema.shape[field].safeParse(value);
  if (!parsed.success) {
    const { min, max } = POLICY_BOUNDS[field];
    throw new StakingError(
      'InvalidConfiguration',
      `${field} must be between ${min} and ${max}, got ${value}`,
    );
  }
  return parsed.data;
}

export function resolvePolicy(overrides: Partial<Policy> = {}): Policy {
  const parsed = policySchema.safeParse({ ...DEFAULT_POLICY, ...overrides });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new StakingError(
      'InvalidConfiguration',
      `${issue?.path.join('.') ?? 'policy'}: ${issue?.message ?? 'invalid'}`,
    );
  }
  return parsed.data;
}
