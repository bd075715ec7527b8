/**
 * Staking Errors
 *
 * Every failure the ledger can raise is a StakingError with a code from the
 * taxonomy below. Callers (and tests) match on `error.code`, never on text.
 */

// ============ Types ============

export type StakingErrorCode =
  | 'InvalidConfiguration'
  | 'BelowMinimumStake'
  | 'InsufficientBalance'
  | 'ZeroAmount'
  | 'Unauthorized'
  | 'TransferFailed'
  | 'ReentrantCall'
  | 'ArithmeticOverflow';

// ============ Error ============

export class StakingError extends Error {
  readonly code: StakingErrorCode;

  constructor(code: StakingErrorCode, message: string) {
    super(`${code}: ${message}`);
    this.name = 'StakingError';
    this.code = code;
  }
}

export function isStakingError(value: unknown): value is StakingError {
  return value instanceof StakingError;
}
