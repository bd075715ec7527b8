/**
 * Staking Module
 *
 * Reward-per-share staking with duration-tiered exit fees and a
 * self-adjusting emission rate.
 */

export * from './accrual';
export * from './controller';
export * from './engine';
export * from './fees';
export * from './ledger';
export * from './policy';
export * from './state';
