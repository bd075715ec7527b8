/**
 * Checked unsigned integer math.
 *
 * Amounts, rates and the reward accumulator are bigints bounded to the
 * uint256 range. Any result outside [0, MAX_UINT256] fails with
 * ArithmeticOverflow instead of wrapping or going negative.
 */

import { StakingError } from '../errors';

export type Uint = bigint;

export const MAX_UINT256: Uint = (1n << 256n) - 1n;

/** Fixed-point scale of the reward-per-unit accumulator */
export const SCALE: Uint = 10n ** 18n;

export const BPS_DENOMINATOR: Uint = 10_000n;

function checked(value: bigint, op: string): Uint {
  if (value < 0n || value > MAX_UINT256) {
    throw new StakingError('ArithmeticOverflow', `${op} result out of range`);
  }
  return value;
}

export function isUint(value: bigint): boolean {
  return value >= 0n && value <= MAX_UINT256;
}

export function add(a: Uint, b: Uint): Uint {
  return checked(checked(a, 'add') + checked(b, 'add'), 'add');
}

export function sub(a: Uint, b: Uint): Uint {
  return checked(checked(a, 'sub') - checked(b, 'sub'), 'sub');
}

export function mul(a: Uint, b: Uint): Uint {
  return checked(checked(a, 'mul') * checked(b, 'mul'), 'mul');
}

/** Floor division */
export function div(a: Uint, b: Uint): Uint {
  if (b === 0n) {
    throw new StakingError('ArithmeticOverflow', 'division by zero');
  }
  return checked(checked(a, 'div') / checked(b, 'div'), 'div');
}

/** a * b / c, floored, with the intermediate product checked */
export function mulDiv(a: Uint, b: Uint, c: Uint): Uint {
  return div(mul(a, b), c);
}

export function min(a: Uint, b: Uint): Uint {
  return a < b ? a : b;
}

export function max(a: Uint, b: Uint): Uint {
  return a > b ? a : b;
}
