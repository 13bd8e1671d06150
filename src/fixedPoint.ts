/**
 * Fixed-Point Arithmetic for Reward Accounting
 *
 * All reward amounts and the reward-per-token accumulator are bigint values.
 * The accumulator is carried at SCALE (1e18) so that a per-unit-of-principal
 * reward keeps 18 decimal places of precision.
 *
 * Storage contract:
 * - Every stored value (checkpoint fields, accumulator fields) must fit in an
 *   unsigned 128-bit integer. Values outside that range abort with OVERFLOW
 *   (or UNDERFLOW when negative); nothing is ever wrapped or clamped.
 * - Each step re-derives from the stored 128-bit values and floors on every
 *   division. Rounding dust is therefore bounded by one unit per settlement
 *   plus totalStakedPrincipal / SCALE per report, and always stays in the pool.
 */

import { LedgerError, LedgerErrorCodes } from './errors';

/** Fixed-point scale of the reward-per-token accumulator */
export const SCALE = 10n ** 18n;

/** Protocol fee is expressed in parts per 10,000 */
export const FEE_DENOMINATOR = 10_000n;

/** Largest value that fits in an unsigned 128-bit slot */
export const MAX_UINT128 = (1n << 128n) - 1n;

/**
 * Compute floor(a * b / denominator).
 *
 * bigint intermediates are arbitrary width, so the product never overflows
 * even when it exceeds 256 bits; only the caller's subsequent toUint128()
 * decides whether the result may be stored.
 *
 * @throws LedgerError DIVISION_BY_ZERO when denominator is 0
 * @throws LedgerError UNDERFLOW when any operand is negative
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new LedgerError(LedgerErrorCodes.DIVISION_BY_ZERO, 'mulDiv: division by zero');
  }
  if (a < 0n || b < 0n || denominator < 0n) {
    throw new LedgerError(
      LedgerErrorCodes.UNDERFLOW,
      `mulDiv: negative operand (${a} * ${b} / ${denominator})`
    );
  }
  return (a * b) / denominator;
}

/**
 * Checked narrowing to the unsigned 128-bit storage range.
 */
export function toUint128(value: bigint): bigint {
  if (value < 0n) {
    throw new LedgerError(LedgerErrorCodes.UNDERFLOW, `Value is negative: ${value}`);
  }
  if (value > MAX_UINT128) {
    throw new LedgerError(LedgerErrorCodes.OVERFLOW, `Value exceeds uint128: ${value}`);
  }
  return value;
}

/**
 * Checked subtraction. Never clamps: a result below zero is a genuine
 * insufficient-balance condition or a bookkeeping bug.
 *
 * @param context Prefix for the error message (e.g. "claim")
 */
export function subUint(a: bigint, b: bigint, context = 'subtraction'): bigint {
  if (b > a) {
    throw new LedgerError(LedgerErrorCodes.UNDERFLOW, `${context}: ${a} - ${b} is negative`);
  }
  return a - b;
}

/**
 * Format base units as a decimal string with `decimals` fractional digits.
 * Trailing zeros of the fraction are trimmed ("1.5", "42", "0.000000000000000001").
 */
export function formatUnits(amount: bigint, decimals: number = 18): string {
  const negative = amount < 0n;
  const abs = negative ? -amount : amount;
  const unit = 10n ** BigInt(decimals);
  const whole = abs / unit;
  const fraction = (abs % unit).toString().padStart(decimals, '0').replace(/0+$/, '');
  const text = fraction.length > 0 ? `${whole}.${fraction}` : whole.toString();
  return negative ? `-${text}` : text;
}
