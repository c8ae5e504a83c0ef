import { err, ok, type Result } from 'neverthrow';

import { ArithmeticOverflowError, ArithmeticUnderflowError } from '../errors/index.js';

/**
 * Fixed-point monetary amount: an unsigned count of 1/10,000ths of a currency unit.
 * Stored state never holds a floating-point value.
 */
export type Amount = bigint;

/** Number of minor units in one currency unit (4 decimal places) */
export const AMOUNT_SCALE = 10_000n;

/** Number of decimal places rendered for an amount */
export const AMOUNT_DECIMALS = 4;

/** Largest representable amount (u64) */
export const MAX_AMOUNT: Amount = 2n ** 64n - 1n;

export const ZERO_AMOUNT: Amount = 0n;

/**
 * Add two amounts, failing instead of exceeding MAX_AMOUNT.
 */
export function checkedAdd(a: Amount, b: Amount): Result<Amount, ArithmeticOverflowError> {
  const sum = a + b;
  if (sum > MAX_AMOUNT) {
    return err(
      new ArithmeticOverflowError(`Amount overflow: ${a.toString()} + ${b.toString()}`, {
        additionalContext: { left: a.toString(), right: b.toString() },
      })
    );
  }
  return ok(sum);
}

/**
 * Subtract `b` from `a`, failing instead of going below zero.
 */
export function checkedSub(a: Amount, b: Amount): Result<Amount, ArithmeticUnderflowError> {
  if (b > a) {
    return err(
      new ArithmeticUnderflowError(`Amount underflow: ${a.toString()} - ${b.toString()}`, {
        additionalContext: { left: a.toString(), right: b.toString() },
      })
    );
  }
  return ok(a - b);
}
