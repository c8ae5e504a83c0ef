import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { InvalidAmountError } from '../errors/index.js';
import { AMOUNT_DECIMALS, AMOUNT_SCALE, MAX_AMOUNT, type Amount } from '../value-objects/amount.js';

// u64 minor units need 20 significant digits, so keep well above that.
// Rounding only matters for the final truncation, which is explicit.
Decimal.set({
  precision: 40,
  rounding: Decimal.ROUND_DOWN,
  toExpNeg: -21,
  toExpPos: 40,
});

const SCALE = new Decimal(AMOUNT_SCALE.toString());
const MAX_MINOR_UNITS = new Decimal(MAX_AMOUNT.toString());

// Plain decimal or exponent notation. Rejects hex/binary/octal literals and Infinity/NaN,
// which Decimal.js would otherwise accept.
const NUMERIC_TEXT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

/**
 * Parse free-form numeric text into a fixed-point amount.
 * The value is multiplied by 10,000 and truncated toward zero.
 */
export function parseAmount(text: string): Result<Amount, InvalidAmountError> {
  const trimmed = text.trim();
  if (!NUMERIC_TEXT.test(trimmed)) {
    return err(new InvalidAmountError(`"${text}" is not a valid decimal amount`));
  }

  const value = new Decimal(trimmed);
  if (value.lessThan(0)) {
    return err(new InvalidAmountError(`Amount "${text}" must not be negative`));
  }

  // Compare before rendering digits: "1e300000000" would otherwise expand to 300M characters.
  const scaled = value.times(SCALE).truncated();
  if (!scaled.isFinite() || scaled.greaterThan(MAX_MINOR_UNITS)) {
    return err(new InvalidAmountError(`Amount "${text}" exceeds the supported maximum`));
  }

  return ok(BigInt(scaled.toFixed(0)));
}

/**
 * Render an amount in currency units with exactly four decimal places.
 */
export function formatAmount(amount: Amount): string {
  return new Decimal(amount.toString()).dividedBy(SCALE).toFixed(AMOUNT_DECIMALS);
}

/**
 * Build an amount from a currency-unit string known to be valid (fixtures, constants).
 * @throws InvalidAmountError when the text does not parse
 */
export function amountOf(text: string): Amount {
  const result = parseAmount(text);
  if (result.isErr()) {
    throw result.error;
  }
  return result.value;
}
