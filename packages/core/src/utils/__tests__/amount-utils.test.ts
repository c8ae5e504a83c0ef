import { describe, expect, it } from 'vitest';

import { InvalidAmountError } from '../../errors/index.js';
import { MAX_AMOUNT } from '../../value-objects/amount.js';
import { amountOf, formatAmount, parseAmount } from '../amount-utils.js';

describe('Amount Utilities', () => {
  describe('parseAmount', () => {
    it('should scale whole units by 10,000', () => {
      expect(parseAmount('5')._unsafeUnwrap()).toBe(50_000n);
      expect(parseAmount('5.0')._unsafeUnwrap()).toBe(50_000n);
    });

    it('should keep four decimal places exactly', () => {
      expect(parseAmount('1.2345')._unsafeUnwrap()).toBe(12_345n);
      expect(parseAmount('0.0001')._unsafeUnwrap()).toBe(1n);
    });

    it('should truncate extra precision toward zero', () => {
      expect(parseAmount('1.23459')._unsafeUnwrap()).toBe(12_345n);
      expect(parseAmount('0.00009')._unsafeUnwrap()).toBe(0n);
    });

    it('should accept surrounding whitespace, leading dots and exponents', () => {
      expect(parseAmount('  2.5 ')._unsafeUnwrap()).toBe(25_000n);
      expect(parseAmount('.5')._unsafeUnwrap()).toBe(5_000n);
      expect(parseAmount('1e2')._unsafeUnwrap()).toBe(1_000_000n);
    });

    it('should reject non-numeric text', () => {
      for (const text of ['', 'abc', '1.2.3', '0x10', 'Infinity', 'NaN']) {
        const result = parseAmount(text);
        expect(result.isErr()).toBe(true);
        expect(result._unsafeUnwrapErr()).toBeInstanceOf(InvalidAmountError);
      }
    });

    it('should reject negative amounts', () => {
      const result = parseAmount('-1.5');

      expect(result.isErr()).toBe(true);
      expect(result._unsafeUnwrapErr().message).toBe('Amount "-1.5" must not be negative');
    });

    it('should reject amounts above the supported maximum', () => {
      expect(parseAmount('1844674407370955.1615')._unsafeUnwrap()).toBe(MAX_AMOUNT);
      expect(parseAmount('1844674407370955.1616').isErr()).toBe(true);
    });

    it('should keep the last fraction digits that truncate to the maximum', () => {
      expect(parseAmount('1844674407370955.16159')._unsafeUnwrap()).toBe(MAX_AMOUNT);
    });

    it('should reject huge exponents without expanding them', () => {
      expect(parseAmount('1e300000000')._unsafeUnwrapErr().message).toBe(
        'Amount "1e300000000" exceeds the supported maximum'
      );
      expect(parseAmount('1e9000000000000000')._unsafeUnwrapErr().message).toBe(
        'Amount "1e9000000000000000" exceeds the supported maximum'
      );
    });

    it('should truncate vanishingly small exponents to zero', () => {
      expect(parseAmount('1e-300000000')._unsafeUnwrap()).toBe(0n);
    });
  });

  describe('formatAmount', () => {
    it('should render exactly four decimal places', () => {
      expect(formatAmount(0n)).toBe('0.0000');
      expect(formatAmount(50_000n)).toBe('5.0000');
      expect(formatAmount(12_345n)).toBe('1.2345');
      expect(formatAmount(1n)).toBe('0.0001');
    });

    it('should render the largest amount without exponent notation', () => {
      expect(formatAmount(MAX_AMOUNT)).toBe('1844674407370955.1615');
    });
  });

  describe('amountOf', () => {
    it('should return the parsed amount', () => {
      expect(amountOf('3.5')).toBe(35_000n);
    });

    it('should throw on invalid text', () => {
      expect(() => amountOf('nope')).toThrow(InvalidAmountError);
    });
  });
});
