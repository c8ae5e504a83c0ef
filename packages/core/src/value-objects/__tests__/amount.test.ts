import { describe, expect, it } from 'vitest';

import { ArithmeticOverflowError, ArithmeticUnderflowError } from '../../errors/index.js';
import { checkedAdd, checkedSub, MAX_AMOUNT } from '../amount.js';

describe('amount arithmetic', () => {
  describe('checkedAdd', () => {
    it('should add two amounts', () => {
      const result = checkedAdd(50_000n, 25_000n);

      expect(result.isOk()).toBe(true);
      expect(result._unsafeUnwrap()).toBe(75_000n);
    });

    it('should accept a sum equal to the maximum', () => {
      expect(checkedAdd(MAX_AMOUNT - 1n, 1n)._unsafeUnwrap()).toBe(MAX_AMOUNT);
    });

    it('should fail instead of exceeding the maximum', () => {
      const result = checkedAdd(MAX_AMOUNT, 1n);

      expect(result.isErr()).toBe(true);
      const error = result._unsafeUnwrapErr();
      expect(error).toBeInstanceOf(ArithmeticOverflowError);
      expect(error.code).toBe('ARITHMETIC_OVERFLOW');
    });
  });

  describe('checkedSub', () => {
    it('should subtract down to zero', () => {
      expect(checkedSub(50_000n, 50_000n)._unsafeUnwrap()).toBe(0n);
    });

    it('should fail instead of going negative', () => {
      const result = checkedSub(50_000n, 70_000n);

      expect(result.isErr()).toBe(true);
      const error = result._unsafeUnwrapErr();
      expect(error).toBeInstanceOf(ArithmeticUnderflowError);
      expect(error.message).toBe('Amount underflow: 50000 - 70000');
      expect(error.context).toEqual({ left: '50000', right: '70000' });
    });
  });
});
