import { canTransition, DuplicateTransactionError } from '@ledgerflow/core';
import { describe, expect, it } from 'vitest';

import { TransactionLedger } from '../transaction-ledger.js';

describe('TransactionLedger', () => {
  it('should store new entries with status ok', () => {
    const ledger = new TransactionLedger();

    const result = ledger.insert({ id: 1, kind: 'deposit', clientId: 1, amount: 50_000n });

    expect(result._unsafeUnwrap()).toEqual({ id: 1, kind: 'deposit', clientId: 1, amount: 50_000n, status: 'ok' });
    expect(ledger.size).toBe(1);
  });

  it('should return the stored entry for in-place updates', () => {
    const ledger = new TransactionLedger();
    ledger.insert({ id: 1, kind: 'deposit', clientId: 1, amount: 50_000n });

    const entry = ledger.find(1);
    if (!entry) throw new Error('entry missing');
    entry.status = 'disputed';

    expect(ledger.find(1)?.status).toBe('disputed');
  });

  it('should return undefined for unknown ids', () => {
    expect(new TransactionLedger().find(99)).toBeUndefined();
  });

  it('should reject a repeated id without overwriting', () => {
    const ledger = new TransactionLedger();
    ledger.insert({ id: 1, kind: 'deposit', clientId: 1, amount: 50_000n });

    const result = ledger.insert({ id: 1, kind: 'withdrawal', clientId: 2, amount: 10_000n });

    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr()).toBeInstanceOf(DuplicateTransactionError);
    expect(result._unsafeUnwrapErr().message).toBe('Transaction 1 has already been recorded');
    expect(ledger.find(1)).toMatchObject({ kind: 'deposit', clientId: 1, amount: 50_000n });
  });
});

describe('status transitions', () => {
  it('should only allow the linear ok → disputed → resolved → refunded path', () => {
    expect(canTransition('ok', 'disputed')).toBe(true);
    expect(canTransition('disputed', 'resolved')).toBe(true);
    expect(canTransition('resolved', 'refunded')).toBe(true);

    expect(canTransition('ok', 'resolved')).toBe(false);
    expect(canTransition('ok', 'refunded')).toBe(false);
    expect(canTransition('disputed', 'ok')).toBe(false);
    expect(canTransition('refunded', 'disputed')).toBe(false);
  });
});
