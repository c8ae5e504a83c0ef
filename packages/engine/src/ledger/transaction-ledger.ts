import { DuplicateTransactionError, type LedgerEntry, type TransactionId } from '@ledgerflow/core';
import { err, ok, type Result } from 'neverthrow';

/**
 * History of every applied deposit and withdrawal, keyed by transaction id.
 *
 * Dispute, resolve and chargeback records carry no amount of their own, so the full
 * history is kept for the lifetime of the run: any later record may reference any
 * earlier id. No eviction.
 */
export class TransactionLedger {
  private readonly entries = new Map<TransactionId, LedgerEntry>();

  /**
   * Record a newly applied deposit/withdrawal with status `ok`.
   * Ids are unique upstream; a repeat is reported, never overwritten.
   */
  insert(entry: Omit<LedgerEntry, 'status'>): Result<LedgerEntry, DuplicateTransactionError> {
    if (this.entries.has(entry.id)) {
      return err(
        new DuplicateTransactionError(`Transaction ${entry.id} has already been recorded`, {
          transactionId: entry.id,
          clientId: entry.clientId,
          amount: entry.amount,
        })
      );
    }

    const stored: LedgerEntry = { ...entry, status: 'ok' };
    this.entries.set(entry.id, stored);
    return ok(stored);
  }

  /**
   * Look up an entry for in-place status updates.
   */
  find(id: TransactionId): LedgerEntry | undefined {
    return this.entries.get(id);
  }

  get size(): number {
    return this.entries.size;
  }
}
