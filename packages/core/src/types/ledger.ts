import type { Amount } from '../value-objects/amount.js';

import type { ClientId, TransactionId } from './identifiers.js';
import type { FundsMutationKind } from './mutation.js';

export type TransactionStatus = 'ok' | 'disputed' | 'resolved' | 'refunded';

/**
 * Allowed status transitions for a ledger entry. Strictly linear, no back-transitions.
 * Single source of truth for the dispute lifecycle.
 */
export const STATUS_TRANSITIONS: Readonly<Record<TransactionStatus, TransactionStatus | undefined>> = {
  ok: 'disputed',
  disputed: 'resolved',
  resolved: 'refunded',
  refunded: undefined,
};

export function canTransition(from: TransactionStatus, to: TransactionStatus): boolean {
  return STATUS_TRANSITIONS[from] === to;
}

/**
 * Stored record of an applied deposit or withdrawal.
 * `amount` never changes once recorded; only `status` advances.
 */
export interface LedgerEntry {
  readonly id: TransactionId;
  readonly kind: FundsMutationKind;
  readonly clientId: ClientId;
  readonly amount: Amount;
  status: TransactionStatus;
}

/**
 * Read model of an account's final state.
 */
export interface AccountSnapshot {
  clientId: ClientId;
  available: Amount;
  held: Amount;
  total: Amount;
  locked: boolean;
}
