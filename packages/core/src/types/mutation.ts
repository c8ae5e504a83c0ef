import type { Amount } from '../value-objects/amount.js';

import type { ClientId, TransactionId } from './identifiers.js';

export const MUTATION_KINDS = ['deposit', 'withdrawal', 'dispute', 'resolve', 'chargeback'] as const;
export type MutationKind = (typeof MUTATION_KINDS)[number];

/** Kinds that move funds and carry an amount */
export type FundsMutationKind = Extract<MutationKind, 'deposit' | 'withdrawal'>;

/** Kinds that reference an earlier deposit/withdrawal by id and carry no amount */
export type DisputeMutationKind = Exclude<MutationKind, FundsMutationKind>;

interface MutationBase {
  id: TransactionId;
  clientId: ClientId;
}

/** Deposit or withdrawal: moves funds and creates a ledger entry */
export interface FundsMutation extends MutationBase {
  kind: FundsMutationKind;
  amount: Amount;
}

/** Dispute, resolve or chargeback of the ledger entry with the same id */
export interface DisputeMutation extends MutationBase {
  kind: DisputeMutationKind;
  amount?: undefined;
}

/**
 * A single validated input instruction applied to one account.
 * Only funds kinds carry an amount.
 */
export type Mutation = FundsMutation | DisputeMutation;

/**
 * Outcome of a successful mutation. `ignored` covers out-of-sequence or unknown
 * references, which are tolerated as counterparty noise.
 */
export type MutationOutcome = 'applied' | 'ignored';
