import { z } from 'zod';

import { MAX_CLIENT_ID, MAX_TRANSACTION_ID } from '../types/identifiers.js';
import {
  MUTATION_KINDS,
  type DisputeMutationKind,
  type FundsMutationKind,
  type MutationKind,
} from '../types/mutation.js';
import { MAX_AMOUNT } from '../value-objects/amount.js';

export const MutationKindSchema = z.enum(MUTATION_KINDS);

export const ClientIdSchema = z
  .number()
  .int('client must be an integer')
  .min(0, 'client must not be negative')
  .max(MAX_CLIENT_ID, `client must be at most ${MAX_CLIENT_ID}`)
  .refine((value) => !Object.is(value, -0), 'client must not be negative');

export const TransactionIdSchema = z
  .number()
  .int('tx must be an integer')
  .min(0, 'tx must not be negative')
  .max(MAX_TRANSACTION_ID, `tx must be at most ${MAX_TRANSACTION_ID}`)
  .refine((value) => !Object.is(value, -0), 'tx must not be negative');

const amountSchema = (params?: z.RawCreateParams) =>
  z.bigint(params).nonnegative('amount must not be negative').max(MAX_AMOUNT, 'amount is too large');

export const AmountSchema = amountSchema();

const AMOUNT_PRESENCE_MESSAGES: Record<MutationKind, string> = {
  deposit: 'deposits must have an amount',
  withdrawal: 'withdrawals must have an amount',
  dispute: 'disputes may not have an amount',
  resolve: 'resolves may not have an amount',
  chargeback: 'chargebacks may not have an amount',
};

const fundsMutation = <K extends FundsMutationKind>(kind: K) =>
  z.object({
    id: TransactionIdSchema,
    kind: z.literal(kind),
    clientId: ClientIdSchema,
    amount: amountSchema({ required_error: AMOUNT_PRESENCE_MESSAGES[kind] }),
  });

const disputeMutation = <K extends DisputeMutationKind>(kind: K) =>
  z.object({
    id: TransactionIdSchema,
    kind: z.literal(kind),
    clientId: ClientIdSchema,
    amount: z.undefined({ errorMap: () => ({ message: AMOUNT_PRESENCE_MESSAGES[kind] }) }),
  });

/**
 * A mutation ready for the engine: ids in range and amount present iff the kind moves funds.
 */
export const MutationSchema = z.discriminatedUnion('kind', [
  fundsMutation('deposit'),
  fundsMutation('withdrawal'),
  disputeMutation('dispute'),
  disputeMutation('resolve'),
  disputeMutation('chargeback'),
]);
