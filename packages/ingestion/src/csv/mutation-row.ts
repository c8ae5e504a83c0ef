import {
  ClientIdSchema,
  MUTATION_KINDS,
  MutationSchema,
  parseAmount,
  RowValidationError,
  TransactionIdSchema,
  type Amount,
  type Mutation,
  type TransactionId,
} from '@ledgerflow/core';
import { err, ok, type Result } from 'neverthrow';
import { z, type ZodError } from 'zod';

export type MutationRowResult = Result<Mutation, RowValidationError>;

const integerText = (field: string) =>
  z
    .string({ required_error: `${field} is required` })
    .regex(/^[+-]?\d+$/, `${field} must be an integer`)
    .transform(Number);

const TxFieldSchema = integerText('tx').pipe(TransactionIdSchema);

/**
 * One CSV record (`type, client, tx, amount`) after csv-parse has trimmed every cell.
 * An empty amount cell counts as absent.
 */
export const MutationRowSchema = z.object({
  type: z
    .string({ required_error: 'type is required' })
    .transform((value) => value.toLowerCase())
    .pipe(
      z.enum(MUTATION_KINDS, {
        errorMap: () => ({ message: `type must be one of ${MUTATION_KINDS.join(', ')}` }),
      })
    ),
  client: integerText('client').pipe(ClientIdSchema),
  tx: TxFieldSchema,
  amount: z
    .string()
    .optional()
    .transform((value) => (value === '' ? undefined : value)),
});

export type MutationRow = z.infer<typeof MutationRowSchema>;

const RawRecordSchema = z.record(z.string(), z.string().optional());

function firstIssue(error: ZodError): string {
  return error.issues[0]?.message ?? 'invalid record';
}

/**
 * Turn a raw CSV record into a mutation, or a RowValidationError naming the transaction
 * (or the record number when the tx column itself is unreadable).
 */
export function toMutation(record: unknown, recordNumber: number): MutationRowResult {
  const fields = RawRecordSchema.safeParse(record);
  const txField = fields.success ? TxFieldSchema.safeParse(fields.data['tx']) : undefined;
  const transactionId: TransactionId | undefined = txField?.success ? txField.data : undefined;

  const fail = (reason: string): MutationRowResult => {
    const subject = transactionId === undefined ? `record ${recordNumber}` : `transaction ${transactionId}`;
    return err(new RowValidationError(`Error parsing ${subject}, ${reason}`, recordNumber, { transactionId }));
  };

  if (!fields.success) return fail('record is not a set of named columns');

  const row = MutationRowSchema.safeParse(fields.data);
  if (!row.success) return fail(firstIssue(row.error));

  let amount: Amount | undefined;
  if (row.data.amount !== undefined) {
    const parsed = parseAmount(row.data.amount);
    if (parsed.isErr()) return fail(parsed.error.message);
    amount = parsed.value;
  }

  const mutation = MutationSchema.safeParse({
    id: row.data.tx,
    kind: row.data.type,
    clientId: row.data.client,
    amount,
  });
  if (!mutation.success) return fail(firstIssue(mutation.error));

  return ok(mutation.data);
}
