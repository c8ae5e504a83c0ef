import {
  EngineAbortError,
  type AccountSnapshot,
  type DomainError,
  type ErrorPolicy,
  type Mutation,
  type MutationError,
  type MutationOutcome,
} from '@ledgerflow/core';
import { getLogger } from '@ledgerflow/logger';
import { err, ok, type Result } from 'neverthrow';

import { AccountRegistry } from '../account/account-registry.js';
import { TransactionLedger } from '../ledger/transaction-ledger.js';

const logger = getLogger('TransactionEngine');

/**
 * One input record: a validated mutation, or the reason the row was rejected upstream.
 */
export type MutationRecord = Result<Mutation, DomainError>;

export type MutationSource = Iterable<MutationRecord> | AsyncIterable<MutationRecord>;

export interface EngineOptions {
  /** Defaults to `abort` */
  errorPolicy?: ErrorPolicy | undefined;
}

export interface SkippedRecord {
  /** 1-based position in the source */
  recordNumber: number;
  error: DomainError;
}

export interface EngineSummary {
  /** Records consumed from the source */
  processed: number;
  /** Records that changed state */
  applied: number;
  /** Dispute-family records referencing unknown ids or out-of-sequence statuses */
  ignored: number;
  /** Records dropped under the `skip` policy */
  skipped: SkippedRecord[];
}

/**
 * Feeds an ordered sequence of mutations into the account registry and ledger.
 *
 * Records are applied one at a time in source order; balances are path-dependent and
 * dispute-family records depend on the status left by earlier ones.
 */
export class TransactionEngine {
  constructor(
    private readonly registry: AccountRegistry = new AccountRegistry(),
    private readonly ledger: TransactionLedger = new TransactionLedger()
  ) {}

  /**
   * Apply a single mutation to the account it names.
   */
  apply(mutation: Mutation): Result<MutationOutcome, MutationError> {
    return this.registry.getOrCreate(mutation.clientId).mutate(mutation, this.ledger);
  }

  /**
   * Consume the whole source.
   *
   * Under `abort` the first failing record ends the run with an EngineAbortError; under
   * `skip` it is logged, listed in the summary, and processing continues.
   */
  async process(source: MutationSource, options?: EngineOptions): Promise<Result<EngineSummary, EngineAbortError>> {
    const errorPolicy = options?.errorPolicy ?? 'abort';
    const summary: EngineSummary = { processed: 0, applied: 0, ignored: 0, skipped: [] };

    for await (const record of source) {
      summary.processed++;
      const recordNumber = summary.processed;
      const outcome = record.andThen((mutation) => this.apply(mutation));

      if (outcome.isErr()) {
        const error = outcome.error;
        if (errorPolicy === 'abort') {
          logger.error({ recordNumber, code: error.code, transactionId: error.transactionId }, error.message);
          return err(new EngineAbortError(recordNumber, error));
        }

        logger.warn({ recordNumber, code: error.code, transactionId: error.transactionId }, `Skipped: ${error.message}`);
        summary.skipped.push({ recordNumber, error });
        continue;
      }

      if (outcome.value === 'applied') {
        summary.applied++;
      } else {
        summary.ignored++;
      }
    }

    logger.info(
      {
        processed: summary.processed,
        applied: summary.applied,
        ignored: summary.ignored,
        skipped: summary.skipped.length,
        accounts: this.registry.size,
        ledgerEntries: this.ledger.size,
      },
      'Finished processing'
    );
    return ok(summary);
  }

  /**
   * Final account states, in no particular order.
   */
  snapshots(): AccountSnapshot[] {
    return this.registry.snapshots();
  }
}
