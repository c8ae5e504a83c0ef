import type { EngineAbortError, ErrorPolicy } from '@ledgerflow/core';
import { TransactionEngine, type EngineSummary, type MutationSource } from '@ledgerflow/engine';
import { readMutationsFromFile, toAccountRows, type AccountRow } from '@ledgerflow/ingestion';
import { getLogger } from '@ledgerflow/logger';
import { err, ok, type Result } from 'neverthrow';

const logger = getLogger('ProcessHandler');

/**
 * Result of the process operation.
 */
export interface ProcessResult {
  /** Final account states, ordered by client id */
  accounts: AccountRow[];

  summary: EngineSummary;
}

/**
 * Process handler parameters
 */
export interface ProcessHandlerParams {
  /** CSV file of mutations */
  inputPath: string;

  /** What to do with a failing record */
  errorPolicy: ErrorPolicy;
}

export type SourceOpener = (inputPath: string) => MutationSource;

/**
 * The input file does not exist.
 */
export class InputNotFoundError extends Error {
  constructor(
    public readonly inputPath: string,
    options?: ErrorOptions
  ) {
    super(`Input file not found: ${inputPath}`, options);
    this.name = 'InputNotFoundError';
  }
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Process handler - replays one input file through a fresh engine and renders the accounts.
 */
export class ProcessHandler {
  constructor(private readonly openSource: SourceOpener = readMutationsFromFile) {}

  /**
   * Execute the process operation.
   */
  async execute(params: ProcessHandlerParams): Promise<Result<ProcessResult, Error>> {
    const { inputPath, errorPolicy } = params;
    const engine = new TransactionEngine();

    logger.info({ inputPath, errorPolicy }, 'Processing transactions');

    let processed: Result<EngineSummary, EngineAbortError>;
    try {
      processed = await engine.process(this.openSource(inputPath), { errorPolicy });
    } catch (error) {
      if (isMissingFileError(error)) {
        return err(new InputNotFoundError(inputPath, { cause: error }));
      }
      return err(error instanceof Error ? error : new Error(String(error)));
    }

    if (processed.isErr()) {
      return err(processed.error);
    }

    const rows = toAccountRows(engine.snapshots());
    if (rows.isErr()) {
      return err(rows.error);
    }

    return ok({ accounts: rows.value, summary: processed.value });
  }
}
