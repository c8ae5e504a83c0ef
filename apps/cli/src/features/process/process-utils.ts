import { EngineAbortError, InvariantViolationError, type TransactionId } from '@ledgerflow/core';
import type { EngineSummary } from '@ledgerflow/engine';
import type { LedgerflowEnv } from '@ledgerflow/env';
import { err, ok, type Result } from 'neverthrow';
import type { z } from 'zod';

import type { FailureExitCode } from '../shared/cli-response.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { InputPathSchema, type ProcessCommandOptionsSchema } from '../shared/schemas.js';

import { InputNotFoundError, type ProcessHandlerParams } from './process-handler.js';

/**
 * Process command options validated by Zod at CLI boundary
 */
export type ProcessCommandOptions = z.infer<typeof ProcessCommandOptionsSchema>;

/** Text-mode heading printed above the reason of an aborted run */
export const ENGINE_FAILURE_HEADING = 'The transaction engine failed with message:';

/**
 * A skipped record as reported in JSON output.
 */
export interface SkippedRecordData {
  recordNumber: number;
  code: string;
  transactionId?: TransactionId | undefined;
  message: string;
}

export interface ProcessSummaryData {
  processed: number;
  applied: number;
  ignored: number;
  skipped: SkippedRecordData[];
}

/**
 * Build handler parameters from the positional input and validated flags.
 * `--on-error` wins over LEDGERFLOW_ERROR_POLICY.
 */
export function buildProcessParamsFromFlags(
  inputPath: string,
  options: ProcessCommandOptions,
  env: Pick<LedgerflowEnv, 'LEDGERFLOW_ERROR_POLICY'>
): Result<ProcessHandlerParams, Error> {
  const path = InputPathSchema.safeParse(inputPath);
  if (!path.success) {
    return err(new Error(path.error.issues[0]?.message ?? 'Invalid input path'));
  }

  return ok({
    inputPath: path.data,
    errorPolicy: options.onError ?? env.LEDGERFLOW_ERROR_POLICY,
  });
}

/**
 * Map a handler failure to the process exit code.
 */
export function exitCodeForError(error: Error): FailureExitCode {
  if (error instanceof InputNotFoundError) return ExitCodes.NOT_FOUND;
  if (error instanceof InvariantViolationError) return ExitCodes.VALIDATION_ERROR;
  return ExitCodes.GENERAL_ERROR;
}

/**
 * Heading shown above the error in text mode, if any.
 */
export function headingForError(error: Error): string | undefined {
  return error instanceof EngineAbortError ? ENGINE_FAILURE_HEADING : undefined;
}

export function toSummaryData(summary: EngineSummary): ProcessSummaryData {
  return {
    processed: summary.processed,
    applied: summary.applied,
    ignored: summary.ignored,
    skipped: summary.skipped.map(({ recordNumber, error }) => ({
      recordNumber,
      code: error.code,
      transactionId: error.transactionId,
      message: error.message,
    })),
  };
}
