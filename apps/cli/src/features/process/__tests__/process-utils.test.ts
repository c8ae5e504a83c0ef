import { EngineAbortError, InvariantViolationError, LockedAccountError, RowValidationError } from '@ledgerflow/core';
import { describe, expect, test } from 'vitest';

import { ExitCodes } from '../../shared/exit-codes.js';
import { InputNotFoundError } from '../process-handler.js';
import {
  buildProcessParamsFromFlags,
  ENGINE_FAILURE_HEADING,
  exitCodeForError,
  headingForError,
  toSummaryData,
} from '../process-utils.js';

describe('buildProcessParamsFromFlags', () => {
  test('should take the error policy from the environment by default', () => {
    const result = buildProcessParamsFromFlags(' transactions.csv ', {}, { LEDGERFLOW_ERROR_POLICY: 'skip' });

    expect(result._unsafeUnwrap()).toEqual({ inputPath: 'transactions.csv', errorPolicy: 'skip' });
  });

  test('should prefer --on-error over the environment', () => {
    const result = buildProcessParamsFromFlags('in.csv', { onError: 'abort' }, { LEDGERFLOW_ERROR_POLICY: 'skip' });

    expect(result._unsafeUnwrap().errorPolicy).toBe('abort');
  });

  test('should reject a blank input path', () => {
    const result = buildProcessParamsFromFlags('   ', {}, { LEDGERFLOW_ERROR_POLICY: 'abort' });

    expect(result._unsafeUnwrapErr().message).toBe('Input file path is required');
  });
});

describe('exitCodeForError', () => {
  test('should map failures to semantic exit codes', () => {
    const abort = new EngineAbortError(1, new LockedAccountError('locked', { transactionId: 1 }));

    expect(exitCodeForError(new InputNotFoundError('in.csv'))).toBe(ExitCodes.NOT_FOUND);
    expect(exitCodeForError(new InvariantViolationError('broken'))).toBe(ExitCodes.VALIDATION_ERROR);
    expect(exitCodeForError(abort)).toBe(ExitCodes.GENERAL_ERROR);
    expect(exitCodeForError(new Error('other'))).toBe(ExitCodes.GENERAL_ERROR);
  });
});

describe('headingForError', () => {
  test('should only head engine aborts', () => {
    const abort = new EngineAbortError(1, new LockedAccountError('locked'));

    expect(headingForError(abort)).toBe(ENGINE_FAILURE_HEADING);
    expect(headingForError(new Error('other'))).toBeUndefined();
  });
});

describe('toSummaryData', () => {
  test('should flatten skipped records for JSON output', () => {
    const error = new RowValidationError('Error parsing transaction 4, tx must be at most 4294967295', 3, {
      transactionId: 4,
    });

    const data = toSummaryData({ processed: 3, applied: 1, ignored: 1, skipped: [{ recordNumber: 3, error }] });

    expect(data).toEqual({
      processed: 3,
      applied: 1,
      ignored: 1,
      skipped: [
        {
          recordNumber: 3,
          code: 'ROW_VALIDATION',
          transactionId: 4,
          message: 'Error parsing transaction 4, tx must be at most 4294967295',
        },
      ],
    });
  });
});
