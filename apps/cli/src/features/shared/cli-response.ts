import { DomainError } from '@ledgerflow/core';

import { ExitCodes, type ExitCode } from './exit-codes.js';

/** Exit codes a failed run can end with */
export type FailureExitCode = Exclude<ExitCode, typeof ExitCodes.SUCCESS>;

export type ErrorCode = 'GENERAL_ERROR' | 'INVALID_ARGS' | 'NOT_FOUND' | 'VALIDATION_ERROR' | 'CONFIG_ERROR';

const ERROR_CODES: Record<FailureExitCode, ErrorCode> = {
  [ExitCodes.GENERAL_ERROR]: 'GENERAL_ERROR',
  [ExitCodes.INVALID_ARGS]: 'INVALID_ARGS',
  [ExitCodes.NOT_FOUND]: 'NOT_FOUND',
  [ExitCodes.VALIDATION_ERROR]: 'VALIDATION_ERROR',
  [ExitCodes.CONFIG_ERROR]: 'CONFIG_ERROR',
};

/** Fields of a domain error as serialized by `DomainError.toJSON` */
export type ErrorDetails = ReturnType<DomainError['toJSON']>;

export interface ErrorBody {
  code: ErrorCode;
  message: string;
  /** Present when the failure is a DomainError: the record, client and amount it names */
  details?: ErrorDetails;
}

/**
 * `--json` envelope written to stdout. A run prints exactly one.
 */
export type CLIResponse<T> =
  | { success: true; command: string; timestamp: string; durationMs: number; data: T }
  | { success: false; command: string; timestamp: string; error: ErrorBody };

export function errorCodeFor(exitCode: FailureExitCode): ErrorCode {
  return ERROR_CODES[exitCode];
}

export function createSuccessResponse<T>(command: string, data: T, durationMs: number): CLIResponse<T> {
  return { success: true, command, timestamp: new Date().toISOString(), durationMs, data };
}

export function createErrorResponse(command: string, error: Error, exitCode: FailureExitCode): CLIResponse<never> {
  const body: ErrorBody = { code: errorCodeFor(exitCode), message: error.message };
  if (error instanceof DomainError) {
    body.details = error.toJSON();
  }

  return { success: false, command, timestamp: new Date().toISOString(), error: body };
}
