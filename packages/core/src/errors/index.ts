/**
 * Error hierarchy for transaction processing.
 *
 * Business failures travel as `Result` errors (neverthrow); nothing in the engine throws
 * for an expected case. Each class carries a stable `code` and the ids needed to trace
 * the failing record.
 */

import type { ClientId, TransactionId } from '../types/identifiers.js';
import type { FundsMutationKind } from '../types/mutation.js';
import type { Amount } from '../value-objects/amount.js';

export interface ErrorContext {
  additionalContext?: Record<string, unknown> | undefined;
  amount?: Amount | undefined;
  clientId?: ClientId | undefined;
  transactionId?: TransactionId | undefined;
}

/**
 * Base domain error
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly severity: 'error' | 'warning';

  readonly timestamp: string;
  readonly transactionId?: TransactionId | undefined;
  readonly clientId?: ClientId | undefined;
  readonly amount?: Amount | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, context?: ErrorContext) {
    super(message);
    this.timestamp = new Date().toISOString();
    this.transactionId = context?.transactionId;
    this.clientId = context?.clientId;
    this.amount = context?.amount;
    this.context = context?.additionalContext;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      amount: this.amount?.toString(),
      clientId: this.clientId,
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
      severity: this.severity,
      timestamp: this.timestamp,
      transactionId: this.transactionId,
    };
  }
}

/**
 * Failure of a single mutation against an account. Fatal to that record only;
 * the engine's error policy decides whether the run continues.
 */
export abstract class MutationError extends DomainError {
  readonly severity = 'error' as const;
}

export class LockedAccountError extends MutationError {
  readonly code = 'LOCKED_ACCOUNT';
}

export class InsufficientFundsError extends MutationError {
  readonly code = 'INSUFFICIENT_FUNDS';
}

export class OnlyDepositsDisputableError extends MutationError {
  readonly code = 'ONLY_DEPOSITS_DISPUTABLE';
}

export class ArithmeticUnderflowError extends MutationError {
  readonly code = 'ARITHMETIC_UNDERFLOW';
}

export class ArithmeticOverflowError extends MutationError {
  readonly code = 'ARITHMETIC_OVERFLOW';
}

/**
 * A deposit or withdrawal reused a transaction id already in the ledger.
 * Upstream guarantees unique ids, so this signals a broken input contract.
 */
export class DuplicateTransactionError extends MutationError {
  readonly code = 'DUPLICATE_TRANSACTION';
}

/**
 * A funds mutation reached the engine without an amount. Typed callers cannot build one;
 * this guards records that bypassed the schema.
 */
export class MissingAmountError extends MutationError {
  readonly code = 'MISSING_AMOUNT';

  constructor(
    public readonly kind: FundsMutationKind,
    context?: ErrorContext
  ) {
    super(`Err for trx ${String(context?.transactionId)}, ${kind} requires an amount`, context);
  }
}

export class InvalidAmountError extends DomainError {
  readonly code = 'INVALID_AMOUNT';
  readonly severity = 'error' as const;
}

/**
 * Malformed input row, rejected before it reaches the engine.
 */
export class RowValidationError extends DomainError {
  readonly code = 'ROW_VALIDATION';
  readonly severity = 'error' as const;

  constructor(
    message: string,
    public readonly recordNumber: number,
    context?: ErrorContext
  ) {
    super(message, context);
  }
}

/**
 * Account state broke `total == available + held`.
 */
export class InvariantViolationError extends DomainError {
  readonly code = 'INVARIANT_VIOLATION';
  readonly severity = 'error' as const;
}

/**
 * The engine stopped at the first failing record under the `abort` policy.
 */
export class EngineAbortError extends DomainError {
  readonly code = 'ENGINE_ABORTED';
  readonly severity = 'error' as const;

  constructor(
    public readonly recordNumber: number,
    public readonly reason: DomainError
  ) {
    super(`Record ${recordNumber} (tx ${String(reason.transactionId ?? '?')}): ${reason.message}`, {
      transactionId: reason.transactionId,
      clientId: reason.clientId,
      amount: reason.amount,
      additionalContext: { reasonCode: reason.code },
    });
  }
}
