import {
  ArithmeticOverflowError,
  ArithmeticUnderflowError,
  canTransition,
  checkedAdd,
  checkedSub,
  formatAmount,
  InsufficientFundsError,
  LockedAccountError,
  MissingAmountError,
  OnlyDepositsDisputableError,
  ZERO_AMOUNT,
  type AccountSnapshot,
  type Amount,
  type ClientId,
  type DisputeMutation,
  type ErrorContext,
  type FundsMutation,
  type LedgerEntry,
  type Mutation,
  type MutationError,
  type MutationOutcome,
} from '@ledgerflow/core';
import { getLogger } from '@ledgerflow/logger';
import { err, ok, type Result } from 'neverthrow';

import type { TransactionLedger } from '../ledger/transaction-ledger.js';

const logger = getLogger('Account');

/**
 * Balance state of one client plus the rules for applying a mutation to it.
 *
 * Every mutation computes all new values before writing any of them, so a failed
 * mutation leaves both the account and the referenced ledger entry untouched.
 * Invariant after every call: `total == available + held`.
 */
export class Account {
  private _available: Amount = ZERO_AMOUNT;
  private _held: Amount = ZERO_AMOUNT;
  private _total: Amount = ZERO_AMOUNT;
  private _locked = false;

  constructor(readonly clientId: ClientId) {}

  get available(): Amount {
    return this._available;
  }

  get held(): Amount {
    return this._held;
  }

  get total(): Amount {
    return this._total;
  }

  /** Terminal state reached through a chargeback */
  get locked(): boolean {
    return this._locked;
  }

  /**
   * Apply one mutation. Ledger entries are created by deposits/withdrawals and
   * advanced by the dispute family (ok → disputed → resolved → refunded).
   */
  mutate(mutation: Mutation, ledger: TransactionLedger): Result<MutationOutcome, MutationError> {
    if (this._locked) {
      return err(
        new LockedAccountError(`Attempt to mutate account ${this.clientId}, which is locked`, this.context(mutation))
      );
    }

    switch (mutation.kind) {
      case 'deposit':
        return this.deposit(mutation, ledger);
      case 'withdrawal':
        return this.withdraw(mutation, ledger);
      case 'dispute':
        return this.dispute(mutation, ledger);
      case 'resolve':
        return this.resolve(mutation, ledger);
      case 'chargeback':
        return this.chargeback(mutation, ledger);
    }
  }

  snapshot(): AccountSnapshot {
    return {
      clientId: this.clientId,
      available: this._available,
      held: this._held,
      total: this._total,
      locked: this._locked,
    };
  }

  private deposit(mutation: FundsMutation, ledger: TransactionLedger): Result<MutationOutcome, MutationError> {
    const amountResult = this.requireAmount(mutation);
    if (amountResult.isErr()) return err(amountResult.error);
    const amount = amountResult.value;

    const available = checkedAdd(this._available, amount);
    const total = checkedAdd(this._total, amount);
    if (available.isErr() || total.isErr()) {
      return err(
        new ArithmeticOverflowError(
          `Error on trx ${mutation.id}: Can't deposit ${formatAmount(amount)}`,
          this.context(mutation, amount)
        )
      );
    }

    const recorded = this.record(mutation, amount, ledger);
    if (recorded.isErr()) return err(recorded.error);

    this._available = available.value;
    this._total = total.value;
    return ok('applied');
  }

  private withdraw(mutation: FundsMutation, ledger: TransactionLedger): Result<MutationOutcome, MutationError> {
    const amountResult = this.requireAmount(mutation);
    if (amountResult.isErr()) return err(amountResult.error);
    const amount = amountResult.value;

    // available and total move as a pair: both debits succeed or neither applies
    const available = checkedSub(this._available, amount);
    const total = checkedSub(this._total, amount);
    if (available.isErr() || total.isErr()) {
      return err(
        new InsufficientFundsError(
          `Error on trx ${mutation.id}: Can't withdraw ${formatAmount(amount)}`,
          this.context(mutation, amount)
        )
      );
    }

    const recorded = this.record(mutation, amount, ledger);
    if (recorded.isErr()) return err(recorded.error);

    this._available = available.value;
    this._total = total.value;
    return ok('applied');
  }

  private dispute(mutation: DisputeMutation, ledger: TransactionLedger): Result<MutationOutcome, MutationError> {
    const entry = this.lookup(mutation, ledger);
    if (!entry) return ok('ignored');

    // Unknown ids are tolerated above; a known withdrawal is a hard error.
    if (entry.kind !== 'deposit') {
      return err(
        new OnlyDepositsDisputableError(
          `Cannot dispute ${mutation.id}, only deposits can be disputed`,
          this.context(mutation, entry.amount)
        )
      );
    }
    if (!canTransition(entry.status, 'disputed')) return this.ignore(mutation, entry);

    const available = checkedSub(this._available, entry.amount);
    if (available.isErr()) {
      return err(
        new ArithmeticUnderflowError(
          `Error on trx ${mutation.id}: Can't dispute ${formatAmount(entry.amount)}`,
          this.context(mutation, entry.amount)
        )
      );
    }
    const held = checkedAdd(this._held, entry.amount);
    if (held.isErr()) {
      return err(
        new ArithmeticOverflowError(
          `Error on trx ${mutation.id}: Can't hold ${formatAmount(entry.amount)}`,
          this.context(mutation, entry.amount)
        )
      );
    }

    this._available = available.value;
    this._held = held.value;
    entry.status = 'disputed';
    return ok('applied');
  }

  private resolve(mutation: DisputeMutation, ledger: TransactionLedger): Result<MutationOutcome, MutationError> {
    const entry = this.lookup(mutation, ledger);
    if (!entry) return ok('ignored');
    if (!canTransition(entry.status, 'resolved')) return this.ignore(mutation, entry);

    const held = checkedSub(this._held, entry.amount);
    if (held.isErr()) {
      return err(
        new ArithmeticUnderflowError(
          `Error on trx ${mutation.id}: Can't resolve ${formatAmount(entry.amount)}`,
          this.context(mutation, entry.amount)
        )
      );
    }
    const available = checkedAdd(this._available, entry.amount);
    if (available.isErr()) {
      return err(
        new ArithmeticOverflowError(
          `Error on trx ${mutation.id}: Can't release ${formatAmount(entry.amount)}`,
          this.context(mutation, entry.amount)
        )
      );
    }

    this._available = available.value;
    this._held = held.value;
    entry.status = 'resolved';
    return ok('applied');
  }

  private chargeback(mutation: DisputeMutation, ledger: TransactionLedger): Result<MutationOutcome, MutationError> {
    const entry = this.lookup(mutation, ledger);
    if (!entry) return ok('ignored');
    if (!canTransition(entry.status, 'refunded')) return this.ignore(mutation, entry);

    const available = checkedSub(this._available, entry.amount);
    const total = checkedSub(this._total, entry.amount);
    if (available.isErr() || total.isErr()) {
      return err(
        new ArithmeticUnderflowError(
          `Error on trx ${mutation.id}: Can't chargeback ${formatAmount(entry.amount)}`,
          this.context(mutation, entry.amount)
        )
      );
    }

    this._available = available.value;
    this._total = total.value;
    this._locked = true;
    entry.status = 'refunded';
    logger.info({ clientId: this.clientId, transactionId: mutation.id }, 'Account locked after chargeback');
    return ok('applied');
  }

  /**
   * Resolve the entry a dispute-family record points at. Ids that were never recorded are
   * treated as counterparty noise. The entry's owner is not compared: its amount moves on
   * this account, so another client's deposit can only be disputed against funds held here.
   */
  private lookup(mutation: DisputeMutation, ledger: TransactionLedger): LedgerEntry | undefined {
    const entry = ledger.find(mutation.id);
    if (!entry) {
      logger.debug({ clientId: this.clientId, transactionId: mutation.id }, `Ignored ${mutation.kind}: unknown tx`);
    }
    return entry;
  }

  private ignore(mutation: DisputeMutation, entry: LedgerEntry): Result<MutationOutcome, MutationError> {
    logger.debug(
      { clientId: this.clientId, transactionId: mutation.id, status: entry.status },
      `Ignored ${mutation.kind}: out of sequence`
    );
    return ok('ignored');
  }

  // Records deserialized without the schema can still arrive here untyped.
  private requireAmount(mutation: FundsMutation): Result<Amount, MissingAmountError> {
    if (typeof mutation.amount !== 'bigint') {
      return err(new MissingAmountError(mutation.kind, this.context(mutation)));
    }
    return ok(mutation.amount);
  }

  private record(mutation: FundsMutation, amount: Amount, ledger: TransactionLedger): Result<LedgerEntry, MutationError> {
    return ledger.insert({ id: mutation.id, kind: mutation.kind, clientId: this.clientId, amount });
  }

  private context(mutation: Mutation, amount?: Amount): ErrorContext {
    return {
      transactionId: mutation.id,
      clientId: this.clientId,
      amount: amount ?? mutation.amount,
    };
  }
}
