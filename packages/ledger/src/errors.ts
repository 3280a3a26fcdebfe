import { DomainError, type TransactionRecord } from '@ledgerfold/core';

/**
 * Base class for records the engine declines to apply. A rejection leaves every
 * account untouched and never stops the stream.
 */
abstract class LedgerRejectionError extends DomainError {
  readonly severity = 'warning' as const;

  constructor(
    message: string,
    readonly record: TransactionRecord,
    additionalContext?: Record<string, unknown>
  ) {
    super(message, { clientId: record.clientId, transactionId: record.txId, additionalContext });
  }
}

/**
 * Dispute, resolve or chargeback naming a deposit that does not exist or belongs to another client
 */
export class UnknownTransactionReferenceError extends LedgerRejectionError {
  readonly code = 'UNKNOWN_TRANSACTION_REFERENCE';
}

/**
 * Dispute action on a deposit that is not in the state the action starts from
 */
export class InvalidStateTransitionError extends LedgerRejectionError {
  readonly code = 'INVALID_STATE_TRANSITION';
}

/**
 * Withdrawal larger than the available balance
 */
export class InsufficientFundsError extends LedgerRejectionError {
  readonly code = 'INSUFFICIENT_FUNDS';
}

/**
 * Deposit or withdrawal on an account frozen by a chargeback
 */
export class LockedAccountError extends LedgerRejectionError {
  readonly code = 'LOCKED_ACCOUNT';
}

/**
 * Deposit or withdrawal reusing a transaction id that was already claimed
 */
export class DuplicateTransactionError extends LedgerRejectionError {
  readonly code = 'DUPLICATE_TRANSACTION';
}

export type LedgerRejection =
  | UnknownTransactionReferenceError
  | InvalidStateTransitionError
  | InsufficientFundsError
  | LockedAccountError
  | DuplicateTransactionError;

export type LedgerRejectionCode = LedgerRejection['code'];

export const LEDGER_REJECTION_CODES: readonly LedgerRejectionCode[] = [
  'UNKNOWN_TRANSACTION_REFERENCE',
  'INVALID_STATE_TRANSITION',
  'INSUFFICIENT_FUNDS',
  'LOCKED_ACCOUNT',
  'DUPLICATE_TRANSACTION',
];
