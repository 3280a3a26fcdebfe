import type { Decimal } from 'decimal.js';

/** Unsigned 16-bit client identifier */
export type ClientId = number;

/** Unsigned 32-bit transaction identifier */
export type TransactionId = number;

export const MAX_CLIENT_ID = 65_535;
export const MAX_TRANSACTION_ID = 4_294_967_295;

export const TRANSACTION_KINDS = ['deposit', 'withdrawal', 'dispute', 'resolve', 'chargeback'] as const;
export type TransactionKind = (typeof TRANSACTION_KINDS)[number];

/** Kinds that move funds and carry an amount */
export type FundsTransactionKind = Extract<TransactionKind, 'deposit' | 'withdrawal'>;

/** Kinds that reference an earlier deposit by its transaction id */
export type DisputeActionKind = Extract<TransactionKind, 'dispute' | 'resolve' | 'chargeback'>;

export interface FundsRecord {
  kind: FundsTransactionKind;
  clientId: ClientId;
  txId: TransactionId;
  amount: Decimal;
}

export interface DisputeActionRecord {
  kind: DisputeActionKind;
  clientId: ClientId;
  /** Id of the deposit this action refers to */
  txId: TransactionId;
}

/**
 * A validated input record. Amount presence is decided by `kind`, never optional.
 */
export type TransactionRecord = FundsRecord | DisputeActionRecord;

export function isFundsRecord(record: TransactionRecord): record is FundsRecord {
  return record.kind === 'deposit' || record.kind === 'withdrawal';
}
