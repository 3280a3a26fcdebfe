import type {
  ClientId,
  DisputeActionKind,
  DisputeActionRecord,
  FundsRecord,
  TransactionId,
  TransactionKind,
  TransactionRecord,
} from '@ledgerfold/core';
import { getLogger } from '@ledgerfold/logger';
import type { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { Account, type AccountSnapshot } from './domain/account.js';
import { DepositStore } from './domain/deposit-store.js';
import { isTerminalDisputeState, nextDisputeState } from './domain/dispute-state.js';
import {
  DuplicateTransactionError,
  InsufficientFundsError,
  InvalidStateTransitionError,
  LEDGER_REJECTION_CODES,
  LockedAccountError,
  UnknownTransactionReferenceError,
  type LedgerRejection,
  type LedgerRejectionCode,
} from './errors.js';
import { InMemoryTransactionIdRegistry, type TransactionIdRegistry } from './registry/transaction-id-registry.js';

/**
 * A record that changed its account, with the account state right after it.
 */
export interface AppliedTransaction {
  kind: TransactionKind;
  clientId: ClientId;
  txId: TransactionId;
  account: AccountSnapshot;
}

export interface LedgerStats {
  /** Records passed to apply() */
  received: number;
  applied: number;
  rejected: number;
  rejectedByCode: Record<LedgerRejectionCode, number>;
}

export interface LedgerEngineOptions {
  /** Where deposit and withdrawal ids are claimed; defaults to a private in-memory registry */
  transactionIds?: TransactionIdRegistry | undefined;
}

export function createEmptyLedgerStats(): LedgerStats {
  const rejectedByCode: Record<LedgerRejectionCode, number> = {
    DUPLICATE_TRANSACTION: 0,
    INSUFFICIENT_FUNDS: 0,
    INVALID_STATE_TRANSITION: 0,
    LOCKED_ACCOUNT: 0,
    UNKNOWN_TRANSACTION_REFERENCE: 0,
  };
  return { received: 0, applied: 0, rejected: 0, rejectedByCode };
}

/**
 * Sum of two stats objects (used when partitions are merged)
 */
export function mergeLedgerStats(a: LedgerStats, b: LedgerStats): LedgerStats {
  const merged = createEmptyLedgerStats();
  merged.received = a.received + b.received;
  merged.applied = a.applied + b.applied;
  merged.rejected = a.rejected + b.rejected;
  for (const code of LEDGER_REJECTION_CODES) {
    merged.rejectedByCode[code] = a.rejectedByCode[code] + b.rejectedByCode[code];
  }
  return merged;
}

/**
 * LedgerEngine - folds transaction records into per-client accounts.
 *
 * Records must be applied in input order. Each call either applies the record
 * completely or rejects it without touching any account; a rejection is returned
 * as a value and the caller simply moves on to the next record.
 *
 * - deposit: credits available funds and keeps the deposit for later disputes
 * - withdrawal: debits available funds when they cover the amount
 * - dispute: moves a deposit's amount from available to held
 * - resolve: moves a disputed amount back from held to available
 * - chargeback: removes a disputed amount from held and locks the account
 *
 * A locked account refuses deposits and withdrawals; dispute actions on its other
 * deposits still apply.
 */
export class LedgerEngine {
  private readonly logger = getLogger('LedgerEngine');
  private readonly accounts = new Map<ClientId, Account>();
  private readonly deposits = new DepositStore();
  private readonly transactionIds: TransactionIdRegistry;
  private readonly stats = createEmptyLedgerStats();

  constructor(options?: LedgerEngineOptions) {
    this.transactionIds = options?.transactionIds ?? new InMemoryTransactionIdRegistry();
  }

  /**
   * Apply one record. Never throws.
   */
  apply(record: TransactionRecord): Result<AppliedTransaction, LedgerRejection> {
    const account = this.openAccount(record.clientId);
    const result = this.dispatch(record, account);

    this.stats.received++;
    if (result.isOk()) {
      this.stats.applied++;
    } else {
      this.stats.rejected++;
      this.stats.rejectedByCode[result.error.code]++;
      this.logger.debug(
        { clientId: record.clientId, code: result.error.code, kind: record.kind, txId: record.txId },
        result.error.message
      );
    }

    return result;
  }

  /**
   * Final state of every account that any record referenced, in first-seen order.
   */
  finalize(): AccountSnapshot[] {
    const snapshots = [...this.accounts.values()].map((account) => account.snapshot());
    this.logger.debug(
      { accounts: snapshots.length, retainedDeposits: this.deposits.size, ...this.stats },
      'Ledger finalized'
    );
    return snapshots;
  }

  getAccount(clientId: ClientId): AccountSnapshot | undefined {
    return this.accounts.get(clientId)?.snapshot();
  }

  getStats(): LedgerStats {
    return { ...this.stats, rejectedByCode: { ...this.stats.rejectedByCode } };
  }

  private openAccount(clientId: ClientId): Account {
    let account = this.accounts.get(clientId);
    if (!account) {
      account = new Account(clientId);
      this.accounts.set(clientId, account);
    }
    return account;
  }

  private dispatch(record: TransactionRecord, account: Account): Result<AppliedTransaction, LedgerRejection> {
    switch (record.kind) {
      case 'deposit':
        return this.applyDeposit(record, account);
      case 'withdrawal':
        return this.applyWithdrawal(record, account);
      case 'dispute':
      case 'resolve':
      case 'chargeback':
        return this.applyDisputeAction(record, account);
    }
  }

  private applyDeposit(record: FundsRecord, account: Account): Result<AppliedTransaction, LedgerRejection> {
    const gate = this.checkFundsRecord(record, account);
    if (gate.isErr()) {
      return err(gate.error);
    }

    account.credit(record.amount);
    this.deposits.retain(record);
    return ok(this.toApplied(record, account));
  }

  private applyWithdrawal(record: FundsRecord, account: Account): Result<AppliedTransaction, LedgerRejection> {
    const gate = this.checkFundsRecord(record, account);
    if (gate.isErr()) {
      return err(gate.error);
    }

    if (account.available.lessThan(record.amount)) {
      return err(
        new InsufficientFundsError(
          `Withdrawal ${record.txId} of ${record.amount.toFixed()} exceeds available ${account.available.toFixed()} for client ${record.clientId}`,
          record,
          { available: account.available.toFixed(), requested: record.amount.toFixed() }
        )
      );
    }

    account.debit(record.amount);
    return ok(this.toApplied(record, account));
  }

  /**
   * Shared gate for deposits and withdrawals: the id is claimed first, so a record
   * refused for a locked account still uses up its id.
   */
  private checkFundsRecord(record: FundsRecord, account: Account): Result<void, LedgerRejection> {
    if (!this.transactionIds.claim(record.txId)) {
      return err(new DuplicateTransactionError(`Transaction ${record.txId} was already recorded`, record));
    }
    if (account.locked) {
      return err(new LockedAccountError(`Client ${record.clientId} is locked; ${record.kind} ${record.txId} refused`, record));
    }
    return ok(undefined);
  }

  private applyDisputeAction(
    record: DisputeActionRecord,
    account: Account
  ): Result<AppliedTransaction, LedgerRejection> {
    const deposit = this.deposits.find(record.txId);
    if (!deposit || deposit.clientId !== record.clientId) {
      return err(
        new UnknownTransactionReferenceError(
          `${capitalize(record.kind)} references unknown deposit ${record.txId} for client ${record.clientId}`,
          record
        )
      );
    }

    const nextState = nextDisputeState(deposit.state, record.kind);
    if (!nextState) {
      return err(
        new InvalidStateTransitionError(
          `Cannot ${record.kind} deposit ${record.txId} in state ${deposit.state}`,
          record,
          { action: record.kind, state: deposit.state, terminal: isTerminalDisputeState(deposit.state) }
        )
      );
    }

    moveDisputedFunds(record.kind, account, deposit.amount);
    deposit.state = nextState;
    return ok(this.toApplied(record, account));
  }

  private toApplied(record: TransactionRecord, account: Account): AppliedTransaction {
    return {
      kind: record.kind,
      clientId: record.clientId,
      txId: record.txId,
      account: account.snapshot(),
    };
  }
}

function moveDisputedFunds(action: DisputeActionKind, account: Account, amount: Decimal): void {
  switch (action) {
    case 'dispute':
      account.hold(amount);
      return;
    case 'resolve':
      account.release(amount);
      return;
    case 'chargeback':
      account.chargeBack(amount);
      return;
  }
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
