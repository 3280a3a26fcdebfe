export { Account, type AccountSnapshot } from './domain/account.js';
export { DepositStore, type RetainedDeposit } from './domain/deposit-store.js';
export {
  DISPUTE_STATES,
  DISPUTE_TRANSITIONS,
  isTerminalDisputeState,
  nextDisputeState,
  type DisputeState,
  type DisputeTransitionRule,
} from './domain/dispute-state.js';
export * from './errors.js';
export {
  LedgerEngine,
  createEmptyLedgerStats,
  mergeLedgerStats,
  type AppliedTransaction,
  type LedgerEngineOptions,
  type LedgerStats,
} from './ledger-engine.js';
export {
  PartitionedLedger,
  foldPartition,
  type ClientPartition,
  type LedgerRunResult,
} from './partitioned-ledger.js';
export { ACCOUNT_ROW_COLUMNS, projectAccounts, type AccountRow } from './projection/account-projector.js';
export {
  InMemoryTransactionIdRegistry,
  OwnedTransactionIdRegistry,
  type TransactionIdRegistry,
} from './registry/transaction-id-registry.js';
