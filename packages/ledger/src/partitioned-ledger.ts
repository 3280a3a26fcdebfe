import { isFundsRecord, type ClientId, type TransactionId, type TransactionRecord } from '@ledgerfold/core';
import { getLogger } from '@ledgerfold/logger';

import type { AccountSnapshot } from './domain/account.js';
import { LedgerEngine, createEmptyLedgerStats, mergeLedgerStats, type LedgerStats } from './ledger-engine.js';
import { OwnedTransactionIdRegistry } from './registry/transaction-id-registry.js';

/**
 * All records of one client, in input order, plus the deposit/withdrawal ids
 * whose first occurrence in the whole stream belongs to this client.
 */
export interface ClientPartition {
  clientId: ClientId;
  records: TransactionRecord[];
  ownedTransactionIds: Set<TransactionId>;
}

export interface LedgerRunResult {
  accounts: AccountSnapshot[];
  stats: LedgerStats;
}

/**
 * Fold a single partition on its own engine. Partitions share no state, so they can
 * be folded in any order and merged afterwards.
 */
export function foldPartition(partition: ClientPartition): LedgerRunResult {
  const engine = new LedgerEngine({
    transactionIds: new OwnedTransactionIdRegistry(partition.ownedTransactionIds),
  });
  for (const record of partition.records) {
    engine.apply(record);
  }
  return { accounts: engine.finalize(), stats: engine.getStats() };
}

/**
 * PartitionedLedger - demultiplexes the stream by client id and folds each client
 * independently.
 *
 * Ordering is only guaranteed within a client; records of different clients never
 * read or write each other's state. Transaction-id uniqueness is the one global
 * rule, so ownership of each id is decided here in input order and handed to the
 * partition that saw it first. The merged result is identical to a sequential
 * LedgerEngine over the same stream.
 */
export class PartitionedLedger {
  private readonly logger = getLogger('PartitionedLedger');
  private readonly partitions = new Map<ClientId, ClientPartition>();
  private readonly idOwners = new Map<TransactionId, ClientId>();

  add(record: TransactionRecord): void {
    let partition = this.partitions.get(record.clientId);
    if (!partition) {
      partition = { clientId: record.clientId, records: [], ownedTransactionIds: new Set() };
      this.partitions.set(record.clientId, partition);
    }
    partition.records.push(record);

    if (isFundsRecord(record) && !this.idOwners.has(record.txId)) {
      this.idOwners.set(record.txId, record.clientId);
      partition.ownedTransactionIds.add(record.txId);
    }
  }

  getPartitions(): ClientPartition[] {
    return [...this.partitions.values()];
  }

  /**
   * Fold every partition and merge their accounts and stats.
   */
  run(): LedgerRunResult {
    const accounts: AccountSnapshot[] = [];
    let stats = createEmptyLedgerStats();

    for (const partition of this.partitions.values()) {
      const result = foldPartition(partition);
      accounts.push(...result.accounts);
      stats = mergeLedgerStats(stats, result.stats);
    }

    this.logger.debug({ partitions: this.partitions.size, records: stats.received }, 'Partitions folded');
    return { accounts, stats };
  }
}
