import type { TransactionId } from '@ledgerfold/core';

/**
 * Decides whether a deposit or withdrawal may use its transaction id.
 * The first claim of an id wins; every later claim is refused.
 */
export interface TransactionIdRegistry {
  claim(txId: TransactionId): boolean;
}

/**
 * Registry for a single engine that sees the whole stream.
 */
export class InMemoryTransactionIdRegistry implements TransactionIdRegistry {
  private readonly claimed = new Set<TransactionId>();

  claim(txId: TransactionId): boolean {
    if (this.claimed.has(txId)) {
      return false;
    }
    this.claimed.add(txId);
    return true;
  }
}

/**
 * Registry for one client partition. Ownership of every id was settled in input
 * order while the stream was demultiplexed, so a partition may only claim the ids
 * it owns, and each of those only once.
 */
export class OwnedTransactionIdRegistry implements TransactionIdRegistry {
  private readonly claimed = new Set<TransactionId>();

  constructor(private readonly owned: ReadonlySet<TransactionId>) {}

  claim(txId: TransactionId): boolean {
    if (!this.owned.has(txId) || this.claimed.has(txId)) {
      return false;
    }
    this.claimed.add(txId);
    return true;
  }
}
