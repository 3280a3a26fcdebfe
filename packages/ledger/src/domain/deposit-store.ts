import type { ClientId, FundsRecord, TransactionId } from '@ledgerfold/core';
import type { Decimal } from 'decimal.js';

import type { DisputeState } from './dispute-state.js';

/**
 * A deposit kept for the whole run so later dispute actions can find it.
 */
export interface RetainedDeposit {
  txId: TransactionId;
  clientId: ClientId;
  amount: Decimal;
  state: DisputeState;
}

export class DepositStore {
  private readonly deposits = new Map<TransactionId, RetainedDeposit>();

  retain(record: FundsRecord): RetainedDeposit {
    const deposit: RetainedDeposit = {
      txId: record.txId,
      clientId: record.clientId,
      amount: record.amount,
      state: 'normal',
    };
    this.deposits.set(record.txId, deposit);
    return deposit;
  }

  find(txId: TransactionId): RetainedDeposit | undefined {
    return this.deposits.get(txId);
  }

  get size(): number {
    return this.deposits.size;
  }
}
