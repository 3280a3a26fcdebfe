import { ZERO, type ClientId } from '@ledgerfold/core';
import type { Decimal } from 'decimal.js';

/**
 * Point-in-time copy of an account. `total` is always `available + held`.
 */
export interface AccountSnapshot {
  clientId: ClientId;
  available: Decimal;
  held: Decimal;
  total: Decimal;
  locked: boolean;
}

/**
 * Mutable per-client balance. Only the ledger engine holds references to it;
 * every mutation moves funds between buckets or out of the account as one step,
 * and total is derived rather than stored.
 */
export class Account {
  private availableFunds: Decimal = ZERO;
  private heldFunds: Decimal = ZERO;
  private isLocked = false;

  constructor(readonly clientId: ClientId) {}

  get available(): Decimal {
    return this.availableFunds;
  }

  get held(): Decimal {
    return this.heldFunds;
  }

  get total(): Decimal {
    return this.availableFunds.plus(this.heldFunds);
  }

  get locked(): boolean {
    return this.isLocked;
  }

  credit(amount: Decimal): void {
    this.availableFunds = this.availableFunds.plus(amount);
  }

  debit(amount: Decimal): void {
    this.availableFunds = this.availableFunds.minus(amount);
  }

  /** available → held */
  hold(amount: Decimal): void {
    this.availableFunds = this.availableFunds.minus(amount);
    this.heldFunds = this.heldFunds.plus(amount);
  }

  /** held → available */
  release(amount: Decimal): void {
    this.heldFunds = this.heldFunds.minus(amount);
    this.availableFunds = this.availableFunds.plus(amount);
  }

  /** Removes held funds and freezes the account against further deposits and withdrawals */
  chargeBack(amount: Decimal): void {
    this.heldFunds = this.heldFunds.minus(amount);
    this.isLocked = true;
  }

  snapshot(): AccountSnapshot {
    return {
      clientId: this.clientId,
      available: this.availableFunds,
      held: this.heldFunds,
      total: this.total,
      locked: this.isLocked,
    };
  }
}
