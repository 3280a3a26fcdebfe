import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import type { AccountSnapshot } from '../domain/account.js';
import { ACCOUNT_ROW_COLUMNS, projectAccounts } from '../projection/account-projector.js';

function snapshot(clientId: number, available: string, held: string, locked = false): AccountSnapshot {
  const availableFunds = new Decimal(available);
  const heldFunds = new Decimal(held);
  return {
    clientId,
    available: availableFunds,
    held: heldFunds,
    total: availableFunds.plus(heldFunds),
    locked,
  };
}

describe('projectAccounts', () => {
  it('should order rows by numeric client id', () => {
    const rows = projectAccounts([snapshot(10, '1', '0'), snapshot(2, '1', '0'), snapshot(1, '1', '0')]);

    expect(rows.map((row) => row.client)).toEqual([1, 2, 10]);
  });

  it('should render amounts with four fractional digits', () => {
    const [row] = projectAccounts([snapshot(1, '1.5', '0.25')]);

    expect(row).toEqual({ client: 1, available: '1.5000', held: '0.2500', total: '1.7500', locked: false });
  });

  it('should render negative available funds', () => {
    const [row] = projectAccounts([snapshot(3, '-8', '10', true)]);

    expect(row).toEqual({ client: 3, available: '-8.0000', held: '10.0000', total: '2.0000', locked: true });
  });

  it('should render zero without a sign', () => {
    const [row] = projectAccounts([snapshot(4, '-0', '0')]);

    expect(row?.available).toBe('0.0000');
    expect(row?.total).toBe('0.0000');
  });

  it('should return no rows for no accounts', () => {
    expect(projectAccounts([])).toEqual([]);
  });

  it('should expose the columns in output order', () => {
    expect(ACCOUNT_ROW_COLUMNS).toEqual(['client', 'available', 'held', 'total', 'locked']);
  });
});
