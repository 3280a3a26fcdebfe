import { formatAmount, type ClientId } from '@ledgerfold/core';

import type { AccountSnapshot } from '../domain/account.js';

/**
 * Output row for one client. Amounts carry exactly four fractional digits.
 */
export interface AccountRow {
  client: ClientId;
  available: string;
  held: string;
  total: string;
  locked: boolean;
}

export const ACCOUNT_ROW_COLUMNS = ['client', 'available', 'held', 'total', 'locked'] as const;

/**
 * Project final accounts into output rows, ordered by ascending client id
 * regardless of the order clients first appeared in.
 */
export function projectAccounts(accounts: Iterable<AccountSnapshot>): AccountRow[] {
  return [...accounts]
    .sort((a, b) => a.clientId - b.clientId)
    .map((account) => ({
      client: account.clientId,
      available: formatAmount(account.available),
      held: formatAmount(account.held),
      total: formatAmount(account.total),
      locked: account.locked,
    }));
}
