import { formatAmount, type ClientId, type TransactionId, type TransactionRecord } from '@ledgerfold/core';
import { Decimal } from 'decimal.js';

import type { AccountSnapshot } from '../domain/account.js';

export function deposit(clientId: ClientId, txId: TransactionId, amount: string): TransactionRecord {
  return { kind: 'deposit', clientId, txId, amount: new Decimal(amount) };
}

export function withdrawal(clientId: ClientId, txId: TransactionId, amount: string): TransactionRecord {
  return { kind: 'withdrawal', clientId, txId, amount: new Decimal(amount) };
}

export function dispute(clientId: ClientId, txId: TransactionId): TransactionRecord {
  return { kind: 'dispute', clientId, txId };
}

export function resolve(clientId: ClientId, txId: TransactionId): TransactionRecord {
  return { kind: 'resolve', clientId, txId };
}

export function chargeback(clientId: ClientId, txId: TransactionId): TransactionRecord {
  return { kind: 'chargeback', clientId, txId };
}

/**
 * Account state rendered as strings, for readable equality assertions.
 */
export interface AccountSummary {
  available: string;
  held: string;
  total: string;
  locked: boolean;
}

export function summarize(snapshot: AccountSnapshot | undefined): AccountSummary | undefined {
  if (!snapshot) return undefined;
  return {
    available: formatAmount(snapshot.available),
    held: formatAmount(snapshot.held),
    total: formatAmount(snapshot.total),
    locked: snapshot.locked,
  };
}

/**
 * Deterministic PRNG (mulberry32) so generated streams are reproducible.
 */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function pick<T>(random: () => number, items: readonly T[]): T {
  const item = items[Math.floor(random() * items.length)];
  if (item === undefined) {
    throw new Error('Cannot pick from an empty list');
  }
  return item;
}

/**
 * Generate a stream mixing every record kind over a few clients. Dispute actions mostly
 * target earlier ids so that lifecycles actually progress. With `reuseIds`, deposit and
 * withdrawal ids are sometimes reused (across clients too) to exercise duplicate handling.
 */
export function generateRecords(
  seed: number,
  count: number,
  clients: readonly ClientId[],
  options: { reuseIds: boolean } = { reuseIds: true }
): TransactionRecord[] {
  const random = createRandom(seed);
  const records: TransactionRecord[] = [];
  const usedIds: TransactionId[] = [];
  let nextId = 1;

  for (let i = 0; i < count; i++) {
    const clientId = pick(random, clients);
    const roll = random();
    const amount = (Math.floor(random() * 100_000) / 10_000).toFixed(4);

    if (roll < 0.35 || usedIds.length === 0) {
      const txId = options.reuseIds && usedIds.length > 0 && random() < 0.05 ? pick(random, usedIds) : nextId++;
      usedIds.push(txId);
      records.push(deposit(clientId, txId, amount));
    } else if (roll < 0.55) {
      const txId = options.reuseIds && random() < 0.05 ? pick(random, usedIds) : nextId++;
      usedIds.push(txId);
      records.push(withdrawal(clientId, txId, amount));
    } else {
      const txId = random() < 0.9 ? pick(random, usedIds) : nextId + 1000;
      const action = pick(random, ['dispute', 'dispute', 'resolve', 'chargeback'] as const);
      records.push({ kind: action, clientId, txId });
    }
  }

  return records;
}

/**
 * Split a stream into per-client subsequences, preserving order within each client.
 */
export function splitByClient(records: readonly TransactionRecord[]): Map<ClientId, TransactionRecord[]> {
  const byClient = new Map<ClientId, TransactionRecord[]>();
  for (const record of records) {
    const list = byClient.get(record.clientId) ?? [];
    list.push(record);
    byClient.set(record.clientId, list);
  }
  return byClient;
}

/**
 * Random merge of several ordered sequences that keeps each sequence's own order.
 */
export function interleave<T>(sequences: readonly (readonly T[])[], random: () => number): T[] {
  const cursors = sequences.map(() => 0);
  const merged: T[] = [];
  for (;;) {
    const open = sequences.map((_, index) => index).filter((index) => (cursors[index] ?? 0) < (sequences[index]?.length ?? 0));
    if (open.length === 0) return merged;
    const index = pick(random, open);
    const cursor = cursors[index] ?? 0;
    const item = sequences[index]?.[cursor];
    if (item !== undefined) merged.push(item);
    cursors[index] = cursor + 1;
  }
}
