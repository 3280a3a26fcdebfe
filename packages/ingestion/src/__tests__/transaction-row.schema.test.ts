import { describe, expect, it } from 'vitest';

import { createTransactionRowSchema, parseTransactionRow } from '../schemas/transaction-row.schema.js';

describe('parseTransactionRow', () => {
  const schema = createTransactionRowSchema('reject');

  it('should parse a deposit', () => {
    const record = parseTransactionRow({ type: 'deposit', client: '1', tx: '7', amount: '1.5' }, 2, schema)._unsafeUnwrap();

    expect(record.kind).toBe('deposit');
    expect(record.clientId).toBe(1);
    expect(record.txId).toBe(7);
    expect('amount' in record ? record.amount.toFixed(4) : undefined).toBe('1.5000');
  });

  it('should accept the type in any case and with surrounding whitespace', () => {
    const record = parseTransactionRow({ type: '  WithDrawal ', client: '2', tx: '3', amount: '4' }, 2, schema)._unsafeUnwrap();

    expect(record.kind).toBe('withdrawal');
  });

  it('should ignore an amount on a dispute action', () => {
    const record = parseTransactionRow({ type: 'dispute', client: '1', tx: '7', amount: '3.0' }, 2, schema)._unsafeUnwrap();

    expect(record).toEqual({ kind: 'dispute', clientId: 1, txId: 7 });
  });

  it('should accept a dispute action without an amount column', () => {
    const record = parseTransactionRow({ type: 'chargeback', client: '1', tx: '7' }, 2, schema)._unsafeUnwrap();

    expect(record).toEqual({ kind: 'chargeback', clientId: 1, txId: 7 });
  });

  it('should accept the largest ids', () => {
    const record = parseTransactionRow({ type: 'resolve', client: '65535', tx: '4294967295' }, 2, schema)._unsafeUnwrap();

    expect(record).toEqual({ kind: 'resolve', clientId: 65535, txId: 4294967295 });
  });

  it('should reject a deposit without an amount', () => {
    const error = parseTransactionRow({ type: 'deposit', client: '1', tx: '7', amount: '' }, 5, schema)._unsafeUnwrapErr();

    expect(error.code).toBe('MALFORMED_RECORD');
    expect(error.line).toBe(5);
    expect(error.message).toBe('Line 5: amount: Required for deposit');
  });

  it('should reject a negative amount', () => {
    const error = parseTransactionRow({ type: 'deposit', client: '1', tx: '7', amount: '-1' }, 3, schema)._unsafeUnwrapErr();

    expect(error.message).toBe('Line 3: amount: Must not be negative');
  });

  it('should reject an amount that is not a plain decimal', () => {
    const error = parseTransactionRow({ type: 'deposit', client: '1', tx: '7', amount: '1e3' }, 3, schema)._unsafeUnwrapErr();

    expect(error.message).toBe('Line 3: amount: Amount "1e3" is not a decimal number');
  });

  it('should reject more than four fractional digits by default', () => {
    const error = parseTransactionRow({ type: 'withdrawal', client: '1', tx: '7', amount: '1.23456' }, 4, schema)._unsafeUnwrapErr();

    expect(error.message).toBe('Line 4: amount: Amount "1.23456" has more than 4 fractional digits');
  });

  it('should reject an amount with more than 28 integer digits', () => {
    const amount = `${'1'.repeat(29)}.5`;
    const error = parseTransactionRow({ type: 'deposit', client: '1', tx: '7', amount }, 6, schema)._unsafeUnwrapErr();

    expect(error.message).toBe(`Line 6: amount: Amount "${amount}" has more than 28 integer digits`);
  });

  it('should reject a dispute row with an empty tx column', () => {
    const error = parseTransactionRow({ type: 'dispute', client: '1', tx: '', amount: '1' }, 6, schema)._unsafeUnwrapErr();

    expect(error.code).toBe('MALFORMED_RECORD');
  });

  it('should round excess precision half-up under the round policy', () => {
    const record = parseTransactionRow(
      { type: 'deposit', client: '1', tx: '7', amount: '1.23455' },
      2,
      createTransactionRowSchema('round')
    )._unsafeUnwrap();

    expect('amount' in record ? record.amount.toString() : undefined).toBe('1.2346');
  });

  it('should reject a client id out of range', () => {
    const error = parseTransactionRow({ type: 'deposit', client: '65536', tx: '1', amount: '1' }, 2, schema)._unsafeUnwrapErr();

    expect(error.message).toBe('Line 2: client: Must be at most 65535');
  });

  it('should reject a transaction id out of range', () => {
    const error = parseTransactionRow({ type: 'dispute', client: '1', tx: '4294967296' }, 2, schema)._unsafeUnwrapErr();

    expect(error.message).toBe('Line 2: tx: Must be at most 4294967295');
  });

  it('should reject signed or fractional ids', () => {
    expect(parseTransactionRow({ type: 'dispute', client: '-1', tx: '1' }, 2, schema)._unsafeUnwrapErr().message).toBe(
      'Line 2: client: Expected an unsigned integer'
    );
    expect(parseTransactionRow({ type: 'dispute', client: '1', tx: '1.5' }, 2, schema)._unsafeUnwrapErr().message).toBe(
      'Line 2: tx: Expected an unsigned integer'
    );
  });

  it('should reject an unknown type', () => {
    const error = parseTransactionRow({ type: 'transfer', client: '1', tx: '1', amount: '1' }, 9, schema)._unsafeUnwrapErr();

    expect(error.line).toBe(9);
    expect(error.message.startsWith('Line 9: type: ')).toBe(true);
    expect(error.row).toEqual({ type: 'transfer', client: '1', tx: '1', amount: '1' });
  });

  it('should reject a row missing the client column', () => {
    const error = parseTransactionRow({ type: 'deposit', tx: '1', amount: '1' }, 2, schema)._unsafeUnwrapErr();

    expect(error.message).toBe('Line 2: client: Required');
  });
});
