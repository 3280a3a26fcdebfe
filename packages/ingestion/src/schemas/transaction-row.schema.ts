import {
  MAX_CLIENT_ID,
  MAX_TRANSACTION_ID,
  TRANSACTION_KINDS,
  fromZod,
  formatZodError,
  parseAmount,
  type AmountPrecisionPolicy,
  type TransactionRecord,
} from '@ledgerfold/core';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { MalformedRecordError } from '../errors.js';

function unsignedIdSchema(max: number) {
  return z
    .string()
    .trim()
    .regex(/^\d+$/, 'Expected an unsigned integer')
    .transform(Number)
    .pipe(z.number().int().max(max, `Must be at most ${max}`));
}

/**
 * Raw CSV row as produced by the parser: every present field is a string, and
 * `amount` may be missing entirely when the row is shorter than the header.
 */
export function createTransactionRowSchema(precision: AmountPrecisionPolicy) {
  return z
    .object({
      type: z.string().trim().toLowerCase().pipe(z.enum(TRANSACTION_KINDS)),
      client: unsignedIdSchema(MAX_CLIENT_ID),
      tx: unsignedIdSchema(MAX_TRANSACTION_ID),
      amount: z.string().optional(),
    })
    .transform((row, ctx): TransactionRecord => {
      if (row.type === 'dispute' || row.type === 'resolve' || row.type === 'chargeback') {
        // An amount on a dispute action carries no meaning and is ignored
        return { kind: row.type, clientId: row.client, txId: row.tx };
      }

      const rawAmount = row.amount?.trim() ?? '';
      if (rawAmount === '') {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['amount'], message: `Required for ${row.type}` });
        return z.NEVER;
      }

      const amount = parseAmount(rawAmount, precision);
      if (amount.isErr()) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['amount'], message: amount.error.message });
        return z.NEVER;
      }
      if (amount.value.isNegative() && !amount.value.isZero()) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['amount'], message: 'Must not be negative' });
        return z.NEVER;
      }

      return { kind: row.type, clientId: row.client, txId: row.tx, amount: amount.value };
    });
}

export type TransactionRowSchema = ReturnType<typeof createTransactionRowSchema>;

/**
 * Validate one raw row. `line` is the 1-based line number in the source file.
 */
export function parseTransactionRow(
  row: Record<string, string>,
  line: number,
  schema: TransactionRowSchema
): Result<TransactionRecord, MalformedRecordError> {
  const parsed = fromZod(schema, row);
  if (parsed.isErr()) {
    return err(new MalformedRecordError(`Line ${line}: ${formatZodError(parsed.error)}`, line, row));
  }
  return ok(parsed.value);
}
