import { createReadStream } from 'node:fs';

import { fromZod, toError, type AmountPrecisionPolicy, type TransactionRecord } from '@ledgerfold/core';
import { getLogger } from '@ledgerfold/logger';
import { parse, type CsvError } from 'csv-parse';
import { z } from 'zod';

import { InputReadError, MalformedRecordError } from '../errors.js';
import {
  createTransactionRowSchema,
  parseTransactionRow,
  type TransactionRowSchema,
} from '../schemas/transaction-row.schema.js';

export const REQUIRED_COLUMNS = ['type', 'client', 'tx'] as const;

// Shape of each entry emitted by csv-parse with `columns` and `info` enabled
const csvEntrySchema = z.object({
  info: z.object({ lines: z.number().int() }),
  record: z.record(z.string(), z.string()),
});

export interface RecordSourceStats {
  /** Data rows seen, including malformed ones */
  rows: number;
  accepted: number;
  malformed: number;
}

export interface CsvRecordSourceOptions {
  /** Handling of amounts with more than four fractional digits (default: reject) */
  precision?: AmountPrecisionPolicy | undefined;
  /** Called once for every skipped row */
  onMalformed?: ((error: MalformedRecordError) => void) | undefined;
}

/**
 * Streams transaction records out of a CSV file in input order.
 *
 * The file is never loaded whole; rows are parsed, validated and yielded one at a
 * time. Rows that fail validation are reported through `onMalformed` and skipped.
 * Failing to open or tokenize the file raises an InputReadError from the iterator.
 */
export class CsvRecordSource {
  private readonly logger = getLogger('CsvRecordSource');
  private readonly schema: TransactionRowSchema;
  private readonly stats: RecordSourceStats = { rows: 0, accepted: 0, malformed: 0 };
  private header: string[] | undefined;
  private headerChecked = false;

  constructor(
    readonly filePath: string,
    private readonly options: CsvRecordSourceOptions = {}
  ) {
    this.schema = createTransactionRowSchema(options.precision ?? 'reject');
  }

  async *records(): AsyncGenerator<TransactionRecord, void, undefined> {
    const input = createReadStream(this.filePath);
    const parser = parse({
      bom: true,
      columns: (header: string[]) => {
        this.header = header.map((column) => column.trim().toLowerCase());
        return this.header;
      },
      info: true,
      relax_column_count: true,
      skip_empty_lines: true,
      skip_records_with_error: true,
      trim: true,
    });

    input.on('error', (error) => parser.destroy(error));
    parser.on('skip', (error: CsvError) => {
      this.stats.rows++;
      const line = typeof error.lines === 'number' ? error.lines : 0;
      this.reportMalformed(new MalformedRecordError(`Line ${line}: ${error.message}`, line));
    });
    input.pipe(parser);

    try {
      for await (const entry of parser) {
        const record = this.toRecord(entry);
        if (record) {
          yield record;
        }
      }
    } catch (error) {
      if (error instanceof InputReadError) {
        throw error;
      }
      const cause = toError(error);
      throw new InputReadError(`Failed to read ${this.filePath}: ${cause.message}`, this.filePath, cause);
    } finally {
      input.destroy();
    }

    this.logger.debug({ filePath: this.filePath, ...this.stats }, 'Finished reading records');
  }

  getStats(): RecordSourceStats {
    return { ...this.stats };
  }

  private toRecord(entry: unknown): TransactionRecord | undefined {
    this.checkHeader();

    const parsedEntry = fromZod(csvEntrySchema, entry);
    if (parsedEntry.isErr()) {
      throw new InputReadError(`Unexpected CSV parser output in ${this.filePath}`, this.filePath, parsedEntry.error);
    }

    this.stats.rows++;
    const { info, record } = parsedEntry.value;
    const result = parseTransactionRow(record, info.lines, this.schema);
    if (result.isErr()) {
      this.reportMalformed(result.error);
      return undefined;
    }

    this.stats.accepted++;
    return result.value;
  }

  private checkHeader(): void {
    if (this.headerChecked) return;
    this.headerChecked = true;

    const header = this.header ?? [];
    const missing = REQUIRED_COLUMNS.filter((column) => !header.includes(column));
    if (missing.length > 0) {
      throw new InputReadError(
        `Header of ${this.filePath} is missing column(s): ${missing.join(', ')}`,
        this.filePath
      );
    }
  }

  private reportMalformed(error: MalformedRecordError): void {
    this.stats.malformed++;
    this.logger.debug({ line: error.line, row: error.row }, error.message);
    this.options.onMalformed?.(error);
  }
}
