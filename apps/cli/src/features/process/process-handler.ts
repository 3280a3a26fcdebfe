import { toError, type TransactionRecord } from '@ledgerfold/core';
import type { ProcessingMode } from '@ledgerfold/env';
import { CsvRecordSource, type RecordSourceStats } from '@ledgerfold/ingestion';
import {
  LedgerEngine,
  PartitionedLedger,
  projectAccounts,
  type AccountRow,
  type LedgerRunResult,
  type LedgerStats,
} from '@ledgerfold/ledger';
import { getLogger } from '@ledgerfold/logger';
import { err, ok, type Result } from 'neverthrow';

import type { ProcessHandlerParams } from './process-utils.js';

// Re-export for convenience
export type { ProcessHandlerParams };

const logger = getLogger('ProcessHandler');

/**
 * Result of the process operation.
 */
export interface ProcessResult {
  /** Final account rows, ascending by client id */
  accounts: AccountRow[];

  mode: ProcessingMode;

  /** Rows read from the input, accepted and malformed */
  records: RecordSourceStats;

  /** Records applied and rejected by the ledger */
  ledger: LedgerStats;
}

/**
 * Process handler - reads the input file and folds it into account rows.
 * Reusable by both the CLI command and tests.
 */
export class ProcessHandler {
  /**
   * Execute the process operation. Malformed and rejected records are counted, not
   * returned as errors; only an unreadable input makes the result an err.
   */
  async execute(params: ProcessHandlerParams): Promise<Result<ProcessResult, Error>> {
    try {
      logger.debug({ params }, 'Starting process');

      const source = new CsvRecordSource(params.inputPath, { precision: params.precision });
      const run =
        params.mode === 'partitioned'
          ? await foldPartitioned(source.records())
          : await foldSequential(source.records());

      const records = source.getStats();
      logger.info(
        {
          accounts: run.accounts.length,
          applied: run.stats.applied,
          malformed: records.malformed,
          mode: params.mode,
          rejected: run.stats.rejected,
        },
        `Processed ${records.rows} rows`
      );

      return ok({
        accounts: projectAccounts(run.accounts),
        mode: params.mode,
        records,
        ledger: run.stats,
      });
    } catch (error) {
      return err(toError(error));
    }
  }
}

async function foldSequential(records: AsyncIterable<TransactionRecord>): Promise<LedgerRunResult> {
  const engine = new LedgerEngine();
  for await (const record of records) {
    engine.apply(record);
  }
  return { accounts: engine.finalize(), stats: engine.getStats() };
}

async function foldPartitioned(records: AsyncIterable<TransactionRecord>): Promise<LedgerRunResult> {
  const ledger = new PartitionedLedger();
  for await (const record of records) {
    ledger.add(record);
  }
  return ledger.run();
}
