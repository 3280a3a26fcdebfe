// Pure utility functions for the process command
// All functions are pure - no side effects

import type { AmountPrecisionPolicy } from '@ledgerfold/core';
import type { ProcessingMode } from '@ledgerfold/env';
import { InputReadError } from '@ledgerfold/ingestion';
import { ACCOUNT_ROW_COLUMNS, type AccountRow } from '@ledgerfold/ledger';
import { err, ok, type Result } from 'neverthrow';
import type { z } from 'zod';

import { ExitCodes, type ExitCode } from '../shared/exit-codes.js';
import { InputPathSchema, type ProcessCommandOptionsSchema } from '../shared/schemas.js';

/**
 * Process command options validated by Zod at CLI boundary
 */
export type ProcessCommandOptions = z.infer<typeof ProcessCommandOptionsSchema>;

/**
 * Process handler parameters.
 */
export interface ProcessHandlerParams {
  /** CSV file to read */
  inputPath: string;

  /** Fold the whole stream on one engine, or each client on its own */
  mode: ProcessingMode;

  /** Handling of amounts with more than four fractional digits */
  precision: AmountPrecisionPolicy;
}

/**
 * Values used when a flag is absent (read from the environment by the caller).
 */
export interface ProcessDefaults {
  mode: ProcessingMode;
  precision: AmountPrecisionPolicy;
}

/**
 * Build process parameters from validated CLI flags. Flags win over defaults.
 */
export function buildProcessParamsFromFlags(
  input: string,
  options: ProcessCommandOptions,
  defaults: ProcessDefaults
): Result<ProcessHandlerParams, Error> {
  const inputPath = InputPathSchema.safeParse(input);
  if (!inputPath.success) {
    return err(new Error(inputPath.error.issues[0]?.message ?? 'Invalid input path'));
  }

  return ok({
    inputPath: inputPath.data,
    mode: options.partitioned ? 'partitioned' : defaults.mode,
    precision: options.precision ?? defaults.precision,
  });
}

/**
 * Render account rows as CSV: a header line, then one line per client.
 */
export function convertToCSV(rows: readonly AccountRow[]): string {
  const csvLines = [ACCOUNT_ROW_COLUMNS.join(',')];

  for (const row of rows) {
    csvLines.push(ACCOUNT_ROW_COLUMNS.map((column) => String(row[column])).join(','));
  }

  return `${csvLines.join('\n')}\n`;
}

/**
 * Exit code for a failed run.
 */
export function getExitCodeForError(error: Error): ExitCode {
  return error instanceof InputReadError ? ExitCodes.NOT_FOUND : ExitCodes.GENERAL_ERROR;
}
