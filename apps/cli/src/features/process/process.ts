import { ValidationError, toError } from '@ledgerfold/core';
import { getDefaultAmountPrecision, getDefaultProcessingMode } from '@ledgerfold/env';
import { configureLogger } from '@ledgerfold/logger';
import type { Command } from 'commander';
import { Result } from 'neverthrow';

import { displayCliError } from '../shared/cli-error.js';
import { createSuccessResponse } from '../shared/cli-response.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { writeToStream } from '../shared/output-stream.js';
import { ProcessCommandOptionsSchema } from '../shared/schemas.js';

import { ProcessHandler, type ProcessResult } from './process-handler.js';
import {
  buildProcessParamsFromFlags,
  convertToCSV,
  getExitCodeForError,
  type ProcessDefaults,
} from './process-utils.js';

const COMMAND_NAME = 'process';

/**
 * Register the input argument, options and action on the root command.
 */
export function registerProcessCommand(program: Command): void {
  program
    .argument('<input>', 'CSV file of transactions (type,client,tx,amount)')
    .option('--json', 'Output results in JSON format')
    .option('--partitioned', 'Fold each client independently; output is identical to the default mode')
    .option('--precision <policy>', 'Amounts with more than 4 fractional digits: reject or round')
    .option('--verbose', 'Log per-record diagnostics to stderr')
    .action(async (input: string, rawOptions: unknown) => {
      await executeProcessCommand(input, rawOptions);
    });
}

/**
 * Execute the process command.
 */
export async function executeProcessCommand(input: string, rawOptions: unknown): Promise<void> {
  // Check for --json flag early (even before validation) to determine output format
  const isJsonMode =
    typeof rawOptions === 'object' && rawOptions !== null && 'json' in rawOptions && rawOptions.json === true;
  const format = isJsonMode ? 'json' : 'text';

  // Validate options at CLI boundary with Zod
  const validationResult = ProcessCommandOptionsSchema.safeParse(rawOptions);
  if (!validationResult.success) {
    const firstError = validationResult.error.issues[0];
    const error = new ValidationError(firstError?.message ?? 'Invalid options');
    displayCliError(COMMAND_NAME, error, ExitCodes.INVALID_ARGS, format);
  }

  const options = validationResult.data;
  if (options.verbose) {
    configureLogger({ console: true, level: 'debug' });
  }

  const defaults = readDefaults();
  if (defaults.isErr()) {
    displayCliError(COMMAND_NAME, defaults.error, ExitCodes.GENERAL_ERROR, format);
  }

  const paramsResult = buildProcessParamsFromFlags(input, options, defaults.value);
  if (paramsResult.isErr()) {
    displayCliError(COMMAND_NAME, paramsResult.error, ExitCodes.INVALID_ARGS, format);
  }

  const startedAt = Date.now();
  const handler = new ProcessHandler();
  const result = await handler.execute(paramsResult.value);
  if (result.isErr()) {
    displayCliError(COMMAND_NAME, result.error, getExitCodeForError(result.error), format);
  }

  const content = isJsonMode
    ? renderJson(result.value, Date.now() - startedAt)
    : convertToCSV(result.value.accounts);

  const written = await writeToStream(process.stdout, content);
  if (written.isErr()) {
    // stdout is gone, so the error can only go to stderr
    const writeError = new Error(`Failed to write output: ${written.error.message}`);
    displayCliError(COMMAND_NAME, writeError, ExitCodes.GENERAL_ERROR, 'text');
  }
}

const readDefaults = Result.fromThrowable(
  (): ProcessDefaults => ({ mode: getDefaultProcessingMode(), precision: getDefaultAmountPrecision() }),
  toError
);

function renderJson(processResult: ProcessResult, durationMs: number): string {
  const response = createSuccessResponse(COMMAND_NAME, processResult, { duration_ms: durationMs });
  return `${JSON.stringify(response, undefined, 2)}\n`;
}
