import { DomainError } from '@ledgerfold/core';

/**
 * A CSV row that could not be turned into a transaction record. The row is skipped.
 */
export class MalformedRecordError extends DomainError {
  readonly code = 'MALFORMED_RECORD';
  readonly severity = 'warning' as const;

  constructor(
    message: string,
    readonly line: number,
    readonly row?: Record<string, string> | undefined
  ) {
    super(message, { additionalContext: { line } });
  }
}

/**
 * The input could not be opened, read or tokenized as CSV. Aborts the run.
 */
export class InputReadError extends DomainError {
  readonly code = 'INPUT_READ_ERROR';
  readonly severity = 'error' as const;

  constructor(
    message: string,
    readonly filePath: string,
    readonly cause?: Error | undefined
  ) {
    super(message, { additionalContext: { filePath } });
  }
}
