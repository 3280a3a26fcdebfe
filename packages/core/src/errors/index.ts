/**
 * Error hierarchy shared by every ledgerfold package.
 *
 * Per-record conditions are returned as values on the err side of a neverthrow `Result`;
 * only run-level failures (unreadable input, unwritable output) ever reach the CLI.
 */

export type ErrorSeverity = 'error' | 'warning';

export interface DomainErrorContext {
  clientId?: number | undefined;
  transactionId?: number | undefined;
  additionalContext?: Record<string, unknown> | undefined;
}

/**
 * Base domain error
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly severity: ErrorSeverity;

  readonly timestamp: string;
  readonly clientId?: number | undefined;
  readonly transactionId?: number | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, context?: DomainErrorContext) {
    super(message);
    this.timestamp = new Date().toISOString();
    this.clientId = context?.clientId;
    this.transactionId = context?.transactionId;
    this.context = context?.additionalContext;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      clientId: this.clientId,
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
      severity: this.severity,
      timestamp: this.timestamp,
      transactionId: this.transactionId,
    };
  }
}

/**
 * Configuration or option validation failure
 */
export class ValidationError extends DomainError {
  readonly code = 'VALIDATION_ERROR';
  readonly severity = 'error' as const;
}

/**
 * Normalize anything caught from a `catch` clause into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
