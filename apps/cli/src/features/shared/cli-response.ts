import type { ExitCode } from './exit-codes.js';

export interface CLIResponseMetadata {
  /** Additional context */
  [key: string]: unknown;

  /** Command execution duration in milliseconds */
  duration_ms?: number | undefined;
}

export interface CLIErrorPayload {
  /** Machine-readable error code */
  code: string;

  /** Additional error details (optional) */
  details?: unknown;

  /** Human-readable error message */
  message: string;

  /** Stack trace (only in development mode) */
  stack?: string | undefined;
}

/**
 * Standardized CLI response format, written to stdout in --json mode.
 */
export interface CLIResponse<T = unknown> {
  /** Whether the command executed successfully */
  success: boolean;

  /** Command that was executed */
  command: string;

  /** ISO 8601 timestamp of when the response was generated */
  timestamp: string;

  /** Response data (only present on success) */
  data?: T;

  /** Error information (only present on failure) */
  error?: CLIErrorPayload | undefined;

  /** Additional metadata about the execution */
  metadata?: CLIResponseMetadata | undefined;
}

export function createSuccessResponse<T>(command: string, data: T, metadata?: CLIResponseMetadata): CLIResponse<T> {
  const response: CLIResponse<T> = {
    success: true,
    command,
    timestamp: new Date().toISOString(),
    data,
  };

  if (metadata) {
    response.metadata = metadata;
  }

  return response;
}

export function createErrorResponse(
  command: string,
  error: Error,
  code: string,
  details?: unknown
): CLIResponse<never> {
  const errorObj: CLIErrorPayload = {
    code,
    message: error.message,
  };

  if (details !== undefined) {
    errorObj.details = details;
  }

  if (process.env['NODE_ENV'] === 'development' && error.stack) {
    errorObj.stack = error.stack;
  }

  return {
    success: false,
    command,
    timestamp: new Date().toISOString(),
    error: errorObj,
  };
}

/**
 * Map exit code to error code string.
 */
export function exitCodeToErrorCode(exitCode: ExitCode): string {
  const codes: Record<number, string> = {
    1: 'GENERAL_ERROR',
    2: 'INVALID_ARGS',
    4: 'NOT_FOUND',
  };
  return codes[exitCode] ?? 'UNKNOWN_ERROR';
}
