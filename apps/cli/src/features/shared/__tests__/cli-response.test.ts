import { ValidationError } from '@ledgerfold/core';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createErrorResponse, createSuccessResponse, exitCodeToErrorCode } from '../cli-response.js';
import { ExitCodes } from '../exit-codes.js';

describe('cli-response', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00.000Z'));
    vi.stubEnv('NODE_ENV', 'test');
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllEnvs();
  });

  describe('createSuccessResponse', () => {
    it('should create a success response with data', () => {
      const response = createSuccessResponse('process', { accounts: [] });

      expect(response).toEqual({
        success: true,
        command: 'process',
        timestamp: '2024-01-01T00:00:00.000Z',
        data: { accounts: [] },
      });
    });

    it('should create a success response with metadata', () => {
      const response = createSuccessResponse('process', { accounts: [] }, { duration_ms: 12 });

      expect(response.metadata).toEqual({ duration_ms: 12 });
    });

    it('should omit metadata when none is given', () => {
      expect(createSuccessResponse('process', 1).metadata).toBeUndefined();
    });
  });

  describe('createErrorResponse', () => {
    it('should create an error response', () => {
      const response = createErrorResponse('process', new Error('Input missing'), 'NOT_FOUND');

      expect(response).toEqual({
        success: false,
        command: 'process',
        timestamp: '2024-01-01T00:00:00.000Z',
        error: { code: 'NOT_FOUND', message: 'Input missing' },
      });
    });

    it('should include details when provided', () => {
      const error = new ValidationError('Bad flag');

      const response = createErrorResponse('process', error, 'INVALID_ARGS', error.toJSON());

      expect(response.error?.details).toEqual({
        clientId: undefined,
        code: 'VALIDATION_ERROR',
        context: undefined,
        message: 'Bad flag',
        name: 'ValidationError',
        severity: 'error',
        timestamp: '2024-01-01T00:00:00.000Z',
        transactionId: undefined,
      });
    });

    it('should include the stack only in development', () => {
      const error = new Error('boom');

      expect(createErrorResponse('process', error, 'GENERAL_ERROR').error?.stack).toBeUndefined();

      vi.stubEnv('NODE_ENV', 'development');
      expect(createErrorResponse('process', error, 'GENERAL_ERROR').error?.stack).toBe(error.stack);
    });
  });

  describe('exitCodeToErrorCode', () => {
    it('should map every non-success exit code', () => {
      expect(exitCodeToErrorCode(ExitCodes.GENERAL_ERROR)).toBe('GENERAL_ERROR');
      expect(exitCodeToErrorCode(ExitCodes.INVALID_ARGS)).toBe('INVALID_ARGS');
      expect(exitCodeToErrorCode(ExitCodes.NOT_FOUND)).toBe('NOT_FOUND');
    });

    it('should fall back for unknown codes', () => {
      expect(exitCodeToErrorCode(ExitCodes.SUCCESS)).toBe('UNKNOWN_ERROR');
    });
  });
});
