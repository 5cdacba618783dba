import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createErrorResponse, createSuccessResponse, exitCodeToErrorCode } from '../cli-response.js';
import { ExitCodes } from '../exit-codes.js';

describe('cli-response', () => {
  const originalEnv = process.env['NODE_ENV'];

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00.000Z'));
    process.env['NODE_ENV'] = 'test';
  });

  afterEach(() => {
    vi.useRealTimers();
    process.env['NODE_ENV'] = originalEnv;
  });

  describe('createSuccessResponse', () => {
    it('should create a success response with data', () => {
      const response = createSuccessResponse('check', { kind: 'transaction' });

      expect(response).toEqual({
        success: true,
        command: 'check',
        timestamp: '2024-01-01T00:00:00.000Z',
        data: { kind: 'transaction' },
      });
    });

    it('should create a success response with metadata', () => {
      const response = createSuccessResponse('check', { kind: 'address' }, { duration_ms: 100, version: '0.1.0' });

      expect(response.metadata).toEqual({ duration_ms: 100, version: '0.1.0' });
    });

    it('should leave metadata out when none is given', () => {
      expect(createSuccessResponse('currencies', []).metadata).toBeUndefined();
    });
  });

  describe('createErrorResponse', () => {
    it('should create an error response with code and message', () => {
      const response = createErrorResponse('check', new Error('CAUDENA_KID not found'), 'AUTHENTICATION_ERROR');

      expect(response).toEqual({
        success: false,
        command: 'check',
        timestamp: '2024-01-01T00:00:00.000Z',
        error: {
          code: 'AUTHENTICATION_ERROR',
          message: 'CAUDENA_KID not found',
        },
      });
    });

    it('should include details when given', () => {
      const response = createErrorResponse('check', new Error('Bad response'), 'VALIDATION_ERROR', { field: 'status' });

      expect(response.error?.details).toEqual({ field: 'status' });
    });

    it('should include the stack trace in development mode only', () => {
      const error = new Error('boom');
      error.stack = 'Error: boom\n    at check.ts:1:1';

      expect(createErrorResponse('check', error, 'GENERAL_ERROR').error?.stack).toBeUndefined();

      process.env['NODE_ENV'] = 'development';
      expect(createErrorResponse('check', error, 'GENERAL_ERROR').error?.stack).toBe(
        'Error: boom\n    at check.ts:1:1'
      );
    });
  });

  describe('exitCodeToErrorCode', () => {
    it('should map exit codes to error code strings', () => {
      expect(exitCodeToErrorCode(ExitCodes.GENERAL_ERROR)).toBe('GENERAL_ERROR');
      expect(exitCodeToErrorCode(ExitCodes.INVALID_ARGS)).toBe('INVALID_ARGS');
      expect(exitCodeToErrorCode(ExitCodes.AUTHENTICATION_ERROR)).toBe('AUTHENTICATION_ERROR');
      expect(exitCodeToErrorCode(ExitCodes.NOT_FOUND)).toBe('NOT_FOUND');
      expect(exitCodeToErrorCode(ExitCodes.RATE_LIMIT)).toBe('RATE_LIMIT');
      expect(exitCodeToErrorCode(ExitCodes.NETWORK_ERROR)).toBe('NETWORK_ERROR');
      expect(exitCodeToErrorCode(ExitCodes.VALIDATION_ERROR)).toBe('VALIDATION_ERROR');
      expect(exitCodeToErrorCode(ExitCodes.TIMEOUT)).toBe('TIMEOUT');
      expect(exitCodeToErrorCode(ExitCodes.CONFIG_ERROR)).toBe('CONFIG_ERROR');
    });

    it('should not map SUCCESS exit code', () => {
      expect(exitCodeToErrorCode(ExitCodes.SUCCESS)).toBe('UNKNOWN_ERROR');
    });
  });
});
