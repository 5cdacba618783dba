import { CaudenaApiError, InvalidSecretError } from '@txcheck/caudena';
import { ConfigError, MissingCredentialError } from '@txcheck/env';
import { HttpError, NetworkError, RateLimitError, ResponseValidationError, TimeoutError } from '@txcheck/http';
import { describe, expect, it } from 'vitest';

import { exitCodeForError } from '../cli-error.js';
import { ExitCodes } from '../exit-codes.js';

describe('exitCodeForError', () => {
  it.each([
    ['missing credentials', new MissingCredentialError('CAUDENA_KID'), ExitCodes.AUTHENTICATION_ERROR],
    ['bad secret', new InvalidSecretError('secret is empty'), ExitCodes.AUTHENTICATION_ERROR],
    ['invalid configuration', new ConfigError('Environment validation failed'), ExitCodes.CONFIG_ERROR],
    ['API status false', new CaudenaApiError('status false', '/v2/btc/transaction/x', {}), ExitCodes.NOT_FOUND],
    ['rate limit', new RateLimitError('caudena rate limit exceeded', 2000), ExitCodes.RATE_LIMIT],
    ['timeout', new TimeoutError(30_000), ExitCodes.TIMEOUT],
    ['network failure', new NetworkError('socket hang up'), ExitCodes.NETWORK_ERROR],
    [
      'invalid response',
      new ResponseValidationError('Response validation failed', 'caudena', '/v2/btc/transaction/x', [], '{}'),
      ExitCodes.VALIDATION_ERROR,
    ],
    ['HTTP 401', new HttpError('HTTP 401: denied', 401, 'denied'), ExitCodes.AUTHENTICATION_ERROR],
    ['HTTP 403', new HttpError('HTTP 403: forbidden', 403, 'forbidden'), ExitCodes.AUTHENTICATION_ERROR],
    ['HTTP 404', new HttpError('HTTP 404: missing', 404, 'missing'), ExitCodes.NOT_FOUND],
    ['HTTP 503', new HttpError('HTTP 503: down', 503, 'down'), ExitCodes.NETWORK_ERROR],
    ['HTTP 400', new HttpError('HTTP 400: bad', 400, 'bad'), ExitCodes.GENERAL_ERROR],
    ['anything else', new Error('unexpected'), ExitCodes.GENERAL_ERROR],
  ])('should map %s', (_label, error, expected) => {
    expect(exitCodeForError(error)).toBe(expected);
  });
});
