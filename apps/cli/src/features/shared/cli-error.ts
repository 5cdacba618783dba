import { CaudenaApiError, InvalidSecretError } from '@txcheck/caudena';
import { ConfigError, MissingCredentialError } from '@txcheck/env';
import { HttpError, NetworkError, RateLimitError, ResponseValidationError, TimeoutError } from '@txcheck/http';

import { ExitCodes, type ExitCode } from './exit-codes.js';

/**
 * Tips shown after error messages, keyed by error code.
 */
export const ERROR_TIPS: Record<string, string> = {
  INVALID_ARGS: 'Check your command arguments and try again. Run with --help for usage information.',
  AUTHENTICATION_ERROR:
    'Set CAUDENA_KID and CAUDENA_SECRET (the base64 secret issued by Caudena) in the environment or in a .env file.',
  NOT_FOUND: 'Caudena has no record of this hash or address. Check the value and the --currency option.',
  RATE_LIMIT: 'You have exceeded the Caudena API rate limit. Wait a few minutes and try again.',
  NETWORK_ERROR: 'The Caudena API could not be reached. Check your connection or CAUDENA_API_URL.',
  TIMEOUT: 'The Caudena API did not answer in time. Raise CAUDENA_TIMEOUT_MS or try again later.',
  CONFIG_ERROR: 'Check the CAUDENA_* and TXCHECK_* environment variables.',
};

/**
 * Pick the exit code for an error coming out of a handler or the runtime setup.
 */
export function exitCodeForError(error: Error): ExitCode {
  if (error instanceof MissingCredentialError || error instanceof InvalidSecretError) {
    return ExitCodes.AUTHENTICATION_ERROR;
  }
  if (error instanceof ConfigError) {
    return ExitCodes.CONFIG_ERROR;
  }
  if (error instanceof CaudenaApiError) {
    return ExitCodes.NOT_FOUND;
  }
  if (error instanceof RateLimitError) {
    return ExitCodes.RATE_LIMIT;
  }
  if (error instanceof TimeoutError) {
    return ExitCodes.TIMEOUT;
  }
  if (error instanceof NetworkError) {
    return ExitCodes.NETWORK_ERROR;
  }
  if (error instanceof ResponseValidationError) {
    return ExitCodes.VALIDATION_ERROR;
  }
  if (error instanceof HttpError) {
    if (error.statusCode === 401 || error.statusCode === 403) return ExitCodes.AUTHENTICATION_ERROR;
    if (error.statusCode === 404) return ExitCodes.NOT_FOUND;
    if (error.statusCode === 429) return ExitCodes.RATE_LIMIT;
    if (error.statusCode >= 500) return ExitCodes.NETWORK_ERROR;
  }
  return ExitCodes.GENERAL_ERROR;
}
