import { flushLoggers } from '@txcheck/logger';

/**
 * Semantic exit codes for the CLI.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** General error (catch-all) */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** Missing or rejected credentials */
  AUTHENTICATION_ERROR: 3,

  /** Transaction or address unknown to the API */
  NOT_FOUND: 4,

  /** Rate limit exceeded */
  RATE_LIMIT: 5,

  /** Network or connectivity error, or a server-side failure */
  NETWORK_ERROR: 6,

  /** Response did not match the expected shape */
  VALIDATION_ERROR: 8,

  /** Timeout error */
  TIMEOUT: 10,

  /** Configuration error */
  CONFIG_ERROR: 11,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Drain log sinks, then exit with a specific exit code.
 */
export function exitWithCode(code: ExitCode): never {
  flushLoggers();
  process.exit(code);
}
