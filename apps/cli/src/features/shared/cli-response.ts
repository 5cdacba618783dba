import { ExitCodes, type ExitCode } from './exit-codes.js';

export interface CLIResponseMetadata {
  [key: string]: unknown;

  /** Command execution duration in milliseconds */
  duration_ms?: number | undefined;

  /** CLI version */
  version?: string | undefined;
}

export interface CLIErrorInfo {
  /** Exit code name, see exitCodeToErrorCode */
  code: string;
  details?: unknown;
  message: string;
  /** Set only when NODE_ENV=development */
  stack?: string | undefined;
}

/**
 * Envelope printed in JSON mode, for both success and failure.
 */
export interface CLIResponse<T = unknown> {
  success: boolean;
  command: string;

  /** ISO 8601 timestamp of when the response was generated */
  timestamp: string;

  /** Only present on success */
  data?: T;

  /** Only present on failure */
  error?: CLIErrorInfo | undefined;

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
  const info: CLIErrorInfo = { code, message: error.message };
  if (details !== undefined) info.details = details;
  if (process.env['NODE_ENV'] === 'development' && error.stack) info.stack = error.stack;

  return { success: false, command, timestamp: new Date().toISOString(), error: info };
}

/**
 * Machine-readable name of a failing exit code, e.g. 4 -> NOT_FOUND.
 */
export function exitCodeToErrorCode(exitCode: ExitCode): string {
  if (exitCode === ExitCodes.SUCCESS) return 'UNKNOWN_ERROR';
  const entry = Object.entries(ExitCodes).find(([, code]) => code === exitCode);
  return entry?.[0] ?? 'UNKNOWN_ERROR';
}
