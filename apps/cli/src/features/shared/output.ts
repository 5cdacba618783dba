import * as p from '@clack/prompts';
import pc from 'picocolors';

import { ERROR_TIPS } from './cli-error.js';
import {
  createErrorResponse,
  createSuccessResponse,
  exitCodeToErrorCode,
  type CLIResponseMetadata,
} from './cli-response.js';
import { ExitCodes, exitWithCode, type ExitCode } from './exit-codes.js';

export type OutputFormat = 'json' | 'text';

export type Spinner = ReturnType<typeof p.spinner>;

/**
 * Format asked for by raw, not yet validated options. Lets a failed option
 * parse still answer in JSON when `--json` was passed.
 */
export function requestedFormat(rawOptions: unknown): OutputFormat {
  return typeof rawOptions === 'object' && rawOptions !== null && 'json' in rawOptions && rawOptions.json === true
    ? 'json'
    : 'text';
}

/**
 * Renders command results as plain text or as a JSON envelope.
 * Reports and JSON go to stdout; text-mode errors go to stderr.
 */
export class OutputManager {
  private startTime: number = Date.now();

  constructor(private format: OutputFormat = 'text') {}

  isJsonMode(): boolean {
    return this.format === 'json';
  }

  isTextMode(): boolean {
    return this.format === 'text';
  }

  /**
   * Print the success envelope (only in JSON mode).
   */
  json<T>(command: string, data: T, metadata?: CLIResponseMetadata): void {
    if (this.format === 'json') {
      const response = createSuccessResponse(command, data, {
        duration_ms: this.elapsed(),
        ...metadata,
      });
      console.log(JSON.stringify(response, undefined, 2));
    }
  }

  /**
   * Print report lines (only in text mode).
   */
  print(lines: string[]): void {
    if (this.format === 'text') {
      console.log(lines.join('\n'));
    }
  }

  /**
   * Output an error response and exit.
   */
  error(command: string, error: Error, exitCode: ExitCode = ExitCodes.GENERAL_ERROR): never {
    const errorCode = exitCodeToErrorCode(exitCode);

    if (this.format === 'json') {
      // stdout, so callers can parse the response
      const response = { ...createErrorResponse(command, error, errorCode), metadata: { duration_ms: this.elapsed() } };
      console.log(JSON.stringify(response, undefined, 2));
    } else {
      this.displayTextError(error, errorCode);
    }

    exitWithCode(exitCode);
  }

  /**
   * Progress spinner, only in text mode on an interactive terminal.
   */
  spinner(): Spinner | undefined {
    if (this.format === 'json' || !process.stdout.isTTY) {
      return undefined;
    }
    return p.spinner();
  }

  private elapsed(): number {
    return Date.now() - this.startTime;
  }

  private displayTextError(error: Error, code: string): void {
    process.stderr.write(`\n${pc.red('✗')} Error: ${error.message}\n`);

    const tip = ERROR_TIPS[code];
    if (tip) {
      process.stderr.write(`\n${pc.dim(tip)}\n`);
    }

    if (process.env['NODE_ENV'] === 'development' && error.stack) {
      process.stderr.write(`\n${pc.dim(error.stack)}\n\n`);
    }
  }
}
