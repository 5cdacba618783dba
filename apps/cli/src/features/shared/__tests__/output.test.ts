import * as p from '@clack/prompts';
import pc from 'picocolors';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ERROR_TIPS } from '../cli-error.js';
import { ExitCodes } from '../exit-codes.js';
import { OutputManager, requestedFormat } from '../output.js';

vi.mock('@clack/prompts', () => ({
  spinner: vi.fn(() => ({
    start: vi.fn(),
    stop: vi.fn(),
    message: vi.fn(),
  })),
}));

describe('OutputManager', () => {
  const originalEnv = process.env['NODE_ENV'];
  const originalIsTTY = process.stdout.isTTY;

  function spyOnOutput() {
    return {
      consoleLogSpy: vi.spyOn(console, 'log').mockImplementation(() => undefined),
      stderrSpy: vi.spyOn(process.stderr, 'write').mockImplementation(() => true),
      processExitSpy: vi.spyOn(process, 'exit').mockImplementation(() => {
        throw new Error('process.exit called');
      }),
    };
  }

  let consoleLogSpy: ReturnType<typeof spyOnOutput>['consoleLogSpy'];
  let stderrSpy: ReturnType<typeof spyOnOutput>['stderrSpy'];
  let processExitSpy: ReturnType<typeof spyOnOutput>['processExitSpy'];

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00.000Z'));
    process.env['NODE_ENV'] = 'test';

    ({ consoleLogSpy, stderrSpy, processExitSpy } = spyOnOutput());

    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.useRealTimers();
    consoleLogSpy.mockRestore();
    stderrSpy.mockRestore();
    processExitSpy.mockRestore();
    process.env['NODE_ENV'] = originalEnv;
    process.stdout.isTTY = originalIsTTY;
  });

  it('should default to text format', () => {
    const output = new OutputManager();

    expect(output.isTextMode()).toBe(true);
    expect(output.isJsonMode()).toBe(false);
  });

  describe('text mode', () => {
    it('should print report lines joined by newlines', () => {
      new OutputManager('text').print(['first', '', 'second']);

      expect(consoleLogSpy).toHaveBeenCalledWith('first\n\nsecond');
    });

    it('should not print the JSON envelope', () => {
      new OutputManager('text').json('check', { kind: 'address' });

      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    it('should write errors and tips to stderr and exit with the code', () => {
      const output = new OutputManager('text');

      expect(() => output.error('check', new Error('Transaction not found'), ExitCodes.NOT_FOUND)).toThrow(
        'process.exit called'
      );

      expect(stderrSpy).toHaveBeenNthCalledWith(1, `\n${pc.red('✗')} Error: Transaction not found\n`);
      expect(stderrSpy).toHaveBeenNthCalledWith(2, `\n${pc.dim(ERROR_TIPS['NOT_FOUND'] ?? '')}\n`);
      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(processExitSpy).toHaveBeenCalledWith(4);
    });

    it('should show a spinner only on an interactive terminal', () => {
      process.stdout.isTTY = false;
      expect(new OutputManager('text').spinner()).toBeUndefined();

      process.stdout.isTTY = true;
      expect(new OutputManager('text').spinner()).toBeDefined();
      expect(p.spinner).toHaveBeenCalledTimes(1);
    });
  });

  describe('json mode', () => {
    it('should print the success envelope with duration metadata', () => {
      new OutputManager('json').json('currencies', { totalCurrencies: 6 });

      expect(consoleLogSpy).toHaveBeenCalledWith(
        JSON.stringify(
          {
            success: true,
            command: 'currencies',
            timestamp: '2024-01-01T00:00:00.000Z',
            data: { totalCurrencies: 6 },
            metadata: { duration_ms: 0 },
          },
          undefined,
          2
        )
      );
    });

    it('should ignore report lines', () => {
      new OutputManager('json').print(['ignored']);

      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    it('should print errors to stdout as an envelope', () => {
      const output = new OutputManager('json');

      expect(() => output.error('check', new Error('--limit must be between 1 and 50'), ExitCodes.INVALID_ARGS)).toThrow(
        'process.exit called'
      );

      expect(consoleLogSpy).toHaveBeenCalledWith(
        JSON.stringify(
          {
            success: false,
            command: 'check',
            timestamp: '2024-01-01T00:00:00.000Z',
            error: { code: 'INVALID_ARGS', message: '--limit must be between 1 and 50' },
            metadata: { duration_ms: 0 },
          },
          undefined,
          2
        )
      );
      expect(stderrSpy).not.toHaveBeenCalled();
      expect(processExitSpy).toHaveBeenCalledWith(2);
    });

    it('should never show a spinner', () => {
      process.stdout.isTTY = true;

      expect(new OutputManager('json').spinner()).toBeUndefined();
    });
  });
});

describe('requestedFormat', () => {
  it('should pick JSON only when --json was passed', () => {
    expect(requestedFormat({ json: true, family: 'bogus' })).toBe('json');
    expect(requestedFormat({ family: 'evm' })).toBe('text');
    expect(requestedFormat({ json: 'yes' })).toBe('text');
    expect(requestedFormat(undefined)).toBe('text');
  });
});
