#!/usr/bin/env node
import { getLogger } from '@txcheck/logger';
import { Command, CommanderError } from 'commander';

import { registerCheckCommand } from './features/check/check.js';
import { registerCurrenciesCommand } from './features/currencies/currencies.js';
import { configureLogging, initialLogLevel } from './features/shared/command-runtime.js';
import { ExitCodes, exitWithCode } from './features/shared/exit-codes.js';

const logger = getLogger('CLI');
const program = new Command();

async function main() {
  configureLogging(initialLogLevel(process.env));

  program
    .name('txcheck')
    .description('Check blockchain transactions and addresses with the Caudena analytics API')
    .version('0.1.0')
    // Usage errors exit with INVALID_ARGS instead of commander's default 1
    .exitOverride();

  registerCheckCommand(program);
  registerCurrenciesCommand(program);

  try {
    await program.parseAsync();
  } catch (error) {
    if (error instanceof CommanderError) {
      exitWithCode(error.exitCode === 0 ? ExitCodes.SUCCESS : ExitCodes.INVALID_ARGS);
    }
    throw error;
  }
}

process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled Rejection: ${String(reason)}`);
  exitWithCode(ExitCodes.GENERAL_ERROR);
});

process.on('uncaughtException', (error) => {
  logger.error(`Uncaught Exception: ${error.message}`);
  logger.error(`Stack: ${error.stack ?? 'unavailable'}`);
  exitWithCode(ExitCodes.GENERAL_ERROR);
});

main().catch((error: unknown) => {
  logger.error(`CLI failed: ${String(error)}`);
  exitWithCode(ExitCodes.GENERAL_ERROR);
});
