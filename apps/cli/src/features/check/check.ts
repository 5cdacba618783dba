import { CaudenaApiClient } from '@txcheck/caudena';
import { getLogger } from '@txcheck/logger';
import type { Command } from 'commander';
import type { z } from 'zod';

import { exitCodeForError } from '../shared/cli-error.js';
import { configureLogging, initialLogLevel, resolveCommandRuntime } from '../shared/command-runtime.js';
import { ExitCodes, exitWithCode } from '../shared/exit-codes.js';
import { OutputManager, requestedFormat } from '../shared/output.js';
import { CheckCommandOptionsSchema } from '../shared/schemas.js';

import { CheckHandler } from './check-handler.js';
import { buildCheckHeader, buildCheckReport } from './check-report.js';
import { buildCheckParams } from './check-utils.js';

const logger = getLogger('CheckCommand');

/**
 * Command options (validated at CLI boundary).
 */
export type CheckCommandOptions = z.infer<typeof CheckCommandOptionsSchema>;

/**
 * Register the check command.
 */
export function registerCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Look up a transaction by hash, or an address by stats and latest transactions')
    .option('--hash <hash>', 'Transaction hash to check')
    .option('--address <address>', 'Blockchain address to check')
    .option('--currency <code>', 'Currency: btc, eth, ltc, doge, trx, bnb (default: btc)')
    .option('--limit <n>', 'Number of recent address transactions to show, 1-50 (default: 5)')
    .option('--risk-threshold <score>', 'Flag contracts scoring below this value, 0-10 (default: 4)')
    .option('--env-file <path>', 'Read credentials and settings from this file before .env and .env.local')
    .option('--json', 'Output results in JSON format')
    .option('--verbose', 'Log HTTP and handler activity to stderr')
    .addHelpText(
      'after',
      `
Examples:
  $ txcheck check --hash 4a5e1e4baab89f3a32518a88c31bc87f618f76673e2cc77ab2127b7afdeda33b
  $ txcheck check --address 0x0000000000000000000000000000000000000000 --currency eth --limit 10
  $ txcheck check --hash abc123 --currency trx --json
`
    )
    .action(async (rawOptions: unknown) => {
      await executeCheckCommand(rawOptions);
    });
}

/**
 * Execute the check command.
 */
async function executeCheckCommand(rawOptions: unknown): Promise<void> {
  const parseResult = CheckCommandOptionsSchema.safeParse(rawOptions);
  if (!parseResult.success) {
    const output = new OutputManager(requestedFormat(rawOptions));
    output.error('check', new Error(parseResult.error.issues[0]?.message || 'Invalid options'), ExitCodes.INVALID_ARGS);
    return;
  }

  const options = parseResult.data;
  const output = new OutputManager(options.json ? 'json' : 'text');

  configureLogging(initialLogLevel(process.env, options.verbose));

  const paramsResult = buildCheckParams(options);
  if (paramsResult.isErr()) {
    output.error('check', paramsResult.error, ExitCodes.INVALID_ARGS);
    return;
  }
  const params = paramsResult.value;

  const runtimeResult = resolveCommandRuntime({ envFile: options.envFile, verbose: options.verbose });
  if (runtimeResult.isErr()) {
    output.error('check', runtimeResult.error, exitCodeForError(runtimeResult.error));
    return;
  }
  const { config, credentials } = runtimeResult.value;
  configureLogging(config.logLevel, config.logFile);

  const clientResult = CaudenaApiClient.create({
    baseUrl: config.apiUrl,
    credentials,
    retries: config.retries,
    timeout: config.timeoutMs,
  });
  if (clientResult.isErr()) {
    output.error('check', clientResult.error, ExitCodes.AUTHENTICATION_ERROR);
    return;
  }
  const client = clientResult.value;

  const target = params.kind === 'transaction' ? params.hash : params.address;
  output.print(buildCheckHeader(params.kind, target, params.currency));

  const spinner = output.spinner();
  spinner?.start('Querying Caudena API');

  let result: Awaited<ReturnType<CheckHandler['execute']>>;
  try {
    result = await new CheckHandler(client).execute(params);
  } finally {
    await client.close();
  }

  if (result.isErr()) {
    spinner?.stop('Lookup failed', 2);
    logger.debug(`Check failed - ${result.error.name}: ${result.error.message}`);
    output.error('check', result.error, exitCodeForError(result.error));
    return;
  }

  spinner?.stop('Response received');
  output.print(buildCheckReport(result.value));
  output.json('check', result.value);

  exitWithCode(ExitCodes.SUCCESS);
}
