import type { CurrencyFamily, CurrencyInfo } from '@txcheck/caudena';
import type { Command } from 'commander';

import { ExitCodes, exitWithCode } from '../shared/exit-codes.js';
import { OutputManager, requestedFormat } from '../shared/output.js';
import { CurrenciesCommandOptionsSchema } from '../shared/schemas.js';

import {
  buildCurrenciesText,
  buildSummary,
  selectCurrencies,
  validateFamily,
  type CurrencyListSummary,
} from './currencies-utils.js';

/**
 * Result data for the currencies command (JSON mode).
 */
interface CurrenciesCommandResult {
  currencies: CurrencyInfo[];
  summary: CurrencyListSummary;
}

/**
 * Register the currencies command.
 */
export function registerCurrenciesCommand(program: Command): void {
  program
    .command('currencies')
    .description('List the currencies the Caudena API can be queried for')
    .option('--family <family>', 'Filter by family (utxo, evm, tvm)')
    .option('--json', 'Output results in JSON format')
    .action((rawOptions: unknown) => {
      executeCurrenciesCommand(rawOptions);
    });
}

function executeCurrenciesCommand(rawOptions: unknown): void {
  const parseResult = CurrenciesCommandOptionsSchema.safeParse(rawOptions);
  if (!parseResult.success) {
    const output = new OutputManager(requestedFormat(rawOptions));
    output.error(
      'currencies',
      new Error(parseResult.error.issues[0]?.message || 'Invalid options'),
      ExitCodes.INVALID_ARGS
    );
    return;
  }

  const options = parseResult.data;
  const output = new OutputManager(options.json ? 'json' : 'text');

  let family: CurrencyFamily | undefined;
  if (options.family) {
    const familyResult = validateFamily(options.family);
    if (familyResult.isErr()) {
      output.error('currencies', familyResult.error, ExitCodes.INVALID_ARGS);
      return;
    }
    family = familyResult.value;
  }

  const currencies = selectCurrencies(family);
  const summary = buildSummary(currencies);

  output.print(buildCurrenciesText(currencies, summary));

  const resultData: CurrenciesCommandResult = { currencies, summary };
  output.json('currencies', resultData);

  exitWithCode(ExitCodes.SUCCESS);
}
