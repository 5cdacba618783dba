// Pure helpers for the currencies command

import { listCurrencies, type CurrencyFamily, type CurrencyInfo } from '@txcheck/caudena';
import { err, ok, type Result } from 'neverthrow';

export const CURRENCY_FAMILIES = ['utxo', 'evm', 'tvm'] as const satisfies readonly CurrencyFamily[];

export interface CurrencyListSummary {
  byFamily: Record<CurrencyFamily, number>;
  totalCurrencies: number;
}

export function validateFamily(family: string): Result<CurrencyFamily, Error> {
  const normalized = family.trim().toLowerCase();
  const match = CURRENCY_FAMILIES.find((candidate) => candidate === normalized);
  if (!match) {
    return err(new Error(`Invalid family: ${family}. Supported: ${CURRENCY_FAMILIES.join(', ')}`));
  }
  return ok(match);
}

export function buildSummary(currencies: CurrencyInfo[]): CurrencyListSummary {
  const byFamily: Record<CurrencyFamily, number> = { utxo: 0, evm: 0, tvm: 0 };
  for (const currency of currencies) {
    byFamily[currency.family] += 1;
  }
  return { byFamily, totalCurrencies: currencies.length };
}

export function selectCurrencies(family?: CurrencyFamily): CurrencyInfo[] {
  return listCurrencies(family);
}

export function buildCurrenciesText(currencies: CurrencyInfo[], summary: CurrencyListSummary): string[] {
  const lines = ['', 'Supported currencies:', '=============================', ''];

  for (const currency of currencies) {
    lines.push(`  ${currency.code.padEnd(6)}${currency.name.padEnd(18)}${currency.family.toUpperCase()}`);
  }

  lines.push('', '=============================', `Total currencies: ${summary.totalCurrencies}`);
  for (const family of CURRENCY_FAMILIES) {
    if (summary.byFamily[family] > 0) {
      lines.push(`  ${family.toUpperCase()}: ${summary.byFamily[family]}`);
    }
  }
  lines.push('', 'Usage example:', '  txcheck check --address <address> --currency eth', '');
  return lines;
}
