import { z } from 'zod';

export const SUPPORTED_CURRENCIES = ['btc', 'eth', 'ltc', 'doge', 'trx', 'bnb'] as const;

export type Currency = (typeof SUPPORTED_CURRENCIES)[number];

export type CurrencyFamily = 'evm' | 'tvm' | 'utxo';

export interface CurrencyInfo {
  code: Currency;
  family: CurrencyFamily;
  name: string;
}

export const DEFAULT_CURRENCY: Currency = 'btc';

export const CURRENCIES: Record<Currency, CurrencyInfo> = {
  btc: { code: 'btc', family: 'utxo', name: 'Bitcoin' },
  eth: { code: 'eth', family: 'evm', name: 'Ethereum' },
  ltc: { code: 'ltc', family: 'utxo', name: 'Litecoin' },
  doge: { code: 'doge', family: 'utxo', name: 'Dogecoin' },
  trx: { code: 'trx', family: 'tvm', name: 'Tron' },
  bnb: { code: 'bnb', family: 'evm', name: 'BNB Smart Chain' },
};

/** Case-insensitive currency code, normalised to lower case. */
export const CurrencySchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(
    z.enum(SUPPORTED_CURRENCIES, {
      errorMap: () => ({ message: `Currency must be one of: ${SUPPORTED_CURRENCIES.join(', ')}` }),
    })
  );

export function listCurrencies(family?: CurrencyFamily): CurrencyInfo[] {
  const all = SUPPORTED_CURRENCIES.map((code) => CURRENCIES[code]);
  return family ? all.filter((info) => info.family === family) : all;
}
