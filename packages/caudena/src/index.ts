export {
  CaudenaApiClient,
  type AddressTransactionsPage,
  type AddressTransactionsQuery,
  type CaudenaApi,
  type CaudenaApiClientConfig,
} from './api-client.js';
export { buildTokenPayload, decodeSecret, signToken, TOKEN_TTL_SECONDS, type TokenPayload } from './auth.js';
export {
  CURRENCIES,
  CurrencySchema,
  DEFAULT_CURRENCY,
  listCurrencies,
  SUPPORTED_CURRENCIES,
  type Currency,
  type CurrencyFamily,
  type CurrencyInfo,
} from './currencies.js';
export { CaudenaApiError, InvalidSecretError } from './errors.js';
export * from './schemas.js';
