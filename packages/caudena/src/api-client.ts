import { DEFAULT_API_URL, type CaudenaCredentials } from '@txcheck/env';
import { HttpClient, type HttpEffects, type HttpRequestParts } from '@txcheck/http';
import { getLogger, type Logger } from '@txcheck/logger';
import { err, ok, type Result } from 'neverthrow';

import { buildTokenPayload, decodeSecret, signToken } from './auth.js';
import type { Currency } from './currencies.js';
import { CaudenaApiError, type InvalidSecretError } from './errors.js';
import {
  CaudenaAddressStatsEnvelopeSchema,
  CaudenaAddressTransactionsEnvelopeSchema,
  CaudenaTransactionEnvelopeSchema,
  type CaudenaAddressStats,
  type CaudenaAddressTransaction,
  type CaudenaTransaction,
} from './schemas.js';

export interface CaudenaApiClientConfig {
  baseUrl?: string | undefined;
  credentials: CaudenaCredentials;
  retries?: number | undefined;
  timeout?: number | undefined;
}

export interface AddressTransactionsQuery {
  page?: number | undefined;
  sortBy?: string | undefined;
  sortOrder?: 'asc' | 'desc' | undefined;
}

export interface AddressTransactionsPage {
  totalEntries: number | undefined;
  transactions: CaudenaAddressTransaction[];
}

/**
 * Read-only operations of the Caudena API. Handlers depend on this
 * interface so tests can pass an in-memory fake.
 */
export interface CaudenaApi {
  close(): Promise<void>;
  getAddressStats(currency: Currency, address: string): Promise<Result<CaudenaAddressStats, Error>>;
  getAddressTransactions(
    currency: Currency,
    address: string,
    query?: AddressTransactionsQuery
  ): Promise<Result<AddressTransactionsPage, Error>>;
  getTransaction(currency: Currency, hash: string): Promise<Result<CaudenaTransaction, Error>>;
}

interface Envelope<TData> {
  data?: TData | null | undefined;
  status: boolean;
}

/**
 * Client for the Caudena v2 API.
 *
 * Every attempt is signed with a fresh HS256 token (`kid` + five minute
 * `exp`), so retries never reuse an expired credential.
 */
export class CaudenaApiClient implements CaudenaApi {
  private readonly httpClient: HttpClient;
  private readonly logger: Logger;
  private readonly now: () => number;

  private constructor(
    private readonly kid: string,
    private readonly key: Buffer,
    config: CaudenaApiClientConfig,
    effects?: Partial<HttpEffects>
  ) {
    this.logger = getLogger('CaudenaApiClient');
    this.now = effects?.now ?? (() => Date.now());

    const baseUrl = config.baseUrl ?? DEFAULT_API_URL;
    this.httpClient = new HttpClient(
      {
        baseUrl,
        providerName: 'caudena',
        retries: config.retries,
        timeout: config.timeout,
      },
      effects
    );

    this.logger.debug(`Caudena API client initialized - BaseUrl: ${baseUrl}, Kid: ${kid}`);
  }

  /**
   * Decode the secret up front so a malformed credential fails before any request.
   */
  static create(
    config: CaudenaApiClientConfig,
    effects?: Partial<HttpEffects>
  ): Result<CaudenaApiClient, InvalidSecretError> {
    return decodeSecret(config.credentials.secret).map(
      (key) => new CaudenaApiClient(config.credentials.kid, key, config, effects)
    );
  }

  async getTransaction(currency: Currency, hash: string): Promise<Result<CaudenaTransaction, Error>> {
    const endpoint = `/v2/${currency}/transaction/${encodeURIComponent(hash)}`;
    const result = await this.httpClient.get(endpoint, {
      buildRequest: () => this.signedRequest(),
      schema: CaudenaTransactionEnvelopeSchema,
    });

    return result.andThen((envelope) => this.unwrap(envelope, endpoint));
  }

  async getAddressStats(currency: Currency, address: string): Promise<Result<CaudenaAddressStats, Error>> {
    const endpoint = `/v2/${currency}/address/stats/${encodeURIComponent(address)}`;
    const result = await this.httpClient.get(endpoint, {
      buildRequest: () => this.signedRequest(),
      schema: CaudenaAddressStatsEnvelopeSchema,
    });

    return result.andThen((envelope) => this.unwrap(envelope, endpoint));
  }

  async getAddressTransactions(
    currency: Currency,
    address: string,
    query: AddressTransactionsQuery = {}
  ): Promise<Result<AddressTransactionsPage, Error>> {
    const endpoint = `/v2/${currency}/address/transactions/${encodeURIComponent(address)}`;
    const body = {
      page: query.page ?? 1,
      sort_by: query.sortBy ?? 'time',
      sort_order: query.sortOrder ?? 'desc',
    };

    const result = await this.httpClient.post(endpoint, body, {
      buildRequest: () => this.signedRequest(),
      schema: CaudenaAddressTransactionsEnvelopeSchema,
    });

    return result.andThen((envelope) =>
      this.unwrap(envelope, endpoint).map((transactions) => ({
        totalEntries: envelope.pagination?.total_entries ?? undefined,
        transactions,
      }))
    );
  }

  async close(): Promise<void> {
    await this.httpClient.close();
  }

  private signedRequest(): HttpRequestParts {
    const nowMs = this.now();
    const { exp } = buildTokenPayload(this.kid, nowMs);
    this.logger.debug(`Signed request token - Kid: ${this.kid}, Expires: ${exp}`);

    return {
      headers: {
        Accept: 'application/json',
        Authorization: `Bearer ${signToken(this.kid, this.key, nowMs)}`,
      },
    };
  }

  private unwrap<TData>(envelope: Envelope<TData>, endpoint: string): Result<TData, CaudenaApiError> {
    if (!envelope.status) {
      this.logger.warn(`Caudena API reported failure - Endpoint: ${endpoint}`);
      return err(new CaudenaApiError(`Caudena API returned status false for ${endpoint}`, endpoint, envelope));
    }
    if (envelope.data === undefined || envelope.data === null) {
      return err(new CaudenaApiError(`Caudena API returned no data for ${endpoint}`, endpoint, envelope));
    }
    return ok(envelope.data);
  }
}
