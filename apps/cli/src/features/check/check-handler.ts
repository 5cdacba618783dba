// Imperative shell for the check command: performs the API calls and
// leaves formatting to check-report.ts

import {
  CaudenaApiError,
  type CaudenaAddressStats,
  type CaudenaAddressTransaction,
  type CaudenaApi,
  type CaudenaTransaction,
  type Currency,
} from '@txcheck/caudena';
import { getLogger } from '@txcheck/logger';
import { err, ok, type Result } from 'neverthrow';

import { findSuspiciousContracts, type SuspiciousContract } from './check-utils.js';

const logger = getLogger('CheckHandler');

export type CheckParams =
  | { currency: Currency; hash: string; kind: 'transaction'; riskThreshold: number }
  | { address: string; currency: Currency; kind: 'address'; limit: number };

export interface TransactionCheckResult {
  currency: Currency;
  hash: string;
  kind: 'transaction';
  riskThreshold: number;
  suspiciousContracts: SuspiciousContract[];
  transaction: CaudenaTransaction;
}

export interface AddressCheckResult {
  address: string;
  currency: Currency;
  kind: 'address';
  limit: number;
  /** `undefined` when the API reported `status: false` for the stats call. */
  stats: CaudenaAddressStats | undefined;
  totalEntries: number | undefined;
  transactions: CaudenaAddressTransaction[];
}

export type CheckResult = AddressCheckResult | TransactionCheckResult;

/**
 * Handler for the check command. Depends only on the CaudenaApi interface.
 */
export class CheckHandler {
  constructor(private readonly api: CaudenaApi) {}

  async execute(params: CheckParams): Promise<Result<CheckResult, Error>> {
    return params.kind === 'transaction'
      ? this.checkTransaction(params.currency, params.hash, params.riskThreshold)
      : this.checkAddress(params.currency, params.address, params.limit);
  }

  private async checkTransaction(
    currency: Currency,
    hash: string,
    riskThreshold: number
  ): Promise<Result<TransactionCheckResult, Error>> {
    logger.info(`Checking transaction - Currency: ${currency}, Hash: ${hash}`);

    const result = await this.api.getTransaction(currency, hash);
    if (result.isErr()) {
      return err(result.error);
    }

    const transaction = result.value;
    const suspiciousContracts = findSuspiciousContracts(transaction, riskThreshold);
    logger.debug(`Transaction loaded - Suspicious contracts: ${suspiciousContracts.length}`);

    return ok({ currency, hash, kind: 'transaction', riskThreshold, suspiciousContracts, transaction });
  }

  /**
   * Stats first, then the latest transactions. An API-level failure
   * (`status: false`) of either call does not abort the lookup; transport
   * and HTTP errors do.
   */
  private async checkAddress(
    currency: Currency,
    address: string,
    limit: number
  ): Promise<Result<AddressCheckResult, Error>> {
    logger.info(`Checking address - Currency: ${currency}, Address: ${address}`);

    const statsResult = await this.api.getAddressStats(currency, address);
    let stats: CaudenaAddressStats | undefined;
    if (statsResult.isOk()) {
      stats = statsResult.value;
    } else if (statsResult.error instanceof CaudenaApiError) {
      logger.warn(`Address stats unavailable - ${statsResult.error.message}`);
    } else {
      return err(statsResult.error);
    }

    const pageResult = await this.api.getAddressTransactions(currency, address);
    if (pageResult.isErr()) {
      if (!(pageResult.error instanceof CaudenaApiError)) {
        return err(pageResult.error);
      }
      logger.warn(`Address transactions unavailable - ${pageResult.error.message}`);
      return ok({ address, currency, kind: 'address', limit, stats, totalEntries: undefined, transactions: [] });
    }

    const { totalEntries, transactions } = pageResult.value;
    logger.debug(`Address transactions loaded - Received: ${transactions.length}, Total: ${totalEntries ?? 'unknown'}`);

    return ok({
      address,
      currency,
      kind: 'address',
      limit,
      stats,
      totalEntries,
      transactions: transactions.slice(0, limit),
    });
  }
}
