import type { CaudenaIoEntry, CaudenaTransaction } from '@txcheck/caudena';
import { err, ok, type Result } from 'neverthrow';

import type { CheckCommandOptions } from './check.js';
import type { CheckParams } from './check-handler.js';

export interface SuspiciousContract {
  address: string | undefined;
  entity: string | undefined;
  score: number;
  side: 'Input' | 'Output';
}

function suspiciousEntries(
  entries: CaudenaIoEntry[] | null | undefined,
  side: SuspiciousContract['side'],
  riskThreshold: number
): SuspiciousContract[] {
  const found: SuspiciousContract[] = [];
  for (const entry of entries ?? []) {
    const score = entry.score;
    if (!entry.contract || !score || score >= riskThreshold) continue;
    found.push({ address: entry.address ?? undefined, entity: entry.name ?? undefined, score, side });
  }
  return found;
}

/**
 * Contract inputs and outputs whose risk score is below the threshold.
 * A missing or zero score means the contract is unscored and is never flagged.
 */
export function findSuspiciousContracts(transaction: CaudenaTransaction, riskThreshold: number): SuspiciousContract[] {
  return [
    ...suspiciousEntries(transaction.inputs, 'Input', riskThreshold),
    ...suspiciousEntries(transaction.outputs, 'Output', riskThreshold),
  ];
}

/**
 * Build handler params from validated options.
 */
export function buildCheckParams(options: CheckCommandOptions): Result<CheckParams, Error> {
  if (options.hash) {
    return ok({ currency: options.currency, hash: options.hash, kind: 'transaction', riskThreshold: options.riskThreshold });
  }
  if (options.address) {
    return ok({ address: options.address, currency: options.currency, kind: 'address', limit: options.limit });
  }
  return err(new Error('Either --hash or --address is required'));
}
