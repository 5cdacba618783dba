import type {
  CaudenaAddressStats,
  CaudenaAddressTransaction,
  CaudenaIoEntry,
  CaudenaTokenParty,
  CaudenaTokenTransfer,
  CaudenaTransaction,
  Currency,
} from '@txcheck/caudena';

import {
  formatFixed,
  formatGrouped,
  formatPlain,
  formatTimestamp,
  formatUsd,
  isNonZero,
  NOT_AVAILABLE,
  truncateId,
} from '../shared/format-utils.js';

import type { AddressCheckResult, TransactionCheckResult } from './check-handler.js';
import type { SuspiciousContract } from './check-utils.js';

export const RULE = '='.repeat(80);

const MAX_IO_ENTRIES = 3;
const MAX_TOKEN_TRANSFERS = 5;
const UNIDENTIFIED = 'Unidentified';

function formatScore(score: number | null | undefined): string {
  return score === null || score === undefined ? NOT_AVAILABLE : formatPlain(score);
}

/**
 * Lines printed before the API call.
 */
export function buildCheckHeader(kind: 'address' | 'transaction', target: string, currency: Currency): string[] {
  const label = kind === 'transaction' ? 'Checking transaction' : 'Checking address';
  return ['', `🔍 ${label}: ${target}`, `   Currency: ${currency.toUpperCase()}`, ''];
}

function ioLines(title: string, noun: string, entries: CaudenaIoEntry[]): string[] {
  const lines = ['', `${title} (${entries.length}):`];
  entries.slice(0, MAX_IO_ENTRIES).forEach((entry, index) => {
    lines.push(
      `   ${index + 1}. ${truncateId(entry.address)} | ${formatGrouped(entry.amount)} | ${formatUsd(entry.amount_usd)}` +
        ` | Score: ${formatScore(entry.score)} | ${entry.name ?? UNIDENTIFIED}`
    );
  });
  if (entries.length > MAX_IO_ENTRIES) {
    lines.push(`   ... and ${entries.length - MAX_IO_ENTRIES} more ${noun}`);
  }
  return lines;
}

function partyLine(label: string, party: CaudenaTokenParty | null | undefined): string[] {
  if (!party?.address) return [];
  const entity = party.entity?.name ?? UNIDENTIFIED;
  return [`      ${label}: ${truncateId(party.address)} (Score: ${formatScore(party.score)}, ${entity})`];
}

function tokenLines(transfers: CaudenaTokenTransfer[]): string[] {
  const lines = ['', `🪙 Token Transfers (${transfers.length}):`];
  for (const transfer of transfers.slice(0, MAX_TOKEN_TRANSFERS)) {
    const token = transfer.token;
    const warning = token?.scam || token?.spam ? ' ⚠️  SCAM/SPAM!' : '';
    lines.push(
      `   ${token?.symbol ?? NOT_AVAILABLE} (${token?.name ?? NOT_AVAILABLE}): ${formatGrouped(transfer.value)}` +
        ` (${formatUsd(transfer.usd)})${warning}`,
      ...partyLine('From', transfer.sender),
      ...partyLine('To', transfer.receiver)
    );
  }
  return lines;
}

function contractLines(contracts: SuspiciousContract[]): string[] {
  const lines = ['', '⚠️  CONTRACT ANALYSIS:'];
  if (contracts.length === 0) {
    lines.push('   ✅ No suspicious contracts detected');
    return lines;
  }
  for (const contract of contracts) {
    lines.push(
      `   ⚠️  SUSPICIOUS CONTRACT (${contract.side}): ${contract.address ?? NOT_AVAILABLE}`,
      `      Score: ${formatPlain(contract.score)}/10 | Entity: ${contract.entity ?? UNIDENTIFIED}`
    );
  }
  return lines;
}

/**
 * Full transaction report. Input, output and token sections only appear
 * when the transaction has entries for them.
 */
export function buildTransactionReport(transaction: CaudenaTransaction, contracts: SuspiciousContract[]): string[] {
  const lines = [
    RULE,
    '📄 TRANSACTION DETAILS',
    RULE,
    '',
    `🔹 Hash: ${transaction.hash ?? NOT_AVAILABLE}`,
    `🔹 Status: ${transaction.status ? '✅ Confirmed' : '⏳ Pending'}`,
    `🔹 Currency: ${transaction.currency?.toUpperCase() ?? NOT_AVAILABLE}`,
    `🔹 Timestamp: ${formatTimestamp(transaction.time)}`,
    `🔹 Block Height: ${formatPlain(transaction.height)}`,
    `🔹 Confirmations: ${formatGrouped(transaction.confirmations)}`,
    '',
    '💰 Amounts:',
    `   Amount: ${formatPlain(transaction.amount)}`,
    `   Amount USD: ${formatUsd(transaction.amount_usd)}`,
    `   Fee: ${formatPlain(transaction.fee)}`,
    `   Fee USD: ${formatUsd(transaction.fee_usd)}`,
  ];

  if (isNonZero(transaction.gas)) {
    lines.push(
      `   Gas: ${formatPlain(transaction.gas)}`,
      `   Gas Used: ${formatPlain(transaction.gas_used)}`,
      `   Gas Price: ${formatPlain(transaction.gas_price)}`
    );
  }

  if (transaction.inputs?.length) {
    lines.push(...ioLines('📥 Inputs', 'inputs', transaction.inputs));
  }
  if (transaction.outputs?.length) {
    lines.push(...ioLines('📤 Outputs', 'outputs', transaction.outputs));
  }
  if (transaction.tokens?.length) {
    lines.push(...tokenLines(transaction.tokens));
  }

  lines.push(...contractLines(contracts), '', RULE);
  return lines;
}

export function buildAddressStatsLines(stats: CaudenaAddressStats, currency: Currency): string[] {
  const unit = (stats.blockchain ?? currency).toUpperCase();
  const lines = [
    RULE,
    '📊 ADDRESS STATISTICS',
    RULE,
    '',
    `🔹 Address: ${stats.address ?? NOT_AVAILABLE}`,
    '',
    '💰 Balance:',
    `   Current: ${formatFixed(stats.balance?.balance, 8)} ${unit}`,
    `   Total In: ${formatFixed(stats.balance?.total_in, 8)}`,
    `   Total Out: ${formatFixed(stats.balance?.total_out, 8)}`,
    '',
    '💰 Balance USD:',
    `   Current: ${formatUsd(stats.balance_usd?.balance)}`,
    `   Total In: ${formatUsd(stats.balance_usd?.total_in)}`,
    `   Total Out: ${formatUsd(stats.balance_usd?.total_out)}`,
    '',
    '📊 Transactions:',
    `   Incoming: ${formatGrouped(stats.trx_count?.in)}`,
    `   Outgoing: ${formatGrouped(stats.trx_count?.out)}`,
  ];

  if (stats.entity) {
    lines.push(
      '',
      '🏢 Entity:',
      `   Name: ${stats.entity.name ?? NOT_AVAILABLE}`,
      `   Category: ${stats.entity.category ?? NOT_AVAILABLE}`
    );
  }

  lines.push(
    '',
    `🔹 Score: ${formatScore(stats.score)}/10`,
    `🔹 First Seen: ${formatTimestamp(stats.first_seen)}`,
    `🔹 Last Seen: ${formatTimestamp(stats.last_seen)}`
  );
  return lines;
}

/**
 * Outgoing transactions report `total_out`, everything else `total_in`.
 */
export function buildTransactionSummaryLines(transaction: CaudenaAddressTransaction): string[] {
  const outgoing = transaction.direction === 'out';
  const amount = outgoing ? transaction.total_out : transaction.total_in;
  const amountUsd = outgoing ? transaction.total_out_usd : transaction.total_in_usd;

  return [
    `Hash: ${truncateId(transaction.hash)}`,
    `Time: ${formatTimestamp(transaction.time)}`,
    `Direction: ${transaction.direction ?? NOT_AVAILABLE}`,
    `Amount: ${formatGrouped(amount)}`,
    `Amount USD: ${formatUsd(amountUsd)}`,
    `Fee: ${formatGrouped(transaction.fee)} (${formatUsd(transaction.fee_usd)})`,
    `Confirmations: ${formatGrouped(transaction.confirmations)}`,
  ];
}

export function buildAddressReport(result: AddressCheckResult): string[] {
  const lines = result.stats
    ? buildAddressStatsLines(result.stats, result.currency)
    : ['⚠️  Address statistics unavailable (the API returned no data)'];

  lines.push('', RULE, `📋 Latest transactions (first ${result.limit}):`, RULE, '');

  if (result.transactions.length === 0) {
    lines.push('❌ No transactions found');
    return lines;
  }

  lines.push(`Total transactions: ${formatGrouped(result.totalEntries)}`, '');
  result.transactions.forEach((transaction, index) => {
    lines.push(`--- Transaction ${index + 1} ---`, ...buildTransactionSummaryLines(transaction), '');
  });
  return lines;
}

export function buildCheckReport(result: AddressCheckResult | TransactionCheckResult): string[] {
  return result.kind === 'transaction'
    ? buildTransactionReport(result.transaction, result.suspiciousContracts)
    : buildAddressReport(result);
}
