import { Decimal } from 'decimal.js';

/**
 * Numeric API field. Amounts may stay numeric strings to keep their precision;
 * absent values are `null` or `undefined`.
 */
export type NumericField = number | string | null | undefined;

export const NOT_AVAILABLE = 'N/A';

function groupThousands(fixed: string): string {
  const negative = fixed.startsWith('-');
  const [integer = '0', fraction] = (negative ? fixed.slice(1) : fixed).split('.');
  const grouped = integer.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  return `${negative ? '-' : ''}${grouped}${fraction === undefined ? '' : `.${fraction}`}`;
}

/**
 * Thousands-separated, every significant digit kept, never exponential.
 * Missing values print as 0.
 */
export function formatGrouped(value: NumericField): string {
  return groupThousands(new Decimal(value ?? 0).toFixed());
}

/**
 * Thousands-separated with a fixed number of decimals. Missing values print as 0.
 */
export function formatFixed(value: NumericField, decimals: number): string {
  return groupThousands(new Decimal(value ?? 0).toFixed(decimals));
}

export function formatUsd(value: NumericField): string {
  return `$${formatFixed(value, 2)}`;
}

/** True for a present value other than zero. */
export function isNonZero(value: NumericField): boolean {
  return value !== null && value !== undefined && !new Decimal(value).isZero();
}

/** Value as-is without grouping, or N/A. */
export function formatPlain(value: NumericField): string {
  if (value === null || value === undefined) return NOT_AVAILABLE;
  return typeof value === 'string' ? value : new Decimal(value).toFixed();
}

/**
 * Unix seconds as `YYYY-MM-DD HH:MM:SS UTC`. Zero or missing is N/A.
 */
export function formatTimestamp(seconds: number | null | undefined): string {
  if (!seconds) return NOT_AVAILABLE;

  const date = new Date(seconds * 1000);
  if (Number.isNaN(date.getTime())) return String(seconds);

  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

/** First `length` characters followed by an ellipsis. */
export function truncateId(value: string | null | undefined, length = 20): string {
  return `${(value ?? NOT_AVAILABLE).slice(0, length)}...`;
}
