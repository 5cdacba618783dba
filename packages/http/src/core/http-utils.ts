// Pure HTTP helpers

import type { RateLimitHeaderInfo } from './types.js';

const MAX_HEADER_DELAY_MS = 30_000;

export const buildUrl = (baseUrl: string, endpoint: string): string => {
  const cleanBaseUrl = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;

  if (!endpoint || endpoint === '/') {
    return cleanBaseUrl;
  }

  const cleanEndpoint = endpoint.startsWith('/') ? endpoint : `/${endpoint}`;
  return `${cleanBaseUrl}${cleanEndpoint}`;
};

/**
 * Mask credential-like query parameters before a URL is logged.
 */
export const sanitizeUrl = (url: string): string => {
  let urlObj: URL;
  try {
    urlObj = new URL(url);
  } catch {
    return url;
  }

  for (const param of ['token', 'key', 'apikey', 'api_key', 'secret', 'password']) {
    if (urlObj.searchParams.has(param)) {
      urlObj.searchParams.set(param, '***');
    }
  }

  return urlObj.toString();
};

/**
 * Retry-After as delay-seconds or HTTP-date. Capped at 30s.
 */
export const parseRetryAfter = (value: string, currentTime: number): number | undefined => {
  if (/^\d+$/.test(value.trim())) {
    const seconds = parseInt(value, 10);
    return seconds === 0 ? 1000 : Math.min(seconds * 1000, MAX_HEADER_DELAY_MS);
  }

  const date = new Date(value);
  if (!isNaN(date.getTime())) {
    const delayMs = date.getTime() - currentTime;
    if (delayMs > 0) {
      return Math.min(delayMs, MAX_HEADER_DELAY_MS);
    }
  }

  return undefined;
};

/**
 * Unix reset timestamp (seconds) to a delay from now. Capped at 30s.
 */
export const parseUnixTimestamp = (value: string, currentTime: number): number | undefined => {
  const timestamp = parseInt(value, 10);
  if (isNaN(timestamp) || timestamp <= 0) {
    return undefined;
  }

  const delaySeconds = timestamp - Math.floor(currentTime / 1000);
  return delaySeconds > 0 ? Math.min(delaySeconds * 1000, MAX_HEADER_DELAY_MS) : undefined;
};

/**
 * Checked in order: Retry-After, X-RateLimit-Reset, X-Rate-Limit-Reset,
 * RateLimit-Reset (delta-seconds). Header names are expected lower-cased.
 */
export const parseRateLimitHeaders = (headers: Record<string, string>, currentTime: number): RateLimitHeaderInfo => {
  const retryAfter = headers['retry-after'];
  if (retryAfter) {
    const delayMs = parseRetryAfter(retryAfter, currentTime);
    if (delayMs !== undefined) {
      return { delayMs, source: 'Retry-After' };
    }
  }

  for (const [name, source] of [
    ['x-ratelimit-reset', 'X-RateLimit-Reset'],
    ['x-rate-limit-reset', 'X-Rate-Limit-Reset'],
  ] as const) {
    const value = headers[name];
    if (value) {
      const delayMs = parseUnixTimestamp(value, currentTime);
      if (delayMs !== undefined) {
        return { delayMs, source };
      }
    }
  }

  const rateLimitReset = headers['ratelimit-reset'];
  if (rateLimitReset) {
    const seconds = parseInt(rateLimitReset, 10);
    if (!isNaN(seconds) && seconds >= 0) {
      return { delayMs: Math.min(seconds * 1000, MAX_HEADER_DELAY_MS), source: 'RateLimit-Reset' };
    }
  }

  return { source: 'default' };
};

export const calculateExponentialBackoff = (attempt: number, baseDelayMs: number, maxDelayMs: number): number => {
  return Math.min(baseDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
};
