import type { ZodType, ZodTypeDef } from 'zod';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface HttpClientConfig {
  baseUrl: string;
  defaultHeaders?: Record<string, string> | undefined;
  providerName: string;
  /** Total attempts per logical request, including the first one. */
  retries?: number | undefined;
  timeout?: number | undefined;
}

/**
 * Headers and body that may be rebuilt for every attempt.
 */
export interface HttpRequestParts {
  body?: string | object | undefined;
  headers?: Record<string, string> | undefined;
}

export interface HttpRequestOptions<T = unknown> extends HttpRequestParts {
  method?: HttpMethod | undefined;
  schema?: ZodType<T, ZodTypeDef, unknown> | undefined;
  timeout?: number | undefined;
  /**
   * Regenerate headers and body before each attempt. Used for signed requests,
   * so a retry never re-sends a credential that may have expired.
   */
  buildRequest?: (() => HttpRequestParts) | undefined;
}

export class HttpError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly responseBody: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export class RateLimitError extends Error {
  constructor(
    message: string,
    public readonly retryAfter?: number
  ) {
    super(message);
    this.name = 'RateLimitError';
  }
}

export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class NetworkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NetworkError';
  }
}

export class ResponseValidationError extends Error {
  constructor(
    message: string,
    public readonly providerName: string,
    public readonly endpoint: string,
    public readonly validationIssues: { message: string; path: string }[],
    public readonly truncatedPayload: string
  ) {
    super(message);
    this.name = 'ResponseValidationError';
  }
}
