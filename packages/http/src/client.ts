import { getLogger, type Logger } from '@txcheck/logger';
import { err, ok, type Result } from 'neverthrow';
import { Agent, fetch as undiciFetch } from 'undici';
import type { ZodType, ZodTypeDef } from 'zod';

import * as HttpUtils from './core/http-utils.js';
import type { HttpEffects, HttpResponse } from './core/types.js';
import type { HttpClientConfig, HttpMethod, HttpRequestOptions } from './types.js';
import { HttpError, NetworkError, RateLimitError, ResponseValidationError, TimeoutError } from './types.js';

type RequestOptions<T> = Omit<HttpRequestOptions<T>, 'method' | 'schema'> & {
  schema: ZodType<T, ZodTypeDef, unknown>;
};

export class HttpClient {
  private readonly baseUrl: string;
  private readonly providerName: string;
  private readonly defaultHeaders: Record<string, string>;
  private readonly retries: number;
  private readonly timeout: number;
  private readonly logger: Logger;
  private readonly effects: HttpEffects;
  private readonly agent: Agent;

  private closePromise?: Promise<void> | undefined;

  constructor(config: HttpClientConfig, effects?: Partial<HttpEffects>) {
    this.baseUrl = config.baseUrl;
    this.providerName = config.providerName;
    this.defaultHeaders = {
      Accept: 'application/json',
      'User-Agent': 'txcheck/0.1.0',
      ...config.defaultHeaders,
    };
    this.retries = Math.max(1, config.retries ?? 3);
    this.timeout = config.timeout ?? 30_000;

    this.logger = getLogger(`HttpClient:${config.providerName}`);

    // Keep-alive pool; closed in close() so the process can exit on its own
    this.agent = new Agent({
      keepAliveTimeout: 10_000,
      keepAliveMaxTimeout: 60_000,
      pipelining: 1,
    });

    this.effects = {
      delay: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)),
      fetch: (url, init) => undiciFetch(url, { ...init, dispatcher: this.agent }),
      log: (level, message, metadata) => {
        if (metadata) {
          this.logger[level](metadata, message);
        } else {
          this.logger[level](message);
        }
      },
      now: () => Date.now(),
      ...effects,
    };

    this.logger.debug(
      `HTTP client initialized - BaseUrl: ${this.baseUrl}, Timeout: ${this.timeout}ms, Retries: ${this.retries}`
    );
  }

  async get<T>(endpoint: string, options: RequestOptions<T>): Promise<Result<T, Error>> {
    return this.request(endpoint, { ...options, method: 'GET' });
  }

  async post<T>(endpoint: string, body: string | object, options: RequestOptions<T>): Promise<Result<T, Error>> {
    return this.request(endpoint, { ...options, body, method: 'POST' });
  }

  /**
   * Send a request and validate the JSON body against `options.schema`.
   *
   * Network failures and timeouts are retried with exponential backoff, 429s
   * honour the server's reset headers. Any other non-2xx status is returned
   * as an HttpError without retrying.
   */
  async request<T>(
    endpoint: string,
    options: HttpRequestOptions<T> & { schema: ZodType<T, ZodTypeDef, unknown> }
  ): Promise<Result<T, Error>> {
    const url = HttpUtils.buildUrl(this.baseUrl, endpoint);
    const safeUrl = HttpUtils.sanitizeUrl(url);
    const method: HttpMethod = options.method ?? 'GET';
    const timeout = options.timeout ?? this.timeout;
    let lastError: Error = new NetworkError('Request failed with unknown error');

    for (let attempt = 1; attempt <= this.retries; attempt++) {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeout);

      try {
        const parts = options.buildRequest ? { ...options, ...options.buildRequest() } : options;
        const headers: Record<string, string> = { ...this.defaultHeaders, ...parts.headers };

        let body: string | null = null;
        if (typeof parts.body === 'string') {
          body = parts.body;
        } else if (parts.body !== undefined) {
          body = JSON.stringify(parts.body);
          headers['Content-Type'] = 'application/json';
        }

        this.effects.log(
          'debug',
          `Making HTTP request - URL: ${safeUrl}, Method: ${method}, Attempt: ${attempt}/${this.retries}`
        );

        const response = await this.effects.fetch(url, { body, headers, method, signal: controller.signal });

        if (response.status === 429) {
          const delay = this.rateLimitDelay(response, attempt);
          if (attempt < this.retries) {
            this.effects.log(
              'warn',
              `Rate limit 429 response received, waiting before retry - Delay: ${delay}ms, Attempt: ${attempt}/${this.retries}`
            );
            await this.effects.delay(delay);
            continue;
          }
          return err(new RateLimitError(`${this.providerName} rate limit exceeded`, delay));
        }

        if (!response.ok) {
          const errorText = await response.text().catch(() => 'Unknown error');
          this.effects.log('debug', `Request rejected - URL: ${safeUrl}, Status: ${response.status}`);
          return err(new HttpError(`HTTP ${response.status}: ${errorText}`, response.status, errorText));
        }

        const payload = await this.readBody(response);
        if (payload.isErr()) {
          return err(new ResponseValidationError(payload.error, this.providerName, endpoint, [], ''));
        }

        return this.validate(options.schema, payload.value, endpoint, response.status);
      } catch (error) {
        const aborted = controller.signal.aborted || (error instanceof Error && error.name === 'AbortError');
        lastError = aborted
          ? new TimeoutError(timeout)
          : new NetworkError(error instanceof Error ? error.message : String(error), { cause: error });

        this.effects.log(
          'warn',
          `Request failed - URL: ${safeUrl}, Attempt: ${attempt}/${this.retries}, Error: ${lastError.message}`,
          { method, providerName: this.providerName }
        );

        if (attempt < this.retries) {
          const delay = HttpUtils.calculateExponentialBackoff(attempt, 1000, 10_000);
          this.effects.log('debug', `Retrying after delay - Delay: ${delay}ms, NextAttempt: ${attempt + 1}`);
          await this.effects.delay(delay);
        }
      } finally {
        clearTimeout(timeoutId);
      }
    }

    return err(lastError);
  }

  /**
   * Close pooled connections. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (!this.closePromise) {
      this.logger.debug('Closing HTTP agent connections');
      this.closePromise = this.agent.close();
    }
    await this.closePromise;
  }

  private async readBody(response: HttpResponse): Promise<Result<unknown, string>> {
    if (response.status === 204 || response.headers.get('content-length') === '0') {
      return ok(undefined);
    }
    try {
      return ok(await response.json());
    } catch (error) {
      return err(`Response body is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private validate<T>(
    schema: ZodType<T, ZodTypeDef, unknown>,
    data: unknown,
    endpoint: string,
    status: number
  ): Result<T, Error> {
    const parsed = schema.safeParse(data);
    if (parsed.success) {
      return ok(parsed.data);
    }

    const issues = parsed.error.issues.map((issue) => ({
      message: issue.message,
      path: issue.path.join('.'),
    }));
    const firstFive = issues
      .slice(0, 5)
      .map((issue) => `${issue.path}: ${issue.message}`)
      .join('; ');
    const truncatedPayload = (JSON.stringify(data) ?? 'undefined').slice(0, 500);

    this.effects.log(
      'error',
      `Response validation failed (showing first 5 of ${issues.length} errors): ${firstFive}`,
      { providerName: this.providerName, status, truncatedPayload }
    );

    return err(
      new ResponseValidationError(
        `Response validation failed: ${firstFive}`,
        this.providerName,
        endpoint,
        issues,
        truncatedPayload
      )
    );
  }

  private rateLimitDelay(response: HttpResponse, attempt: number): number {
    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key.toLowerCase()] = value;
    });
    const info = HttpUtils.parseRateLimitHeaders(headers, this.effects.now());
    return HttpUtils.calculateExponentialBackoff(attempt, info.delayMs ?? 2000, 60_000);
  }
}
