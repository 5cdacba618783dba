// Data-only types shared by the client and its pure helpers

export interface RateLimitHeaderInfo {
  delayMs?: number | undefined;
  source: string;
}

/**
 * The subset of a fetch Response the client reads.
 * Both undici's and the global Response satisfy it.
 */
export interface HttpResponse {
  ok: boolean;
  status: number;
  headers: {
    get(name: string): string | null;
    forEach(callback: (value: string, key: string) => void): void;
  };
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export interface HttpFetchInit {
  body: string | null;
  headers: Record<string, string>;
  method: string;
  signal: AbortSignal;
}

/**
 * Side effects, injectable for tests.
 */
export interface HttpEffects {
  delay: (ms: number) => Promise<void>;
  fetch: (url: string, init: HttpFetchInit) => Promise<HttpResponse>;
  log: (level: 'debug' | 'info' | 'warn' | 'error', message: string, metadata?: Record<string, unknown>) => void;
  now: () => number;
}
