/**
 * Rate limit header parsing result
 */
export interface RateLimitHeaderInfo {
  delayMs?: number | undefined;
  source: string;
}

export interface HttpFetchInit {
  body: string | null;
  headers: Record<string, string>;
  method: string;
  signal: AbortSignal;
}

/**
 * The slice of a fetch Response the client reads.
 */
export interface HttpResponse {
  headers: { get(name: string): string | null };
  json(): Promise<unknown>;
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

/**
 * Side effects interface for dependency injection
 */
export interface HttpEffects {
  /** Wait between attempts; resolves early when `signal` aborts. */
  delay: (ms: number, signal?: AbortSignal) => Promise<void>;
  fetch: (url: string, init: HttpFetchInit) => Promise<HttpResponse>;
  log: (level: 'debug' | 'info' | 'warn' | 'error', message: string, metadata?: Record<string, unknown>) => void;
  now: () => number;
}
