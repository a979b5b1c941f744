import type { ZodType, ZodTypeDef } from 'zod';

export interface HttpClientConfig {
  baseUrl: string;
  defaultHeaders?: Record<string, string> | undefined;
  providerName: string;
  /** Total attempts per request, including the first. */
  retries?: number | undefined;
  timeout?: number | undefined;
}

export type HttpRequestBody = string | object;

export interface HttpRequestOptions<T> {
  body?: HttpRequestBody | undefined;
  headers?: Record<string, string> | undefined;
  method?: 'GET' | 'POST' | undefined;
  schema: ZodType<T, ZodTypeDef, unknown>;
  /** Caller cancellation. Aborting ends the request with RequestAbortedError and stops further attempts. */
  signal?: AbortSignal | undefined;
  timeout?: number | undefined;
}

export class HttpError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public responseBody: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export class RateLimitError extends Error {
  constructor(
    message: string,
    public retryAfter?: number
  ) {
    super(message);
    this.name = 'RateLimitError';
  }
}

export class ResponseValidationError extends Error {
  constructor(
    message: string,
    public providerName: string,
    public endpoint: string,
    public validationIssues: { message: string; path: string }[],
    public truncatedPayload: string
  ) {
    super(message);
    this.name = 'ResponseValidationError';
  }
}

export class RequestTimeoutError extends Error {
  constructor(public timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
  }
}

export class RequestAbortedError extends Error {
  constructor(message = 'Request aborted') {
    super(message);
    this.name = 'RequestAbortedError';
  }
}

/**
 * Transport-level failure (DNS, refused connection, reset socket). `code` is the
 * system error code found on the error or its cause chain, when there is one.
 */
export class NetworkError extends Error {
  constructor(
    message: string,
    public code: string | undefined,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'NetworkError';
  }
}
