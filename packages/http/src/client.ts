import { getLogger } from '@soundness/logger';
import { err, ok, type Result } from 'neverthrow';
import { Agent, fetch as undiciFetch } from 'undici';

import * as HttpUtils from './core/http-utils.js';
import type { HttpEffects, HttpResponse } from './core/types.js';
import type { HttpClientConfig, HttpRequestBody, HttpRequestOptions } from './types.js';
import {
  HttpError,
  NetworkError,
  RateLimitError,
  RequestAbortedError,
  RequestTimeoutError,
  ResponseValidationError,
} from './types.js';

type ResolvedConfig = HttpClientConfig & { retries: number; timeout: number };

/** Largest delay `setTimeout` honours; longer ones fire after 1 ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export class HttpClient {
  private readonly config: ResolvedConfig;
  private readonly logger: ReturnType<typeof getLogger>;
  private readonly effects: HttpEffects;
  private readonly agent: Agent;

  private closePromise?: Promise<void> | undefined;

  constructor(config: HttpClientConfig, effects?: Partial<HttpEffects>) {
    this.config = {
      ...config,
      defaultHeaders: {
        Accept: 'application/json',
        'User-Agent': 'zk-account-soundness/0.1.0',
        ...config.defaultHeaders,
      },
      retries: config.retries ?? 1,
      timeout: config.timeout ?? 30_000,
    };

    if (!Number.isInteger(this.config.retries) || this.config.retries < 1) {
      throw new RangeError(`retries must be a positive integer, got ${this.config.retries}`);
    }
    if (!(this.config.timeout > 0 && this.config.timeout <= MAX_TIMEOUT_MS)) {
      throw new RangeError(`timeout must be between 1 and ${MAX_TIMEOUT_MS} ms, got ${this.config.timeout}`);
    }

    this.logger = getLogger(`HttpClient:${config.providerName}`);

    // Keep-alive pool shared by every request to this endpoint
    this.agent = new Agent({
      keepAliveTimeout: 10_000,
      keepAliveMaxTimeout: 60_000,
      pipelining: 1,
    });

    this.effects = {
      delay: (ms, signal) => abortableDelay(ms, signal),
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
      `HTTP client initialized - BaseUrl: ${HttpUtils.sanitizeUrl(config.baseUrl)}, Timeout: ${this.config.timeout}ms, Attempts: ${this.config.retries}`
    );
  }

  /**
   * POST a JSON body and validate the JSON response against `options.schema`.
   */
  async post<T>(
    endpoint: string,
    body: HttpRequestBody,
    options: Omit<HttpRequestOptions<T>, 'method' | 'body'>
  ): Promise<Result<T, Error>> {
    return this.request(endpoint, { ...options, body, method: 'POST' });
  }

  /**
   * Make an HTTP request with a per-attempt timeout, bounded retries and schema validation.
   */
  async request<T>(endpoint: string, options: HttpRequestOptions<T>): Promise<Result<T, Error>> {
    const url = HttpUtils.buildUrl(this.config.baseUrl, endpoint);
    const method = options.method ?? 'GET';
    const timeout = options.timeout ?? this.config.timeout;
    const attempts = this.config.retries;
    const callerSignal = options.signal;
    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      if (callerSignal?.aborted) {
        return err(new RequestAbortedError());
      }

      const controller = new AbortController();
      let timedOut = false;
      const timeoutId = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, timeout);
      const onCallerAbort = () => controller.abort();
      callerSignal?.addEventListener('abort', onCallerAbort, { once: true });

      try {
        this.effects.log(
          'debug',
          `Making HTTP request - URL: ${HttpUtils.sanitizeUrl(url)}, Method: ${method}, Attempt: ${attempt}/${attempts}`
        );

        const headers: Record<string, string> = { ...this.config.defaultHeaders, ...options.headers };
        let body: string | null = null;
        if (options.body !== undefined) {
          if (typeof options.body === 'string') {
            body = options.body;
          } else {
            body = JSON.stringify(options.body);
            headers['Content-Type'] = 'application/json';
          }
        }

        const response = await this.effects.fetch(url, { body, headers, method, signal: controller.signal });

        if (!response.ok) {
          const errorText = await response.text().catch(() => 'Unknown error');

          if (response.status === 429) {
            if (attempt < attempts) {
              await this.backoffAfterRateLimit(response, attempt, attempts, callerSignal);
              continue;
            }
            return err(new RateLimitError(`${this.config.providerName} rate limit exceeded`));
          }

          return err(new HttpError(`HTTP ${response.status}: ${errorText}`, response.status, errorText));
        }

        let data: unknown;
        try {
          data = await response.json();
        } catch (error) {
          if (callerSignal?.aborted || timedOut) throw error;
          return err(
            new ResponseValidationError('Response body is not valid JSON', this.config.providerName, endpoint, [], '')
          );
        }

        return this.validate(data, options, { endpoint, method, status: response.status, url });
      } catch (error) {
        if (callerSignal?.aborted) {
          return err(new RequestAbortedError());
        }

        lastError = timedOut
          ? new RequestTimeoutError(timeout)
          : new NetworkError(error instanceof Error ? error.message : String(error), HttpUtils.extractErrorCode(error), {
              cause: error,
            });

        this.effects.log(
          'warn',
          `Request failed - URL: ${HttpUtils.sanitizeUrl(url)}, Attempt: ${attempt}/${attempts}, Error: ${lastError.message}`,
          { method, providerName: this.config.providerName }
        );

        if (attempt < attempts) {
          const delay = HttpUtils.calculateExponentialBackoff(attempt, 1000, 10_000);
          this.effects.log('debug', `Retrying after delay - Delay: ${delay}ms, NextAttempt: ${attempt + 1}`);
          await this.effects.delay(delay, callerSignal);
        }
      } finally {
        clearTimeout(timeoutId);
        callerSignal?.removeEventListener('abort', onCallerAbort);
      }
    }

    return err(lastError ?? new Error('Request failed with unknown error'));
  }

  /**
   * Closes the undici agent so keep-alive sockets do not hold the process open.
   * Idempotent: every call returns the first call's promise.
   */
  close(): Promise<void> {
    this.closePromise ??= this.closeAgent();
    return this.closePromise;
  }

  private async closeAgent(): Promise<void> {
    this.logger.debug('Closing HTTP agent connections');
    try {
      await this.agent.close();
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to close HTTP agent: ${errorMessage}`);
      throw new Error(`HTTP agent cleanup failed: ${errorMessage}`, { cause: error });
    }
  }

  private validate<T>(
    data: unknown,
    options: HttpRequestOptions<T>,
    meta: { endpoint: string; method: string; status: number; url: string }
  ): Result<T, Error> {
    const parseResult = options.schema.safeParse(data);
    if (parseResult.success) {
      return ok(parseResult.data);
    }

    const allIssues = parseResult.error.issues.map((issue) => ({
      message: issue.message,
      path: issue.path.join('.'),
    }));

    const firstFiveErrors = allIssues
      .slice(0, 5)
      .map((issue) => `${issue.path}: ${issue.message}`)
      .join('; ');

    const truncatedPayload = (JSON.stringify(data) ?? '').slice(0, 500);

    this.effects.log(
      'error',
      `Response validation failed (showing first 5 of ${allIssues.length} errors): ${firstFiveErrors}`,
      {
        method: meta.method,
        providerName: this.config.providerName,
        status: meta.status,
        truncatedPayload,
        url: HttpUtils.sanitizeUrl(meta.url),
      }
    );

    return err(
      new ResponseValidationError(
        `Response validation failed: ${firstFiveErrors}`,
        this.config.providerName,
        meta.endpoint,
        allIssues,
        truncatedPayload
      )
    );
  }

  private async backoffAfterRateLimit(
    response: HttpResponse,
    attempt: number,
    attempts: number,
    signal: AbortSignal | undefined
  ): Promise<void> {
    const retryDelayInfo = HttpUtils.parseRateLimitHeaders(
      HttpUtils.readRateLimitHeaders(response.headers),
      this.effects.now()
    );
    const baseDelay = retryDelayInfo.delayMs ?? 2000;
    const delay = HttpUtils.calculateExponentialBackoff(attempt, baseDelay, 60_000);

    this.effects.log(
      'warn',
      `Rate limit 429 response received, waiting before retry - Source: ${retryDelayInfo.source}, BaseDelay: ${baseDelay}ms, ActualDelay: ${delay}ms, Attempt: ${attempt}/${attempts}`
    );

    await this.effects.delay(delay, signal);
  }
}

/**
 * Sleep for `ms`, resolving early once `signal` aborts. The caller checks the signal afterwards.
 */
function abortableDelay(ms: number, signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
