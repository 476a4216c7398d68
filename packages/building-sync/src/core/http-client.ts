/**
 * HTTP Client
 *
 * Thin layer over native fetch used by the building fetcher:
 * - Exponential backoff with jitter on retryable failures
 * - Per-request timeout via AbortController
 * - Classified errors (status, timeout, network, JSON parse)
 *
 * Retries happen inside a single sync cycle. A request that still fails
 * surfaces to the caller; the poller then retries on its own schedule.
 *
 * USAGE:
 * ```typescript
 * const client = new HTTPClient({ maxRetries: 2, timeoutMs: 10_000 });
 * const body = await client.fetchJSON('https://buildings.example.com/api', {
 *   headers: { Authorization: 'Bearer test-token' },
 * });
 * ```
 */

import { createLogger } from './utils/logger.js';

const log = createLogger({ module: 'http' });

// ============================================================================
// Configuration Types
// ============================================================================

export interface HTTPClientConfig {
  /** Retry attempts after the first request (default: 2) */
  readonly maxRetries: number;

  /** Delay before the first retry in milliseconds (default: 250) */
  readonly initialDelayMs: number;

  /** Exponential backoff multiplier (default: 2) */
  readonly backoffMultiplier: number;

  /** Upper bound on a single retry delay (default: 2000) */
  readonly maxDelayMs: number;

  /** Request timeout in milliseconds (default: 30000) */
  readonly timeoutMs: number;

  readonly userAgent: string;

  /** Jitter factor, 0-1 (default: 0.1) */
  readonly jitterFactor: number;
}

export const DEFAULT_HTTP_CONFIG: HTTPClientConfig = {
  maxRetries: 2,
  initialDelayMs: 250,
  backoffMultiplier: 2,
  maxDelayMs: 2000,
  timeoutMs: 30_000,
  userAgent: 'building-sync/0.1',
  jitterFactor: 0.1,
};

/**
 * Per-request options (override client defaults)
 */
export interface FetchOptions {
  readonly timeoutMs?: number;
  readonly retries?: number;
  readonly headers?: Readonly<Record<string, string>>;
  readonly signal?: AbortSignal;
}

// ============================================================================
// Error Types
// ============================================================================

/**
 * Non-success HTTP status
 */
export class HTTPError extends Error {
  readonly name = 'HTTPError' as const;

  constructor(
    message: string,
    readonly statusCode: number,
    readonly url: string
  ) {
    super(message);
    Object.setPrototypeOf(this, HTTPError.prototype);
  }
}

export class HTTPTimeoutError extends Error {
  readonly name = 'HTTPTimeoutError' as const;

  constructor(
    readonly url: string,
    readonly timeoutMs: number
  ) {
    super(`Request timeout after ${timeoutMs}ms: ${url}`);
    Object.setPrototypeOf(this, HTTPTimeoutError.prototype);
  }
}

/**
 * Connection refused, DNS failure and the like
 */
export class HTTPNetworkError extends Error {
  readonly name = 'HTTPNetworkError' as const;

  constructor(
    readonly url: string,
    cause: unknown
  ) {
    super(`Network error: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    Object.setPrototypeOf(this, HTTPNetworkError.prototype);
  }
}

export class HTTPJSONParseError extends Error {
  readonly name = 'HTTPJSONParseError' as const;
  readonly responseText: string;

  constructor(
    readonly url: string,
    responseText: string,
    cause: unknown
  ) {
    super(`Failed to parse JSON response: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
    this.responseText = responseText.slice(0, 500);
    Object.setPrototypeOf(this, HTTPJSONParseError.prototype);
  }
}

// ============================================================================
// HTTP Client Implementation
// ============================================================================

const RETRYABLE_STATUS = new Set([408, 429, 500, 502, 503, 504]);

export function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUS.has(status);
}

export class HTTPClient {
  private readonly config: HTTPClientConfig;

  constructor(config: Partial<HTTPClientConfig> = {}) {
    this.config = { ...DEFAULT_HTTP_CONFIG, ...config };
  }

  /**
   * GET a JSON document
   *
   * @throws {HTTPError} Non-success status after retries
   * @throws {HTTPTimeoutError} Last attempt timed out
   * @throws {HTTPNetworkError} Last attempt failed to connect
   * @throws {HTTPJSONParseError} Body is not JSON (never retried)
   */
  async fetchJSON(url: string, options?: FetchOptions): Promise<unknown> {
    const response = await this.fetchWithRetry(url, options);
    const text = await response.text();

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      throw new HTTPJSONParseError(url, text, error);
    }
  }

  async fetchWithRetry(url: string, options?: FetchOptions): Promise<Response> {
    const maxAttempts = (options?.retries ?? this.config.maxRetries) + 1;

    for (let attempt = 1; ; attempt++) {
      const isLastAttempt = attempt >= maxAttempts;

      try {
        const response = await this.fetchWithTimeout(url, options);
        if (response.ok) {
          return response;
        }
        throw new HTTPError(`HTTP ${response.status}: ${response.statusText}`, response.status, url);
      } catch (error) {
        if (isLastAttempt || !this.isRetryableError(error)) {
          throw error;
        }
        log.warn('HTTP attempt failed', {
          attempt,
          maxAttempts,
          url,
          error: error instanceof Error ? error.message : String(error),
        });
      }

      await this.sleep(this.calculateBackoffDelay(attempt));
    }
  }

  private async fetchWithTimeout(url: string, options?: FetchOptions): Promise<Response> {
    const timeoutMs = options?.timeoutMs ?? this.config.timeoutMs;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    const signal = options?.signal
      ? this.mergeAbortSignals([controller.signal, options.signal])
      : controller.signal;

    try {
      return await fetch(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.config.userAgent,
          ...options?.headers,
        },
        signal,
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new HTTPTimeoutError(url, timeoutMs);
      }
      if (options?.signal?.aborted) {
        throw error;
      }
      throw new HTTPNetworkError(url, error);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * initialDelay * multiplier^(attempt-1), capped, with ±jitter
   */
  private calculateBackoffDelay(attempt: number): number {
    const exponential =
      this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);
    const capped = Math.min(exponential, this.config.maxDelayMs);
    const jitterRange = capped * this.config.jitterFactor;
    const jitter = Math.random() * 2 * jitterRange - jitterRange;
    return Math.max(0, Math.floor(capped + jitter));
  }

  private isRetryableError(error: unknown): boolean {
    if (error instanceof HTTPTimeoutError || error instanceof HTTPNetworkError) {
      return true;
    }
    if (error instanceof HTTPError) {
      return isRetryableStatus(error.statusCode);
    }
    return false;
  }

  /**
   * Signal that aborts when any input signal aborts
   */
  private mergeAbortSignals(signals: readonly AbortSignal[]): AbortSignal {
    const controller = new AbortController();

    for (const signal of signals) {
      if (signal.aborted) {
        controller.abort();
        break;
      }
      signal.addEventListener('abort', () => controller.abort(), { once: true });
    }

    return controller.signal;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
