// packages/core/src/utils/retry.ts — Canonical retry policy for provider calls

import { HTTP_TOO_MANY_REQUESTS, MAX_PROVIDER_ATTEMPTS } from './constants.js';
import { sleep } from './sleep.js';

export interface RetryConfig {
  /** Total attempts including the first. Clamped to MAX_PROVIDER_ATTEMPTS. */
  maxAttempts: number;
  /** Base of the exponential backoff. Jitter is drawn from [0, baseDelayMs). */
  baseDelayMs: number;
  /** Wall-clock budget across all attempts. */
  budgetMs: number;
  signal?: AbortSignal;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

export interface AttemptResult<T> {
  result?: T;
  error?: Error;
  attempts: number;
  totalElapsedMs: number;
}

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  budgetMs: 600_000,
};

/** Budget below which another attempt is not started. */
const MIN_REMAINING_BUDGET_MS = 5000;

/**
 * Check if an error represents an HTTP 5xx, a timeout or a retryable network error.
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof Error) {
    const msg = error.message;
    if (msg.includes('ETIMEDOUT') || msg.includes('ECONNRESET') || msg.includes('ECONNREFUSED')) {
      return true;
    }
    if (error.name === 'TimeoutError') {
      return true;
    }
  }
  const status = getStatusCode(error);
  if (status !== undefined && status >= 500) {
    return true;
  }
  return false;
}

/**
 * Check if an error represents an HTTP 429 rate limit.
 */
export function isRateLimit(error: unknown): boolean {
  return getStatusCode(error) === HTTP_TOO_MANY_REQUESTS;
}

/**
 * Parse the Retry-After header value from an error, clamped to 60s max.
 * Returns delay in milliseconds, or undefined if not found.
 */
export function parseRetryAfter(error: unknown): number | undefined {
  const retryAfter = getHeader(error, 'retry-after');
  if (!retryAfter) {
    return undefined;
  }

  const seconds = Number(retryAfter);
  if (!Number.isNaN(seconds) && seconds >= 0) {
    return Math.min(seconds * 1000, 60_000);
  }

  const dateMs = Date.parse(retryAfter);
  if (!Number.isNaN(dateMs)) {
    const delayMs = dateMs - Date.now();
    if (delayMs <= 0) {
      return 0;
    }
    return Math.min(delayMs, 60_000);
  }

  return undefined;
}

/**
 * Exponential backoff with jitter: min(base * 2^retryCount, 30 * base) + [0, base).
 */
export function calculateBackoff(retryCount: number, baseDelayMs = 1000): number {
  const base = Math.min(baseDelayMs * 2 ** retryCount, 30 * baseDelayMs);
  const jitter = Math.floor(Math.random() * baseDelayMs);
  return base + jitter;
}

/**
 * Execute fn under the canonical retry policy:
 * - 429: wait (Retry-After when present, else backoff) and try again
 * - 5xx, timeouts, ETIMEDOUT / ECONNRESET / ECONNREFUSED: back off and try again
 * - any other error: fail immediately
 * - never more than maxAttempts calls, never past the time budget
 *
 * Never throws; the outcome is reported in the AttemptResult.
 */
export async function withCanonicalRetry<T>(
  fn: () => Promise<T>,
  config?: Partial<RetryConfig>,
): Promise<AttemptResult<T>> {
  const cfg: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
  const maxAttempts = Math.max(1, Math.min(cfg.maxAttempts, MAX_PROVIDER_ATTEMPTS));

  const startTime = Date.now();
  let retryCount = 0;
  let attemptCount = 0;
  let lastError: Error | undefined;

  while (attemptCount < maxAttempts) {
    const remaining = cfg.budgetMs - (Date.now() - startTime);
    if (attemptCount > 0 && remaining < MIN_REMAINING_BUDGET_MS) {
      return {
        error: lastError ?? new Error('Retry budget exhausted'),
        attempts: attemptCount,
        totalElapsedMs: Date.now() - startTime,
      };
    }

    attemptCount++;

    try {
      const result = await fn();
      return { result, attempts: attemptCount, totalElapsedMs: Date.now() - startTime };
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      const retryable = isRateLimit(err) || isRetryable(err);
      if (!retryable || attemptCount >= maxAttempts || cfg.signal?.aborted) {
        return { error: lastError, attempts: attemptCount, totalElapsedMs: Date.now() - startTime };
      }

      // 429 honours Retry-After and does not grow the backoff exponent
      const delayMs = isRateLimit(err)
        ? (parseRetryAfter(err) ?? calculateBackoff(retryCount, cfg.baseDelayMs))
        : calculateBackoff(retryCount++, cfg.baseDelayMs);

      cfg.onRetry?.(attemptCount, err, delayMs);

      try {
        await sleep(delayMs, cfg.signal);
      } catch {
        return { error: lastError, attempts: attemptCount, totalElapsedMs: Date.now() - startTime };
      }
    }
  }

  return {
    error: lastError ?? new Error('All attempts exhausted'),
    attempts: attemptCount,
    totalElapsedMs: Date.now() - startTime,
  };
}

// -- Internal helpers --

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object';
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
  return isRecord(value) ? value : undefined;
}

function getStatusCode(error: unknown): number | undefined {
  const e = asRecord(error);
  if (!e) return undefined;
  if (typeof e.status === 'number') return e.status;
  if (typeof e.statusCode === 'number') return e.statusCode;
  const resp = asRecord(e.response);
  if (resp) {
    if (typeof resp.status === 'number') return resp.status;
    if (typeof resp.statusCode === 'number') return resp.statusCode;
  }
  return undefined;
}

function getHeader(error: unknown, name: string): string | undefined {
  const e = asRecord(error);
  if (!e) return undefined;
  // AI SDK errors carry `responseHeaders`; fetch-style errors carry `headers` or `response.headers`
  const candidates = [e.responseHeaders, e.headers, asRecord(e.response)?.headers];
  for (const headers of candidates) {
    if (headers instanceof Headers) {
      const value = headers.get(name);
      if (value) return value;
      continue;
    }
    const record = asRecord(headers);
    const value = record?.[name];
    if (typeof value === 'string' && value) return value;
  }
  return undefined;
}
