import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  calculateBackoff,
  isRateLimit,
  isRetryable,
  parseRetryAfter,
  withCanonicalRetry,
} from '../../../src/utils/retry.js';

describe('isRetryable', () => {
  it('accepts 5xx statuses in any of the usual fields', () => {
    expect(isRetryable({ status: 500 })).toBe(true);
    expect(isRetryable({ statusCode: 503 })).toBe(true);
    expect(isRetryable({ response: { status: 502 } })).toBe(true);
  });

  it('accepts network errors and timeouts', () => {
    expect(isRetryable(new Error('connect ETIMEDOUT 10.0.0.1:443'))).toBe(true);
    expect(isRetryable(new Error('read ECONNRESET'))).toBe(true);
    expect(isRetryable(new Error('connect ECONNREFUSED 127.0.0.1:443'))).toBe(true);
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';
    expect(isRetryable(timeout)).toBe(true);
  });

  it('rejects 4xx and plain errors', () => {
    expect(isRetryable({ status: 400 })).toBe(false);
    expect(isRetryable({ status: 429 })).toBe(false);
    expect(isRetryable(new Error('invalid api key'))).toBe(false);
  });
});

describe('isRateLimit', () => {
  it('detects 429 via status, statusCode and response.status', () => {
    expect(isRateLimit({ status: 429 })).toBe(true);
    expect(isRateLimit({ statusCode: 429 })).toBe(true);
    expect(isRateLimit({ response: { status: 429 } })).toBe(true);
    expect(isRateLimit({ status: 500 })).toBe(false);
  });
});

describe('parseRetryAfter', () => {
  it('reads seconds from plain header records', () => {
    expect(parseRetryAfter({ headers: { 'retry-after': '5' } })).toBe(5000);
  });

  it('reads AI SDK responseHeaders', () => {
    expect(parseRetryAfter({ statusCode: 429, responseHeaders: { 'retry-after': '2' } })).toBe(2000);
  });

  it('reads a Headers instance', () => {
    expect(parseRetryAfter({ headers: new Headers({ 'retry-after': '3' }) })).toBe(3000);
  });

  it('clamps to 60 seconds', () => {
    expect(parseRetryAfter({ headers: { 'retry-after': '120' } })).toBe(60_000);
    const farFuture = new Date(Date.now() + 300_000).toUTCString();
    expect(parseRetryAfter({ headers: { 'retry-after': farFuture } })).toBe(60_000);
  });

  it('returns 0 for a date in the past', () => {
    const past = new Date(Date.now() - 10_000).toUTCString();
    expect(parseRetryAfter({ headers: { 'retry-after': past } })).toBe(0);
  });

  it('returns undefined without the header', () => {
    expect(parseRetryAfter(new Error('no headers'))).toBeUndefined();
    expect(parseRetryAfter({ headers: { 'content-type': 'application/json' } })).toBeUndefined();
  });
});

describe('calculateBackoff', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('doubles per retry from the base delay', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0);
    expect(calculateBackoff(0)).toBe(1000);
    expect(calculateBackoff(1)).toBe(2000);
    expect(calculateBackoff(2)).toBe(4000);
  });

  it('caps the exponential part at 30x the base', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0);
    expect(calculateBackoff(10)).toBe(30_000);
    expect(calculateBackoff(10, 10)).toBe(300);
  });

  it('adds jitter below one base delay', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0.999);
    expect(calculateBackoff(0)).toBe(1999);
    expect(calculateBackoff(0, 10)).toBe(19);
  });
});

describe('withCanonicalRetry', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(Math, 'random').mockReturnValue(0);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('returns the first successful result', async () => {
    const fn = vi.fn().mockResolvedValue('success');
    const result = await withCanonicalRetry(fn);
    expect(result.result).toBe('success');
    expect(result.attempts).toBe(1);
    expect(result.error).toBeUndefined();
  });

  it('backs off and retries on 5xx', async () => {
    const serverError = Object.assign(new Error('Server Error'), { status: 500 });
    const fn = vi
      .fn()
      .mockRejectedValueOnce(serverError)
      .mockRejectedValueOnce(serverError)
      .mockResolvedValue('recovered');

    const promise = withCanonicalRetry(fn, { maxAttempts: 3 });
    await vi.advanceTimersByTimeAsync(1000);
    await vi.advanceTimersByTimeAsync(2000);

    const result = await promise;
    expect(result.result).toBe('recovered');
    expect(result.attempts).toBe(3);
  });

  it('fails immediately on a non-429 4xx', async () => {
    const fn = vi.fn().mockRejectedValue(Object.assign(new Error('Bad Request'), { status: 400 }));
    const result = await withCanonicalRetry(fn, { maxAttempts: 5 });
    expect(result.error?.message).toBe('Bad Request');
    expect(result.attempts).toBe(1);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('honours Retry-After on 429 without growing the backoff exponent', async () => {
    const rateLimited = Object.assign(new Error('Rate Limited'), {
      status: 429,
      responseHeaders: { 'retry-after': '2' },
    });
    const serverError = Object.assign(new Error('Server Error'), { status: 500 });
    const fn = vi
      .fn()
      .mockRejectedValueOnce(rateLimited)
      .mockRejectedValueOnce(serverError)
      .mockResolvedValue('ok');
    const onRetry = vi.fn();

    const promise = withCanonicalRetry(fn, { maxAttempts: 3, onRetry });
    await vi.advanceTimersByTimeAsync(2000);
    await vi.advanceTimersByTimeAsync(1000);

    const result = await promise;
    expect(result.result).toBe('ok');
    expect(onRetry).toHaveBeenNthCalledWith(1, 1, rateLimited, 2000);
    expect(onRetry).toHaveBeenNthCalledWith(2, 2, serverError, 1000);
  });

  it('stops at maxAttempts and reports the last error', async () => {
    const serverError = Object.assign(new Error('Server Error'), { status: 503 });
    const fn = vi.fn().mockRejectedValue(serverError);

    const promise = withCanonicalRetry(fn, { maxAttempts: 2, baseDelayMs: 10 });
    await vi.advanceTimersByTimeAsync(10);

    const result = await promise;
    expect(result.error).toBe(serverError);
    expect(result.attempts).toBe(2);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('never makes more than five calls', async () => {
    const fn = vi.fn().mockRejectedValue(Object.assign(new Error('down'), { status: 500 }));

    const promise = withCanonicalRetry(fn, { maxAttempts: 9, baseDelayMs: 1 });
    await vi.advanceTimersByTimeAsync(100);

    const result = await promise;
    expect(result.attempts).toBe(5);
    expect(fn).toHaveBeenCalledTimes(5);
  });

  it('gives up when the abort signal fires during a backoff', async () => {
    const controller = new AbortController();
    const fn = vi.fn().mockRejectedValue(Object.assign(new Error('down'), { status: 500 }));

    const promise = withCanonicalRetry(fn, { maxAttempts: 5, signal: controller.signal });
    await vi.advanceTimersByTimeAsync(500);
    controller.abort();

    const result = await promise;
    expect(result.attempts).toBe(1);
    expect(result.error?.message).toBe('down');
  });
});
