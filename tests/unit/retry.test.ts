/**
 * Unit Tests: Retry with backoff
 */

import { describe, it, expect, vi } from 'vitest';
import {
  ApiRequestError,
  DEFAULT_RETRY_CONFIG,
  calculateDelay,
  isRetryableError,
  parseRetryAfter,
  withRetry,
} from '../../src/api/retry.js';
import { createLogger } from '../../src/api/logger.js';

const logger = createLogger({ level: 'error', sink: () => {} });
const noJitter = { ...DEFAULT_RETRY_CONFIG, baseDelayMs: 100, maxDelayMs: 1000, jitterFactor: 0 };

describe('withRetry', () => {
  it('retries a transient failure and returns the eventual result', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const fn = vi
      .fn(async () => 'ok')
      .mockRejectedValueOnce(new ApiRequestError('Nexus API error (503)', 503));

    const result = await withRetry(fn, { logger, sleep });

    expect(result).toMatchObject({ success: true, data: 'ok', attempts: 2 });
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('does not retry client errors', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const error = new ApiRequestError('Nexus API error (404)', 404);

    const result = await withRetry(() => Promise.reject(error), { logger, sleep });

    expect(result).toMatchObject({ success: false, error, attempts: 1 });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('gives up after the configured number of retries', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const fn = vi.fn(() => Promise.reject(new Error('connect ECONNREFUSED 127.0.0.1:8081')));

    const result = await withRetry(fn, { logger, sleep, maxRetries: 2 });

    expect(result.success).toBe(false);
    expect(result.attempts).toBe(3);
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('reports each retry through onRetry', async () => {
    const onRetry = vi.fn();
    const fn = vi
      .fn(async () => 1)
      .mockRejectedValueOnce(new ApiRequestError('Nexus API error (502)', 502));

    await withRetry(fn, { logger, sleep: async () => {}, onRetry, jitterFactor: 0, baseDelayMs: 10 });

    expect(onRetry).toHaveBeenCalledWith(1, expect.any(ApiRequestError), 10);
  });
});

describe('calculateDelay', () => {
  it('doubles the delay per attempt up to the maximum', () => {
    expect(calculateDelay(1, noJitter)).toBe(100);
    expect(calculateDelay(3, noJitter)).toBe(400);
    expect(calculateDelay(5, noJitter)).toBe(1000);
  });

  it('prefers Retry-After, capped at the maximum', () => {
    expect(calculateDelay(1, { ...noJitter, maxDelayMs: 30000 }, 5)).toBe(5000);
    expect(calculateDelay(1, noJitter, 5)).toBe(1000);
  });
});

describe('isRetryableError', () => {
  it('retries server errors, rate limits, timeouts and network failures', () => {
    expect(isRetryableError(new ApiRequestError('x', 429), DEFAULT_RETRY_CONFIG)).toBe(true);
    expect(isRetryableError(new ApiRequestError('x', 500), DEFAULT_RETRY_CONFIG)).toBe(true);
    expect(isRetryableError(new Error('fetch failed'), DEFAULT_RETRY_CONFIG)).toBe(true);

    const timeout = new Error('This operation was aborted');
    timeout.name = 'AbortError';
    expect(isRetryableError(timeout, DEFAULT_RETRY_CONFIG)).toBe(true);
  });

  it('does not retry other failures', () => {
    expect(isRetryableError(new ApiRequestError('x', 400), DEFAULT_RETRY_CONFIG)).toBe(false);
    expect(isRetryableError(new Error('Unexpected token'), DEFAULT_RETRY_CONFIG)).toBe(false);
  });
});

describe('parseRetryAfter', () => {
  it('reads seconds and ignores unusable values', () => {
    expect(parseRetryAfter('120')).toBe(120);
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
    expect(parseRetryAfter('Thu, 01 Jan 1970 00:00:00 GMT')).toBeUndefined();
  });
});
