/**
 * Retry with exponential backoff for the Nexus REST client
 *
 * - Exponential backoff with jitter
 * - Honors Retry-After on 429/503
 * - Retries network failures and 5xx, never other 4xx
 */

import type { RetryConfig, RetryResult } from './types.js';
import { logger, type ApiLogger } from './logger.js';

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.1,
  retryableStatuses: [429, 500, 502, 503, 504],
};

const NOT_FOUND_STATUS = 404;

const NETWORK_ERROR_PATTERNS = [
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'socket hang up',
  'fetch failed',
];

// =============================================================================
// Types
// =============================================================================

/**
 * Options for a retry operation
 */
export interface RetryOptions<T> extends RetryConfig {
  /** Custom logger instance */
  logger?: ApiLogger;
  /** Called before each retry attempt */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Custom function to determine if an error is retryable */
  isRetryable?: (error: Error) => boolean;
  /** Called when operation succeeds */
  onSuccess?: (result: T, attempts: number) => void;
  /** Wait implementation (replaced in tests) */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Error raised for a non-2xx HTTP response
 */
export class ApiRequestError extends Error {
  public readonly status: number;
  public readonly method?: string;
  public readonly url?: string;
  public readonly details?: Record<string, unknown>;
  public readonly retryAfter?: number;

  constructor(
    message: string,
    status: number,
    options: {
      method?: string;
      url?: string;
      details?: Record<string, unknown>;
      retryAfter?: number;
    } = {}
  ) {
    super(message);
    this.name = 'ApiRequestError';
    this.status = status;
    this.method = options.method;
    this.url = options.url;
    this.details = options.details;
    this.retryAfter = options.retryAfter;
  }

  isNotFound(): boolean {
    return this.status === NOT_FOUND_STATUS;
  }
}

/**
 * Check whether an error is an HTTP 404
 */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof ApiRequestError && error.isNotFound();
}

// =============================================================================
// Delay Calculation
// =============================================================================

/**
 * Calculate delay for a retry attempt
 *
 * @param attempt - The current attempt number (1-indexed)
 * @param retryAfter - Retry-After header value in seconds
 * @returns Delay in milliseconds
 */
export function calculateDelay(
  attempt: number,
  config: Required<RetryConfig>,
  retryAfter?: number
): number {
  if (retryAfter !== undefined && retryAfter > 0) {
    const jitter = Math.random() * config.baseDelayMs * config.jitterFactor;
    return Math.min(retryAfter * 1000 + jitter, config.maxDelayMs);
  }

  // baseDelay * 2^(attempt-1), +/- jitter
  const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt - 1);
  const jitter =
    Math.random() * exponentialDelay * config.jitterFactor * 2 -
    exponentialDelay * config.jitterFactor;

  return Math.min(Math.max(exponentialDelay + jitter, 0), config.maxDelayMs);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Retry Logic
// =============================================================================

/**
 * Check if an error is retryable based on configuration
 */
export function isRetryableError(error: Error, config: Required<RetryConfig>): boolean {
  if (error instanceof ApiRequestError) {
    return config.retryableStatuses.includes(error.status);
  }

  // Request timeout
  if (error.name === 'AbortError') {
    return true;
  }

  const message = error.message.toLowerCase();
  return NETWORK_ERROR_PATTERNS.some((pattern) => message.includes(pattern.toLowerCase()));
}

/**
 * Parse a Retry-After header value (seconds or HTTP-date)
 *
 * @returns Delay in seconds, or undefined if not parseable
 */
export function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined;

  const seconds = parseInt(value, 10);
  if (!isNaN(seconds) && seconds > 0) {
    return seconds;
  }

  const delayMs = new Date(value).getTime() - Date.now();
  if (!isNaN(delayMs) && delayMs > 0) {
    return Math.ceil(delayMs / 1000);
  }

  return undefined;
}

/**
 * Execute a function with retry logic
 *
 * @returns RetryResult with success/failure and metadata
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions<T> = {}
): Promise<RetryResult<T>> {
  const config: Required<RetryConfig> = {
    maxRetries: options.maxRetries ?? DEFAULT_RETRY_CONFIG.maxRetries,
    baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY_CONFIG.maxDelayMs,
    jitterFactor: options.jitterFactor ?? DEFAULT_RETRY_CONFIG.jitterFactor,
    retryableStatuses: options.retryableStatuses ?? DEFAULT_RETRY_CONFIG.retryableStatuses,
  };

  const log = options.logger ?? logger;
  const wait = options.sleep ?? sleep;
  const startTime = Date.now();
  let lastError: Error = new Error('Unknown error');

  for (let attempt = 1; attempt <= config.maxRetries + 1; attempt++) {
    try {
      const result = await fn();

      if (attempt > 1) {
        log.info(`Request succeeded after ${attempt} attempts`, { attempts: attempt });
      }
      options.onSuccess?.(result, attempt);

      return {
        success: true,
        data: result,
        attempts: attempt,
        totalTimeMs: Date.now() - startTime,
      };
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      const retryable = options.isRetryable
        ? options.isRetryable(lastError)
        : isRetryableError(lastError, config);
      const isLastAttempt = attempt > config.maxRetries;

      if (!retryable || isLastAttempt) {
        if (retryable && config.maxRetries > 0) {
          log.warn(`All ${config.maxRetries} retry attempts exhausted`, {
            error: lastError.message,
            attempts: attempt,
          });
        }

        return {
          success: false,
          error: lastError,
          attempts: attempt,
          totalTimeMs: Date.now() - startTime,
        };
      }

      const retryAfter = lastError instanceof ApiRequestError ? lastError.retryAfter : undefined;
      const delayMs = calculateDelay(attempt, config, retryAfter);

      log.info(`Retry attempt ${attempt}/${config.maxRetries} in ${Math.round(delayMs)}ms`, {
        error: lastError.message,
        status: lastError instanceof ApiRequestError ? lastError.status : undefined,
      });
      options.onRetry?.(attempt, lastError, delayMs);

      await wait(delayMs);
    }
  }

  return {
    success: false,
    error: lastError,
    attempts: config.maxRetries + 1,
    totalTimeMs: Date.now() - startTime,
  };
}
