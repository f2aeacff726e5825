/**
 * Request, configuration and retry types for the Nexus REST client
 */

// =============================================================================
// Common Types
// =============================================================================

/**
 * HTTP methods used against the API
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * Per-request options
 */
export interface RequestOptions {
  /** Query parameters */
  params?: Record<string, string | number | boolean | undefined>;
  /** Request body (JSON serialized) */
  body?: unknown;
  /** Additional headers */
  headers?: Record<string, string>;
  /** Skip retry logic for this request */
  skipRetry?: boolean;
}

// =============================================================================
// Client Configuration
// =============================================================================

/**
 * Client configuration options
 */
export interface NexusClientConfig {
  /** Server base URL, e.g. https://nexus.example.com */
  baseUrl?: string;
  /** Basic-auth user */
  username?: string;
  /** Basic-auth password */
  password?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Enable debug logging */
  debug?: boolean;
  /** Custom user agent suffix */
  userAgent?: string;
  /** Retry overrides */
  retry?: RetryConfig;
}

/**
 * Settings file structure (~/.nexus-reconcile/settings.json)
 */
export interface NexusSettings {
  env?: {
    NEXUS_URL?: string;
    NEXUS_USERNAME?: string;
    NEXUS_PASSWORD?: string;
  };
}

// =============================================================================
// Retry Configuration
// =============================================================================

/**
 * Retry configuration options
 */
export interface RetryConfig {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Base delay in milliseconds (default: 1000) */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs?: number;
  /** Jitter factor (0-1) to add randomness (default: 0.1) */
  jitterFactor?: number;
  /** HTTP status codes to retry on (default: [429, 500, 502, 503, 504]) */
  retryableStatuses?: number[];
}

/**
 * Result of a retry operation
 */
export interface RetryResult<T> {
  /** Whether the operation succeeded */
  success: boolean;
  /** The result data (if successful) */
  data?: T;
  /** The error (if failed) */
  error?: Error;
  /** Number of attempts made */
  attempts: number;
  /** Total time spent on retries (ms) */
  totalTimeMs: number;
}
