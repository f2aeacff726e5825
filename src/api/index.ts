/**
 * Nexus API module
 *
 * Provides:
 * - NexusClient (fetch, basic auth, retry, redacted logging)
 * - ResourceApi with the per-category endpoint table
 * - Pro feature detection
 */

export {
  createClient,
  resolveConnection,
  loadSettingsFile,
  defaultSettingsPath,
  DEFAULT_BASE_URL,
  REST_PREFIX,
} from './client.js';
export type { NexusClient } from './client.js';

export { NexusResourceApi, isAlreadyAbsent, toDocuments } from './resources.js';
export type { ResourceApi } from './resources.js';

export { detectProFeature, resolveProFeature, PRO_FEATURE_MODES } from './license.js';
export type { ProFeatureMode } from './license.js';

export {
  withRetry,
  ApiRequestError,
  isNotFoundError,
  calculateDelay,
  isRetryableError,
  parseRetryAfter,
  sleep,
  DEFAULT_RETRY_CONFIG,
} from './retry.js';
export type { RetryOptions } from './retry.js';

export {
  logger,
  createLogger,
  ApiLogger,
  parseLogLevel,
  redactString,
  redactPatterns,
  redactObject,
  redactValue,
  redactHeaders,
} from './logger.js';
export type { LogLevel, LogEntry, LoggerConfig } from './logger.js';

export type {
  HttpMethod,
  RequestOptions,
  NexusClientConfig,
  NexusSettings,
  RetryConfig,
  RetryResult,
} from './types.js';
