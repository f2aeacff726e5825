/**
 * Nexus REST client
 *
 * Thin typed wrapper over fetch:
 * - Basic authentication
 * - Retry with exponential backoff, Retry-After on 429/503
 * - Request timeout through AbortController
 * - Debug logging with secret redaction
 */

import type { HttpMethod, NexusClientConfig, NexusSettings, RequestOptions } from './types.js';
import { withRetry, ApiRequestError, parseRetryAfter, type RetryOptions } from './retry.js';
import { logger, ApiLogger } from './logger.js';
import { isPlainObject } from '../engine/document.js';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';

// =============================================================================
// Types
// =============================================================================

/**
 * Low-level client shared by the resource API and the license probe
 */
export interface NexusClient {
  /**
   * Issue a request against `<baseUrl>/service/rest<path>`.
   * Resolves with the parsed JSON body, the raw text for non-JSON bodies,
   * or undefined for empty responses.
   *
   * @throws ApiRequestError for non-2xx responses (after retries)
   */
  request(method: HttpMethod, path: string, options?: RequestOptions): Promise<unknown>;

  /** Current configuration, secrets omitted */
  getConfig(): { baseUrl: string; username?: string; hasPassword: boolean };
}

export const DEFAULT_BASE_URL = 'http://localhost:8081';
export const DEFAULT_TIMEOUT_MS = 30000;
export const REST_PREFIX = '/service/rest';

// =============================================================================
// Configuration Resolution
// =============================================================================

export function defaultSettingsPath(): string {
  return path.join(os.homedir(), '.nexus-reconcile', 'settings.json');
}

/**
 * Load ~/.nexus-reconcile/settings.json; a missing file yields null
 *
 * @throws Error when the file exists but is not valid JSON
 */
export function loadSettingsFile(settingsPath: string = defaultSettingsPath()): NexusSettings | null {
  if (!fs.existsSync(settingsPath)) {
    return null;
  }
  const content = fs.readFileSync(settingsPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new Error(
      `Invalid settings file ${settingsPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  if (!isPlainObject(parsed)) {
    return null;
  }

  const env = parsed.env;
  if (!isPlainObject(env)) {
    return {};
  }
  const pick = (key: string): string | undefined => {
    const value = env[key];
    return typeof value === 'string' ? value : undefined;
  };
  return {
    env: {
      NEXUS_URL: pick('NEXUS_URL'),
      NEXUS_USERNAME: pick('NEXUS_USERNAME'),
      NEXUS_PASSWORD: pick('NEXUS_PASSWORD'),
    },
  };
}

interface ResolvedConnection {
  baseUrl: string;
  username?: string;
  password?: string;
}

/**
 * Resolve connection settings: explicit config, then environment, then settings file
 */
export function resolveConnection(
  config: NexusClientConfig,
  env: NodeJS.ProcessEnv = process.env,
  settingsPath?: string
): ResolvedConnection {
  const needsSettings =
    !(config.baseUrl ?? env.NEXUS_URL) ||
    !(config.username ?? env.NEXUS_USERNAME) ||
    !(config.password ?? env.NEXUS_PASSWORD);
  const settings = needsSettings ? loadSettingsFile(settingsPath)?.env : undefined;

  const baseUrl = config.baseUrl ?? env.NEXUS_URL ?? settings?.NEXUS_URL ?? DEFAULT_BASE_URL;

  return {
    baseUrl: baseUrl.replace(/\/+$/, ''),
    username: config.username ?? env.NEXUS_USERNAME ?? settings?.NEXUS_USERNAME,
    password: config.password ?? env.NEXUS_PASSWORD ?? settings?.NEXUS_PASSWORD,
  };
}

function extractErrorMessage(status: number, body: string): string {
  const fallback = `Nexus API error (${status})`;
  if (!body) return fallback;

  try {
    const parsed: unknown = JSON.parse(body);
    // Validation failures come back as [{ id, message }]
    if (Array.isArray(parsed)) {
      const messages = parsed
        .map((entry: unknown) =>
          typeof entry === 'object' && entry !== null && 'message' in entry
            ? String(entry.message)
            : undefined
        )
        .filter((message): message is string => message !== undefined);
      if (messages.length > 0) return `${fallback}: ${messages.join('; ')}`;
    }
    if (typeof parsed === 'object' && parsed !== null && 'message' in parsed) {
      return `${fallback}: ${String(parsed.message)}`;
    }
  } catch {
    // Plain-text error body
  }
  return `${fallback}: ${body.substring(0, 200)}`;
}

function parseDetails(body: string): Record<string, unknown> | undefined {
  try {
    const parsed: unknown = JSON.parse(body);
    return typeof parsed === 'object' && parsed !== null ? { body: parsed } : undefined;
  } catch {
    return undefined;
  }
}

// =============================================================================
// Client Implementation
// =============================================================================

/**
 * Create a Nexus client with retry and logging
 */
export function createClient(
  config: NexusClientConfig = {},
  options: { env?: NodeJS.ProcessEnv; settingsPath?: string; logger?: ApiLogger } = {}
): NexusClient {
  const { baseUrl, username, password } = resolveConnection(config, options.env, options.settingsPath);
  const timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;
  const log =
    options.logger ?? (config.debug ? logger.child({ component: 'http' }) : new ApiLogger({ level: 'warn' }));

  const defaultHeaders: Record<string, string> = {
    Accept: 'application/json',
    'User-Agent': config.userAgent ? `nexus-reconcile ${config.userAgent}` : 'nexus-reconcile',
  };
  if (username !== undefined && password !== undefined) {
    defaultHeaders['Authorization'] =
      `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
  }

  async function request(
    method: HttpMethod,
    requestPath: string,
    requestOptions: RequestOptions = {}
  ): Promise<unknown> {
    const url = new URL(`${baseUrl}${REST_PREFIX}${requestPath}`);
    for (const [key, value] of Object.entries(requestOptions.params ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }

    // String bodies (PEM certificates) are sent verbatim
    const isText = typeof requestOptions.body === 'string';
    const headers: Record<string, string> = { ...defaultHeaders };
    if (requestOptions.body !== undefined) {
      headers['Content-Type'] = isText ? 'text/plain' : 'application/json';
    }
    Object.assign(headers, requestOptions.headers);
    const body =
      requestOptions.body === undefined
        ? undefined
        : typeof requestOptions.body === 'string'
          ? requestOptions.body
          : JSON.stringify(requestOptions.body);

    log.request(method, url.toString(), { headers, body: requestOptions.body });

    const makeRequest = async (): Promise<unknown> => {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeout);

      try {
        const startTime = Date.now();
        const response = await fetch(url.toString(), {
          method,
          headers,
          body,
          signal: controller.signal,
        });
        log.response(response.status, method, url.toString(), Date.now() - startTime);

        const text = await response.text();

        if (!response.ok) {
          throw new ApiRequestError(extractErrorMessage(response.status, text), response.status, {
            method,
            url: url.toString(),
            details: parseDetails(text),
            retryAfter: parseRetryAfter(response.headers.get('Retry-After')),
          });
        }

        return parseBody(text, response.headers.get('Content-Type'));
      } finally {
        clearTimeout(timeoutId);
      }
    };

    if (requestOptions.skipRetry) {
      return makeRequest();
    }

    const retryOptions: RetryOptions<unknown> = { ...config.retry, logger: log };
    const result = await withRetry(makeRequest, retryOptions);

    if (!result.success) {
      throw result.error ?? new Error(`${method} ${requestPath} failed`);
    }
    return result.data;
  }

  return {
    request,
    getConfig() {
      return { baseUrl, username, hasPassword: password !== undefined };
    },
  };
}

function parseBody(text: string, contentType: string | null): unknown {
  if (text.length === 0) {
    return undefined;
  }
  if (contentType?.includes('json')) {
    return JSON.parse(text);
  }
  return text;
}
