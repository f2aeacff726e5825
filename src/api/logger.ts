/**
 * Structured logging with secret redaction
 *
 * Desired-state documents carry repository credentials, LDAP bind passwords
 * and user passwords; none of them may reach a log line in plaintext.
 * - Redacts sensitive headers (Authorization, NX-ANTI-CSRF-TOKEN, cookies)
 * - Redacts sensitive object keys at any depth
 * - Human-readable or JSON lines, written to stderr so stdout stays
 *   reserved for command output
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Log levels in order of severity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Structured log entry
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Additional context data */
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level to output (default: warn) */
  level?: LogLevel;
  /** Output as JSON lines (default: false) */
  json?: boolean;
  /** Include timestamps in human-readable output (default: true) */
  timestamps?: boolean;
  /** Where formatted lines go (default: stderr) */
  sink?: (line: string, level: LogLevel) => void;
}

// =============================================================================
// Constants
// =============================================================================

const SENSITIVE_PATTERNS = [
  // HTTP auth schemes
  /Basic\s+[a-zA-Z0-9+/=]{8,}/g,
  /Bearer\s+[a-zA-Z0-9._-]+/gi,

  // JWT tokens
  /eyJ[a-zA-Z0-9_-]*\.eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*/g,

  // PEM private keys
  /-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g,

  // Credentials embedded in URLs
  /(?<=:\/\/[^/\s:@]+:)[^@\s/]+(?=@)/g,
];

const SENSITIVE_HEADERS = new Set([
  'authorization',
  'proxy-authorization',
  'nx-anti-csrf-token',
  'cookie',
  'set-cookie',
]);

/**
 * Object keys (lowercased) whose values are redacted
 */
const SENSITIVE_KEYS = new Set([
  'password',
  'authpassword',
  'bearertoken',
  'token',
  'secret',
  'apikey',
  'api_key',
  'remote_password',
  'ldap_auth_password',
  'privatekey',
  'private_key',
  'authorization',
  'credentials',
]);

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const MAX_DEPTH = 10;

// =============================================================================
// Redaction Functions
// =============================================================================

/**
 * Redact a sensitive string, keeping the first and last 4 characters of long values
 *
 * @example
 * redactString('Basic dXNlcjpwYXNz') // 'Basi...YXNz'
 * redactString('short') // '[REDACTED]'
 */
export function redactString(value: string): string {
  if (!value || value.length < 10) {
    return '[REDACTED]';
  }
  return value.substring(0, 4) + '...' + value.substring(value.length - 4);
}

/**
 * Apply pattern-based redaction to a string
 */
export function redactPatterns(value: string): string {
  let result = value;
  for (const pattern of SENSITIVE_PATTERNS) {
    pattern.lastIndex = 0;
    result = result.replace(pattern, (match) => redactString(match));
  }
  return result;
}

/**
 * Deep copy of a value with sensitive keys and patterns redacted
 */
export function redactValue(value: unknown, depth = 0): unknown {
  if (depth > MAX_DEPTH) {
    return '[MAX_DEPTH]';
  }
  if (typeof value === 'string') {
    return redactPatterns(value);
  }
  if (Array.isArray(value)) {
    return value.map((entry) => redactValue(entry, depth + 1));
  }
  if (typeof value !== 'object' || value === null) {
    return value;
  }

  const result: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value)) {
    const lowerKey = key.toLowerCase();
    if (SENSITIVE_KEYS.has(lowerKey) || SENSITIVE_HEADERS.has(lowerKey)) {
      result[key] = child === null || child === undefined ? child : '[REDACTED]';
    } else {
      result[key] = redactValue(child, depth + 1);
    }
  }
  return result;
}

/**
 * Redact every sensitive value in a context record
 */
export function redactObject(context: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    const lowerKey = key.toLowerCase();
    result[key] =
      (SENSITIVE_KEYS.has(lowerKey) || SENSITIVE_HEADERS.has(lowerKey)) &&
      value !== null &&
      value !== undefined
        ? '[REDACTED]'
        : redactValue(value, 1);
  }
  return result;
}

/**
 * Redact sensitive headers from a Headers object or plain record
 */
export function redactHeaders(headers: Headers | Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  const entries: [string, string][] =
    headers instanceof Headers ? Array.from(headers.entries()) : Object.entries(headers);

  for (const [key, value] of entries) {
    result[key] = SENSITIVE_HEADERS.has(key.toLowerCase())
      ? redactString(value)
      : redactPatterns(value);
  }
  return result;
}

/**
 * Parse a log level name; unknown names yield undefined
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const lower = value?.toLowerCase();
  return LOG_LEVELS.find((level) => level === lower);
}

// =============================================================================
// Logger Class
// =============================================================================

function writeToStderr(line: string): void {
  process.stderr.write(line + '\n');
}

/**
 * Logger with JSON output and automatic secret redaction
 */
export class ApiLogger {
  private config: Required<LoggerConfig>;
  private readonly baseContext: Record<string, unknown>;

  constructor(config: LoggerConfig = {}, baseContext: Record<string, unknown> = {}) {
    this.config = {
      level: config.level ?? 'warn',
      json: config.json ?? false,
      timestamps: config.timestamps ?? true,
      sink: config.sink ?? writeToStderr,
    };
    this.baseContext = redactObject(baseContext);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private createEntry(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: redactPatterns(message),
    };

    const merged = { ...this.baseContext, ...(context ? redactObject(context) : {}) };
    if (Object.keys(merged).length > 0) {
      entry.context = merged;
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: redactPatterns(error.message),
        stack: error.stack ? redactPatterns(error.stack) : undefined,
      };
    }

    return entry;
  }

  formatEntry(entry: LogEntry): string {
    if (this.config.json) {
      return JSON.stringify(entry);
    }

    const parts: string[] = [];
    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp}]`);
    }
    parts.push(`[${entry.level.toUpperCase()}]`);
    parts.push(entry.message);

    if (entry.context) {
      parts.push(JSON.stringify(entry.context));
    }
    if (entry.error) {
      parts.push(`\n  Error: ${entry.error.name}: ${entry.error.message}`);
    }

    return parts.join(' ');
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): void {
    if (!this.isLevelEnabled(level)) return;
    this.config.sink(this.formatEntry(this.createEntry(level, message, context, error)), level);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  /**
   * Log an HTTP request (with redacted sensitive data)
   */
  request(
    method: string,
    url: string,
    options?: { headers?: Headers | Record<string, string>; body?: unknown }
  ): void {
    this.debug(`HTTP ${method} ${redactPatterns(url)}`, {
      headers: options?.headers ? redactHeaders(options.headers) : undefined,
      body: options?.body !== undefined ? redactValue(options.body) : undefined,
    });
  }

  /**
   * Log an HTTP response; 4xx/5xx at warn level
   */
  response(status: number, method: string, url: string, durationMs?: number): void {
    const level: LogLevel = status >= 400 ? 'warn' : 'debug';
    this.log(level, `HTTP ${status} ${method} ${redactPatterns(url)}`, { durationMs });
  }

  /**
   * Create a child logger that adds context to every entry
   */
  child(context: Record<string, unknown>): ApiLogger {
    return new ApiLogger(this.config, { ...this.baseContext, ...context });
  }

  setConfig(config: Partial<LoggerConfig>): void {
    Object.assign(this.config, config);
  }

  getConfig(): Required<LoggerConfig> {
    return { ...this.config };
  }
}

// =============================================================================
// Default Logger Instance
// =============================================================================

/**
 * Shared logger, configured from NEXUS_RECONCILE_LOG_LEVEL / NEXUS_RECONCILE_LOG_JSON
 */
export const logger = new ApiLogger({
  level: parseLogLevel(process.env.NEXUS_RECONCILE_LOG_LEVEL),
  json: process.env.NEXUS_RECONCILE_LOG_JSON === 'true',
});

export function createLogger(config: LoggerConfig = {}): ApiLogger {
  return new ApiLogger(config);
}
