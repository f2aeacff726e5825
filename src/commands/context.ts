/**
 * Command context creation from parsed CLI options
 */

import type { CommandContext, GlobalOptions } from '../types.js';
import { createLogger, parseLogLevel, type ApiLogger } from '../api/logger.js';
import { PRO_FEATURE_MODES, type ProFeatureMode } from '../api/license.js';
import { DEFAULT_CONFIG_PATH } from '../config/loader.js';

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function isProFeatureMode(value: unknown): value is ProFeatureMode {
  return PRO_FEATURE_MODES.some((mode) => mode === value);
}

/**
 * Read the global options out of commander's untyped option bag
 */
export function parseGlobalOptions(raw: Record<string, unknown>): GlobalOptions {
  const only = Array.isArray(raw.only)
    ? raw.only.filter((selector): selector is string => typeof selector === 'string')
    : undefined;

  return {
    config: optionalString(raw.config) ?? DEFAULT_CONFIG_PATH,
    url: optionalString(raw.url),
    username: optionalString(raw.username),
    dryRun: raw.dryRun === true,
    json: raw.json === true,
    only: only && only.length > 0 ? only : undefined,
    pro: isProFeatureMode(raw.pro) ? raw.pro : 'auto',
    verbose: raw.verbose === true,
  };
}

/**
 * Create the command context; verbose mode lowers the log level to debug
 * unless NEXUS_RECONCILE_LOG_LEVEL says otherwise
 */
export function createContext(
  options: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env
): CommandContext {
  const level =
    parseLogLevel(env.NEXUS_RECONCILE_LOG_LEVEL) ?? (options.verbose ? 'debug' : 'warn');
  const logger: ApiLogger = createLogger({
    level,
    json: env.NEXUS_RECONCILE_LOG_JSON === 'true',
  });

  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    logger,
  };
}
