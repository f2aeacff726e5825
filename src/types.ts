/**
 * Shared types for the nexus-reconcile CLI
 */

import type { ApiLogger } from './api/logger.js';
import type { ProFeatureMode } from './api/license.js';

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 */
export type GlobalOptions = {
  /** Desired-state YAML file */
  config: string;
  /** Server base URL (falls back to NEXUS_URL, then the settings file) */
  url?: string;
  /** Username (falls back to NEXUS_USERNAME, then the settings file) */
  username?: string;
  /** Don't apply changes, just show what would happen */
  dryRun: boolean;
  /** Output JSON for CI/automation */
  json: boolean;
  /** Resource type ids, categories or `repositories` to restrict the run to */
  only?: string[];
  /** Whether Pro-only resource types are reconciled */
  pro: ProFeatureMode;
  /** Enable verbose logging */
  verbose: boolean;
};

export type OutputFormat = 'human' | 'json';

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}

/**
 * Context passed to every command
 */
export interface CommandContext {
  options: GlobalOptions;
  outputFormat: OutputFormat;
  logger: ApiLogger;
}
