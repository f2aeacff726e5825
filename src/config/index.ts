/**
 * Configuration module exports
 */

export {
  ConfigError,
  DEFAULT_CONFIG_PATH,
  buildDesiredState,
  loadDesiredState,
  parseDesiredState,
  type ConfigErrorCode,
  type LoadOptions,
} from './loader.js';
