/**
 * Configuration Module
 *
 * Exports all configuration-related types, classes, and utilities.
 */

export type { CliOverrides, LogFormat, ServerConfig } from './types.js';

export { DEFAULT_CONFIG, VALID_LOG_LEVELS, VALID_LOG_FORMATS } from './types.js';

export { ConfigError, ConfigLoadError, ConfigValidationError } from './errors.js';

export { ConfigManager } from './manager.js';

export type { ConfigManagerOptions } from './manager.js';
