/**
 * Configuration Module
 * Unified access point for all configuration
 */

export { loadConfig, DEFAULT_CONFIG_FILE } from './loader';
export { ConfigSchema, ConfigValidationError } from './schema';
export type { AppConfig } from './schema';
