/**
 * Configuration module.
 */

export { loadConfig } from './load-config.js';
export { isLogLevel, LOG_LEVELS, type LogLevel } from './log-levels.js';
export type { WrappersConfig, WrappersConfigOverrides, WrappersEnvironment } from './types.js';
