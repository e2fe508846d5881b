/**
 * handler-wrappers
 *
 * Declares, inherits and resolves the wrapper template that renders around
 * each handler action.
 *
 * @packageDocumentation
 */

// =============================================================================
// Config module
// =============================================================================
export {
  loadConfig,
  type WrappersConfig,
  type WrappersConfigOverrides,
  type WrappersEnvironment,
} from './config/index.js';

// =============================================================================
// Events module
// =============================================================================
export * from './events/index.js';

// =============================================================================
// Handler module
// =============================================================================
export * from './handler/index.js';

// =============================================================================
// Logging module
// =============================================================================
export {
  type ComponentLogger,
  createLogger,
  getRootLogger,
  isLogLevel,
  LOG_LEVELS,
  type LogFields,
  type LogLevel,
  logDebug,
  logError,
  logInfo,
  logTrace,
  logWarn,
  setLogLevel,
  setRootLogger,
} from './logging/index.js';

// =============================================================================
// Lookup module
// =============================================================================
export * from './lookup/index.js';

// =============================================================================
// Registry module
// =============================================================================
export * from './registry/index.js';

// =============================================================================
// Resolver module
// =============================================================================
export * from './resolver/index.js';

// =============================================================================
// Types module
// =============================================================================
export * from './types/index.js';
