/**
 * Configuration loading.
 *
 * Environment Variables:
 *   WRAPPERS_ROOT        - Conventional wrapper directory (default: "wrapperss")
 *   WRAPPERS_VIEW_PATHS  - Colon-separated view directories (default: "app/views")
 *   WRAPPERS_LOG_LEVEL   - Log level: trace, debug, info, warn, error, fatal, silent
 *   WRAPPERS_ENV         - Environment: development, test, production
 */

import { isLogLevel, type LogLevel } from './log-levels.js';
import { ConfigurationError } from '../registry/errors.js';
import { DEFAULT_WRAPPER_ROOT } from '../registry/naming.js';
import type { WrappersConfig, WrappersConfigOverrides, WrappersEnvironment } from './types.js';

const ENVIRONMENTS: readonly WrappersEnvironment[] = ['development', 'test', 'production'];

const DEFAULT_VIEW_PATHS = ['app/views'];

function isEnvironment(value: string): value is WrappersEnvironment {
  return (ENVIRONMENTS as readonly string[]).includes(value);
}

function parseEnvironment(value: string | undefined): WrappersEnvironment {
  if (value === undefined || value.length === 0) {
    return 'development';
  }
  if (!isEnvironment(value)) {
    throw new ConfigurationError(
      `Invalid WRAPPERS_ENV '${value}'. Expected one of: ${ENVIRONMENTS.join(', ')}`
    );
  }
  return value;
}

function parseLogLevel(value: string | undefined, environment: WrappersEnvironment): LogLevel {
  if (value === undefined || value.length === 0) {
    return environment === 'test' ? 'silent' : 'info';
  }
  const level = value.toLowerCase();
  if (!isLogLevel(level)) {
    throw new ConfigurationError(`Invalid WRAPPERS_LOG_LEVEL '${value}'`);
  }
  return level;
}

function parseViewPaths(value: string | undefined): string[] {
  if (value === undefined) {
    return [...DEFAULT_VIEW_PATHS];
  }
  return value
    .split(':')
    .map((path) => path.trim())
    .filter((path) => path.length > 0);
}

function parseWrapperRoot(value: string | undefined): string {
  const root = (value ?? DEFAULT_WRAPPER_ROOT).trim().replace(/^\/+|\/+$/g, '');
  if (root.length === 0) {
    throw new ConfigurationError('WRAPPERS_ROOT must be a non-empty path');
  }
  return root;
}

/**
 * Load configuration from the environment, then apply overrides.
 *
 * @param env - Environment variables (default: process.env)
 * @param overrides - Values that win over the environment
 * @throws ConfigurationError for an unknown environment or log level
 *
 * @example
 * ```typescript
 * const config = loadConfig(process.env, { viewPaths: ['views'] });
 * ```
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: WrappersConfigOverrides = {}
): WrappersConfig {
  const environment = overrides.environment ?? parseEnvironment(env.WRAPPERS_ENV);

  const config: WrappersConfig = {
    wrapperRoot: parseWrapperRoot(overrides.wrapperRoot ?? env.WRAPPERS_ROOT),
    viewPaths: overrides.viewPaths ? [...overrides.viewPaths] : parseViewPaths(env.WRAPPERS_VIEW_PATHS),
    logLevel: overrides.logLevel ?? parseLogLevel(env.WRAPPERS_LOG_LEVEL, environment),
    environment,
  };

  if (!isLogLevel(config.logLevel)) {
    throw new ConfigurationError(`Invalid log level '${String(config.logLevel)}'`);
  }

  return config;
}
