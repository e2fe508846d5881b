/**
 * Configuration types.
 */

import type { LogLevel } from './log-levels.js';

/**
 * Runtime environment.
 */
export type WrappersEnvironment = 'development' | 'test' | 'production';

/**
 * Configuration for wrapper resolution.
 */
export interface WrappersConfig {
  /** Conventional wrapper directory (default: "wrapperss"). */
  wrapperRoot: string;

  /** View directories searched by the filesystem lookup (default: ["app/views"]). */
  viewPaths: string[];

  /** Log level (default: "info", "silent" in test). */
  logLevel: LogLevel;

  /** Current environment (default: "development"). */
  environment: WrappersEnvironment;
}

/**
 * Explicit overrides merged on top of the environment.
 */
export type WrappersConfigOverrides = Partial<WrappersConfig>;
