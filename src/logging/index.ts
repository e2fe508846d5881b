/**
 * Structured logging API.
 *
 * Thin layer over pino so every component logs with the same shape:
 * a message plus a flat object of structured fields. Each component builds
 * its logger once at module load with `createLogger({ component })`.
 */

import { type Level, type Logger, type LoggerOptions, pino } from 'pino';
import { loadConfig } from '../config/load-config.js';
import type { LogLevel } from '../config/log-levels.js';

/**
 * Structured logging fields.
 *
 * All fields are optional. Common fields include:
 * - component: Component/subsystem identifier (e.g., "registry", "resolver")
 * - operation: Operation being performed (e.g., "declare", "resolve")
 * - handler_class: Handler class the message is about
 * - action: Action name being rendered
 * - wrapper: Resolved wrapper identifier
 */
export interface LogFields {
  [key: string]: string | number | boolean | null | undefined;
}

export { isLogLevel, LOG_LEVELS, type LogLevel } from '../config/log-levels.js';

function buildRootLogger(): Logger {
  const config = loadConfig();
  const loggerOptions: LoggerOptions = {
    name: 'handler-wrappers',
    level: config.logLevel,
  };

  // Pretty output only for interactive development sessions
  if (config.environment === 'development') {
    loggerOptions.transport = {
      target: 'pino-pretty',
      options: { colorize: true },
    };
  }

  return pino(loggerOptions);
}

let rootLogger: Logger = buildRootLogger();

/**
 * Get the shared root logger.
 */
export function getRootLogger(): Logger {
  return rootLogger;
}

/**
 * Replace the shared root logger.
 *
 * Loggers created afterwards (and the module-level log functions) use the
 * new instance. Mostly useful to route output into a test destination.
 */
export function setRootLogger(logger: Logger): void {
  rootLogger = logger;
}

/**
 * Change the level of the shared root logger.
 */
export function setLogLevel(level: LogLevel): void {
  rootLogger.level = level;
}

function stripUndefined(fields?: LogFields): Record<string, string | number | boolean | null> {
  const result: Record<string, string | number | boolean | null> = {};
  if (!fields) {
    return result;
  }
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

function write(level: Level, message: string, fields?: LogFields): void {
  rootLogger[level](stripUndefined(fields), message);
}

/**
 * Log an ERROR level message with structured fields.
 *
 * @example
 * logError('Wrapper lookup failed', {
 *   component: 'resolver',
 *   handler_class: 'PostsHandler',
 * });
 */
export function logError(message: string, fields?: LogFields): void {
  write('error', message, fields);
}

/**
 * Log a WARN level message with structured fields.
 */
export function logWarn(message: string, fields?: LogFields): void {
  write('warn', message, fields);
}

/**
 * Log an INFO level message with structured fields.
 */
export function logInfo(message: string, fields?: LogFields): void {
  write('info', message, fields);
}

/**
 * Log a DEBUG level message with structured fields.
 */
export function logDebug(message: string, fields?: LogFields): void {
  write('debug', message, fields);
}

/**
 * Log a TRACE level message with structured fields.
 *
 * Used for per-resolution detail; disabled unless explicitly enabled.
 */
export function logTrace(message: string, fields?: LogFields): void {
  write('trace', message, fields);
}

/**
 * Logger with preset fields, as returned by {@link createLogger}.
 */
export interface ComponentLogger {
  error(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  debug(message: string, fields?: LogFields): void;
  trace(message: string, fields?: LogFields): void;
}

/**
 * Create a logger with preset fields.
 *
 * Useful for creating component-specific loggers that automatically
 * include common fields in every log message.
 *
 * @example
 * const logger = createLogger({ component: 'wrapper_registry' });
 * logger.debug('Declared wrapper', { handler_class: 'PostsHandler' });
 * // Logs: { component: 'wrapper_registry', handler_class: 'PostsHandler' }
 */
export function createLogger(defaultFields: LogFields): ComponentLogger {
  const mergeFields = (fields?: LogFields): LogFields => ({
    ...defaultFields,
    ...fields,
  });

  return {
    error: (message, fields) => logError(message, mergeFields(fields)),
    warn: (message, fields) => logWarn(message, mergeFields(fields)),
    info: (message, fields) => logInfo(message, mergeFields(fields)),
    debug: (message, fields) => logDebug(message, mergeFields(fields)),
    trace: (message, fields) => logTrace(message, mergeFields(fields)),
  };
}
