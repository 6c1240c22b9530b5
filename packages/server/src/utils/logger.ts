/**
 * Logger Utility
 *
 * Scoped console logging with level filtering. Each line is prefixed with
 * `[scope]`. The minimum level comes from `configureLogging()` when set,
 * otherwise from the LOG_LEVEL environment variable (read on every call),
 * otherwise INFO.
 *
 * Usage:
 *   import { createLogger } from '../utils/logger.js';
 *   const logger = createLogger('activities');
 *   logger.info('Signed up');
 *   logger.error('Request failed', error);
 *
 * @module
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Supported log levels in ascending severity order.
 */
export type LogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

export interface Logger {
  /** Per-request outcomes that are not worth an INFO line (duplicates, misses) */
  debug(message: string, ...args: unknown[]): void;
  /** Roster changes, server start and stop */
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  /** Unexpected failures */
  error(message: string, ...args: unknown[]): void;
}

// ============================================================================
// Constants
// ============================================================================

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  ERROR: 3,
};

const DEFAULT_LOG_LEVEL: LogLevel = 'INFO';

const CONSOLE_METHODS: Record<LogLevel, 'debug' | 'log' | 'warn' | 'error'> = {
  DEBUG: 'debug',
  INFO: 'log',
  WARNING: 'warn',
  ERROR: 'error',
};

// ============================================================================
// Log Level Resolution
// ============================================================================

let configuredLevel: LogLevel | undefined;

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_VALUES, value);
}

/**
 * Parses a level name case-insensitively. WARN is accepted for WARNING.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) {
    return undefined;
  }
  const upper = value.trim().toUpperCase();
  if (upper === 'WARN') {
    return 'WARNING';
  }
  return isLogLevel(upper) ? upper : undefined;
}

/**
 * Pins the minimum level, overriding LOG_LEVEL. Pass undefined to go back
 * to the environment.
 */
export function configureLogging(options: { level?: LogLevel }): void {
  configuredLevel = options.level;
}

export function getLogLevel(): LogLevel {
  return configuredLevel ?? parseLogLevel(process.env.LOG_LEVEL) ?? DEFAULT_LOG_LEVEL;
}

function shouldLog(messageLevel: LogLevel): boolean {
  return LOG_LEVEL_VALUES[messageLevel] >= LOG_LEVEL_VALUES[getLogLevel()];
}

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Creates a logger whose lines start with `[scope]`.
 *
 * @example
 * ```ts
 * const logger = createLogger('activities');
 * logger.info('Signed up ada@example.edu for Chess Club');
 * // Output: [activities] Signed up ada@example.edu for Chess Club
 * ```
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;

  const emit = (level: LogLevel, message: string, args: unknown[]): void => {
    if (!shouldLog(level)) {
      return;
    }
    console[CONSOLE_METHODS[level]](prefix, message, ...args);
  };

  return {
    debug: (message, ...args) => emit('DEBUG', message, args),
    info: (message, ...args) => emit('INFO', message, args),
    warn: (message, ...args) => emit('WARNING', message, args),
    error: (message, ...args) => emit('ERROR', message, args),
  };
}
