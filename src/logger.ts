/**
 * Prefixed console logger with numeric levels.
 *
 * Usage:
 *   import { createLogger } from './logger.ts';
 *   const log = createLogger('RecentStore');
 *   log.debug('Loaded entries', { count });
 *   log.warn('Bookmark is stale');
 *   log.error('Failed to save', error);
 */

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: Record<LogLevelName, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  child(prefix: string): Logger;
  setLevel(level: number): void;
}

let defaultLevel = getEnvironmentLevel();

function getEnvironmentLevel(): number {
  return process.env.NODE_ENV === 'development' ? LOG_LEVELS.debug : LOG_LEVELS.warn;
}

function shouldLog(current: number, threshold: number): boolean {
  return current >= threshold;
}

function formatMessage(prefix: string, message: string): string {
  return prefix ? `[${prefix}] ${message}` : message;
}

// Loggers without an explicit level follow the default, even when it changes later.
function makeLogger(prefix: string, level: number | undefined): Logger {
  let explicitLevel = level;
  const threshold = (): number => explicitLevel ?? defaultLevel;

  return {
    debug(message: string, ...args: unknown[]): void {
      if (shouldLog(LOG_LEVELS.debug, threshold())) {
        console.log(formatMessage(prefix, message), ...args);
      }
    },
    info(message: string, ...args: unknown[]): void {
      if (shouldLog(LOG_LEVELS.info, threshold())) {
        console.info(formatMessage(prefix, message), ...args);
      }
    },
    warn(message: string, ...args: unknown[]): void {
      if (shouldLog(LOG_LEVELS.warn, threshold())) {
        console.warn(formatMessage(prefix, message), ...args);
      }
    },
    error(message: string, ...args: unknown[]): void {
      if (shouldLog(LOG_LEVELS.error, threshold())) {
        console.error(formatMessage(prefix, message), ...args);
      }
    },
    child(childPrefix: string): Logger {
      return makeLogger(prefix ? `${prefix}:${childPrefix}` : childPrefix, explicitLevel);
    },
    setLevel(newLevel: number): void {
      explicitLevel = newLevel;
    },
  };
}

/**
 * Sets the level of every logger that has no level of its own.
 */
export function setDefaultLogLevel(level: LogLevelName): void {
  defaultLevel = LOG_LEVELS[level];
}

/**
 * Factory for module-specific loggers.
 *
 * @example
 * const log = createLogger('Main');
 * log.info('Opening file', filePath);
 */
export function createLogger(module: string): Logger {
  return makeLogger(module, undefined);
}
