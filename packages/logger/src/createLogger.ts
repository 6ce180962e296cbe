/**
 * @fileoverview Logger factory for tapecache
 * Creates Winston logger instances that keep stdout free for query answers.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, Logger, LogLevel } from './types.js';
import { standardFields, prettyPrint } from './formats.js';

/**
 * Every level the console transport may emit; all of them go to stderr.
 */
const STDERR_LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Creates a configured logger instance.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: false });
 * logger.info('Trade log loaded', { trades: 1200 });
 * ```
 *
 * @example
 * ```typescript
 * // JSON to stderr and a copy in a file
 * const logger = createLogger({
 *   level: 'debug',
 *   json: true,
 *   filePath: './logs/tapecache.log',
 * });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
  } = config;

  const consoleFormat = json ? format.json() : prettyPrint;

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: consoleFormat,
        stderrLevels: STDERR_LEVELS,
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        // Files never get ANSI colors
        format: format.json(),
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  // Winston complains about a logger with no transports
  const silent = transports.length === 0;

  return winston.createLogger({
    level,
    // Shared fields run once here; each transport picks its output layout
    format: standardFields,
    transports: silent ? [new winston.transports.Console({ silent: true })] : transports,
    // errorHandler.ts decides when the process exits
    exitOnError: false,
  });
}

/**
 * Creates a child logger whose entries carry `component` and any other
 * context fields.
 *
 * @example
 * ```typescript
 * const cacheLogger = createChildLogger(logger, { component: 'range-cache' });
 * cacheLogger.debug('Entry split', { range: '[0, 20)' });
 * ```
 */
export function createChildLogger(logger: Logger, context: Record<string, unknown>): Logger {
  return logger.child(context);
}

/**
 * Logger that discards everything; the default for library classes
 * constructed without one.
 */
export function createSilentLogger(): Logger {
  return createLogger({ level: 'error', console: false });
}
