/**
 * @fileoverview Type definitions for the tapecache logger
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Minimum severity written by a logger.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: false,
 *   filePath: './logs/tapecache.log'
 * };
 * ```
 */
export interface LoggerConfig {
  level: LogLevel;

  /**
   * JSON lines instead of the colorized pretty format.
   * @default true in production, false otherwise
   */
  json?: boolean;

  /** Optional log file, written in addition to stderr */
  filePath?: string;

  /**
   * Write to stderr. Query answers own stdout, so the console transport
   * never writes there.
   * @default true
   */
  console?: boolean;
}

/**
 * Re-export Winston's Logger type for convenience.
 */
export type Logger = WinstonLogger;
