/**
 * @fileoverview Public API exports for @tapecache/logger
 * Structured stderr logging and fatal error handling
 */

export { createLogger, createChildLogger, createSilentLogger } from './createLogger.js';

export { attachGlobalHandlers, gracefulExit, resetGlobalHandlersForTesting } from './errorHandler.js';

export {
  generateRequestId,
  getRequestContext,
  getRequestId,
  withRequestContext,
  setRequestContext,
} from './request-context.js';

export { startTimer, measureAsync } from './perf-timer.js';

export type { Logger, LoggerConfig, LogLevel } from './types.js';
export type { RequestContext } from './request-context.js';
export type { PerfTimer } from './perf-timer.js';
