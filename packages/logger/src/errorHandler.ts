/**
 * @fileoverview Global error handlers for uncaught exceptions and unhandled rejections
 * Ensures fatal errors are logged before the process terminates.
 */

import type { Logger } from './types.js';

/**
 * Time allowed for transports to flush before a forced exit.
 */
const FLUSH_TIMEOUT_MS = 3000;

let handlersAttached = false;

/**
 * Attaches process-level handlers that log uncaught exceptions and
 * unhandled rejections with their stack, then exit with code 1.
 *
 * Calling it twice logs a warning and keeps the first registration.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(logger: Logger): void {
  if (handlersAttached) {
    logger.warn('Global error handlers already attached, skipping');
    return;
  }

  const uncaughtExceptionHandler = (error: Error) => {
    logger.error('Uncaught exception detected - process will exit', {
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack,
      },
      event: 'uncaughtException',
      fatal: true,
    });

    gracefulExit(logger, 1);
  };

  const unhandledRejectionHandler = (reason: unknown) => {
    const errorInfo =
      reason instanceof Error
        ? {
            name: reason.name,
            message: reason.message,
            stack: reason.stack,
          }
        : {
            message: String(reason),
          };

    logger.error('Unhandled promise rejection detected - process will exit', {
      error: errorInfo,
      event: 'unhandledRejection',
      fatal: true,
    });

    gracefulExit(logger, 1);
  };

  process.on('uncaughtException', uncaughtExceptionHandler);
  process.on('unhandledRejection', unhandledRejectionHandler);

  handlersAttached = true;

  logger.debug('Global error handlers attached', {
    handlers: ['uncaughtException', 'unhandledRejection'],
  });
}

/**
 * Ends the logger and exits once its transports finish, or after
 * FLUSH_TIMEOUT_MS, whichever comes first.
 *
 * @param exitCode - 0 success, 1 startup or fatal process error, 2 cache corruption
 */
export function gracefulExit(logger: Logger, exitCode: number): void {
  const timeoutId = setTimeout(() => {
    process.stderr.write(`[logger] Flush timeout expired (${FLUSH_TIMEOUT_MS}ms), forcing exit\n`);
    process.exit(exitCode);
  }, FLUSH_TIMEOUT_MS);

  logger.on('finish', () => {
    clearTimeout(timeoutId);
    process.exit(exitCode);
  });

  logger.end();
}

/**
 * Forget the registration flag. Only meant for tests.
 */
export function resetGlobalHandlersForTesting(): void {
  handlersAttached = false;
}
