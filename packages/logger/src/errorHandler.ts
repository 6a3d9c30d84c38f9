/**
 * @fileoverview Process-level handlers for uncaught exceptions and unhandled
 * rejections. Errors are logged, then the process exits with code 1.
 */

import type { Logger } from './types.js';

/** Upper bound on waiting for transports to flush before exiting. */
const FLUSH_TIMEOUT_MS = 3000;

let handlersAttached = false;

/**
 * Attaches fail-fast handlers to the process.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'warn' });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(logger: Logger): void {
  if (handlersAttached) {
    logger.warn('Global error handlers already attached, skipping');
    return;
  }

  const uncaughtExceptionHandler = (error: Error): void => {
    logger.error('Uncaught exception detected - process will exit', {
      error: { name: error.name, message: error.message, stack: error.stack },
      event: 'uncaughtException',
      fatal: true,
    });
    gracefulExit(logger, 1);
  };

  const unhandledRejectionHandler = (reason: unknown): void => {
    const errorInfo =
      reason instanceof Error
        ? { name: reason.name, message: reason.message, stack: reason.stack }
        : { message: String(reason) };

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
 * Ends the logger and exits once it has flushed, or after FLUSH_TIMEOUT_MS.
 */
function gracefulExit(logger: Logger, exitCode: number): void {
  const timeoutId = setTimeout(() => {
    process.stderr.write(`[logger] flush timeout expired (${FLUSH_TIMEOUT_MS}ms), forcing exit\n`);
    process.exit(exitCode);
  }, FLUSH_TIMEOUT_MS);

  logger.on('finish', () => {
    clearTimeout(timeoutId);
    process.exit(exitCode);
  });

  logger.end();
}

/**
 * Flushes and closes a logger. Used by the CLI before returning its exit code.
 */
export function closeLogger(logger: Logger): Promise<void> {
  return new Promise((resolve) => {
    const timeoutId = setTimeout(resolve, FLUSH_TIMEOUT_MS);
    logger.on('finish', () => {
      clearTimeout(timeoutId);
      resolve();
    });
    logger.end();
  });
}
