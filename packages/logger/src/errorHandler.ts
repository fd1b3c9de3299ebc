/**
 * @fileoverview Process-level handlers for uncaught exceptions and
 * unhandled rejections. Both are logged as fatal and end the process.
 */

import type { Logger } from './types.js';

/**
 * Upper bound on waiting for transports to flush before exiting.
 */
const FLUSH_TIMEOUT_MS = 3000;

let detachCurrent: (() => void) | null = null;

/**
 * Summarizes a thrown value for structured logging.
 */
export function describeError(reason: unknown): Record<string, unknown> {
  if (reason instanceof Error) {
    return { name: reason.name, message: reason.message, stack: reason.stack };
  }
  return { message: String(reason) };
}

/**
 * Logs uncaught exceptions and unhandled rejections, then exits with code 1.
 * Process warnings are logged without exiting.
 *
 * Only one set of handlers is active at a time; a second call logs a
 * warning and returns the existing detach function.
 *
 * @returns Function removing the handlers
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(logger: Logger): () => void {
  if (detachCurrent) {
    logger.warn('Global error handlers already attached, skipping');
    return detachCurrent;
  }

  const onUncaughtException = (error: Error): void => {
    logger.error('Uncaught exception, exiting', {
      error: describeError(error),
      event: 'uncaughtException',
      fatal: true,
    });
    exitAfterFlush(logger, 1);
  };

  const onUnhandledRejection = (reason: unknown): void => {
    logger.error('Unhandled promise rejection, exiting', {
      error: describeError(reason),
      event: 'unhandledRejection',
      fatal: true,
    });
    exitAfterFlush(logger, 1);
  };

  const onWarning = (warning: Error): void => {
    logger.warn('Process warning', { warning: describeError(warning), event: 'warning' });
  };

  process.on('uncaughtException', onUncaughtException);
  process.on('unhandledRejection', onUnhandledRejection);
  process.on('warning', onWarning);

  const detach = (): void => {
    process.off('uncaughtException', onUncaughtException);
    process.off('unhandledRejection', onUnhandledRejection);
    process.off('warning', onWarning);
    detachCurrent = null;
  };
  detachCurrent = detach;

  logger.debug('Global error handlers attached');
  return detach;
}

function exitAfterFlush(logger: Logger, exitCode: number): void {
  const timeout = setTimeout(() => {
    console.error(`[logger] flush did not finish within ${FLUSH_TIMEOUT_MS}ms, exiting`);
    process.exit(exitCode);
  }, FLUSH_TIMEOUT_MS);

  logger.on('finish', () => {
    clearTimeout(timeout);
    process.exit(exitCode);
  });
  logger.end();
}
