// Process-level handlers for the CLI run

import { logger } from '../services/logger';
import { errorMessage } from '../utils/errors';

/**
 * Logs an unhandled rejection or uncaught exception and exits non-zero so a
 * half-finished run is never reported as success.
 */
export function installProcessHandlers(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.fatal('process:unhandled_rejection', {
      error: errorMessage(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
    process.exit(1);
  });

  process.on('uncaughtException', (error: Error) => {
    logger.fatal('process:uncaught_exception', { error: error.message, stack: error.stack });
    process.exit(1);
  });

  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
  signals.forEach((signal) => {
    process.on(signal, () => {
      logger.warn('process:signal', { signal });
      process.exit(130);
    });
  });
}
