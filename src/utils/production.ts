/**
 * Process lifecycle - graceful shutdown on signals and fatal errors
 */

import { createLogger } from './logger';

const logger = createLogger('production');

const FORCE_EXIT_MS = 30_000;

/**
 * Run `shutdownFn` once on SIGTERM, SIGINT or an uncaught exception, then exit.
 * The process is forced down if shutdown takes longer than 30 seconds.
 */
export function setupShutdownHandlers(shutdownFn: () => Promise<void>): void {
  let isShuttingDown = false;

  async function shutdown(signal: string): Promise<void> {
    if (isShuttingDown) {
      logger.warn({ signal }, 'Shutdown already in progress, ignoring duplicate signal');
      return;
    }
    isShuttingDown = true;
    logger.info({ signal }, 'Starting graceful shutdown');

    // Force exit if shutdown hangs
    const forceTimer = setTimeout(() => {
      logger.error('Shutdown timeout (30s) - forcing exit');
      process.exit(1);
    }, FORCE_EXIT_MS);
    forceTimer.unref();

    try {
      await shutdownFn();
      clearTimeout(forceTimer);
      logger.info('Graceful shutdown complete');
      process.exit(0);
    } catch (err) {
      clearTimeout(forceTimer);
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    }
  }

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  process.on('uncaughtException', (err) => {
    logger.fatal({ err }, 'Uncaught exception - shutting down');
    void shutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason) => {
    const err = reason instanceof Error ? reason : new Error(String(reason));
    logger.error({ err }, 'Unhandled rejection');
  });
}
