import { INestApplicationContext, Logger } from '@nestjs/common';

/**
 * First SIGINT/SIGTERM aborts the running crawl so it can return its
 * partial report. A second one closes the application context and exits.
 */
export function setupGracefulShutdown(
  app: INestApplicationContext,
  controller: AbortController,
): void {
  const logger = new Logger('GracefulShutdown');

  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

  signals.forEach((signal) => {
    process.on(signal, async () => {
      if (!controller.signal.aborted) {
        logger.log(`${signal} received: cancelling the run...`);
        controller.abort();
        return;
      }

      logger.log(`${signal} received again: closing application...`);
      try {
        await app.close();
        logger.log('Application closed gracefully.');
        process.exit(130);
      } catch (err) {
        logger.error(`Error during graceful shutdown: ${String(err)}`);
        process.exit(1);
      }
    });
  });
}
