import { Application } from 'express';
import { Server } from 'http';
import { toError } from '../errors/AppError';
import { Logger } from '../utils/logger';

/**
 * Listen on the configured port and close cleanly on SIGTERM/SIGINT.
 * `onClose` releases process-wide resources such as the pg pool.
 */
export function startServer(
  app: Application,
  port: number,
  logger: Logger,
  onClose: () => Promise<void>
): Server {
  const server = app.listen(port, () => {
    logger.info('Server listening', { port });
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down gracefully', { signal });
    server.close(() => {
      onClose().then(
        () => {
          logger.info('Server closed');
          process.exit(0);
        },
        (error: unknown) => {
          logger.error('Error releasing resources', toError(error));
          process.exit(1);
        }
      );
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  return server;
}
