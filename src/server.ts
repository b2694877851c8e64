// Load environment variables from .env file
import 'dotenv/config';

import { config } from './config/env';
import { logger, errorMeta } from './utils/logger';
import { createApp } from './app';
import { getCatalogServices, resetCatalogServices } from './services/catalog-services';

export const startServer = async (port: number = config.port): Promise<void> => {
  // Load the catalog and warm the index before accepting traffic
  await getCatalogServices();

  const app = createApp();

  const server = app.listen(port, () => {
    server.setTimeout(120_000);
    server.keepAliveTimeout = 65_000;
    server.headersTimeout = 70_000;

    logger.info('shelfwise service listening', { port, store: config.storage.backend });
  });

  server.on('clientError', (err: Error, socket) => {
    logger.debug('client connection error', { error: err.message });
    if (!socket.destroyed) {
      socket.end('HTTP/1.1 400 Bad Request\r\n\r\n');
    }
  });

  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info('shutting down service');

    const forceExitTimer = setTimeout(() => {
      logger.error('graceful shutdown timed out after 30s, forcing exit');
      process.exit(1);
    }, 30_000);
    forceExitTimer.unref();

    try {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
      logger.info('HTTP server closed, connections drained');
    } catch (error: unknown) {
      logger.error('HTTP server close failed', errorMeta(error));
    }

    try {
      await resetCatalogServices();
    } catch (error: unknown) {
      logger.error('service shutdown failed', errorMeta(error));
    }

    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
};

if (require.main === module) {
  startServer().catch((error: unknown) => {
    logger.error('service failed to start', errorMeta(error));
    process.exit(1);
  });
}
