/**
 * @file Process entry point.
 */

import type { Server } from 'http';
import { loadConfig } from './config';
import { closeDatabase, connectDatabase, getDatabase } from './config/database';
import { logger, errorMessage } from './utils/logger';
import { createApp } from './app';
import { initializeCore, startBackgroundWork, stopBackgroundWork } from './startup';

async function main(): Promise<void> {
  const config = loadConfig();
  const db = await connectDatabase(config.mongo.uri, config.mongo.dbName);
  const core = await initializeCore(config, db);

  const app = createApp({
    scheduler: core.scheduler,
    health: async () => {
      let database = true;
      try {
        await getDatabase().command({ ping: 1 });
      } catch {
        database = false;
      }
      const checks = { database, deliveryWorker: core.worker.isRunning };
      return { status: database && checks.deliveryWorker ? 'healthy' : 'unhealthy', checks };
    },
  });

  const server: Server = app.listen(config.port, () => {
    logger.info(`[Server] Listening on port ${config.port}`);
  });

  await startBackgroundWork(core);

  const shutdown = (signal: string): void => {
    logger.info(`[Server] ${signal} received, shutting down`);
    stopBackgroundWork(core);
    server.close(() => {
      closeDatabase()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error(`[Server] Error closing database: ${errorMessage(error)}`);
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  logger.error(`[Server] Startup failed: ${errorMessage(error)}`);
  process.exit(1);
});
