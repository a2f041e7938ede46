/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - SERVER ENTRY POINT
 * ============================================================================
 */

import type { Server } from 'http';
import { App } from './app';
import { config } from './config/config';
import { databaseManager } from './config/database';
import logger, { errorMessage } from './config/logger';
import { startJobs, type JobScheduler } from './jobs';
import { setupGlobalErrorHandlers } from './middleware/errorHandler';
import { createPostgresServices } from './services';

let server: Server | null = null;
let jobs: JobScheduler | null = null;

async function main(): Promise<void> {
  setupGlobalErrorHandlers();

  logger.info('Starting telehealth scheduler', {
    environment: config.env,
    nodeVersion: process.version,
    pid: process.pid,
  });

  await databaseManager.connect();

  const services = createPostgresServices(databaseManager.pool);
  const { app } = new App({
    services,
    healthCheck: () => databaseManager.healthCheck(),
  });

  jobs = startJobs(services);

  const port = config.server.port;
  server = app.listen(port, () => {
    logger.info('API server started', {
      port,
      environment: config.env,
      health: `http://localhost:${port}/api/health`,
    });
  });

  server.on('error', (error: NodeJS.ErrnoException) => {
    if (error.code === 'EADDRINUSE' || error.code === 'EACCES') {
      logger.error(`Port ${port} is unavailable`, { code: error.code });
      process.exit(1);
    }
    logger.error('HTTP server error', { error: error.message });
  });
}

/**
 * Graceful shutdown
 */
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down gracefully`);

  jobs?.stopAll();

  if (server) {
    const closing = server;
    await new Promise<void>((resolve, reject) => {
      closing.close((error) => (error ? reject(error) : resolve()));
    });
    logger.info('HTTP server closed');
  }

  await databaseManager.disconnect();
  logger.info('Server shut down gracefully');
}

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((error) => {
        logger.error('Error during shutdown', { error: errorMessage(error) });
        process.exit(1);
      });
  });
}

if (require.main === module) {
  main().catch((error) => {
    logger.error('Failed to start telehealth scheduler', { error: errorMessage(error) });
    process.exit(1);
  });
}

export default main;
