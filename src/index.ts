import { createApp } from './app';
import { env } from './config/environment';
import { logger } from './config/logger';
import { closeConnection, getSupabaseClient, testConnection } from './config/database';
import { createSupabaseRepositories } from './repositories';
import { createServices } from './services';

/**
 * Application Entry Point
 *
 * Starts the Express server and handles graceful shutdown
 */

const SHUTDOWN_TIMEOUT_MS = 10000;

async function startServer(): Promise<void> {
  if (!(await testConnection())) {
    throw new Error('Database connection failed');
  }

  const services = createServices(createSupabaseRepositories(getSupabaseClient()));
  const app = createApp(services);

  const server = app.listen(env.PORT, () => {
    logger.info(`Store API listening on http://localhost:${env.PORT}`, {
      environment: env.NODE_ENV,
      docs: `http://localhost:${env.PORT}/docs`,
      health: `http://localhost:${env.PORT}/health`,
    });
  });

  const gracefulShutdown = (signal: string) => {
    logger.info(`${signal} received, starting graceful shutdown...`);

    server.close(() => {
      closeConnection();
      logger.info('HTTP server closed');
      process.exit(0);
    });

    // Force shutdown when open connections do not drain in time
    setTimeout(() => {
      logger.error('Could not close connections in time, forcefully shutting down');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
    gracefulShutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled Rejection', { reason });
    gracefulShutdown('unhandledRejection');
  });
}

startServer().catch((error: unknown) => {
  logger.error('Failed to start server', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
