import { Server } from 'http';
import { createApp } from './app';
import { env } from '@/config/env';
import { dependencies } from '@/config/dependencies';
import { logger } from '@/adapters/logging/LoggerFactory';

/**
 * Server Entry Point
 * Starts the Express server and handles graceful shutdown
 */

let server: Server | undefined;

/**
 * Start the server
 */
function startServer(): void {
  const app = createApp(dependencies);

  server = app.listen(env.PORT, env.HOST, () => {
    logger.info({ host: env.HOST, port: env.PORT, env: env.NODE_ENV }, `Server running on http://${env.HOST}:${env.PORT}`);
    logger.info(`API endpoints available at http://${env.HOST}:${env.PORT}/api`);
    logger.info(`Docs: http://${env.HOST}:${env.PORT}/docs`);
  });

  server.on('error', (error: NodeJS.ErrnoException) => {
    if (error.code === 'EADDRINUSE') {
      logger.fatal(`Port ${env.PORT} is already in use`);
    } else {
      logger.fatal({ error }, 'Server error');
    }
    process.exit(1);
  });
}

/**
 * Graceful shutdown handler
 */
function gracefulShutdown(signal: string): void {
  logger.info(`${signal} received. Starting graceful shutdown...`);

  if (!server) {
    process.exit(0);
  }

  // Stop accepting new connections, let in-flight upstream calls finish
  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });

  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, env.SHUTDOWN_TIMEOUT_MS).unref();
}

/**
 * Process event handlers
 */
process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled Promise Rejection');
});

process.on('uncaughtException', (error) => {
  logger.fatal({ error }, 'Uncaught Exception');
  process.exit(1);
});

startServer();
