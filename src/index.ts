/**
 * Tactical Pattern Engine - Entry Point
 */

// Load environment variables FIRST, before any other imports
import 'dotenv/config';

import app from './app.js';
import { config, validateConfig } from './config/index.js';
import { logger } from './utils/logger.js';

const startServer = () => {
  validateConfig();

  logger.info(
    {
      nodeEnv: config.nodeEnv,
      port: config.port,
      scoringSelection: config.scoringSelection,
      scoringAggregation: config.scoringAggregation,
      geometryCache: config.geometryCache,
    },
    'Starting Tactical Pattern Engine'
  );

  const server = app.listen(config.port, () => {
    logger.info(`Server running on port ${config.port}`);
    logger.info(`Health check: http://localhost:${config.port}/api/v1/health`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal');

    server.close((error) => {
      if (error) {
        logger.error({ error }, 'Error closing HTTP server');
        process.exit(1);
      }
      logger.info('HTTP server closed');
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  // Handle uncaught errors
  process.on('uncaughtException', (error) => {
    logger.fatal({ error }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
  });
};

try {
  startServer();
} catch (error) {
  logger.fatal({ error }, 'Failed to start server');
  process.exit(1);
}
