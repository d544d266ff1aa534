import { createServer } from 'http';

import { env } from './config/env.config';
import { logger } from './config/logger.config';
import { createApp } from './app';

const PORT = env.PORT;

const server = createServer(createApp());

server.listen(PORT, '0.0.0.0', () => {
  logger.info('League analytics backend started', {
    port: PORT,
    lineupStrategy: env.LINEUP_STRATEGY,
    healthCheck: `http://localhost:${PORT}/api/health`,
  });
});

// Graceful shutdown
let isShuttingDown = false;
const gracefulShutdown = () => {
  if (isShuttingDown) return;
  isShuttingDown = true;
  logger.info('Shutting down');

  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });

  // Force shutdown after 10 seconds
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 10000).unref();
};

process.on('SIGINT', gracefulShutdown);
process.on('SIGTERM', gracefulShutdown);

process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
  gracefulShutdown();
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection', { reason: String(reason) });
  gracefulShutdown();
});
