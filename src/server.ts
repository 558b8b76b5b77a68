import { Server } from 'node:http';

import { createApp } from './app';
import { ServerConfig } from './config';
import { logger } from './utils/logger';

const app = createApp();
let server: Server;

// Graceful shutdown handler
const gracefulShutdown = (signal: string) => {
  logger.info(`Received ${signal}, shutting down gracefully...`);
  server.close(() => {
    logger.info('Server closed');
    // eslint-disable-next-line n/no-process-exit, unicorn/no-process-exit -- Intentional server shutdown
    process.exit(0);
  });

  // Force exit after the timeout (unref to not block process exit)
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    // eslint-disable-next-line n/no-process-exit, unicorn/no-process-exit -- Intentional forced shutdown
    process.exit(1);
  }, ServerConfig.shutdownTimeoutMs).unref();
};

try {
  server = app.listen(ServerConfig.port, ServerConfig.host, () => {
    logger.info('Server started', {
      host: ServerConfig.host,
      nodeEnv: process.env.NODE_ENV ?? 'development',
      port: ServerConfig.port,
    });
  });

  process.on('SIGTERM', () => {
    gracefulShutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    gracefulShutdown('SIGINT');
  });
} catch (error) {
  logger.error('Failed to start server', error);
  // eslint-disable-next-line n/no-process-exit, unicorn/no-process-exit -- Fatal startup error
  process.exit(1);
}
