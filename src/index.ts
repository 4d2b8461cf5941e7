import logger from 'jet-logger';
import { getEnv } from './config/env';
import { createServer } from './server';
import { createDefaultAgent } from './lib/ai';
import { closeRedisClient } from './lib/cache/redis-client';
import { errorMessage } from './lib/ai/core/errors';

// **** Run **** //

const startServer = () => {
  const env = getEnv();
  const agent = createDefaultAgent();
  const server = createServer(agent).listen(env.PORT, () => {
    logger.info(`Express server started on port: ${env.PORT}`);
  });

  // Graceful shutdown
  const gracefulShutdown = () => {
    logger.info('Shutting down gracefully...');
    server.close(() => {
      const closing = env.VARIABLE_STORE === 'redis' ? closeRedisClient() : Promise.resolve();
      closing.then(
        () => {
          logger.info('Connections closed successfully');
          process.exit(0);
        },
        (error: unknown) => {
          logger.err(`Error during shutdown: ${errorMessage(error)}`);
          process.exit(1);
        }
      );
    });
  };

  process.on('SIGTERM', gracefulShutdown);
  process.on('SIGINT', gracefulShutdown);
};

try {
  startServer();
} catch (error) {
  logger.err(`Failed to start server: ${errorMessage(error)}`);
  process.exit(1);
}
