/**
 * Redis Client Singleton
 * Shared connection for the context-variable store
 */

import Redis from 'ioredis';
import logger from 'jet-logger';
import { getEnv } from '../../config/env';

let redisClient: Redis | null = null;

/**
 * Get or create Redis client instance
 */
export function getRedisClient(): Redis {
  if (!redisClient) {
    redisClient = new Redis(getEnv().REDIS_URL, {
      maxRetriesPerRequest: 3,
      enableReadyCheck: true,
      retryStrategy: (times: number) => Math.min(times * 50, 2000),
      // Reconnect after a failover leaves us on a replica
      reconnectOnError: (err) => err.message.includes('READONLY'),
    });

    redisClient.on('error', (err: Error) => {
      logger.err(`[Redis] Client error: ${err.message}`);
    });

    redisClient.on('connect', () => {
      logger.info('[Redis] Client connected');
    });
  }

  return redisClient;
}

/**
 * Close Redis connection
 */
export async function closeRedisClient(): Promise<void> {
  if (redisClient) {
    await redisClient.quit();
    redisClient = null;
  }
}
