import { Redis } from 'ioredis';
import { logger } from '../observability/logger.js';

const CONNECT_TIMEOUT_MS = 5000;
const COMMAND_TIMEOUT_MS = 2000;
const MAX_CONNECT_RETRIES = 3;

let redisClient: Redis | null = null;
let isHealthy = false;

function createRedisClient(url: string): Redis {
  const client = new Redis(url, {
    connectTimeout: CONNECT_TIMEOUT_MS,
    commandTimeout: COMMAND_TIMEOUT_MS,
    retryStrategy: (times: number) => {
      if (times > MAX_CONNECT_RETRIES) {
        logger.error('redis_connection', 'Max retries exceeded, giving up', { times });
        return null;
      }
      const delay = Math.min(times * 200, 2000);
      logger.warn('redis_connection', 'Retrying connection', { times, delay });
      return delay;
    },
    maxRetriesPerRequest: 2,
    enableReadyCheck: true,
    lazyConnect: true,
  });

  client.on('ready', () => {
    logger.info('redis_lifecycle', 'Redis ready');
    isHealthy = true;
  });

  client.on('error', (error) => {
    logger.error('redis_lifecycle', 'Redis error', {
      error: error.message,
    });
    isHealthy = false;
  });

  client.on('close', () => {
    logger.warn('redis_lifecycle', 'Redis connection closed');
    isHealthy = false;
  });

  return client;
}

/**
 * Connect before the node starts serving so that the chain snapshot can be
 * loaded. Resolves to null (in-memory mode) when no URL is configured or the
 * first connection fails.
 */
export async function connectRedis(url: string | undefined): Promise<Redis | null> {
  if (!url) {
    logger.info('redis_initialization', 'REDIS_URL not provided, chain kept in memory only');
    return null;
  }

  const client = createRedisClient(url);
  try {
    await client.connect();
    redisClient = client;
    logger.info('redis_initialization', 'Redis client connected', { mode: 'persistent' });
    return client;
  } catch (error) {
    logger.error('redis_initialization', 'Failed to connect to Redis, continuing in memory', {
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    client.disconnect();
    return null;
  }
}

export function isRedisHealthy(): boolean {
  return redisClient !== null && isHealthy;
}

export async function shutdownRedis(): Promise<void> {
  if (redisClient) {
    logger.info('redis_shutdown', 'Shutting down Redis connection');
    await redisClient.quit();
    redisClient = null;
    isHealthy = false;
  }
}
