/**
 * Shared Redis Client Factory
 * One Redis connection per process, used by the stats store.
 */

import { Redis } from 'ioredis';
import { logger } from '../logger/structured-logger.js';
import { withTimeout } from '../reliability/timeout-guard.js';

let redisClientInstance: Redis | null = null;

export interface RedisClientOptions {
  url: string;
  maxRetriesPerRequest?: number;
  connectTimeout?: number;
  commandTimeout?: number;
}

function redactUrl(url: string): string {
  return url.replace(/:[^:@]+@/, ':****@');
}

/**
 * Get or create the shared Redis client
 * @returns Redis client, or null if the connection fails (callers degrade to no stats)
 */
export async function getRedisClient(options: RedisClientOptions): Promise<Redis | null> {
  if (redisClientInstance) {
    return redisClientInstance;
  }

  const {
    url,
    maxRetriesPerRequest = 2,
    connectTimeout = 2000,
    commandTimeout = 2000,
  } = options;

  const useTls = url.startsWith('rediss://');
  const redis = new Redis(url, {
    maxRetriesPerRequest,
    connectTimeout,
    commandTimeout,
    retryStrategy: (times: number) => {
      if (times > maxRetriesPerRequest) return null;
      return Math.min(times * 100, 500);
    },
    lazyConnect: true,
    enableOfflineQueue: false,
    enableReadyCheck: true,
    ...(useTls && { tls: {} }),
  });

  redis.on('error', (err: Error) => {
    logger.warn({ event: 'redis_error', error: err.message }, '[Redis] Connection error (non-critical)');
  });

  try {
    await withTimeout(redis.connect(), connectTimeout, 'redis_connect');
    const pong = await redis.ping();
    if (pong !== 'PONG') {
      throw new Error(`Unexpected PING reply: ${pong}`);
    }

    logger.info({ event: 'redis_connected', redisUrl: redactUrl(url), useTls }, '[Redis] Shared client connected');
    redisClientInstance = redis;
    return redis;
  } catch (err) {
    logger.warn({
      event: 'redis_connection_failed',
      redisUrl: redactUrl(url),
      error: err instanceof Error ? err.message : String(err),
    }, '[Redis] Failed to connect, stats disabled');
    redis.disconnect();
    return null;
  }
}

/**
 * Close the Redis connection (for graceful shutdown)
 */
export async function closeRedisClient(): Promise<void> {
  if (!redisClientInstance) return;
  const client = redisClientInstance;
  redisClientInstance = null;
  await client.quit();
  logger.info({ event: 'redis_closed' }, '[Redis] Client connection closed');
}
