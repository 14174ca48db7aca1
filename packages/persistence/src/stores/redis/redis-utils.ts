/**
 * Shared Redis utility functions
 *
 * Common functionality used across all Redis store implementations.
 */

import { Redis } from 'ioredis';
import { logger } from '../../logger.js';

/**
 * Mask sensitive parts of Redis URL for logging
 *
 * @param url Redis connection URL
 * @returns Masked URL with password replaced by ***
 */
export function maskRedisUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.password) {
      parsed.password = '***';
    }
    return parsed.toString();
  } catch {
    return 'redis://***';
  }
}

/**
 * Normalize a key namespace so it always ends in a colon (empty stays empty)
 */
export function normalizeKeyPrefix(prefix: string | undefined): string {
  if (!prefix) {
    return '';
  }
  return prefix.endsWith(':') ? prefix : `${prefix}:`;
}

/**
 * Create a configured Redis client with standard connection handling
 *
 * @param redisUrl Redis connection URL (optional, defaults to REDIS_URL env var)
 * @param connectionName Name for logging (e.g., "OAuth state", "login sessions")
 */
export function createRedisClient(redisUrl: string | undefined, connectionName: string): Redis {
  const url = redisUrl ?? process.env.REDIS_URL;
  if (!url) {
    throw new Error('Redis URL not configured. Set REDIS_URL environment variable.');
  }

  const redis = new Redis(url, {
    maxRetriesPerRequest: 3,
    connectTimeout: 5000,
    retryStrategy: (times) => Math.min(times * 50, 2000),
    lazyConnect: true,
  });

  redis.on('error', (error: unknown) => {
    logger.error('Redis connection error', { connection: connectionName, error });
  });

  redis.on('connect', () => {
    logger.info(`Redis connected successfully for ${connectionName}`, { url: maskRedisUrl(url) });
  });

  redis.connect().catch((error: unknown) => {
    logger.error('Failed to connect to Redis', { connection: connectionName, error });
  });

  return redis;
}
