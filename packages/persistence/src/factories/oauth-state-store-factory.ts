/**
 * OAuth State Store Factory
 *
 * Auto-detects the state store implementation based on environment:
 * - Redis: RedisOAuthStateStore (required for multi-instance deployments)
 * - Development/Test: MemoryOAuthStateStore (single-instance only)
 */

import type { OAuthStateStore } from '../interfaces/oauth-state-store.js';
import { MemoryOAuthStateStore } from '../stores/memory/memory-oauth-state-store.js';
import { RedisOAuthStateStore } from '../stores/redis/redis-oauth-state-store.js';
import { logger } from '../logger.js';

export type StoreType = 'memory' | 'redis' | 'auto';

export interface StoreFactoryOptions {
  /**
   * - 'auto': Redis when a URL is configured, memory otherwise outside production (default)
   * - 'memory': In-memory store (single instance)
   * - 'redis': Redis store
   */
  type?: StoreType;
  redisUrl?: string;
  keyPrefix?: string;
}

export class OAuthStateStoreFactory {
  static create(options: StoreFactoryOptions = {}): OAuthStateStore {
    const storeType = options.type ?? 'auto';

    switch (storeType) {
      case 'auto':
        return this.createAutoDetected(options);
      case 'memory':
        return new MemoryOAuthStateStore();
      case 'redis':
        return this.createRedisStore(options);
    }
  }

  private static createAutoDetected(options: StoreFactoryOptions): OAuthStateStore {
    const redisUrl = options.redisUrl ?? process.env.REDIS_URL;

    if (redisUrl) {
      logger.info('Creating Redis OAuth state store', { detected: true });
      return this.createRedisStore({ ...options, redisUrl });
    }

    if (process.env.NODE_ENV === 'production') {
      throw new Error('Redis required for OAuth state store in production. Set REDIS_URL environment variable.');
    }

    logger.info('Creating in-memory OAuth state store', { detected: true });
    logger.warn('Memory OAuth state store NOT suitable for multi-instance deployments', {
      recommendation: 'Configure REDIS_URL'
    });
    return new MemoryOAuthStateStore();
  }

  private static createRedisStore(options: StoreFactoryOptions): RedisOAuthStateStore {
    const redisUrl = options.redisUrl ?? process.env.REDIS_URL;
    if (!redisUrl) {
      throw new Error('Redis URL not configured. Set REDIS_URL environment variable.');
    }
    return new RedisOAuthStateStore(redisUrl, options.keyPrefix);
  }
}
