/**
 * Login Session Store Factory
 *
 * Same detection rules as the OAuth state store: Redis when configured,
 * memory for local development and tests.
 */

import type { LoginSessionStore } from '../interfaces/login-session-store.js';
import { MemoryLoginSessionStore } from '../stores/memory/memory-login-session-store.js';
import { RedisLoginSessionStore } from '../stores/redis/redis-login-session-store.js';
import type { StoreFactoryOptions } from './oauth-state-store-factory.js';
import { logger } from '../logger.js';

export class LoginSessionStoreFactory {
  static create(options: StoreFactoryOptions = {}): LoginSessionStore {
    const storeType = options.type ?? 'auto';
    const redisUrl = options.redisUrl ?? process.env.REDIS_URL;

    if (storeType === 'memory' || (storeType === 'auto' && !redisUrl)) {
      if (storeType === 'auto' && process.env.NODE_ENV === 'production') {
        throw new Error('Redis required for login session store in production. Set REDIS_URL environment variable.');
      }
      logger.info('Creating in-memory login session store', { detected: storeType === 'auto' });
      return new MemoryLoginSessionStore();
    }

    if (!redisUrl) {
      throw new Error('Redis URL not configured. Set REDIS_URL environment variable.');
    }

    logger.info('Creating Redis login session store', { detected: storeType === 'auto' });
    return new RedisLoginSessionStore(redisUrl, options.keyPrefix);
  }
}
