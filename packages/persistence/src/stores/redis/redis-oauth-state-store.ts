/**
 * Redis-backed OAuth state store
 *
 * Shares pending authorizations between instances. Records expire through
 * Redis TTLs; consumption is a single Lua script so a state can be redeemed
 * only once even when two callbacks race.
 */

import type { Redis } from 'ioredis';
import type { OAuthStateStore } from '../../interfaces/oauth-state-store.js';
import { type OAuthState, serializeOAuthState, deserializeOAuthState, idPrefix } from '../../types.js';
import { PersistenceError, throwIfAborted } from '../../errors.js';
import { logger } from '../../logger.js';
import { createRedisClient, normalizeKeyPrefix } from './redis-utils.js';

const GET_AND_DELETE_SCRIPT = `
  local value = redis.call('GET', KEYS[1])
  if value then
    redis.call('DEL', KEYS[1])
  end
  return value
`;

export class RedisOAuthStateStore implements OAuthStateStore {
  private readonly redis: Redis;
  private readonly keyPrefix: string;

  constructor(redisUrl?: string, keyPrefix: string = '') {
    this.redis = createRedisClient(redisUrl, 'OAuth state');
    this.keyPrefix = `${normalizeKeyPrefix(keyPrefix)}oauth:state:`;

    logger.info('RedisOAuthStateStore initialized', { keyPrefix: this.keyPrefix });
  }

  async put(nonce: string, state: OAuthState, ttlSeconds: number, signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal);

    try {
      await this.redis.set(this.buildKey(nonce), serializeOAuthState(state), 'EX', ttlSeconds);
    } catch (error) {
      logger.oauthError?.('Failed to store OAuth state', { state: idPrefix(nonce), error });
      throw new PersistenceError('OAuth state storage failed', 'state.put', { cause: error });
    }

    logger.oauthDebug?.('Stored OAuth state in Redis', {
      state: idPrefix(nonce),
      provider: state.provider,
      ttl: ttlSeconds
    });
  }

  async consume(nonce: string, signal?: AbortSignal): Promise<OAuthState | null> {
    throwIfAborted(signal);

    let value: unknown;
    try {
      // eval(script, numKeys, key1, ...)
      value = await this.redis.eval(GET_AND_DELETE_SCRIPT, 1, this.buildKey(nonce));
    } catch (error) {
      logger.oauthError?.('Error during atomic OAuth state retrieval', { state: idPrefix(nonce), error });
      throw new PersistenceError('OAuth state retrieval failed', 'state.consume', { cause: error });
    }

    if (typeof value !== 'string') {
      logger.oauthWarn?.('OAuth state not found during consume (replay or expired)', {
        state: idPrefix(nonce)
      });
      return null;
    }

    const state = this.parse(value, nonce, 'state.consume');

    logger.oauthDebug?.('Consumed OAuth state from Redis', {
      state: idPrefix(nonce),
      provider: state.provider
    });

    return state;
  }

  async peek(nonce: string): Promise<OAuthState | null> {
    let value: string | null;
    try {
      value = await this.redis.get(this.buildKey(nonce));
    } catch (error) {
      throw new PersistenceError('OAuth state lookup failed', 'state.peek', { cause: error });
    }
    return value === null ? null : this.parse(value, nonce, 'state.peek');
  }

  async dispose(): Promise<void> {
    await this.redis.quit();
  }

  private parse(value: string, nonce: string, operation: 'state.consume' | 'state.peek'): OAuthState {
    try {
      return deserializeOAuthState(value);
    } catch (error) {
      logger.oauthError?.('Corrupt OAuth state record', { state: idPrefix(nonce), error });
      throw new PersistenceError('OAuth state record is corrupt', operation, { cause: error });
    }
  }

  private buildKey(nonce: string): string {
    return `${this.keyPrefix}${nonce}`;
  }
}
