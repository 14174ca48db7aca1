/**
 * Redis-backed login session store
 *
 * Sessions are plain `key -> subjectId` strings with a TTL. Resolution reads
 * the value and resets the TTL in one Lua script.
 */

import { randomBytes } from 'node:crypto';
import type { Redis } from 'ioredis';
import type { CreatedSession, LoginSessionStore } from '../../interfaces/login-session-store.js';
import { idPrefix } from '../../types.js';
import { PersistenceError, throwIfAborted } from '../../errors.js';
import { logger } from '../../logger.js';
import { createRedisClient, normalizeKeyPrefix } from './redis-utils.js';

const GET_AND_REFRESH_SCRIPT = `
  local value = redis.call('GET', KEYS[1])
  if value then
    redis.call('PEXPIRE', KEYS[1], ARGV[1])
  end
  return value
`;

export class RedisLoginSessionStore implements LoginSessionStore {
  private readonly redis: Redis;
  private readonly keyPrefix: string;

  constructor(redisUrl?: string, keyPrefix: string = '') {
    this.redis = createRedisClient(redisUrl, 'login sessions');
    this.keyPrefix = `${normalizeKeyPrefix(keyPrefix)}session:`;

    logger.info('RedisLoginSessionStore initialized', { keyPrefix: this.keyPrefix });
  }

  async create(subjectId: string, ttlSeconds: number, signal?: AbortSignal): Promise<CreatedSession> {
    throwIfAborted(signal);

    const sessionId = randomBytes(32).toString('hex');
    // Taken before SET, so the reported expiry is never later than the key's
    const expiresAt = new Date(Date.now() + ttlSeconds * 1000);

    let reply: string | null;
    try {
      reply = await this.redis.set(this.buildKey(sessionId), subjectId, 'EX', ttlSeconds, 'NX');
    } catch (error) {
      logger.error('Failed to create login session', { session: idPrefix(sessionId), error });
      throw new PersistenceError('Session storage failed', 'session.create', { cause: error });
    }

    if (reply !== 'OK') {
      throw new PersistenceError('Session id collision', 'session.create');
    }

    logger.debug('Login session created', { session: idPrefix(sessionId), ttl: ttlSeconds });
    return { sessionId, expiresAt };
  }

  async resolve(sessionId: string, ttlSeconds: number, signal?: AbortSignal): Promise<string | null> {
    throwIfAborted(signal);

    let value: unknown;
    try {
      value = await this.redis.eval(GET_AND_REFRESH_SCRIPT, 1, this.buildKey(sessionId), ttlSeconds * 1000);
    } catch (error) {
      logger.error('Failed to resolve login session', { session: idPrefix(sessionId), error });
      throw new PersistenceError('Session lookup failed', 'session.resolve', { cause: error });
    }

    if (typeof value !== 'string') {
      logger.debug('Login session not found', { session: idPrefix(sessionId) });
      return null;
    }
    return value;
  }

  async remainingExpiry(sessionId: string, signal?: AbortSignal): Promise<Date | null> {
    throwIfAborted(signal);

    let ttlMs: number;
    try {
      ttlMs = await this.redis.pttl(this.buildKey(sessionId));
    } catch (error) {
      throw new PersistenceError('Session expiry lookup failed', 'session.expiry', { cause: error });
    }

    // -2: no such key, -1: key without expiry
    if (ttlMs === -2) {
      return null;
    }
    if (ttlMs < 0) {
      logger.error('Login session has no expiry', { session: idPrefix(sessionId) });
      throw new PersistenceError('Session has no expiry', 'session.expiry');
    }
    return new Date(Date.now() + ttlMs);
  }

  async dispose(): Promise<void> {
    await this.redis.quit();
  }

  private buildKey(sessionId: string): string {
    return `${this.keyPrefix}${sessionId}`;
  }
}
