/**
 * In-memory login session store
 *
 * WARNING: All sessions are lost on server restart and are not shared
 * between instances. Expired sessions are evicted on access and by a
 * periodic sweep.
 */

import { randomBytes } from 'node:crypto';
import type { CreatedSession, LoginSessionStore } from '../../interfaces/login-session-store.js';
import { idPrefix } from '../../types.js';
import { throwIfAborted } from '../../errors.js';
import { logger } from '../../logger.js';

interface Entry {
  subjectId: string;
  evictAt: number;
}

const DEFAULT_CLEANUP_INTERVAL_MS = 5 * 60 * 1000;

export class MemoryLoginSessionStore implements LoginSessionStore {
  private readonly sessions = new Map<string, Entry>();
  private cleanupInterval?: NodeJS.Timeout;

  constructor(cleanupIntervalMs: number = DEFAULT_CLEANUP_INTERVAL_MS) {
    logger.info('MemoryLoginSessionStore initialized');

    this.cleanupInterval = setInterval(() => this.cleanup(), cleanupIntervalMs);
    if (typeof this.cleanupInterval.unref === 'function') {
      this.cleanupInterval.unref();
    }
  }

  async create(subjectId: string, ttlSeconds: number, signal?: AbortSignal): Promise<CreatedSession> {
    throwIfAborted(signal);

    const sessionId = randomBytes(32).toString('hex');
    const evictAt = Date.now() + ttlSeconds * 1000;
    this.sessions.set(sessionId, { subjectId, evictAt });

    logger.debug('Login session created', {
      session: idPrefix(sessionId),
      ttl: ttlSeconds
    });

    return { sessionId, expiresAt: new Date(evictAt) };
  }

  async resolve(sessionId: string, ttlSeconds: number, signal?: AbortSignal): Promise<string | null> {
    throwIfAborted(signal);

    const entry = this.live(sessionId);
    if (!entry) {
      logger.debug('Login session not found', { session: idPrefix(sessionId) });
      return null;
    }

    entry.evictAt = Date.now() + ttlSeconds * 1000;
    return entry.subjectId;
  }

  async remainingExpiry(sessionId: string, signal?: AbortSignal): Promise<Date | null> {
    throwIfAborted(signal);

    const entry = this.live(sessionId);
    return entry ? new Date(entry.evictAt) : null;
  }

  /**
   * Drop every expired session
   * @returns number of sessions removed
   */
  cleanup(): number {
    const now = Date.now();
    let cleanedCount = 0;

    for (const [sessionId, entry] of this.sessions) {
      if (entry.evictAt <= now) {
        this.sessions.delete(sessionId);
        cleanedCount++;
      }
    }

    if (cleanedCount > 0) {
      logger.debug('Expired login sessions cleaned up', { cleanedCount, remainingCount: this.sessions.size });
    }
    return cleanedCount;
  }

  async dispose(): Promise<void> {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = undefined;
    }
    this.sessions.clear();
  }

  /**
   * @internal
   */
  get size(): number {
    return this.sessions.size;
  }

  private live(sessionId: string): Entry | undefined {
    const entry = this.sessions.get(sessionId);
    if (entry && entry.evictAt <= Date.now()) {
      this.sessions.delete(sessionId);
      logger.debug('Login session expired', { session: idPrefix(sessionId) });
      return undefined;
    }
    return entry;
  }
}
