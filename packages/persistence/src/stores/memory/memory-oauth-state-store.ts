/**
 * In-memory OAuth state store
 *
 * Single-instance only: a callback that lands on another instance will not
 * find its state. Expired records are evicted on access and by a periodic
 * sweep, so abandoned flows do not accumulate.
 */

import type { OAuthStateStore } from '../../interfaces/oauth-state-store.js';
import { type OAuthState, idPrefix } from '../../types.js';
import { throwIfAborted } from '../../errors.js';
import { logger } from '../../logger.js';

interface Entry {
  state: OAuthState;
  evictAt: number;
}

const DEFAULT_CLEANUP_INTERVAL_MS = 60 * 1000;

function copyState(state: OAuthState): OAuthState {
  return { ...state, createdAt: new Date(state.createdAt), expiresAt: new Date(state.expiresAt) };
}

export class MemoryOAuthStateStore implements OAuthStateStore {
  private readonly entries = new Map<string, Entry>();
  private cleanupInterval?: NodeJS.Timeout;

  constructor(cleanupIntervalMs: number = DEFAULT_CLEANUP_INTERVAL_MS) {
    logger.info('MemoryOAuthStateStore initialized');

    this.cleanupInterval = setInterval(() => this.cleanup(), cleanupIntervalMs);
    if (typeof this.cleanupInterval.unref === 'function') {
      this.cleanupInterval.unref();
    }
  }

  async put(nonce: string, state: OAuthState, ttlSeconds: number, signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal);

    this.entries.set(nonce, { state: copyState(state), evictAt: Date.now() + ttlSeconds * 1000 });

    logger.oauthDebug?.('Stored OAuth state in memory', {
      state: idPrefix(nonce),
      provider: state.provider,
      ttl: ttlSeconds
    });
  }

  async consume(nonce: string, signal?: AbortSignal): Promise<OAuthState | null> {
    throwIfAborted(signal);

    // get + delete run in one synchronous step, so two callbacks cannot both win
    const entry = this.live(nonce);
    this.entries.delete(nonce);

    if (!entry) {
      logger.oauthWarn?.('OAuth state not found during consume (replay or expired)', {
        state: idPrefix(nonce)
      });
      return null;
    }

    logger.oauthDebug?.('Consumed OAuth state from memory', {
      state: idPrefix(nonce),
      provider: entry.state.provider
    });

    return copyState(entry.state);
  }

  async peek(nonce: string): Promise<OAuthState | null> {
    const entry = this.live(nonce);
    return entry ? copyState(entry.state) : null;
  }

  /**
   * Drop every expired record
   * @returns number of records removed
   */
  cleanup(): number {
    const now = Date.now();
    let cleanedCount = 0;

    for (const [nonce, entry] of this.entries) {
      if (entry.evictAt <= now) {
        this.entries.delete(nonce);
        cleanedCount++;
      }
    }

    if (cleanedCount > 0) {
      logger.oauthDebug('Expired OAuth states cleaned up', { cleanedCount, remainingCount: this.entries.size });
    }
    return cleanedCount;
  }

  async dispose(): Promise<void> {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = undefined;
    }
    this.entries.clear();
  }

  /**
   * Number of stored records, including expired ones not yet swept
   * @internal
   */
  get size(): number {
    return this.entries.size;
  }

  private live(nonce: string): Entry | undefined {
    const entry = this.entries.get(nonce);
    if (entry && entry.evictAt <= Date.now()) {
      this.entries.delete(nonce);
      return undefined;
    }
    return entry;
  }
}
