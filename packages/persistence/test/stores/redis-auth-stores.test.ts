/**
 * Tests for the Redis OAuth state and login session stores using ioredis-mock
 */

import { randomBytes } from 'node:crypto';
import { vi } from 'vitest';
import {
  RedisOAuthStateStore,
  RedisLoginSessionStore,
  PersistenceError,
  type OAuthState
} from '../../src/index.js';

vi.mock('ioredis', async () => {
  const { default: RedisMock } = await import('ioredis-mock');
  return { default: RedisMock, Redis: RedisMock };
});

const REDIS_URL = 'redis://localhost:6379';

function freshId(): string {
  return randomBytes(32).toString('hex');
}

function pendingState(): OAuthState {
  const createdAt = new Date();
  return {
    provider: 'github',
    userAgent: 'test-agent',
    createdAt,
    expiresAt: new Date(createdAt.getTime() + 10 * 60 * 1000)
  };
}

async function rawClient() {
  const { default: RedisMock } = await import('ioredis-mock');
  return new RedisMock(REDIS_URL);
}

describe('RedisOAuthStateStore', () => {
  let store: RedisOAuthStateStore;

  beforeEach(() => {
    store = new RedisOAuthStateStore(REDIS_URL, 'test');
  });

  afterEach(async () => {
    await store.dispose();
  });

  it('round-trips a state through consume', async () => {
    const nonce = freshId();
    const state = pendingState();

    await store.put(nonce, state, 600);

    expect(await store.consume(nonce)).toEqual(state);
  });

  it('deletes the record atomically on consume', async () => {
    const nonce = freshId();
    await store.put(nonce, pendingState(), 600);

    const results = await Promise.all([store.consume(nonce), store.consume(nonce)]);

    expect(results.filter((result) => result !== null)).toHaveLength(1);
    expect(await store.peek(nonce)).toBeNull();
  });

  it('stores flat JSON with ISO timestamps under the prefixed key', async () => {
    const nonce = freshId();
    const state = pendingState();
    await store.put(nonce, state, 600);

    const redis = await rawClient();
    const raw = await redis.get(`test:oauth:state:${nonce}`);
    expect(raw).not.toBeNull();
    expect(JSON.parse(raw ?? '{}')).toEqual({
      provider: 'github',
      userAgent: 'test-agent',
      createdAt: state.createdAt.toISOString(),
      expiresAt: state.expiresAt.toISOString()
    });
    expect(await redis.ttl(`test:oauth:state:${nonce}`)).toBeGreaterThan(590);
  });

  it('returns null for an unknown nonce', async () => {
    expect(await store.consume(freshId())).toBeNull();
  });

  it('rejects corrupt records as persistence failures', async () => {
    const nonce = freshId();
    const redis = await rawClient();
    await redis.set(`test:oauth:state:${nonce}`, '{"provider":""}');

    await expect(store.peek(nonce)).rejects.toBeInstanceOf(PersistenceError);
  });
});

describe('RedisLoginSessionStore', () => {
  let store: RedisLoginSessionStore;

  beforeEach(() => {
    store = new RedisLoginSessionStore(REDIS_URL, 'test:');
  });

  afterEach(async () => {
    await store.dispose();
  });

  it('creates sessions that resolve to their subject', async () => {
    const before = Date.now();
    const { sessionId, expiresAt } = await store.create('user-1', 3600);

    expect(sessionId).toMatch(/^[0-9a-f]{64}$/);
    expect(expiresAt.getTime()).toBeGreaterThanOrEqual(before + 3600 * 1000);
    expect(expiresAt.getTime()).toBeLessThanOrEqual(Date.now() + 3600 * 1000);
    expect(await store.resolve(sessionId, 3600)).toBe('user-1');
  });

  it('returns null for unknown sessions', async () => {
    const sessionId = freshId();

    expect(await store.resolve(sessionId, 3600)).toBeNull();
    expect(await store.remainingExpiry(sessionId)).toBeNull();
  });

  it('resets the TTL to the full duration on resolve', async () => {
    const { sessionId } = await store.create('user-1', 60);

    await store.resolve(sessionId, 3600);

    const expiry = await store.remainingExpiry(sessionId);
    expect(expiry).not.toBeNull();
    expect((expiry?.getTime() ?? 0) - Date.now()).toBeGreaterThan(3500 * 1000);
  });

  it('throws when a session key has no expiry', async () => {
    const sessionId = freshId();
    const redis = await rawClient();
    await redis.set(`test:session:${sessionId}`, 'user-1');

    await expect(store.remainingExpiry(sessionId)).rejects.toBeInstanceOf(PersistenceError);
  });
});
