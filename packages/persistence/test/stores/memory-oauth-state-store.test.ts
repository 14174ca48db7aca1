/**
 * Tests for MemoryOAuthStateStore
 */

import { vi } from 'vitest';
import { MemoryOAuthStateStore, type OAuthState } from '../../src/index.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');

function pendingState(overrides: Partial<OAuthState> = {}): OAuthState {
  return {
    provider: 'github',
    redirectUrl: 'http://localhost:3000/callback',
    userAgent: 'test-agent',
    ipAddress: '203.0.113.5',
    createdAt: NOW,
    expiresAt: new Date(NOW.getTime() + 10 * 60 * 1000),
    ...overrides
  };
}

describe('MemoryOAuthStateStore', () => {
  let store: MemoryOAuthStateStore;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(NOW);
    store = new MemoryOAuthStateStore();
  });

  afterEach(async () => {
    await store.dispose();
    vi.useRealTimers();
  });

  it('returns the stored state on consume', async () => {
    const state = pendingState();
    await store.put('nonce-1', state, 600);

    expect(await store.consume('nonce-1')).toEqual(state);
  });

  it('consumes a nonce at most once', async () => {
    await store.put('nonce-1', pendingState(), 600);

    expect(await store.consume('nonce-1')).not.toBeNull();
    expect(await store.consume('nonce-1')).toBeNull();
    expect(store.size).toBe(0);
  });

  it('lets exactly one of two concurrent consumers win', async () => {
    await store.put('nonce-1', pendingState(), 600);

    const results = await Promise.all([store.consume('nonce-1'), store.consume('nonce-1')]);

    expect(results.filter((result) => result !== null)).toHaveLength(1);
  });

  it('peek does not consume', async () => {
    await store.put('nonce-1', pendingState(), 600);

    expect(await store.peek('nonce-1')).not.toBeNull();
    expect(await store.consume('nonce-1')).not.toBeNull();
  });

  it('evicts records after their TTL', async () => {
    await store.put('nonce-1', pendingState(), 600);

    vi.setSystemTime(new Date(NOW.getTime() + 600 * 1000));

    expect(await store.peek('nonce-1')).toBeNull();
    expect(await store.consume('nonce-1')).toBeNull();
  });

  it('keeps records until the TTL elapses', async () => {
    await store.put('nonce-1', pendingState(), 600);

    vi.setSystemTime(new Date(NOW.getTime() + 599 * 1000));

    expect(await store.consume('nonce-1')).not.toBeNull();
  });

  it('does not write when the call was aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('client went away'));

    await expect(store.put('nonce-1', pendingState(), 600, controller.signal)).rejects.toThrow('client went away');
    expect(store.size).toBe(0);
  });

  it('does not consume when the call was aborted', async () => {
    await store.put('nonce-1', pendingState(), 600);
    const controller = new AbortController();
    controller.abort();

    await expect(store.consume('nonce-1', controller.signal)).rejects.toThrow();
    expect(await store.peek('nonce-1')).not.toBeNull();
  });

  it('hands out copies that do not alias the stored record', async () => {
    await store.put('nonce-1', pendingState(), 600);

    const peeked = await store.peek('nonce-1');
    if (!peeked) {
      throw new Error('expected a stored state');
    }
    peeked.userAgent = 'tampered';
    peeked.expiresAt.setTime(0);

    expect(await store.consume('nonce-1')).toEqual(pendingState());
  });

  it('sweeps abandoned records without any reads', async () => {
    await store.dispose();
    vi.useFakeTimers({ toFake: ['Date', 'setInterval', 'clearInterval'] });
    vi.setSystemTime(NOW);
    store = new MemoryOAuthStateStore(60 * 1000);

    for (let i = 0; i < 1000; i++) {
      await store.put(`nonce-${i}`, pendingState(), 1);
    }
    expect(store.size).toBe(1000);

    vi.advanceTimersByTime(24 * 60 * 60 * 1000);

    expect(store.size).toBe(0);
  });

  it('leaves live records in place when sweeping', async () => {
    await store.put('short', pendingState(), 1);
    await store.put('long', pendingState(), 600);

    vi.setSystemTime(new Date(NOW.getTime() + 2000));

    expect(store.cleanup()).toBe(1);
    expect(await store.peek('long')).not.toBeNull();
  });
});
