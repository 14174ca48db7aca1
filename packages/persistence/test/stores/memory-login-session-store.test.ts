/**
 * Tests for MemoryLoginSessionStore
 */

import { vi } from 'vitest';
import { MemoryLoginSessionStore } from '../../src/index.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');
const DAY = 24 * 60 * 60;

describe('MemoryLoginSessionStore', () => {
  let store: MemoryLoginSessionStore;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(NOW);
    store = new MemoryLoginSessionStore();
  });

  afterEach(async () => {
    await store.dispose();
    vi.useRealTimers();
  });

  it('creates 64-character hex session ids', async () => {
    const first = await store.create('user-1', DAY);
    const second = await store.create('user-1', DAY);

    expect(first.sessionId).toMatch(/^[0-9a-f]{64}$/);
    expect(second.sessionId).not.toBe(first.sessionId);
  });

  it('returns the expiry written with the session', async () => {
    const created = await store.create('user-1', DAY);

    expect(created.expiresAt).toEqual(new Date(NOW.getTime() + DAY * 1000));
    expect(await store.remainingExpiry(created.sessionId)).toEqual(created.expiresAt);
  });

  it('resolves a session to its subject', async () => {
    const { sessionId } = await store.create('user-1', DAY);

    expect(await store.resolve(sessionId, DAY)).toBe('user-1');
  });

  it('returns null for unknown sessions', async () => {
    expect(await store.resolve('missing', DAY)).toBeNull();
    expect(await store.remainingExpiry('missing')).toBeNull();
  });

  it('reports the expiry set at creation', async () => {
    const { sessionId } = await store.create('user-1', DAY);

    expect(await store.remainingExpiry(sessionId)).toEqual(new Date(NOW.getTime() + DAY * 1000));
  });

  it('slides the expiry on every resolution', async () => {
    const { sessionId } = await store.create('user-1', DAY);
    const before = await store.remainingExpiry(sessionId);

    const later = new Date(NOW.getTime() + 60 * 60 * 1000);
    vi.setSystemTime(later);
    await store.resolve(sessionId, DAY);

    const after = await store.remainingExpiry(sessionId);
    expect(after).toEqual(new Date(later.getTime() + DAY * 1000));
    expect(after?.getTime()).toBeGreaterThan(before?.getTime() ?? Infinity);
  });

  it('expires sessions that are not used within the TTL', async () => {
    const { sessionId } = await store.create('user-1', 60);

    vi.setSystemTime(new Date(NOW.getTime() + 60 * 1000));

    expect(await store.resolve(sessionId, 60)).toBeNull();
    expect(store.size).toBe(0);
  });

  it('keeps a session alive while it keeps being used', async () => {
    const { sessionId } = await store.create('user-1', 60);

    for (let step = 1; step <= 5; step++) {
      vi.setSystemTime(new Date(NOW.getTime() + step * 50 * 1000));
      expect(await store.resolve(sessionId, 60)).toBe('user-1');
    }
  });

  it('commits nothing when the call was aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(store.create('user-1', DAY, controller.signal)).rejects.toThrow();
    expect(store.size).toBe(0);
  });

  it('sweeps sessions that are never used again', async () => {
    await store.dispose();
    vi.useFakeTimers({ toFake: ['Date', 'setInterval', 'clearInterval'] });
    vi.setSystemTime(NOW);
    store = new MemoryLoginSessionStore(5 * 60 * 1000);

    for (let i = 0; i < 1000; i++) {
      await store.create(`user-${i}`, 1);
    }
    expect(store.size).toBe(1000);

    vi.advanceTimersByTime(24 * 60 * 60 * 1000);

    expect(store.size).toBe(0);
  });

  it('keeps live sessions when sweeping', async () => {
    await store.create('user-1', 60);
    const { sessionId } = await store.create('user-2', DAY);

    vi.setSystemTime(new Date(NOW.getTime() + 61 * 1000));

    expect(store.cleanup()).toBe(1);
    expect(await store.resolve(sessionId, DAY)).toBe('user-2');
  });
});
