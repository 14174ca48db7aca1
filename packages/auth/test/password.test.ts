/**
 * Tests for password hashing
 */

import { hashPassword, verifyPassword } from '../src/index.js';

describe('password hashing', () => {
  it('verifies the original password', async () => {
    const hash = await hashPassword('test-password', 4);

    expect(hash).not.toBe('test-password');
    expect(hash.startsWith('$2')).toBe(true);
    expect(await verifyPassword('test-password', hash)).toBe(true);
  });

  it('rejects other passwords', async () => {
    const hash = await hashPassword('test-password', 4);

    expect(await verifyPassword('other-password', hash)).toBe(false);
  });

  it('salts every hash', async () => {
    const first = await hashPassword('test-password', 4);
    const second = await hashPassword('test-password', 4);

    expect(first).not.toBe(second);
  });
});
