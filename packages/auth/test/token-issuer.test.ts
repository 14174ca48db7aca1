/**
 * Tests for TokenIssuer
 */

import { SignJWT } from 'jose';
import { TokenIssuer, UnauthenticatedError } from '../src/index.js';

const SECRET = 'test-secret';

async function signRaw(claims: Record<string, unknown>, exp?: number, secret: string = SECRET): Promise<string> {
  const jwt = new SignJWT(claims).setProtectedHeader({ alg: 'HS256' });
  if (exp !== undefined) {
    jwt.setExpirationTime(exp);
  }
  return jwt.sign(new TextEncoder().encode(secret));
}

function inOneHour(): number {
  return Math.floor(Date.now() / 1000) + 3600;
}

describe('TokenIssuer', () => {
  const issuer = new TokenIssuer(SECRET);

  it('round-trips subject, role and expiry', async () => {
    const exp = inOneHour();

    const issued = await issuer.issue('user-1', 'admin', new Date(exp * 1000));
    const claims = await issuer.verify(issued.token);

    expect(claims).toEqual({ subjectId: 'user-1', role: 'admin', exp });
    expect(claims.exp * 1000).toBe(issued.expiresAt.getTime());
  });

  it('truncates the expiry to whole seconds', async () => {
    const seconds = inOneHour();
    const issued = await issuer.issue('user-1', 'user', new Date(seconds * 1000 + 999));

    expect(issued.expiresAt).toEqual(new Date(seconds * 1000));
    expect((await issuer.verify(issued.token)).exp).toBe(seconds);
  });

  it('rejects an empty secret', () => {
    expect(() => new TokenIssuer('')).toThrow('Token signing secret must not be empty');
  });

  it('rejects tokens signed with another secret', async () => {
    const token = await signRaw({ sub: 'user-1', role: 'user' }, inOneHour(), 'other-secret');

    await expect(issuer.verify(token)).rejects.toBeInstanceOf(UnauthenticatedError);
  });

  it('rejects expired tokens', async () => {
    const issued = await issuer.issue('user-1', 'user', new Date(Date.now() - 60_000));

    await expect(issuer.verify(issued.token)).rejects.toMatchObject({ code: 'unauthenticated' });
  });

  it('rejects malformed tokens', async () => {
    await expect(issuer.verify('not-a-jwt')).rejects.toMatchObject({ code: 'unauthenticated' });
    await expect(issuer.verify('')).rejects.toMatchObject({ code: 'unauthenticated' });
  });

  it('rejects tokens without a role', async () => {
    const token = await signRaw({ sub: 'user-1' }, inOneHour());

    await expect(issuer.verify(token)).rejects.toMatchObject({ code: 'unauthenticated', message: 'invalid token claims' });
  });

  it('rejects tokens without a subject', async () => {
    const token = await signRaw({ role: 'user' }, inOneHour());

    await expect(issuer.verify(token)).rejects.toMatchObject({ code: 'unauthenticated' });
  });

  it('rejects tokens without an expiry', async () => {
    const token = await signRaw({ sub: 'user-1', role: 'user' });

    await expect(issuer.verify(token)).rejects.toMatchObject({ code: 'unauthenticated' });
  });

  it('treats an unknown role as user', async () => {
    const token = await signRaw({ sub: 'user-1', role: 'superuser' }, inOneHour());

    expect((await issuer.verify(token)).role).toBe('user');
  });
});
