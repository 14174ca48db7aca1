/**
 * Session-bound bearer tokens (HS256 JWT)
 */

import { SignJWT, jwtVerify, type JWTPayload } from 'jose';
import { UnauthenticatedError } from './errors.js';
import { type Role, parseRole } from './roles.js';

export interface TokenClaims {
  subjectId: string;
  role: Role;
  /** Expiry in seconds since the epoch */
  exp: number;
}

export interface IssuedToken {
  token: string;
  expiresAt: Date;
}

export class TokenIssuer {
  private readonly key: Uint8Array;

  constructor(secret: string) {
    if (!secret) {
      throw new Error('Token signing secret must not be empty');
    }
    this.key = new TextEncoder().encode(secret);
  }

  /**
   * Sign a token that expires at `expiresAt`, truncated to whole seconds.
   * The returned expiresAt is the truncated instant, so it equals `exp * 1000`.
   */
  async issue(subjectId: string, role: Role, expiresAt: Date): Promise<IssuedToken> {
    const exp = Math.floor(expiresAt.getTime() / 1000);

    const token = await new SignJWT({ role })
      .setProtectedHeader({ alg: 'HS256', typ: 'JWT' })
      .setSubject(subjectId)
      .setExpirationTime(exp)
      .sign(this.key);

    return { token, expiresAt: new Date(exp * 1000) };
  }

  async verify(token: string): Promise<TokenClaims> {
    let payload: JWTPayload;
    try {
      ({ payload } = await jwtVerify(token, this.key, { algorithms: ['HS256'] }));
    } catch (error) {
      throw new UnauthenticatedError('invalid token', { cause: error });
    }

    if (typeof payload.sub !== 'string' || payload.sub === '' || typeof payload.exp !== 'number' || !('role' in payload)) {
      throw new UnauthenticatedError('invalid token claims');
    }

    return {
      subjectId: payload.sub,
      role: parseRole(payload.role),
      exp: payload.exp
    };
  }
}
