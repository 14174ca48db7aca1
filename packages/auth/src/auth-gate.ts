/**
 * Per-call authentication and authorization
 *
 * Every call is classified once: admitted (public method, internal caller, or
 * an authenticated user the policy allows) or rejected with an RpcError.
 */

import { createHash, timingSafeEqual } from 'node:crypto';
import { logger } from '@sessiongate/observability';
import { InternalError, PermissionDeniedError, RpcError, UnauthenticatedError } from './errors.js';
import type { PolicyEngine } from './policy-engine.js';
import type { Role } from './roles.js';
import type { TokenIssuer } from './token-issuer.js';

export const AUTH_SERVICE = 'auth.v1.AuthService';
export const USER_SERVICE = 'user.v1.UserService';
export const HEALTH_METHOD = '/health';

export const PUBLIC_METHODS: readonly string[] = [
  `/${AUTH_SERVICE}/GetOAuthCodeURL`,
  `/${AUTH_SERVICE}/LoginByOAuth`,
  `/${AUTH_SERVICE}/LoginByPassword`,
  `/${AUTH_SERVICE}/GetUserToken`,
  HEALTH_METHOD
];

export const INTERNAL_TOKEN_TYPE = 'internal';

export interface Principal {
  subjectId: string;
  role: Role;
}

/**
 * Transport-neutral view of the call being gated
 */
export interface GateRequest {
  fullMethod: string;
  authorization?: string;
  tokenType?: string;
}

export type GateResult =
  | { kind: 'public' }
  | { kind: 'internal' }
  | { kind: 'user'; principal: Principal };

export interface AuthGateOptions {
  issuer: TokenIssuer;
  policy: PolicyEngine;
  internalToken?: string;
  publicMethods?: Iterable<string>;
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

/**
 * Extract the credentials from an `Authorization: Bearer <token>` header
 */
export function parseBearer(header: string | undefined): string | null {
  if (!header) {
    return null;
  }
  const match = /^Bearer\s+(\S+)\s*$/i.exec(header);
  return match?.[1] ?? null;
}

export class AuthGate {
  private readonly issuer: TokenIssuer;
  private readonly policy: PolicyEngine;
  private readonly internalDigest: Buffer | null;
  private readonly publicMethods: Set<string>;

  constructor(options: AuthGateOptions) {
    this.issuer = options.issuer;
    this.policy = options.policy;
    this.internalDigest = options.internalToken ? digest(options.internalToken) : null;
    this.publicMethods = new Set(options.publicMethods ?? PUBLIC_METHODS);
  }

  /**
   * Classify a call
   * @throws RpcError (unauthenticated, permission_denied or internal) when rejected
   */
  async admit(request: GateRequest): Promise<GateResult> {
    try {
      return await this.classify(request);
    } catch (error) {
      if (error instanceof RpcError) {
        logger.debug('Call rejected', { method: request.fullMethod, code: error.code });
        throw error;
      }
      logger.error('Authorization check failed', error);
      throw new InternalError('authorization check failed', { cause: error });
    }
  }

  private async classify(request: GateRequest): Promise<GateResult> {
    if (this.publicMethods.has(request.fullMethod)) {
      return { kind: 'public' };
    }

    if (!request.authorization) {
      throw new UnauthenticatedError('missing authorization token');
    }
    const token = parseBearer(request.authorization);
    if (!token) {
      throw new UnauthenticatedError('malformed authorization header');
    }

    if (request.tokenType === INTERNAL_TOKEN_TYPE) {
      if (!this.internalTokenMatches(token)) {
        throw new UnauthenticatedError('invalid internal token');
      }
      return { kind: 'internal' };
    }

    const claims = await this.issuer.verify(token);
    const principal: Principal = { subjectId: claims.subjectId, role: claims.role };

    let allowed: boolean;
    try {
      allowed = this.policy.isAllowed(principal.role, request.fullMethod);
    } catch (error) {
      logger.error('Authorization policy check failed', error);
      throw new InternalError('authorization check failed', { cause: error });
    }

    if (!allowed) {
      throw new PermissionDeniedError('insufficient permissions');
    }

    return { kind: 'user', principal };
  }

  private internalTokenMatches(token: string): boolean {
    if (!this.internalDigest) {
      return false;
    }
    return timingSafeEqual(digest(token), this.internalDigest);
  }
}
