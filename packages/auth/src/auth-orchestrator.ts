/**
 * Login flows behind auth.v1.AuthService
 *
 * OAuth (authorization URL, callback), password login and session-to-token
 * exchange. Constructed once at startup; holds no state of its own beyond
 * the injected stores.
 */

import { randomBytes } from 'node:crypto';
import type { OAuthProviderName } from '@sessiongate/config';
import { logger } from '@sessiongate/observability';
import {
  type LoginSessionStore,
  type OAuthState,
  type OAuthStateStore,
  idPrefix
} from '@sessiongate/persistence';
import {
  FailedPreconditionError,
  InternalError,
  InvalidArgumentError,
  NotFoundError,
  RpcError,
  UnauthenticatedError,
  abortedCallError,
  toRpcError
} from './errors.js';
import type { Identity, IdentityRepository } from './identity/identity-repository.js';
import { verifyPassword } from './password.js';
import type { ProviderRegistry } from './providers/registry.js';
import type { OAuthProvider, OAuthUserInfo } from './providers/types.js';
import type { IssuedToken, TokenIssuer } from './token-issuer.js';

/**
 * Per-call facts the transport knows about the caller
 */
export interface CallInfo {
  userAgent?: string;
  ipAddress?: string;
  signal?: AbortSignal;
}

export interface AuthorizationRedirect {
  url: string;
  state: string;
}

export interface LoginSession {
  sessionId: string;
  expiresAt: Date;
}

export interface OrchestratorSettings {
  oauthStateTtlSeconds: number;
  sessionTtlSeconds: number;
}

export interface AuthOrchestratorDeps {
  states: OAuthStateStore;
  sessions: LoginSessionStore;
  issuer: TokenIssuer;
  providers: ProviderRegistry;
  identities: IdentityRepository;
  settings: OrchestratorSettings;
}

export class AuthOrchestrator {
  private readonly states: OAuthStateStore;
  private readonly sessions: LoginSessionStore;
  private readonly issuer: TokenIssuer;
  private readonly providers: ProviderRegistry;
  private readonly identities: IdentityRepository;
  private readonly settings: OrchestratorSettings;

  constructor(deps: AuthOrchestratorDeps) {
    this.states = deps.states;
    this.sessions = deps.sessions;
    this.issuer = deps.issuer;
    this.providers = deps.providers;
    this.identities = deps.identities;
    this.settings = deps.settings;
  }

  /**
   * GetOAuthCodeURL
   */
  async getOAuthCodeUrl(provider: string, redirectUrl: string | undefined, call: CallInfo = {}): Promise<AuthorizationRedirect> {
    return this.run(call, () => this.beginOAuth(provider, redirectUrl, call));
  }

  /**
   * LoginByOAuth
   */
  async loginByOAuth(code: string, state: string, call: CallInfo = {}): Promise<LoginSession> {
    return this.run(call, async () => {
      const identity = await this.completeOAuth(code, state, call);
      return this.openSession(identity, call);
    });
  }

  /**
   * LoginByPassword
   */
  async loginByPassword(email: string, password: string, call: CallInfo = {}): Promise<LoginSession> {
    return this.run(call, async () => {
      logger.info('Password login attempt started', { ipAddress: call.ipAddress, userAgent: call.userAgent });

      if (!email || !password) {
        throw new InvalidArgumentError('email and password are required');
      }

      const identity = await this.identities.getByEmail(email);
      if (!identity) {
        logger.warn('Password login failed: unknown account', { ipAddress: call.ipAddress });
        throw new NotFoundError('invalid credentials');
      }

      if (!identity.passwordHash) {
        logger.warn('Password login attempt for OAuth-only account', { userId: identity.id, ipAddress: call.ipAddress });
        throw new FailedPreconditionError('password login not available for this account');
      }

      let valid: boolean;
      try {
        valid = await verifyPassword(password, identity.passwordHash);
      } catch (error) {
        throw new InternalError('failed to verify password', { cause: error });
      }
      if (!valid) {
        logger.warn('Password login failed: wrong password', { userId: identity.id, ipAddress: call.ipAddress });
        throw new UnauthenticatedError('invalid credentials');
      }

      const loggedIn = await this.identities.update(identity.id, { lastLoginAt: new Date() });
      return this.openSession(loggedIn, call);
    });
  }

  /**
   * GetUserToken: exchange a session for a bearer token that expires with it
   */
  async getUserToken(sessionId: string, call: CallInfo = {}): Promise<IssuedToken> {
    return this.run(call, async () => {
      if (!sessionId) {
        throw new InvalidArgumentError('session_id is required');
      }

      // Resolution slides the session, so the expiry is read afterwards
      const subjectId = await this.sessions.resolve(sessionId, this.settings.sessionTtlSeconds, call.signal);
      if (subjectId === null) {
        logger.warn('User token request failed: invalid or expired session', { session: idPrefix(sessionId) });
        throw new UnauthenticatedError('invalid or expired session');
      }

      const expiresAt = await this.sessions.remainingExpiry(sessionId, call.signal);
      if (expiresAt === null) {
        throw new UnauthenticatedError('session not found');
      }

      const identity = await this.identities.getById(subjectId);
      if (!identity) {
        logger.warn('Session refers to a missing user', { userId: subjectId, session: idPrefix(sessionId) });
        throw new NotFoundError('user not found');
      }

      const issued = await this.issuer.issue(identity.id, identity.role, expiresAt);

      logger.info('User token generated', {
        userId: identity.id,
        role: identity.role,
        session: idPrefix(sessionId),
        expiresAt: issued.expiresAt.toISOString()
      });

      return issued;
    });
  }

  /**
   * Start an OAuth authorization: store a single-use state and build the provider URL
   */
  async beginOAuth(providerName: string, redirectUrl: string | undefined, call: CallInfo = {}): Promise<AuthorizationRedirect> {
    logger.oauthInfo('OAuth code URL request started', {
      provider: providerName,
      ipAddress: call.ipAddress,
      userAgent: call.userAgent
    });

    if (!providerName) {
      throw new InvalidArgumentError('provider is required');
    }
    const provider = this.providers.get(providerName);
    if (!provider) {
      logger.oauthWarn('OAuth code URL request for unsupported provider', { provider: providerName });
      throw new InvalidArgumentError(`unsupported provider: ${providerName}`);
    }

    const effectiveRedirect = redirectUrl || provider.defaultRedirectUri;
    if (!effectiveRedirect) {
      throw new InvalidArgumentError('redirect_url is required for this provider');
    }

    const nonce = randomBytes(32).toString('hex');
    const now = new Date();
    const state: OAuthState = {
      provider: provider.name,
      redirectUrl: effectiveRedirect,
      userAgent: call.userAgent || undefined,
      ipAddress: call.ipAddress || undefined,
      createdAt: now,
      expiresAt: new Date(now.getTime() + this.settings.oauthStateTtlSeconds * 1000)
    };

    await this.states.put(nonce, state, this.settings.oauthStateTtlSeconds, call.signal);

    logger.oauthInfo('OAuth code URL generated', {
      provider: provider.name,
      redirectUrl: effectiveRedirect,
      state: idPrefix(nonce)
    });

    return { url: provider.buildAuthorizationUrl(nonce, effectiveRedirect), state: nonce };
  }

  /**
   * Finish an OAuth authorization and return the (possibly new) local identity
   */
  async completeOAuth(code: string, nonce: string, call: CallInfo = {}): Promise<Identity> {
    logger.oauthInfo('OAuth login attempt started', { ipAddress: call.ipAddress, userAgent: call.userAgent });

    if (!code || !nonce) {
      throw new InvalidArgumentError('code and state are required');
    }

    // Consumed before any check, so a state can never be redeemed twice
    const state = await this.states.consume(nonce, call.signal);
    if (!state) {
      logger.oauthWarn('OAuth state validation failed', { state: idPrefix(nonce), ipAddress: call.ipAddress });
      throw new InvalidArgumentError('invalid or expired state');
    }

    this.validateState(state, nonce, call);

    const provider = this.providers.get(state.provider);
    if (!provider) {
      logger.oauthError('OAuth state names an unconfigured provider', { provider: state.provider });
      throw new InvalidArgumentError(`unsupported provider: ${state.provider}`);
    }

    const userInfo = await this.fetchProviderIdentity(provider, code, state.redirectUrl ?? provider.defaultRedirectUri, call);
    return this.upsertIdentity(provider.name, userInfo);
  }

  private validateState(state: OAuthState, nonce: string, call: CallInfo): void {
    if (state.expiresAt.getTime() <= Date.now()) {
      logger.oauthWarn('OAuth state has expired', { state: idPrefix(nonce), expiredAt: state.expiresAt.toISOString() });
      throw new InvalidArgumentError('state has expired');
    }

    // Soft binding: only enforced when both sides are known
    if (state.userAgent && call.userAgent && state.userAgent !== call.userAgent) {
      logger.oauthWarn('OAuth callback user agent mismatch', { state: idPrefix(nonce) });
      throw new InvalidArgumentError('user agent mismatch - possible session hijacking');
    }
    if (state.ipAddress && call.ipAddress && state.ipAddress !== call.ipAddress) {
      logger.oauthWarn('OAuth callback IP address mismatch', { state: idPrefix(nonce), ipAddress: call.ipAddress });
      throw new InvalidArgumentError('IP address mismatch - possible session hijacking');
    }
  }

  private async fetchProviderIdentity(
    provider: OAuthProvider,
    code: string,
    redirectUri: string | undefined,
    call: CallInfo
  ): Promise<OAuthUserInfo> {
    if (!redirectUri) {
      throw new InternalError('no redirect URL recorded for OAuth state');
    }

    let accessToken: string;
    try {
      accessToken = await provider.exchangeCode(code, redirectUri, call.signal);
    } catch (error) {
      if (call.signal?.aborted) {
        throw abortedCallError(call.signal);
      }
      logger.oauthError('OAuth token exchange failed', error);
      throw new InternalError('failed to exchange code for token', { cause: error });
    }

    try {
      const userInfo = await provider.fetchUserInfo(accessToken, call.signal);
      logger.oauthInfo('User info retrieved from provider', { provider: provider.name, externalId: userInfo.id });
      return userInfo;
    } catch (error) {
      if (call.signal?.aborted) {
        throw abortedCallError(call.signal);
      }
      logger.oauthError('Failed to get user info from provider', error);
      throw new InternalError('failed to get user info', { cause: error });
    }
  }

  private async upsertIdentity(provider: OAuthProviderName, userInfo: OAuthUserInfo): Promise<Identity> {
    const now = new Date();
    const existing = await this.identities.getByExternalId(provider, userInfo.id);

    if (existing) {
      const updated = await this.identities.update(existing.id, { lastLoginAt: now });
      logger.info('Existing user login', { userId: updated.id, provider });
      return updated;
    }

    const externalIds: Identity['externalIds'] = {};
    externalIds[provider] = userInfo.id;

    const created = await this.identities.create({
      name: userInfo.name,
      email: userInfo.email,
      role: 'user',
      externalIds,
      lastLoginAt: now
    });
    logger.info('New user created', { userId: created.id, provider });
    return created;
  }

  private async openSession(identity: Identity, call: CallInfo): Promise<LoginSession> {
    // The last step of a login: nothing after it can fail and orphan the session
    const { sessionId, expiresAt } = await this.sessions.create(
      identity.id,
      this.settings.sessionTtlSeconds,
      call.signal
    );

    logger.info('Login completed', {
      userId: identity.id,
      session: idPrefix(sessionId),
      ipAddress: call.ipAddress
    });

    return { sessionId, expiresAt };
  }

  /**
   * Run one RPC: abort reasons win over whatever the aborted step threw,
   * and anything that is not an RpcError becomes internal
   */
  private async run<T>(call: CallInfo, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (call.signal?.aborted) {
        throw abortedCallError(call.signal);
      }
      if (!(error instanceof RpcError)) {
        logger.error('Auth operation failed', error);
      }
      throw toRpcError(error);
    }
  }
}
