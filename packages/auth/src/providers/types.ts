/**
 * OAuth provider contract
 */

import type { OAuthProviderName } from '@sessiongate/config';

/**
 * Profile returned by a provider's user-info endpoint
 */
export interface OAuthUserInfo {
  /** Provider-scoped account id */
  id: string;
  name: string;
  email: string;
  avatarUrl?: string;
}

export interface OAuthProviderConfig {
  clientId: string;
  clientSecret: string;
  redirectUri?: string;
  scopes?: string[];
}

export interface OAuthProvider {
  readonly name: OAuthProviderName;
  /** Redirect URI registered with the provider, used when a request names none */
  readonly defaultRedirectUri?: string;

  buildAuthorizationUrl(state: string, redirectUri: string): string;
  /**
   * Trade an authorization code for an access token
   */
  exchangeCode(code: string, redirectUri: string, signal?: AbortSignal): Promise<string>;
  fetchUserInfo(accessToken: string, signal?: AbortSignal): Promise<OAuthUserInfo>;
}

/**
 * Base error for OAuth provider failures
 */
export class OAuthError extends Error {
  constructor(
    message: string,
    public readonly provider: OAuthProviderName,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'OAuthError';
  }
}

export class OAuthTokenError extends OAuthError {
  constructor(message: string, provider: OAuthProviderName, details?: Record<string, unknown>) {
    super(message, provider, details);
    this.name = 'OAuthTokenError';
  }
}

export class OAuthProviderError extends OAuthError {
  constructor(message: string, provider: OAuthProviderName, details?: Record<string, unknown>) {
    super(message, provider, details);
    this.name = 'OAuthProviderError';
  }
}
