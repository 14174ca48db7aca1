/**
 * Base OAuth provider implementation with common functionality
 */

import { z } from 'zod';
import type { OAuthProviderName } from '@sessiongate/config';
import { logger } from '@sessiongate/observability';
import {
  type OAuthProvider,
  type OAuthProviderConfig,
  type OAuthUserInfo,
  OAuthProviderError,
  OAuthTokenError
} from './types.js';

/**
 * Token endpoint reply. Some providers (GitHub) answer 200 with an error body.
 */
const TokenResponseSchema = z.object({
  access_token: z.string().min(1).optional(),
  token_type: z.string().optional(),
  scope: z.string().optional(),
  error: z.string().optional(),
  error_description: z.string().optional()
});

export abstract class BaseOAuthProvider implements OAuthProvider {
  abstract readonly name: OAuthProviderName;

  constructor(protected readonly config: OAuthProviderConfig) {}

  get defaultRedirectUri(): string | undefined {
    return this.config.redirectUri;
  }

  protected abstract getAuthorizationEndpoint(): string;
  protected abstract getTokenEndpoint(): string;
  protected abstract getDefaultScopes(): string[];
  abstract fetchUserInfo(accessToken: string, signal?: AbortSignal): Promise<OAuthUserInfo>;

  /**
   * Extra query parameters for the authorization URL
   */
  protected getAuthorizationParams(): Record<string, string> {
    return {};
  }

  buildAuthorizationUrl(state: string, redirectUri: string): string {
    const params = new URLSearchParams({
      client_id: this.config.clientId,
      response_type: 'code',
      redirect_uri: redirectUri,
      scope: (this.config.scopes ?? this.getDefaultScopes()).join(' '),
      state,
      ...this.getAuthorizationParams()
    });

    return `${this.getAuthorizationEndpoint()}?${params.toString()}`;
  }

  async exchangeCode(code: string, redirectUri: string, signal?: AbortSignal): Promise<string> {
    const body = new URLSearchParams({
      client_id: this.config.clientId,
      client_secret: this.config.clientSecret,
      code,
      grant_type: 'authorization_code',
      redirect_uri: redirectUri
    });

    const response = await fetch(this.getTokenEndpoint(), {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        'Accept': 'application/json'
      },
      body: body.toString(),
      signal
    });

    if (!response.ok) {
      const errorText = await response.text();
      logger.oauthError('Token exchange failed', {
        provider: this.name,
        status: response.status,
        statusText: response.statusText,
        errorBody: errorText,
        redirectUri
      });
      throw new OAuthTokenError(
        `Token exchange failed: ${response.status} ${response.statusText}`,
        this.name,
        { status: response.status }
      );
    }

    const parsed = TokenResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new OAuthTokenError('Malformed token response', this.name);
    }
    if (!parsed.data.access_token) {
      logger.oauthError('Token exchange returned no access token', {
        provider: this.name,
        error: parsed.data.error,
        errorDescription: parsed.data.error_description
      });
      throw new OAuthTokenError(parsed.data.error_description ?? 'No access token received', this.name, {
        error: parsed.data.error
      });
    }

    logger.oauthDebug('Token exchange successful', { provider: this.name });
    return parsed.data.access_token;
  }

  /**
   * GET a JSON document from the provider API and validate it
   */
  protected async getJson<T>(
    url: string,
    accessToken: string,
    schema: z.ZodType<T>,
    signal?: AbortSignal,
    headers: Record<string, string> = {}
  ): Promise<T> {
    const response = await fetch(url, {
      headers: {
        'Authorization': `Bearer ${accessToken}`,
        'Accept': 'application/json',
        ...headers
      },
      signal
    });

    if (!response.ok) {
      const errorBody = await response.text();
      logger.oauthError('Provider API error response', { provider: this.name, url, status: response.status, errorBody });
      throw new OAuthProviderError(
        `Provider API request failed: ${response.status} ${response.statusText}`,
        this.name,
        { status: response.status }
      );
    }

    const parsed = schema.safeParse(await response.json());
    if (!parsed.success) {
      throw new OAuthProviderError('Unexpected provider API response', this.name, { url });
    }
    return parsed.data;
  }
}
