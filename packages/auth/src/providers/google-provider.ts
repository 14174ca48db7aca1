/**
 * Google OAuth provider
 */

import { z } from 'zod';
import { BaseOAuthProvider } from './base-provider.js';
import type { OAuthUserInfo } from './types.js';

const GoogleUserSchema = z.object({
  id: z.string(),
  email: z.string(),
  name: z.string().optional(),
  picture: z.string().optional()
});

export class GoogleOAuthProvider extends BaseOAuthProvider {
  readonly name = 'google' as const;

  protected getAuthorizationEndpoint(): string {
    return 'https://accounts.google.com/o/oauth2/v2/auth';
  }

  protected getTokenEndpoint(): string {
    return 'https://oauth2.googleapis.com/token';
  }

  protected getDefaultScopes(): string[] {
    return ['openid', 'email', 'profile'];
  }

  protected getAuthorizationParams(): Record<string, string> {
    return { access_type: 'offline' };
  }

  async fetchUserInfo(accessToken: string, signal?: AbortSignal): Promise<OAuthUserInfo> {
    const userData = await this.getJson('https://www.googleapis.com/oauth2/v2/userinfo', accessToken, GoogleUserSchema, signal);

    return {
      id: userData.id,
      email: userData.email,
      name: userData.name ?? userData.email,
      avatarUrl: userData.picture
    };
  }
}
