/**
 * GitHub OAuth provider
 */

import { z } from 'zod';
import { logger } from '@sessiongate/observability';
import { BaseOAuthProvider } from './base-provider.js';
import type { OAuthUserInfo } from './types.js';

const GitHubUserSchema = z.object({
  id: z.number(),
  login: z.string(),
  name: z.string().nullable().optional(),
  email: z.string().nullable().optional(),
  avatar_url: z.string().optional()
});

const GitHubEmailsSchema = z.array(z.object({
  email: z.string(),
  primary: z.boolean(),
  verified: z.boolean()
}));

export class GitHubOAuthProvider extends BaseOAuthProvider {
  readonly name = 'github' as const;

  private readonly GITHUB_AUTH_URL = 'https://github.com/login/oauth/authorize';
  private readonly GITHUB_TOKEN_URL = 'https://github.com/login/oauth/access_token';
  private readonly GITHUB_USER_URL = 'https://api.github.com/user';
  private readonly GITHUB_USER_EMAIL_URL = 'https://api.github.com/user/emails';
  private readonly API_HEADERS = {
    'Accept': 'application/vnd.github.v3+json',
    'User-Agent': 'sessiongate'
  };

  protected getAuthorizationEndpoint(): string {
    return this.GITHUB_AUTH_URL;
  }

  protected getTokenEndpoint(): string {
    return this.GITHUB_TOKEN_URL;
  }

  protected getDefaultScopes(): string[] {
    return ['user:email'];
  }

  async fetchUserInfo(accessToken: string, signal?: AbortSignal): Promise<OAuthUserInfo> {
    logger.oauthDebug('Fetching GitHub user info');

    const userData = await this.getJson(this.GITHUB_USER_URL, accessToken, GitHubUserSchema, signal, this.API_HEADERS);

    // Private emails are only listed by /user/emails
    let primaryEmail = userData.email ?? undefined;
    if (!primaryEmail) {
      primaryEmail = await this.fetchPrimaryEmail(accessToken, signal);
    }

    if (!primaryEmail) {
      logger.oauthWarn('No email address found - using GitHub noreply email', {
        userId: userData.id,
        login: userData.login
      });
      primaryEmail = `${userData.id}+${userData.login}@users.noreply.github.com`;
    }

    return {
      id: userData.id.toString(),
      email: primaryEmail,
      name: userData.name || userData.login,
      avatarUrl: userData.avatar_url
    };
  }

  private async fetchPrimaryEmail(accessToken: string, signal?: AbortSignal): Promise<string | undefined> {
    try {
      const emails = await this.getJson(this.GITHUB_USER_EMAIL_URL, accessToken, GitHubEmailsSchema, signal, this.API_HEADERS);
      const primary = emails.find((email) => email.primary && email.verified);
      const fallback = emails.find((email) => email.verified);
      return primary?.email ?? fallback?.email ?? emails[0]?.email;
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      logger.oauthError('Could not fetch GitHub user emails', error);
      return undefined;
    }
  }
}
