/**
 * OAuth configuration schema
 * Multi-provider OAuth 2.0 settings
 */

import { z } from 'zod';

/**
 * OAuth configuration schema (non-secret redirect URIs)
 */
export const OAuthConfigSchema = z.object({
  GITHUB_REDIRECT_URI: z.string().url().optional(),
  GOOGLE_REDIRECT_URI: z.string().url().optional(),
});

export type OAuthConfig = z.infer<typeof OAuthConfigSchema>;

/**
 * OAuth secrets schema (client IDs and secrets)
 */
export const OAuthSecretsSchema = z.object({
  GITHUB_CLIENT_ID: z.string().optional(),
  GITHUB_CLIENT_SECRET: z.string().optional(),

  GOOGLE_CLIENT_ID: z.string().optional(),
  GOOGLE_CLIENT_SECRET: z.string().optional(),
});

export type OAuthSecrets = z.infer<typeof OAuthSecretsSchema>;

export const SUPPORTED_OAUTH_PROVIDERS = ['github', 'google'] as const;

export type OAuthProviderName = typeof SUPPORTED_OAUTH_PROVIDERS[number];
