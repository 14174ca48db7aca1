/**
 * Configured OAuth providers, looked up by name
 */

import { EnvironmentConfig, SUPPORTED_OAUTH_PROVIDERS, type OAuthProviderName } from '@sessiongate/config';
import { logger } from '@sessiongate/observability';
import type { OAuthProvider, OAuthProviderConfig } from './types.js';
import { GitHubOAuthProvider } from './github-provider.js';
import { GoogleOAuthProvider } from './google-provider.js';

export function createProvider(name: OAuthProviderName, config: OAuthProviderConfig): OAuthProvider {
  switch (name) {
    case 'github':
      return new GitHubOAuthProvider(config);
    case 'google':
      return new GoogleOAuthProvider(config);
  }
}

export class ProviderRegistry {
  private readonly providers = new Map<string, OAuthProvider>();

  constructor(providers: Iterable<OAuthProvider> = []) {
    for (const provider of providers) {
      this.providers.set(provider.name, provider);
    }
  }

  /**
   * Build the registry from every provider whose credentials are configured
   */
  static fromEnvironment(): ProviderRegistry {
    const providers: OAuthProvider[] = [];
    for (const name of SUPPORTED_OAUTH_PROVIDERS) {
      const credentials = EnvironmentConfig.getOAuthCredentials(name);
      if (credentials) {
        providers.push(createProvider(name, credentials));
      }
    }

    logger.info('OAuth provider registry created', { providers: providers.map((provider) => provider.name) });
    return new ProviderRegistry(providers);
  }

  get(name: string): OAuthProvider | undefined {
    return this.providers.get(name);
  }

  names(): string[] {
    return [...this.providers.keys()];
  }
}
