/**
 * Environment configuration for the auth server
 * Combines all configuration schemas
 */

import { z } from 'zod';
import { BaseConfigSchema } from './base-config.js';
import { AuthConfigSchema, AuthSecretsSchema, DEFAULT_JWT_SECRET } from './auth-config.js';
import { OAuthConfigSchema, OAuthSecretsSchema, type OAuthProviderName } from './oauth-config.js';
import { StorageConfigSchema } from './storage-config.js';

/**
 * Non-secret configuration schema (safe to log)
 */
export const ConfigurationSchema = BaseConfigSchema
  .merge(AuthConfigSchema)
  .merge(OAuthConfigSchema)
  .merge(StorageConfigSchema);

/**
 * Secret configuration schema (never log)
 */
export const SecretsSchema = AuthSecretsSchema.merge(OAuthSecretsSchema);

/**
 * Combined environment schema
 */
export const EnvironmentSchema = ConfigurationSchema.merge(SecretsSchema);

export type Configuration = z.infer<typeof ConfigurationSchema>;
export type Secrets = z.infer<typeof SecretsSchema>;
export type Environment = z.infer<typeof EnvironmentSchema>;

/**
 * Configuration status interface
 */
export interface ConfigurationStatus {
  configuration: Configuration;
  secrets: {
    configured: string[];
    missing: string[];
    total: number;
  };
}

/**
 * Logger interface for optional logging
 */
export interface ConfigLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, error?: Error | unknown): void;
}

/**
 * Client credentials for one OAuth provider
 */
export interface OAuthCredentials {
  clientId: string;
  clientSecret: string;
  redirectUri?: string;
}

/**
 * Authentication settings in the units the auth package works with
 */
export interface AuthSettings {
  jwtSecret: string;
  internalToken?: string;
  oauthStateTtlSeconds: number;
  sessionTtlSeconds: number;
  policyFile?: string;
  policyFailOpen: boolean;
}

export interface StorageSettings {
  type?: 'memory' | 'redis';
  redisUrl?: string;
  keyPrefix: string;
}

function readInt(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') {
    return undefined;
  }
  return Number.parseInt(raw, 10);
}

function readString(name: string): string | undefined {
  const raw = process.env[name];
  return raw === '' ? undefined : raw;
}

/**
 * Environment configuration manager
 */
export class EnvironmentConfig {
  private static _instance: Environment | null = null;
  private static _configStatus: ConfigurationStatus | null = null;
  private static _logger: ConfigLogger | null = null;

  /**
   * Set optional logger for configuration messages
   */
  static setLogger(logger: ConfigLogger): void {
    this._logger = logger;
  }

  /**
   * Load and validate environment configuration
   */
  static load(): Environment {
    if (this._instance) {
      return this._instance;
    }

    const env = {
      // Base configuration
      HTTP_PORT: readInt('HTTP_PORT'),
      HTTP_HOST: readString('HTTP_HOST'),
      ALLOWED_ORIGINS: readString('ALLOWED_ORIGINS'),
      REQUEST_TIMEOUT_MS: readInt('REQUEST_TIMEOUT_MS'),
      NODE_ENV: readString('NODE_ENV'),

      // Auth
      OAUTH_STATE_TTL_MINUTES: readInt('OAUTH_STATE_TTL_MINUTES'),
      SESSION_TTL_HOURS: readInt('SESSION_TTL_HOURS'),
      POLICY_FILE: readString('POLICY_FILE'),
      POLICY_FAIL_OPEN: process.env.POLICY_FAIL_OPEN === 'true',
      JWT_SECRET: readString('JWT_SECRET'),
      INTERNAL_TOKEN: readString('INTERNAL_TOKEN'),

      // GitHub OAuth
      GITHUB_CLIENT_ID: readString('GITHUB_CLIENT_ID'),
      GITHUB_CLIENT_SECRET: readString('GITHUB_CLIENT_SECRET'),
      GITHUB_REDIRECT_URI: readString('GITHUB_REDIRECT_URI'),

      // Google OAuth
      GOOGLE_CLIENT_ID: readString('GOOGLE_CLIENT_ID'),
      GOOGLE_CLIENT_SECRET: readString('GOOGLE_CLIENT_SECRET'),
      GOOGLE_REDIRECT_URI: readString('GOOGLE_REDIRECT_URI'),

      // Storage configuration
      REDIS_URL: readString('REDIS_URL'),
      REDIS_KEY_PREFIX: readString('REDIS_KEY_PREFIX'),
      STORAGE_TYPE: readString('STORAGE_TYPE'),
    };

    let parsed: Environment;
    try {
      parsed = EnvironmentSchema.parse(env);
    } catch (error) {
      if (this._logger) {
        this._logger.error('Environment configuration validation failed', error);
      }
      throw new Error('Invalid environment configuration');
    }

    // The development default is public; signing with it would let anyone mint admin tokens
    if (parsed.NODE_ENV === 'production' && parsed.JWT_SECRET === DEFAULT_JWT_SECRET) {
      this._logger?.error('JWT_SECRET must be set in production');
      throw new Error('JWT_SECRET must be set in production');
    }

    this._instance = parsed;
    this._configStatus = this.analyzeConfiguration(env);
    return this._instance;
  }

  /**
   * Analyze configuration and separate secrets
   */
  private static analyzeConfiguration(env: Record<string, unknown>): ConfigurationStatus {
    const configuration = ConfigurationSchema.parse(env);

    // Analyze secrets without exposing their values
    const secretKeys = Object.keys(SecretsSchema.shape);
    const configured: string[] = [];
    const missing: string[] = [];

    for (const key of secretKeys) {
      const value = env[key];
      // JWT_SECRET falls back to a development default, which does not count
      if (key === 'JWT_SECRET') {
        if (value && value !== DEFAULT_JWT_SECRET) {
          configured.push(key);
        } else {
          missing.push(key);
        }
      } else if (value) {
        configured.push(key);
      } else {
        missing.push(key);
      }
    }

    return {
      configuration,
      secrets: {
        configured,
        missing,
        total: secretKeys.length
      }
    };
  }

  /**
   * Get current environment configuration
   */
  static get(): Environment {
    return this.load();
  }

  /**
   * Get configuration status
   */
  static getConfigurationStatus(): ConfigurationStatus {
    if (!this._configStatus) {
      this.load();
    }
    if (!this._configStatus) {
      throw new Error('Configuration status not initialized after load()');
    }
    return this._configStatus;
  }

  /**
   * Log configuration status (requires logger to be set)
   */
  static logConfiguration(): void {
    if (!this._logger) {
      return;
    }

    const status = this.getConfigurationStatus();

    this._logger.info('Configuration loaded', { configuration: status.configuration });

    this._logger.info('Secrets status', {
      totalSecrets: status.secrets.total,
      configuredCount: status.secrets.configured.length,
      configured: status.secrets.configured.join(', ') || 'none',
      missingCount: status.secrets.missing.length,
      missing: status.secrets.missing.join(', ') || 'none'
    });

    if (status.secrets.missing.includes('JWT_SECRET')) {
      this._logger.warn('JWT_SECRET not set - tokens are signed with the development default');
    }

    const configuredProviders = (['github', 'google'] as const).filter((provider) =>
      this.checkOAuthCredentials(provider)
    );

    if (configuredProviders.length > 0) {
      this._logger.info('OAuth providers configured', { providers: configuredProviders });
    } else {
      this._logger.warn('OAuth: no providers configured');
    }
  }

  /**
   * Check if OAuth credentials are configured for a provider
   */
  static checkOAuthCredentials(provider: string | undefined): boolean {
    if (!provider) return false;
    const status = this.getConfigurationStatus();
    switch (provider) {
      case 'github':
        return status.secrets.configured.includes('GITHUB_CLIENT_ID') &&
               status.secrets.configured.includes('GITHUB_CLIENT_SECRET');
      case 'google':
        return status.secrets.configured.includes('GOOGLE_CLIENT_ID') &&
               status.secrets.configured.includes('GOOGLE_CLIENT_SECRET');
      default:
        return false;
    }
  }

  /**
   * Get client credentials for a provider, if configured
   */
  static getOAuthCredentials(provider: OAuthProviderName): OAuthCredentials | undefined {
    const env = this.get();
    switch (provider) {
      case 'github':
        if (!env.GITHUB_CLIENT_ID || !env.GITHUB_CLIENT_SECRET) return undefined;
        return {
          clientId: env.GITHUB_CLIENT_ID,
          clientSecret: env.GITHUB_CLIENT_SECRET,
          redirectUri: env.GITHUB_REDIRECT_URI,
        };
      case 'google':
        if (!env.GOOGLE_CLIENT_ID || !env.GOOGLE_CLIENT_SECRET) return undefined;
        return {
          clientId: env.GOOGLE_CLIENT_ID,
          clientSecret: env.GOOGLE_CLIENT_SECRET,
          redirectUri: env.GOOGLE_REDIRECT_URI,
        };
    }
  }

  /**
   * Reset configuration (useful for testing)
   */
  static reset(): void {
    this._instance = null;
    this._configStatus = null;
  }

  /**
   * Get authentication settings (lifetimes in seconds)
   */
  static getAuthSettings(): AuthSettings {
    const env = this.get();

    return {
      jwtSecret: env.JWT_SECRET,
      internalToken: env.INTERNAL_TOKEN,
      oauthStateTtlSeconds: env.OAUTH_STATE_TTL_MINUTES * 60,
      sessionTtlSeconds: env.SESSION_TTL_HOURS * 60 * 60,
      policyFile: env.POLICY_FILE,
      policyFailOpen: env.POLICY_FAIL_OPEN,
    };
  }

  /**
   * Get storage backend selection for the state and session stores
   */
  static getStorageConfig(): StorageSettings {
    const env = this.get();

    return {
      type: env.STORAGE_TYPE,
      redisUrl: env.REDIS_URL,
      keyPrefix: env.REDIS_KEY_PREFIX,
    };
  }

  /**
   * Get server configuration
   */
  static getServerConfig() {
    const env = this.get();

    return {
      port: env.HTTP_PORT,
      host: env.HTTP_HOST,
      requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
      allowedOrigins: env.ALLOWED_ORIGINS
        ?.split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0),
    };
  }
}
