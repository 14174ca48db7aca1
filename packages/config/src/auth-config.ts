/**
 * Authentication configuration schema
 * Lifetimes for OAuth state and login sessions, token signing and RBAC policy
 */

import { z } from 'zod';

export const DEFAULT_JWT_SECRET = 'dev-jwt-secret-change-in-production';
export const DEFAULT_OAUTH_STATE_TTL_MINUTES = 10;
export const DEFAULT_SESSION_TTL_HOURS = 24;

/**
 * Auth configuration schema (non-secret settings)
 */
export const AuthConfigSchema = z.object({
  OAUTH_STATE_TTL_MINUTES: z.number().int().positive().default(DEFAULT_OAUTH_STATE_TTL_MINUTES),
  SESSION_TTL_HOURS: z.number().int().positive().default(DEFAULT_SESSION_TTL_HOURS),

  // RBAC policy table location (defaults to the policy shipped with @sessiongate/auth)
  POLICY_FILE: z.string().optional(),

  // Admit protected calls when the policy table cannot be loaded. Never the default.
  POLICY_FAIL_OPEN: z.boolean().default(false),
});

export type AuthConfig = z.infer<typeof AuthConfigSchema>;

/**
 * Auth secrets schema
 */
export const AuthSecretsSchema = z.object({
  JWT_SECRET: z.string().min(1).default(DEFAULT_JWT_SECRET),

  // Shared secret for service-to-service calls (x-token-type: internal)
  INTERNAL_TOKEN: z.string().optional(),
});

export type AuthSecrets = z.infer<typeof AuthSecretsSchema>;
