/**
 * Base configuration schema for the auth server
 * Core settings for HTTP transport and call deadlines
 */

import { z } from 'zod';

/**
 * Base configuration schema (non-secret settings)
 */
export const BaseConfigSchema = z.object({
  // HTTP server configuration
  HTTP_PORT: z.number().int().min(1).max(65535).default(3000),
  HTTP_HOST: z.string().default('localhost'),
  // Comma-separated CORS origins; unset means localhost only
  ALLOWED_ORIGINS: z.string().optional(),

  // Upper bound for a single RPC call (clients may ask for less)
  REQUEST_TIMEOUT_MS: z.number().int().positive().default(30_000),

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;
