/**
 * Storage configuration schema
 * Backend selection for the OAuth state and login session stores
 */

import { z } from 'zod';

export const StorageConfigSchema = z.object({
  // Redis connection
  REDIS_URL: z.string().url().optional(),

  // Key prefix for running several deployments against one Redis instance
  // Example: 'auth-main:' or 'auth-canary:'
  REDIS_KEY_PREFIX: z.string().optional().default(''),

  // Explicit storage type selection (auto-detect if not set)
  STORAGE_TYPE: z.enum(['memory', 'redis']).optional(),
});

export type StorageConfig = z.infer<typeof StorageConfigSchema>;
