/**
 * Persistence layer type definitions
 */

import { z } from 'zod';

/**
 * Pending OAuth authorization, keyed by its state nonce
 *
 * Lives only between the authorization redirect and the callback.
 */
export interface OAuthState {
  provider: string;
  redirectUrl?: string;
  userAgent?: string;
  ipAddress?: string;
  createdAt: Date;
  expiresAt: Date;
}

/**
 * Wire shape of an OAuth state record (flat JSON, ISO-8601 timestamps)
 */
export const OAuthStateRecordSchema = z.object({
  provider: z.string().min(1),
  redirectUrl: z.string().optional(),
  userAgent: z.string().optional(),
  ipAddress: z.string().optional(),
  createdAt: z.string().datetime(),
  expiresAt: z.string().datetime(),
});

export type OAuthStateRecord = z.infer<typeof OAuthStateRecordSchema>;

export function serializeOAuthState(state: OAuthState): string {
  const record: OAuthStateRecord = {
    provider: state.provider,
    redirectUrl: state.redirectUrl,
    userAgent: state.userAgent,
    ipAddress: state.ipAddress,
    createdAt: state.createdAt.toISOString(),
    expiresAt: state.expiresAt.toISOString(),
  };
  return JSON.stringify(record);
}

/**
 * Parse a stored record, rejecting anything that is not a well-formed state
 */
export function deserializeOAuthState(raw: string): OAuthState {
  const record = OAuthStateRecordSchema.parse(JSON.parse(raw));
  return {
    provider: record.provider,
    redirectUrl: record.redirectUrl,
    userAgent: record.userAgent,
    ipAddress: record.ipAddress,
    createdAt: new Date(record.createdAt),
    expiresAt: new Date(record.expiresAt),
  };
}

/**
 * Truncate an opaque identifier for logging
 */
export function idPrefix(id: string): string {
  return id.substring(0, 16) + '...';
}
