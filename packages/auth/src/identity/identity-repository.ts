/**
 * Identity storage contract
 *
 * Profile management lives elsewhere; the auth flows only need lookups,
 * first-login creation and last-login bookkeeping.
 */

import type { OAuthProviderName } from '@sessiongate/config';
import type { Role } from '../roles.js';

export interface Identity {
  id: string;
  name: string;
  email: string;
  role: Role;
  externalIds: Partial<Record<OAuthProviderName, string>>;
  passwordHash?: string;
  lastLoginAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

export type NewIdentity = Omit<Identity, 'id' | 'createdAt' | 'updatedAt'>;

export type IdentityChanges = Partial<NewIdentity>;

export interface IdentityRepository {
  getById(id: string): Promise<Identity | null>;
  getByEmail(email: string): Promise<Identity | null>;
  getByExternalId(provider: OAuthProviderName, externalId: string): Promise<Identity | null>;
  create(identity: NewIdentity): Promise<Identity>;
  /**
   * @throws Error when no identity has the id
   */
  update(id: string, changes: IdentityChanges): Promise<Identity>;
}

/**
 * Identity fields that may leave the server
 */
export type PublicIdentity = Omit<Identity, 'passwordHash'>;

export function toPublicIdentity(identity: Identity): PublicIdentity {
  const { passwordHash: _passwordHash, ...rest } = identity;
  return rest;
}
