/**
 * In-memory identity repository for development and tests
 */

import { randomUUID } from 'node:crypto';
import type { OAuthProviderName } from '@sessiongate/config';
import type { Identity, IdentityChanges, IdentityRepository, NewIdentity } from './identity-repository.js';

export class IdentityConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IdentityConflictError';
  }
}

function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export class MemoryIdentityRepository implements IdentityRepository {
  private readonly identities = new Map<string, Identity>();

  async getById(id: string): Promise<Identity | null> {
    const identity = this.identities.get(id);
    return identity ? { ...identity } : null;
  }

  async getByEmail(email: string): Promise<Identity | null> {
    const wanted = normalizeEmail(email);
    for (const identity of this.identities.values()) {
      if (normalizeEmail(identity.email) === wanted) {
        return { ...identity };
      }
    }
    return null;
  }

  async getByExternalId(provider: OAuthProviderName, externalId: string): Promise<Identity | null> {
    for (const identity of this.identities.values()) {
      if (identity.externalIds[provider] === externalId) {
        return { ...identity };
      }
    }
    return null;
  }

  async create(identity: NewIdentity): Promise<Identity> {
    if (await this.getByEmail(identity.email)) {
      throw new IdentityConflictError('email already registered');
    }
    for (const [provider, externalId] of Object.entries(identity.externalIds)) {
      if (externalId && this.findExternal(provider, externalId)) {
        throw new IdentityConflictError(`${provider} account already linked`);
      }
    }

    const now = new Date();
    const created: Identity = {
      ...identity,
      externalIds: { ...identity.externalIds },
      id: randomUUID(),
      createdAt: now,
      updatedAt: now
    };
    this.identities.set(created.id, created);
    return { ...created };
  }

  async update(id: string, changes: IdentityChanges): Promise<Identity> {
    const existing = this.identities.get(id);
    if (!existing) {
      throw new Error(`Identity ${id} not found`);
    }

    const updated: Identity = { ...existing, ...changes, id, updatedAt: new Date() };
    this.identities.set(id, updated);
    return { ...updated };
  }

  /**
   * @internal
   */
  get size(): number {
    return this.identities.size;
  }

  private findExternal(provider: string, externalId: string): Identity | undefined {
    for (const identity of this.identities.values()) {
      for (const [linkedProvider, linkedId] of Object.entries(identity.externalIds)) {
        if (linkedProvider === provider && linkedId === externalId) {
          return identity;
        }
      }
    }
    return undefined;
  }
}
