/**
 * Read-only user lookups behind user.v1.UserService
 */

import { InvalidArgumentError, NotFoundError, UnauthenticatedError } from './errors.js';
import type { Principal } from './auth-gate.js';
import { type IdentityRepository, type PublicIdentity, toPublicIdentity } from './identity/identity-repository.js';

export class UserService {
  constructor(private readonly identities: IdentityRepository) {}

  /**
   * GetCurrentUser: the identity behind the caller's token
   */
  async getCurrentUser(principal: Principal | undefined): Promise<PublicIdentity> {
    if (!principal) {
      throw new UnauthenticatedError('no authenticated user');
    }
    return this.getUser(principal.subjectId);
  }

  /**
   * GetUser
   */
  async getUser(id: string): Promise<PublicIdentity> {
    if (!id) {
      throw new InvalidArgumentError('id is required');
    }
    const identity = await this.identities.getById(id);
    if (!identity) {
      throw new NotFoundError('user not found');
    }
    return toPublicIdentity(identity);
  }
}
