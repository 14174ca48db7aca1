/**
 * Caller roles
 */

export const ROLES = ['user', 'admin'] as const;

export type Role = (typeof ROLES)[number];

/**
 * Coerce any stored or claimed role to a known one; unrecognized values become 'user'
 */
export function parseRole(value: unknown): Role {
  return value === 'admin' ? 'admin' : 'user';
}
