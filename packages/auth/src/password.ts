/**
 * Password hashing for local accounts
 */

import bcrypt from 'bcrypt';

export const DEFAULT_BCRYPT_ROUNDS = 10;

export async function hashPassword(password: string, rounds: number = DEFAULT_BCRYPT_ROUNDS): Promise<string> {
  return bcrypt.hash(password, rounds);
}

export async function verifyPassword(password: string, passwordHash: string): Promise<boolean> {
  return bcrypt.compare(password, passwordHash);
}
