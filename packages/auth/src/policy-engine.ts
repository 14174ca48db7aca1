/**
 * Role-based access policy for RPC methods
 *
 * The table maps a role to the method patterns it may call:
 * an exact full method (`/user.v1.UserService/GetUser`), a whole service
 * (`/user.v1.UserService/*`) or everything (`*`).
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { logger } from '@sessiongate/observability';
import type { Role } from './roles.js';

export const DEFAULT_POLICY_FILE = fileURLToPath(new URL('../policy/rbac-policy.json', import.meta.url));

export const PolicyTableSchema = z.object({
  roles: z.record(z.string(), z.array(z.string().min(1)))
});

export type PolicyTable = z.infer<typeof PolicyTableSchema>;

/**
 * Raised for every decision when the policy could not be loaded and the
 * engine is not allowed to fail open
 */
export class PolicyUnavailableError extends Error {
  constructor(options?: { cause?: unknown }) {
    super('authorization policy unavailable', options);
    this.name = 'PolicyUnavailableError';
  }
}

export interface PolicyLoadOptions {
  file?: string;
  failOpen?: boolean;
}

function matches(pattern: string, fullMethod: string): boolean {
  if (pattern === '*') {
    return true;
  }
  if (pattern.endsWith('/*')) {
    return fullMethod.startsWith(pattern.slice(0, -1));
  }
  return pattern === fullMethod;
}

export class PolicyEngine {
  private constructor(
    private readonly table: PolicyTable | null,
    private readonly failOpen: boolean,
    private readonly loadError?: unknown
  ) {}

  /**
   * Build an engine from an in-memory table
   * @throws ZodError when the table is malformed
   */
  static fromTable(table: unknown): PolicyEngine {
    return new PolicyEngine(PolicyTableSchema.parse(table), false);
  }

  /**
   * Load the policy file once at startup. Never throws: a missing or invalid
   * file yields an unavailable engine.
   */
  static async load(options: PolicyLoadOptions = {}): Promise<PolicyEngine> {
    const file = options.file ?? DEFAULT_POLICY_FILE;
    const failOpen = options.failOpen ?? false;

    try {
      const table = PolicyTableSchema.parse(JSON.parse(await readFile(file, 'utf8')));
      logger.info('Authorization policy loaded', { file, roles: Object.keys(table.roles) });
      return new PolicyEngine(table, failOpen);
    } catch (error) {
      if (failOpen) {
        logger.error('Authorization policy failed to load - POLICY_FAIL_OPEN is set, every authenticated call will be allowed', error);
      } else {
        logger.error('Authorization policy failed to load - protected calls will be rejected', error);
      }
      return new PolicyEngine(null, failOpen, error);
    }
  }

  get available(): boolean {
    return this.table !== null;
  }

  get failsOpen(): boolean {
    return this.failOpen;
  }

  /**
   * @throws PolicyUnavailableError when the engine has no policy and fails closed
   */
  isAllowed(role: Role, fullMethod: string): boolean {
    if (!this.table) {
      if (this.failOpen) {
        logger.warn('Authorization policy unavailable - allowing call', { role, method: fullMethod });
        return true;
      }
      throw new PolicyUnavailableError({ cause: this.loadError });
    }

    const patterns = this.table.roles[role] ?? [];
    return patterns.some((pattern) => matches(pattern, fullMethod));
  }
}
