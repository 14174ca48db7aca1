/**
 * RPC method table
 *
 * A method is a zod request schema plus a handler. Requests are JSON bodies
 * in lowerCamelCase; the first schema issue becomes the invalid_argument
 * message.
 */

import type { z } from 'zod';
import { InvalidArgumentError } from '@sessiongate/auth';
import type { CallContext } from '../server/call-context.js';

export type RpcHandler = (body: unknown, context: CallContext) => Promise<unknown>;

/**
 * Full method name (`/package.Service/Method`) to handler
 */
export type RpcMethodTable = Map<string, RpcHandler>;

export function defineMethod<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  handle: (request: T, context: CallContext) => Promise<unknown>
): RpcHandler {
  return async (body, context) => {
    const parsed = schema.safeParse(body ?? {});
    if (!parsed.success) {
      const [issue] = parsed.error.issues;
      const field = issue.path.join('.');
      throw new InvalidArgumentError(field ? `${field}: ${issue.message}` : issue.message);
    }
    return handle(parsed.data, context);
  };
}

export function methodName(service: string, method: string): string {
  return `/${service}/${method}`;
}

export function mergeMethodTables(...tables: RpcMethodTable[]): RpcMethodTable {
  const merged: RpcMethodTable = new Map();
  for (const table of tables) {
    for (const [name, handler] of table) {
      if (merged.has(name)) {
        throw new Error(`RPC method registered twice: ${name}`);
      }
      merged.set(name, handler);
    }
  }
  return merged;
}
