/**
 * user.v1.UserService (read-only) over the RPC transport
 */

import { z } from 'zod';
import { USER_SERVICE, type PublicIdentity, type UserService } from '@sessiongate/auth';
import { type RpcMethodTable, defineMethod, methodName } from './rpc-method.js';

const GetUserRequestSchema = z.object({
  id: z.string().default('')
});

const GetCurrentUserRequestSchema = z.object({});

export interface UserMessage {
  id: string;
  name: string;
  email: string;
  role: string;
  externalIds: Record<string, string>;
  lastLoginAt?: string;
  createdAt: string;
  updatedAt: string;
}

export function toUserMessage(identity: PublicIdentity): UserMessage {
  const externalIds: Record<string, string> = {};
  for (const [provider, externalId] of Object.entries(identity.externalIds)) {
    if (externalId) {
      externalIds[provider] = externalId;
    }
  }

  return {
    id: identity.id,
    name: identity.name,
    email: identity.email,
    role: identity.role,
    externalIds,
    lastLoginAt: identity.lastLoginAt?.toISOString(),
    createdAt: identity.createdAt.toISOString(),
    updatedAt: identity.updatedAt.toISOString()
  };
}

export function createUserServiceMethods(users: UserService): RpcMethodTable {
  return new Map([
    [
      methodName(USER_SERVICE, 'GetCurrentUser'),
      defineMethod(GetCurrentUserRequestSchema, async (_request, context) => {
        return { user: toUserMessage(await users.getCurrentUser(context.principal)) };
      })
    ],
    [
      methodName(USER_SERVICE, 'GetUser'),
      defineMethod(GetUserRequestSchema, async (request) => {
        return { user: toUserMessage(await users.getUser(request.id)) };
      })
    ]
  ]);
}
