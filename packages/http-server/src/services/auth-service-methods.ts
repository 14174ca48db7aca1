/**
 * auth.v1.AuthService over the RPC transport
 */

import { z } from 'zod';
import { AUTH_SERVICE, type AuthOrchestrator, type CallInfo } from '@sessiongate/auth';
import type { CallContext } from '../server/call-context.js';
import { type RpcMethodTable, defineMethod, methodName } from './rpc-method.js';

const GetOAuthCodeUrlRequestSchema = z.object({
  provider: z.string().default(''),
  redirectUrl: z.string().optional()
});

const LoginByOAuthRequestSchema = z.object({
  code: z.string().default(''),
  state: z.string().default('')
});

const LoginByPasswordRequestSchema = z.object({
  email: z.string().default(''),
  password: z.string().default('')
});

const GetUserTokenRequestSchema = z.object({
  sessionId: z.string().default('')
});

function callInfo(context: CallContext): CallInfo {
  return {
    userAgent: context.userAgent,
    ipAddress: context.ipAddress,
    signal: context.signal
  };
}

export function createAuthServiceMethods(orchestrator: AuthOrchestrator): RpcMethodTable {
  return new Map([
    [
      methodName(AUTH_SERVICE, 'GetOAuthCodeURL'),
      defineMethod(GetOAuthCodeUrlRequestSchema, async (request, context) => {
        const { url, state } = await orchestrator.getOAuthCodeUrl(
          request.provider,
          request.redirectUrl || undefined,
          callInfo(context)
        );
        return { url, state };
      })
    ],
    [
      methodName(AUTH_SERVICE, 'LoginByOAuth'),
      defineMethod(LoginByOAuthRequestSchema, async (request, context) => {
        const session = await orchestrator.loginByOAuth(request.code, request.state, callInfo(context));
        return { sessionId: session.sessionId, expiresAt: session.expiresAt.toISOString() };
      })
    ],
    [
      methodName(AUTH_SERVICE, 'LoginByPassword'),
      defineMethod(LoginByPasswordRequestSchema, async (request, context) => {
        const session = await orchestrator.loginByPassword(request.email, request.password, callInfo(context));
        return { sessionId: session.sessionId, expiresAt: session.expiresAt.toISOString() };
      })
    ],
    [
      methodName(AUTH_SERVICE, 'GetUserToken'),
      defineMethod(GetUserTokenRequestSchema, async (request, context) => {
        const issued = await orchestrator.getUserToken(request.sessionId, callInfo(context));
        return { token: issued.token, expiresAt: issued.expiresAt.toISOString() };
      })
    ]
  ]);
}
