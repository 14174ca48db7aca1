/**
 * Express adapter for the AuthGate
 *
 * Runs after the call context exists and before the method handler. A
 * rejection is passed to the RPC error handler; admission attaches the
 * principal (user tokens only) to the call context.
 */

import type { NextFunction, Request, Response } from 'express';
import { type AuthGate, InternalError } from '@sessiongate/auth';
import { logger } from '@sessiongate/observability';

export const TOKEN_TYPE_HEADER = 'x-token-type';

export function createAuthGateMiddleware(gate: AuthGate) {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    const context = req.callContext;
    if (!context) {
      next(new InternalError('call context missing'));
      return;
    }

    try {
      const result = await gate.admit({
        fullMethod: context.fullMethod,
        authorization: req.get('authorization'),
        tokenType: req.get(TOKEN_TYPE_HEADER)
      });

      if (result.kind === 'user') {
        context.principal = result.principal;
      }

      logger.debug('Call admitted', {
        requestId: context.requestId,
        method: context.fullMethod,
        kind: result.kind,
        userId: result.kind === 'user' ? result.principal.subjectId : undefined
      });
      next();
    } catch (error) {
      next(error);
    }
  };
}
