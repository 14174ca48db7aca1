/**
 * RPC routes: `POST /<package.Service>/<Method>` with a JSON body
 *
 * Order per call: method lookup, call context, auth gate, handler. Errors
 * from any step reach the RPC error handler.
 */

import type { NextFunction, Request, RequestHandler, Response, Router } from 'express';
import { type AuthGate, NotFoundError } from '@sessiongate/auth';
import { logger } from '@sessiongate/observability';
import { createAuthGateMiddleware } from '../../middleware/auth-gate-middleware.js';
import type { RpcMethodTable } from '../../services/rpc-method.js';
import { createCallContextMiddleware, whenAborted } from '../call-context.js';

export interface RpcRoutesOptions {
  methods: RpcMethodTable;
  gate: AuthGate;
  maxTimeoutMs: number;
}

export function setupRpcRoutes(router: Router, options: RpcRoutesOptions): void {
  const { methods } = options;

  const requireKnownMethod: RequestHandler = (req, _res, next) => {
    const fullMethod = `/${req.params.service}/${req.params.method}`;
    if (!methods.has(fullMethod)) {
      next(new NotFoundError(`method not found: ${fullMethod}`));
      return;
    }
    next();
  };

  const invoke = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const context = req.callContext;
    const handler = context ? methods.get(context.fullMethod) : undefined;
    if (!context || !handler) {
      next(new NotFoundError('method not found'));
      return;
    }

    try {
      // Settles at the deadline even when a store call ignores the signal
      const response = await Promise.race([handler(req.body, context), whenAborted(context.signal)]);
      res.json(response);
    } catch (error) {
      logger.debug('RPC call failed', { requestId: context.requestId, method: context.fullMethod });
      next(error);
    }
  };

  router.post(
    '/:service/:method',
    requireKnownMethod,
    createCallContextMiddleware(options.maxTimeoutMs),
    createAuthGateMiddleware(options.gate),
    invoke
  );
}
