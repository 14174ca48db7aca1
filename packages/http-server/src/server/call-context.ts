/**
 * Per-call context: caller details plus the signal that bounds the call
 *
 * The signal aborts with a DeadlineExceededError when the call deadline
 * passes and with a CanceledError when the client goes away first.
 */

import type { NextFunction, Request, Response } from 'express';
import { CanceledError, DeadlineExceededError, type Principal } from '@sessiongate/auth';
import { extractIpAddress, extractUserAgent } from './client-info.js';

export const REQUEST_TIMEOUT_HEADER = 'x-request-timeout-ms';

export interface CallContext {
  requestId: string;
  fullMethod: string;
  userAgent?: string;
  ipAddress?: string;
  signal: AbortSignal;
  /**
   * Set by the auth gate for user-token calls
   */
  principal?: Principal;
}

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      callContext?: CallContext;
    }
  }
}

/**
 * Effective call timeout: the client's request, capped by the server maximum
 */
export function resolveTimeoutMs(requested: string | undefined, maxTimeoutMs: number): number {
  if (!requested) {
    return maxTimeoutMs;
  }
  const parsed = Number(requested);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    return maxTimeoutMs;
  }
  return Math.min(parsed, maxTimeoutMs);
}

export function createCallContext(req: Request, res: Response, fullMethod: string, maxTimeoutMs: number): CallContext {
  const controller = new AbortController();
  const timeoutMs = resolveTimeoutMs(req.get(REQUEST_TIMEOUT_HEADER), maxTimeoutMs);

  const timer = setTimeout(() => {
    controller.abort(new DeadlineExceededError(`deadline exceeded after ${timeoutMs}ms`));
  }, timeoutMs);
  timer.unref();

  res.on('close', () => {
    clearTimeout(timer);
    if (!res.writableFinished) {
      controller.abort(new CanceledError('client closed request'));
    }
  });

  return {
    requestId: req.requestId ?? '',
    fullMethod,
    userAgent: extractUserAgent(req),
    ipAddress: extractIpAddress(req),
    signal: controller.signal
  };
}

/**
 * Express middleware attaching a CallContext for `/:service/:method`
 */
export function createCallContextMiddleware(maxTimeoutMs: number) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const fullMethod = `/${req.params.service}/${req.params.method}`;
    req.callContext = createCallContext(req, res, fullMethod, maxTimeoutMs);
    next();
  };
}

/**
 * Settles only by rejecting with the abort reason
 */
export function whenAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}
