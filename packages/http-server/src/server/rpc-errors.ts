/**
 * RPC error to HTTP response mapping
 */

import type { Response } from 'express';
import { type RpcCode, RpcError } from '@sessiongate/auth';

const HTTP_STATUS: Record<RpcCode, number> = {
  invalid_argument: 400,
  unauthenticated: 401,
  permission_denied: 403,
  not_found: 404,
  failed_precondition: 400,
  internal: 500,
  canceled: 499,
  deadline_exceeded: 504
};

export interface RpcErrorBody {
  code: RpcCode;
  message: string;
}

export function httpStatusFor(code: RpcCode): number {
  return HTTP_STATUS[code];
}

export function sendRpcError(res: Response, error: RpcError): void {
  if (res.headersSent) {
    return;
  }
  const body: RpcErrorBody = { code: error.code, message: error.message };
  if (error.code === 'unauthenticated') {
    res.setHeader('WWW-Authenticate', 'Bearer');
  }
  res.status(httpStatusFor(error.code)).json(body);
}
