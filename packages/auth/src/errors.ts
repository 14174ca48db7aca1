/**
 * RPC error taxonomy
 *
 * Every failure that leaves a service method is an RpcError. The transport
 * maps the code to its status and sends `{ code, message }`.
 */

export type RpcCode =
  | 'invalid_argument'
  | 'unauthenticated'
  | 'permission_denied'
  | 'not_found'
  | 'failed_precondition'
  | 'internal'
  | 'canceled'
  | 'deadline_exceeded';

export class RpcError extends Error {
  constructor(
    public readonly code: RpcCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RpcError';
  }
}

export class InvalidArgumentError extends RpcError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('invalid_argument', message, options);
    this.name = 'InvalidArgumentError';
  }
}

export class UnauthenticatedError extends RpcError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('unauthenticated', message, options);
    this.name = 'UnauthenticatedError';
  }
}

export class PermissionDeniedError extends RpcError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('permission_denied', message, options);
    this.name = 'PermissionDeniedError';
  }
}

export class NotFoundError extends RpcError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('not_found', message, options);
    this.name = 'NotFoundError';
  }
}

export class FailedPreconditionError extends RpcError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('failed_precondition', message, options);
    this.name = 'FailedPreconditionError';
  }
}

export class InternalError extends RpcError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('internal', message, options);
    this.name = 'InternalError';
  }
}

export class CanceledError extends RpcError {
  constructor(message: string = 'request canceled', options?: { cause?: unknown }) {
    super('canceled', message, options);
    this.name = 'CanceledError';
  }
}

export class DeadlineExceededError extends RpcError {
  constructor(message: string = 'deadline exceeded', options?: { cause?: unknown }) {
    super('deadline_exceeded', message, options);
    this.name = 'DeadlineExceededError';
  }
}

/**
 * Normalize anything thrown inside a call into an RpcError
 *
 * Abort and timeout errors keep their meaning; everything else becomes a
 * generic internal error so backend details never reach the caller.
 */
export function toRpcError(error: unknown, fallbackMessage: string = 'internal error'): RpcError {
  if (error instanceof RpcError) {
    return error;
  }
  if (error instanceof Error) {
    if (error.name === 'AbortError') {
      return new CanceledError('request canceled', { cause: error });
    }
    if (error.name === 'TimeoutError') {
      return new DeadlineExceededError('deadline exceeded', { cause: error });
    }
  }
  return new InternalError(fallbackMessage, { cause: error });
}

/**
 * Error for a call whose signal fired: the abort reason when available
 */
export function abortedCallError(signal: AbortSignal): RpcError {
  return toRpcError(signal.reason);
}
