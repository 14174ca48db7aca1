/**
 * Errors raised by store implementations
 */

export type PersistenceOperation =
  | 'state.put'
  | 'state.consume'
  | 'state.peek'
  | 'session.create'
  | 'session.resolve'
  | 'session.expiry';

/**
 * Backing store failure (connection loss, unexpected reply, corrupt record)
 */
export class PersistenceError extends Error {
  constructor(
    message: string,
    public readonly operation: PersistenceOperation,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}

/**
 * Abort the operation before it writes anything if the caller has gone away
 */
export function throwIfAborted(signal?: AbortSignal): void {
  signal?.throwIfAborted();
}
