/**
 * Login session store interface
 *
 * Maps an opaque session id to the subject that logged in. Sessions slide:
 * every successful resolution restores the full lifetime.
 */

export interface CreatedSession {
  /** 64-character hex session id */
  sessionId: string;
  expiresAt: Date;
}

export interface LoginSessionStore {
  /**
   * Create a session for a subject
   *
   * The id and expiry come back from the same write, so a caller never holds
   * a committed session it could not read the expiry of.
   */
  create(subjectId: string, ttlSeconds: number, signal?: AbortSignal): Promise<CreatedSession>;

  /**
   * Look up a session and reset its lifetime to ttlSeconds in one step
   * @returns the subject id, or null when the session is unknown or expired
   */
  resolve(sessionId: string, ttlSeconds: number, signal?: AbortSignal): Promise<string | null>;

  /**
   * Absolute expiry of a live session
   * @returns null when the session does not exist
   * @throws PersistenceError when the session has no expiry
   */
  remainingExpiry(sessionId: string, signal?: AbortSignal): Promise<Date | null>;

  /**
   * Release connections
   */
  dispose(): Promise<void>;
}
