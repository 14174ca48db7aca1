/**
 * OAuth state (nonce) store interface
 *
 * Holds pending authorizations between the redirect to the provider and the
 * callback. Every nonce can be consumed at most once.
 */

import type { OAuthState } from '../types.js';

export interface OAuthStateStore {
  /**
   * Store a pending authorization under its nonce
   * @param ttlSeconds - lifetime after which the store evicts the record
   * @param signal - aborts the call before the write is issued
   */
  put(nonce: string, state: OAuthState, ttlSeconds: number, signal?: AbortSignal): Promise<void>;

  /**
   * Atomically read and delete a pending authorization
   * @returns the state, or null when absent (never stored, already consumed, or evicted)
   */
  consume(nonce: string, signal?: AbortSignal): Promise<OAuthState | null>;

  /**
   * Read without consuming (diagnostics)
   */
  peek(nonce: string): Promise<OAuthState | null>;

  /**
   * Release connections
   */
  dispose(): Promise<void>;
}
