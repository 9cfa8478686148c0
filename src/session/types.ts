/**
 * Session Type Definitions
 */

import type { Token } from '../auth/types.js';

/**
 * Refresh state of a session
 *
 * - FRESH: remaining lifetime > refresh threshold
 * - STALE: remaining lifetime <= refresh threshold, next use re-issues
 * - REFRESHING: a re-issuance is in flight
 * - DISCARDED: torn down, every call fails
 */
export type SessionState = 'FRESH' | 'STALE' | 'REFRESHING' | 'DISCARDED';

/**
 * Remote client that accepts a bearer token after construction
 */
export interface RemoteClient<TClient> {
  /** The wrapped client operations are run against */
  readonly client: TClient;

  /** Replace the bearer credential used for subsequent requests */
  applyCredential(token: string): void;
}

/**
 * Anything that can hand out a currently valid token
 */
export interface TokenSource {
  readonly state: SessionState;
  getValidToken(): Promise<Token>;
  discard(): void;
}
