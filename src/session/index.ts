/**
 * Session Module
 *
 * Per-session token refresh and the facade that applies it to a remote
 * client.
 */

export { RefreshCoordinator, type RefreshCoordinatorOptions } from './refresh-coordinator.js';
export { ScopedClient, type Operation } from './scoped-client.js';
export type { RemoteClient, SessionState, TokenSource } from './types.js';
