/**
 * Client Factories
 *
 * Entry points that turn a user ID into a Supabase client acting as that
 * user, with or without automatic token refresh.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { issueToken, type TokenIssuer } from '../auth/issuer.js';
import type { CustomClaims } from '../auth/types.js';
import { loadConfig, type Config } from '../config/index.js';
import { ClientError } from '../errors/index.js';
import { silentLogger, type Logger } from '../logging/index.js';
import { RefreshCoordinator } from '../session/refresh-coordinator.js';
import type { Clock } from '../utils/clock.js';
import { ScopedSupabaseClient, SupabaseRemoteClient } from './supabase.js';

/**
 * Options shared by both factories
 */
export interface ClientOptions {
  /** Connection settings (default: loadConfig() from the environment) */
  readonly config?: Config;
  /** Role claim (default: "authenticated") */
  readonly role?: string;
  readonly customClaims?: CustomClaims;
  /** Token validity in seconds (default: 3600) */
  readonly expirySeconds?: number;
  readonly clock?: Clock;
}

/**
 * Options for auto-refreshing clients
 */
export interface ScopedClientOptions extends ClientOptions {
  /** Seconds before expiry at which the token is re-issued (default: 60) */
  readonly refreshThresholdSeconds?: number;
  readonly logger?: Logger;
  /** Replaces issueToken */
  readonly issuer?: TokenIssuer;
}

function assertUserId(userId: string): void {
  if (!userId || userId.trim().length === 0) {
    throw new ClientError('userId cannot be empty');
  }
}

/**
 * Create a Supabase client that acts as `userId` and keeps its token fresh
 *
 * @throws ClientError if userId is empty
 * @throws ConfigurationError if no valid configuration is available
 */
export async function createScopedClient(
  userId: string,
  options: ScopedClientOptions = {}
): Promise<ScopedSupabaseClient> {
  assertUserId(userId);

  const config = options.config ?? loadConfig();
  const logger = options.logger ?? silentLogger;

  const coordinator = await RefreshCoordinator.start({
    config,
    subject: userId,
    logger,
    ...(options.role !== undefined ? { role: options.role } : {}),
    ...(options.customClaims !== undefined ? { customClaims: options.customClaims } : {}),
    ...(options.expirySeconds !== undefined ? { expirySeconds: options.expirySeconds } : {}),
    ...(options.refreshThresholdSeconds !== undefined
      ? { refreshThresholdSeconds: options.refreshThresholdSeconds }
      : {}),
    ...(options.clock !== undefined ? { clock: options.clock } : {}),
    ...(options.issuer !== undefined ? { issuer: options.issuer } : {}),
  });

  const remote = new SupabaseRemoteClient(config, coordinator.currentToken.value);
  logger.debug('Scoped client created', {
    sub: userId,
    expiresAt: coordinator.currentToken.expiresAt,
  });

  return new ScopedSupabaseClient(remote, coordinator);
}

/**
 * Create a plain Supabase client that acts as `userId`
 *
 * The token is issued once and never refreshed; use for work that finishes
 * well inside `expirySeconds`.
 *
 * @throws ClientError if userId is empty
 * @throws ConfigurationError if no valid configuration is available
 */
export function getClient(userId: string, options: ClientOptions = {}): SupabaseClient {
  assertUserId(userId);

  const config = options.config ?? loadConfig();
  const token = issueToken(config, userId, {
    ...(options.role !== undefined ? { role: options.role } : {}),
    ...(options.customClaims !== undefined ? { customClaims: options.customClaims } : {}),
    ...(options.expirySeconds !== undefined ? { expirySeconds: options.expirySeconds } : {}),
    ...(options.clock !== undefined ? { now: options.clock() } : {}),
  });

  return createClient(config.supabaseUrl, config.supabaseKey, {
    global: {
      headers: { Authorization: `Bearer ${token.value}` },
    },
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
  });
}
