/**
 * Scoped Client Builder
 *
 * Fluent alternative to createScopedClient().
 *
 * @example
 * const scoped = await new ScopedClientBuilder('user-123', config)
 *   .withRole('authenticated')
 *   .withExpiry(7200)
 *   .withClaims({ tenant_id: 'acme' })
 *   .withRefreshThreshold(120)
 *   .build();
 */

import type { CustomClaims } from '../auth/types.js';
import type { Config } from '../config/index.js';
import type { Logger } from '../logging/index.js';
import type { Clock } from '../utils/clock.js';
import { createScopedClient, type ScopedClientOptions } from './factory.js';
import type { ScopedSupabaseClient } from './supabase.js';

type MutableOptions = { -readonly [K in keyof ScopedClientOptions]: ScopedClientOptions[K] };

export class ScopedClientBuilder {
  private readonly userId: string;
  private readonly options: MutableOptions = {};

  /**
   * @param config - Connection settings; loaded from the environment at build() when omitted
   */
  constructor(userId: string, config?: Config) {
    this.userId = userId;
    if (config !== undefined) this.options.config = config;
  }

  withRole(role: string): this {
    this.options.role = role;
    return this;
  }

  /** Token validity in seconds */
  withExpiry(seconds: number): this {
    this.options.expirySeconds = seconds;
    return this;
  }

  withClaims(claims: CustomClaims): this {
    this.options.customClaims = claims;
    return this;
  }

  /** Seconds before expiry at which the token is re-issued */
  withRefreshThreshold(seconds: number): this {
    this.options.refreshThresholdSeconds = seconds;
    return this;
  }

  withLogger(logger: Logger): this {
    this.options.logger = logger;
    return this;
  }

  withClock(clock: Clock): this {
    this.options.clock = clock;
    return this;
  }

  /**
   * @throws ClientError if userId is empty
   * @throws ConfigurationError if no valid configuration is available
   */
  build(): Promise<ScopedSupabaseClient> {
    return createScopedClient(this.userId, { ...this.options });
  }
}
