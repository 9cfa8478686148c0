/**
 * Refresh Coordinator
 *
 * Holds the current token of one session and re-issues it when it gets
 * close to expiry. Staleness is checked lazily on every getValidToken()
 * call; there is no background timer.
 *
 * At most one re-issuance runs per session. Callers that arrive while it is
 * in flight share its promise, so they all see the same token or the same
 * TokenError. A failed attempt is not cached: the session stays STALE and
 * the next call starts a new attempt.
 */

import { issueToken, type TokenIssuer } from '../auth/issuer.js';
import type { CustomClaims, Token } from '../auth/types.js';
import type { Config } from '../config/index.js';
import { ClientError, TokenError, ValidationError } from '../errors/index.js';
import { silentLogger, type Logger } from '../logging/index.js';
import { systemClock, type Clock } from '../utils/clock.js';
import {
  DEFAULT_EXPIRY_SECONDS,
  DEFAULT_REFRESH_THRESHOLD_SECONDS,
  ROLE_AUTHENTICATED,
} from '../utils/constants.js';
import type { SessionState, TokenSource } from './types.js';

/**
 * Session settings
 */
export interface RefreshCoordinatorOptions {
  readonly config: Config;

  /** ID of the user the session acts as */
  readonly subject: string;

  /** Role claim (default: "authenticated") */
  readonly role?: string;

  readonly customClaims?: CustomClaims;

  /** Lifetime of each issued token in seconds (default: 3600) */
  readonly expirySeconds?: number;

  /** Re-issue once remaining lifetime is at or below this (default: 60) */
  readonly refreshThresholdSeconds?: number;

  readonly clock?: Clock;
  readonly logger?: Logger;

  /** Replaces issueToken, e.g. to delegate signing elsewhere */
  readonly issuer?: TokenIssuer;
}

function assertSubject(subject: string): void {
  if (!subject || subject.trim().length === 0) {
    throw new ClientError('userId cannot be empty');
  }
}

function assertThreshold(threshold: number, expirySeconds: number): void {
  if (!Number.isInteger(threshold) || threshold < 0) {
    throw new ValidationError('Refresh threshold must be a non-negative whole number of seconds', 'refreshThresholdSeconds');
  }

  // A non-positive expiry is left for the claim builder to report.
  if (expirySeconds > 0 && threshold >= expirySeconds) {
    throw new ValidationError(
      `Refresh threshold (${threshold}s) must be smaller than the token lifetime (${expirySeconds}s)`,
      'refreshThresholdSeconds'
    );
  }
}

export class RefreshCoordinator implements TokenSource {
  private current: Token;
  private inFlight: Promise<Token> | null = null;
  private discarded = false;

  private readonly config: Config;
  private readonly role: string;
  private readonly customClaims: CustomClaims;
  private readonly expirySeconds: number;
  private readonly refreshThreshold: number;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly issuer: TokenIssuer;

  readonly subject: string;

  /**
   * Issue the initial token and return a coordinator holding it
   *
   * @throws ClientError if subject is empty
   * @throws ValidationError for a bad threshold, expiry or custom claims
   */
  static async start(options: RefreshCoordinatorOptions): Promise<RefreshCoordinator> {
    assertSubject(options.subject);
    assertThreshold(
      options.refreshThresholdSeconds ?? DEFAULT_REFRESH_THRESHOLD_SECONDS,
      options.expirySeconds ?? DEFAULT_EXPIRY_SECONDS
    );

    const issuer = options.issuer ?? issueToken;
    const clock = options.clock ?? systemClock;
    const token = await issuer(options.config, options.subject, {
      role: options.role ?? ROLE_AUTHENTICATED,
      customClaims: options.customClaims ?? {},
      expirySeconds: options.expirySeconds ?? DEFAULT_EXPIRY_SECONDS,
      now: clock(),
    });

    return new RefreshCoordinator(options, token);
  }

  constructor(options: RefreshCoordinatorOptions, initialToken: Token) {
    assertSubject(options.subject);

    this.subject = options.subject;
    this.config = options.config;
    this.role = options.role ?? ROLE_AUTHENTICATED;
    this.customClaims = options.customClaims ?? {};
    this.expirySeconds = options.expirySeconds ?? DEFAULT_EXPIRY_SECONDS;
    this.refreshThreshold = options.refreshThresholdSeconds ?? DEFAULT_REFRESH_THRESHOLD_SECONDS;
    this.clock = options.clock ?? systemClock;
    this.issuer = options.issuer ?? issueToken;
    this.logger = (options.logger ?? silentLogger).child({ sub: options.subject });

    assertThreshold(this.refreshThreshold, this.expirySeconds);
    this.current = initialToken;
  }

  get state(): SessionState {
    if (this.discarded) return 'DISCARDED';
    if (this.inFlight) return 'REFRESHING';
    return this.isStale() ? 'STALE' : 'FRESH';
  }

  /**
   * Most recently issued token, without any freshness check
   */
  get currentToken(): Token {
    return this.current;
  }

  /**
   * Return a token that is not expired, re-issuing it first if stale
   *
   * @throws ClientError if the session was discarded
   * @throws TokenError if the re-issuance this call waited on failed
   */
  async getValidToken(): Promise<Token> {
    if (this.discarded) {
      throw new ClientError('Session has been discarded', { sub: this.subject });
    }

    if (this.inFlight) {
      return this.inFlight;
    }

    if (!this.isStale()) {
      return this.current;
    }

    const attempt = this.reissue().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = attempt;
    return attempt;
  }

  /**
   * Tear the session down. An in-flight re-issuance still settles for the
   * callers already waiting on it.
   */
  discard(): void {
    if (this.discarded) return;
    this.discarded = true;
    this.logger.info('Session discarded', { refreshing: this.inFlight !== null });
  }

  private isStale(): boolean {
    return this.clock() + this.refreshThreshold >= this.current.expiresAt;
  }

  private async reissue(): Promise<Token> {
    const now = this.clock();
    this.logger.debug('Refreshing token', { expiresAt: this.current.expiresAt, now });

    let token: Token;
    try {
      token = await this.issuer(this.config, this.subject, {
        role: this.role,
        customClaims: this.customClaims,
        expirySeconds: this.expirySeconds,
        now,
      });
    } catch (error) {
      const failure =
        error instanceof TokenError ? error : new TokenError('Token refresh failed', error, { sub: this.subject });
      this.logger.warn('Token refresh failed', { error: failure.message });
      throw failure;
    }

    if (token.expiresAt <= this.clock()) {
      throw new TokenError('Re-issued token is already expired', undefined, {
        sub: this.subject,
        expiresAt: token.expiresAt,
      });
    }

    this.current = token;
    this.logger.debug('Token refreshed', { expiresAt: token.expiresAt });
    return token;
  }
}
