/**
 * Error types for Supabase scoped sessions
 */

/**
 * Base error class for every error raised by this library
 */
export class ScopedClientError extends Error {
  public readonly context: Readonly<Record<string, unknown>>;

  constructor(message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ScopedClientError';
    this.context = Object.freeze({ ...context });
    Object.setPrototypeOf(this, ScopedClientError.prototype);
  }

  override toString(): string {
    return `${this.name}: ${this.message}`;
  }
}

/**
 * Error thrown for missing or invalid configuration (URL, API key, JWT secret)
 */
export class ConfigurationError extends ScopedClientError {
  public readonly fieldName: string;
  public readonly reason: string;

  constructor(fieldName: string, reason: string) {
    super(`${fieldName} - ${reason}`, { fieldName, reason });
    this.name = 'ConfigurationError';
    this.fieldName = fieldName;
    this.reason = reason;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Error thrown when claim building receives malformed input
 */
export class ValidationError extends ScopedClientError {
  public readonly field?: string | undefined;

  constructor(message: string, field?: string) {
    super(message, field !== undefined ? { field } : {});
    this.name = 'ValidationError';
    if (field !== undefined) this.field = field;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Error thrown when a token cannot be signed or re-issued
 *
 * Retryable: a session that hits it stays stale and retries on next access.
 */
export class TokenError extends ScopedClientError {
  constructor(message: string, cause?: unknown, context: Record<string, unknown> = {}) {
    super(message, context, cause !== undefined ? { cause } : undefined);
    this.name = 'TokenError';
    Object.setPrototypeOf(this, TokenError.prototype);
  }
}

/**
 * Error thrown on API misuse (empty subject, use of a discarded session)
 */
export class ClientError extends ScopedClientError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, context);
    this.name = 'ClientError';
    Object.setPrototypeOf(this, ClientError.prototype);
  }
}

/**
 * Error thrown when a token signature does not match, or the token is not a
 * well-formed HS256 JWT
 */
export class InvalidSignatureError extends ScopedClientError {
  constructor(message: string = 'Token signature is invalid', cause?: unknown) {
    super(message, {}, cause !== undefined ? { cause } : undefined);
    this.name = 'InvalidSignatureError';
    Object.setPrototypeOf(this, InvalidSignatureError.prototype);
  }
}

/**
 * Error thrown when a correctly signed token is at or past its `exp`
 */
export class ExpiredTokenError extends ScopedClientError {
  public readonly expiresAt: number;

  constructor(expiresAt: number) {
    super(`Token expired at ${expiresAt}`, { expiresAt });
    this.name = 'ExpiredTokenError';
    this.expiresAt = expiresAt;
    Object.setPrototypeOf(this, ExpiredTokenError.prototype);
  }
}
