/**
 * Error Type Tests
 */

import { describe, test, expect } from 'vitest';
import {
  ClientError,
  ConfigurationError,
  ExpiredTokenError,
  InvalidSignatureError,
  ScopedClientError,
  TokenError,
  ValidationError,
} from '../../src/errors/index.js';

describe('Errors', () => {
  test('Every error extends ScopedClientError and Error', () => {
    const errors = [
      new ConfigurationError('jwtSecret', 'cannot be empty'),
      new ValidationError('bad'),
      new TokenError('failed'),
      new ClientError('misuse'),
      new InvalidSignatureError(),
      new ExpiredTokenError(100),
    ];

    for (const error of errors) {
      expect(error).toBeInstanceOf(ScopedClientError);
      expect(error).toBeInstanceOf(Error);
    }
  });

  test('ConfigurationError names the field', () => {
    const error = new ConfigurationError('supabaseUrl', 'is required');

    expect(error.message).toBe('supabaseUrl - is required');
    expect(error.fieldName).toBe('supabaseUrl');
    expect(error.reason).toBe('is required');
    expect(error.toString()).toBe('ConfigurationError: supabaseUrl - is required');
  });

  test('ValidationError keeps the offending field', () => {
    expect(new ValidationError('Subject cannot be empty', 'sub').field).toBe('sub');
    expect(new ValidationError('bad').field).toBeUndefined();
  });

  test('TokenError keeps its cause and context', () => {
    const cause = new Error('network down');
    const error = new TokenError('Token refresh failed', cause, { sub: 'u1' });

    expect(error.cause).toBe(cause);
    expect(error.context).toEqual({ sub: 'u1' });
    expect(Object.isFrozen(error.context)).toBe(true);
  });

  test('InvalidSignatureError has a default message', () => {
    expect(new InvalidSignatureError().message).toBe('Token signature is invalid');
  });

  test('ExpiredTokenError reports the expiry', () => {
    const error = new ExpiredTokenError(1_700_003_600);

    expect(error.message).toBe('Token expired at 1700003600');
    expect(error.expiresAt).toBe(1_700_003_600);
    expect(error.name).toBe('ExpiredTokenError');
  });
});
