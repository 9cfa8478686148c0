/**
 * Configuration Tests
 */

import { describe, test, expect, vi } from 'vitest';
import { loadConfig } from '../../src/config/index.js';
import { ConfigurationError } from '../../src/errors/index.js';
import { TEST_JWT_SECRET } from '../helpers/jwt.js';

const env = {
  SUPABASE_URL: 'https://project.example.com',
  SUPABASE_KEY: 'test-anon-key',
  SUPABASE_JWT_SECRET: TEST_JWT_SECRET,
};

function captureError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) return error;
    throw error;
  }
  throw new Error('Expected a ConfigurationError');
}

describe('loadConfig', () => {
  test('Reads settings from the environment', () => {
    expect(loadConfig({}, env)).toEqual({
      supabaseUrl: 'https://project.example.com',
      supabaseKey: 'test-anon-key',
      jwtSecret: TEST_JWT_SECRET,
    });
  });

  test('Prefers overrides over the environment', () => {
    const config = loadConfig({ supabaseKey: 'override-key' }, env);

    expect(config.supabaseKey).toBe('override-key');
    expect(config.supabaseUrl).toBe('https://project.example.com');
  });

  test('Strips trailing slashes from the URL', () => {
    const config = loadConfig({ supabaseUrl: 'http://localhost:54321//' }, env);

    expect(config.supabaseUrl).toBe('http://localhost:54321');
  });

  test('Returns a frozen object', () => {
    expect(Object.isFrozen(loadConfig({}, env))).toBe(true);
  });

  test('Reports a missing URL', () => {
    const error = captureError(() => loadConfig({}, { ...env, SUPABASE_URL: undefined }));

    expect(error.fieldName).toBe('supabaseUrl');
    expect(error.message).toBe('supabaseUrl - supabaseUrl is required');
  });

  test('Reports an invalid URL', () => {
    const error = captureError(() => loadConfig({ supabaseUrl: 'not a url' }, env));

    expect(error.fieldName).toBe('supabaseUrl');
    expect(error.reason).toBe('supabaseUrl must be a valid URL');
  });

  test('Rejects non-HTTP URLs', () => {
    const error = captureError(() => loadConfig({ supabaseUrl: 'ftp://example.com' }, env));

    expect(error.reason).toBe('supabaseUrl must use http or https');
  });

  test('Reports a missing API key', () => {
    const error = captureError(() => loadConfig({}, { ...env, SUPABASE_KEY: undefined }));

    expect(error.fieldName).toBe('supabaseKey');
    expect(error.reason).toBe('supabaseKey is required');
  });

  test('Reports a blank JWT secret', () => {
    const error = captureError(() => loadConfig({ jwtSecret: '   ' }, env));

    expect(error.fieldName).toBe('jwtSecret');
    expect(error.reason).toBe('jwtSecret cannot be empty');
  });

  test('Reads process.env by default', () => {
    vi.stubEnv('SUPABASE_URL', 'http://localhost:54321');
    vi.stubEnv('SUPABASE_KEY', 'test-anon-key');
    vi.stubEnv('SUPABASE_JWT_SECRET', TEST_JWT_SECRET);
    try {
      expect(loadConfig().supabaseUrl).toBe('http://localhost:54321');
    } finally {
      vi.unstubAllEnvs();
    }
  });
});
