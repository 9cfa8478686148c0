/**
 * Client Factory Tests
 *
 * supabase-js is replaced by an in-process fake that records the options
 * each client was created with.
 */

import { beforeEach, describe, test, expect, vi } from 'vitest';
import { issueToken } from '../../src/auth/issuer.js';
import { verifyToken } from '../../src/auth/jwt.js';
import { createScopedClient, getClient } from '../../src/clients/factory.js';
import { ClientError, ConfigurationError } from '../../src/errors/index.js';
import { createClient, lastClientOptions } from '../helpers/supabase.js';
import { T0, TEST_JWT_SECRET, createTestClock, createTestConfig } from '../helpers/jwt.js';

vi.mock('@supabase/supabase-js', async () => import('../helpers/supabase.js'));

const config = createTestConfig();

describe('createScopedClient', () => {
  beforeEach(() => {
    createClient.mockClear();
  });

  test('Creates a client that sends the session token', async () => {
    const scoped = await createScopedClient('u1', { config, clock: createTestClock() });

    expect(createClient).toHaveBeenCalledTimes(1);
    expect(createClient.mock.calls[0]?.slice(0, 2)).toEqual(['http://localhost:54321', 'test-anon-key']);

    const token = await lastClientOptions().accessToken?.();
    expect(token).toBe(issueToken(config, 'u1', { now: T0 }).value);
    expect(scoped.state).toBe('FRESH');
  });

  test('Runs RPC calls under a refreshed token once stale', async () => {
    const clock = createTestClock();
    const scoped = await createScopedClient('u1', { config, clock, refreshThresholdSeconds: 120 });

    clock.set(T0 + 3500);
    const result = await scoped.rpc('archive_item', { item_id: 7 });

    expect(result).toEqual({
      data: {
        fn: 'archive_item',
        args: { item_id: 7 },
        token: issueToken(config, 'u1', { now: T0 + 3500 }).value,
      },
      error: null,
    });
  });

  test('Runs table queries as the session user', async () => {
    const scoped = await createScopedClient('u1', { config, clock: createTestClock() });

    const result = await scoped.from('items', (query) => query.select('id, title'));

    expect(result).toEqual({
      data: {
        table: 'items',
        columns: 'id, title',
        token: issueToken(config, 'u1', { now: T0 }).value,
      },
      error: null,
    });
  });

  test('Invokes edge functions as the session user', async () => {
    const clock = createTestClock();
    const scoped = await createScopedClient('u1', {
      config,
      clock,
      customClaims: { tenant_id: 'acme' },
    });

    const result = await scoped.invoke('send-digest', { body: { week: 12 } });
    const token = result.data?.token;

    expect(result.data?.functionName).toBe('send-digest');
    expect(typeof token).toBe('string');
    if (typeof token === 'string') {
      expect(verifyToken(token, TEST_JWT_SECRET, { now: T0 })['tenant_id']).toBe('acme');
    }
  });

  test('Fails with ClientError for an empty userId', async () => {
    await expect(createScopedClient('', { config })).rejects.toThrow(ClientError);
    expect(createClient).not.toHaveBeenCalled();
  });

  test('Loads configuration from the environment by default', async () => {
    vi.stubEnv('SUPABASE_URL', 'http://localhost:54321/');
    vi.stubEnv('SUPABASE_KEY', 'env-anon-key');
    vi.stubEnv('SUPABASE_JWT_SECRET', TEST_JWT_SECRET);
    try {
      await createScopedClient('u1');

      expect(createClient.mock.calls[0]?.slice(0, 2)).toEqual(['http://localhost:54321', 'env-anon-key']);
    } finally {
      vi.unstubAllEnvs();
    }
  });

  test('Fails with ConfigurationError when the environment is incomplete', async () => {
    vi.stubEnv('SUPABASE_URL', 'http://localhost:54321');
    vi.stubEnv('SUPABASE_KEY', 'env-anon-key');
    vi.stubEnv('SUPABASE_JWT_SECRET', '');
    try {
      await expect(createScopedClient('u1')).rejects.toThrow(ConfigurationError);
    } finally {
      vi.unstubAllEnvs();
    }
  });
});

describe('getClient', () => {
  beforeEach(() => {
    createClient.mockClear();
  });

  test('Sends a fixed bearer token', () => {
    getClient('u1', { config, clock: createTestClock() });

    const options = lastClientOptions();
    expect(options.global?.headers?.['Authorization']).toBe(
      `Bearer ${issueToken(config, 'u1', { now: T0 }).value}`
    );
    expect(options.auth).toEqual({ persistSession: false, autoRefreshToken: false });
    expect(options.accessToken).toBeUndefined();
  });

  test('Applies role and expiry to the token', () => {
    getClient('u1', { config, clock: createTestClock(), role: 'service_role', expirySeconds: 300 });

    const header = lastClientOptions().global?.headers?.['Authorization'] ?? '';
    const claims = verifyToken(header.replace('Bearer ', ''), TEST_JWT_SECRET, { now: T0 });

    expect(claims.role).toBe('service_role');
    expect(claims.exp).toBe(T0 + 300);
  });

  test('Fails with ClientError for an empty userId', () => {
    expect(() => getClient('   ', { config })).toThrow('userId cannot be empty');
    expect(createClient).not.toHaveBeenCalled();
  });
});
