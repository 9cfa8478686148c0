/**
 * Supabase Client Binding
 *
 * Wraps @supabase/supabase-js so that every REST, RPC, storage and edge
 * function request carries the session's current user token.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { Config } from '../config/index.js';
import { ScopedClient } from '../session/scoped-client.js';
import type { RemoteClient } from '../session/types.js';

export type FunctionInvokeOptions = Parameters<SupabaseClient['functions']['invoke']>[1];

const tableQuery = (client: SupabaseClient, table: string) => client.from(table);

export type TableQuery = ReturnType<typeof tableQuery>;

/**
 * Supabase client whose bearer token can be swapped after construction
 *
 * Uses the `accessToken` client option: supabase-js asks for the token on
 * every request instead of managing an auth session itself. The client's
 * `auth` namespace is unavailable in this mode.
 */
export class SupabaseRemoteClient implements RemoteClient<SupabaseClient> {
  readonly client: SupabaseClient;
  private credential: string;

  constructor(config: Config, token: string) {
    this.credential = token;
    this.client = createClient(config.supabaseUrl, config.supabaseKey, {
      accessToken: async () => this.credential,
    });
  }

  applyCredential(token: string): void {
    this.credential = token;
  }
}

/**
 * Scoped Supabase client with automatic token refresh
 *
 * @example
 * const scoped = await createScopedClient('user-123', { config });
 * const { data } = await scoped.execute((db) => db.from('items').select('*'));
 * await scoped.rpc('archive_item', { item_id: 7 });
 */
export class ScopedSupabaseClient extends ScopedClient<SupabaseClient> {
  /**
   * Build and run a table query as the session user
   *
   * @example
   * const { data } = await scoped.from('items', (query) => query.select('id, title').eq('owner', 'u1'));
   */
  from<TResult>(table: string, build: (query: TableQuery) => PromiseLike<TResult>): Promise<TResult> {
    return this.execute((client) => build(tableQuery(client, table)));
  }

  /**
   * Call a Postgres function as the session user
   */
  rpc(fn: string, args: Record<string, unknown> = {}) {
    return this.execute((client) => client.rpc(fn, args));
  }

  /**
   * Invoke an edge function as the session user
   */
  invoke(functionName: string, options?: FunctionInvokeOptions) {
    return this.execute((client) => client.functions.invoke(functionName, options));
  }
}
