/**
 * Supabase Clients
 *
 * Factories, builder and the Supabase binding of the scoped session facade.
 */

export { createScopedClient, getClient, type ClientOptions, type ScopedClientOptions } from './factory.js';
export { ScopedClientBuilder } from './builder.js';
export { ScopedSupabaseClient, SupabaseRemoteClient, type FunctionInvokeOptions, type TableQuery } from './supabase.js';
