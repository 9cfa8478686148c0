/**
 * Scoped Client
 *
 * Facade over a remote client and a token source. Every operation first
 * waits for a valid token, applies it as the client's bearer credential,
 * then runs unchanged. Errors from the operation propagate untouched;
 * there is no retry around the operation itself.
 */

import type { Token } from '../auth/types.js';
import type { RemoteClient, SessionState, TokenSource } from './types.js';

export type Operation<TClient, TResult> = (client: TClient) => PromiseLike<TResult> | TResult;

export class ScopedClient<TClient> {
  protected readonly remote: RemoteClient<TClient>;
  protected readonly tokens: TokenSource;

  constructor(remote: RemoteClient<TClient>, tokens: TokenSource) {
    this.remote = remote;
    this.tokens = tokens;
  }

  get state(): SessionState {
    return this.tokens.state;
  }

  /**
   * Run an operation against the remote client under a valid credential
   *
   * If the credential cannot be refreshed, the TokenError surfaces here and
   * the operation never runs.
   *
   * @example
   * const { data } = await scoped.execute((client) => client.from('items').select('*'));
   */
  execute<TResult>(operation: Operation<TClient, TResult>): Promise<TResult> {
    return this.tokens.getValidToken().then((token) => {
      this.remote.applyCredential(token.value);
      return operation(this.remote.client);
    });
  }

  /**
   * Current valid token, refreshing first if needed
   */
  async getToken(): Promise<Token> {
    const token = await this.tokens.getValidToken();
    this.remote.applyCredential(token.value);
    return token;
  }

  /**
   * Discard the session; later calls fail with ClientError
   */
  discard(): void {
    this.tokens.discard();
  }
}
