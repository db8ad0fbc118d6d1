import type { Result } from 'neverthrow';

import type { AuthenticationError, ReauthenticationError, TaskError } from '../errors.js';
import type { HttpRequest, ResponseMetadata } from '../types.js';

export interface AuthenticationOptions {
  signal?: AbortSignal | undefined;
}

/**
 * Attaches credentials to requests and, for methods that can, refreshes them
 * after the server rejects a request.
 */
export interface AuthenticationMethod {
  authenticate(
    request: HttpRequest,
    options?: AuthenticationOptions
  ): Promise<Result<HttpRequest, AuthenticationError>>;

  /**
   * Whether `error` should trigger one reauthentication and retry.
   * `metadata` is the raw response of the failed attempt, when there was one.
   */
  shouldReauthenticate(error: TaskError, metadata: ResponseMetadata | undefined): boolean;

  reauthenticate(options?: AuthenticationOptions): Promise<Result<void, ReauthenticationError>>;
}
