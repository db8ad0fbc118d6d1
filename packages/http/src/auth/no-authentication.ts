import { err, ok, type Result } from 'neverthrow';

import { RefreshNotSupportedError, type TaskError } from '../errors.js';
import type { HttpRequest, ResponseMetadata } from '../types.js';

import type { AuthenticationMethod } from './authentication-method.js';

/**
 * Sends requests unchanged.
 */
export class NoAuthentication implements AuthenticationMethod {
  authenticate(request: HttpRequest): Promise<Result<HttpRequest, never>> {
    return Promise.resolve(ok(request));
  }

  shouldReauthenticate(_error: TaskError, _metadata: ResponseMetadata | undefined): boolean {
    return false;
  }

  reauthenticate(): Promise<Result<void, RefreshNotSupportedError>> {
    return Promise.resolve(err(new RefreshNotSupportedError()));
  }
}
