import { err, ok, type Result } from 'neverthrow';

import { HeaderName, withHeader } from '../core/headers.js';
import { RefreshNotSupportedError, type TaskError } from '../errors.js';
import type { HttpRequest, ResponseMetadata } from '../types.js';

import type { AuthenticationMethod } from './authentication-method.js';

export interface HeaderKeyAuthenticationConfig {
  key: string;
  /** Defaults to Authorization. */
  header?: string | undefined;
  /** Written before the key with a space. Defaults to "Bearer"; null sends the bare key. */
  prefix?: string | null | undefined;
}

/**
 * A static key sent in a header on every request.
 */
export class HeaderKeyAuthentication implements AuthenticationMethod {
  private readonly header: string;
  private readonly value: string;

  constructor(config: HeaderKeyAuthenticationConfig) {
    const prefix = config.prefix === undefined ? 'Bearer' : config.prefix;
    this.header = config.header ?? HeaderName.Authorization;
    this.value = prefix === null ? config.key : `${prefix} ${config.key}`;
  }

  authenticate(request: HttpRequest): Promise<Result<HttpRequest, never>> {
    return Promise.resolve(ok({ ...request, headers: withHeader(request.headers, this.header, this.value) }));
  }

  shouldReauthenticate(_error: TaskError, _metadata: ResponseMetadata | undefined): boolean {
    return false;
  }

  reauthenticate(): Promise<Result<void, RefreshNotSupportedError>> {
    return Promise.resolve(err(new RefreshNotSupportedError()));
  }
}
