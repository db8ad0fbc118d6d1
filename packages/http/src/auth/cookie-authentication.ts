import { err, ok, type Result } from 'neverthrow';

import { getHeader, HeaderName, withHeader } from '../core/headers.js';
import { RefreshNotSupportedError } from '../errors.js';
import type { HttpRequest } from '../types.js';

import type { AuthenticationMethod } from './authentication-method.js';

export interface CookieAuthenticationConfig {
  name: string;
  value: string;
  /** Defaults to Cookie. */
  header?: string | undefined;
  /** Append to an existing cookie header instead of replacing it. Defaults to true. */
  appendToExisting?: boolean | undefined;
}

/**
 * A static cookie sent on every request.
 */
export class CookieAuthentication implements AuthenticationMethod {
  private readonly header: string;
  private readonly cookie: string;
  private readonly appendToExisting: boolean;

  constructor(config: CookieAuthenticationConfig) {
    this.header = config.header ?? HeaderName.Cookie;
    this.cookie = `${config.name}=${config.value}`;
    this.appendToExisting = config.appendToExisting ?? true;
  }

  authenticate(request: HttpRequest): Promise<Result<HttpRequest, never>> {
    const existing = getHeader(request.headers, this.header);
    const value = this.appendToExisting && existing ? `${existing}; ${this.cookie}` : this.cookie;
    return Promise.resolve(ok({ ...request, headers: withHeader(request.headers, this.header, value) }));
  }

  shouldReauthenticate(): boolean {
    return false;
  }

  reauthenticate(): Promise<Result<void, RefreshNotSupportedError>> {
    return Promise.resolve(err(new RefreshNotSupportedError()));
  }
}
