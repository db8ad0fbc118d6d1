import { getLogger, type Logger } from '@endpointkit/logger';
import { err, ok, type Result } from 'neverthrow';

import { raceAbort } from '../core/abort.js';
import { HeaderName, withHeader } from '../core/headers.js';
import {
  CancelledError,
  describeCause,
  metadataOf,
  NoRefreshTokenError,
  NotAuthenticatedError,
  RefreshFailedError,
  type AuthenticationError,
  type ReauthenticationError,
  type TaskError,
} from '../errors.js';
import type { HttpRequest, ResponseMetadata } from '../types.js';

import type { AuthenticationMethod, AuthenticationOptions } from './authentication-method.js';

export interface TokenPair {
  readonly accessToken: string;
  readonly refreshToken: string;
}

/**
 * Exchanges a refresh token for a new pair. `signal` aborts when the refresh
 * is superseded by `setCredentials` or `clearCredentials`.
 */
export type RefreshFunction = (refreshToken: string, options: { signal: AbortSignal }) => Promise<TokenPair>;

export interface TokenPairAuthenticationConfig {
  credentials?: TokenPair | undefined;
  refresh: RefreshFunction;
  /** Defaults to Authorization. */
  header?: string | undefined;
  /** Defaults to "Bearer"; null sends the bare token. */
  tokenPrefix?: string | null | undefined;
  /** Statuses that trigger a refresh. Defaults to [401]. */
  refreshTriggerStatusCodes?: readonly number[] | undefined;
  onCredentialsUpdated?: ((credentials: TokenPair) => void | Promise<void>) | undefined;
  onRefreshFailed?: ((error: RefreshFailedError) => void | Promise<void>) | undefined;
}

type RefreshOutcome = Result<void, NoRefreshTokenError | RefreshFailedError>;

interface PendingRefresh {
  readonly controller: AbortController;
  readonly promise: Promise<RefreshOutcome>;
}

const SUPERSEDED = Symbol('superseded');

/**
 * Access/refresh token pair with coalesced refresh: however many callers ask
 * for a refresh while one is running, the refresh function runs once and
 * every caller gets its outcome.
 */
export class TokenPairAuthentication implements AuthenticationMethod {
  private readonly logger: Logger;
  private readonly refresh: RefreshFunction;
  private readonly header: string;
  private readonly tokenPrefix: string | null;
  private readonly triggerStatusCodes: ReadonlySet<number>;
  private readonly onCredentialsUpdated: TokenPairAuthenticationConfig['onCredentialsUpdated'];
  private readonly onRefreshFailed: TokenPairAuthenticationConfig['onRefreshFailed'];

  private credentials: TokenPair | undefined;
  private pending: PendingRefresh | undefined;
  // Bumped whenever credentials are replaced from outside; a refresh started
  // under an older generation must not write its result
  private generation = 0;

  constructor(config: TokenPairAuthenticationConfig) {
    this.logger = getLogger('TokenPairAuthentication');
    this.refresh = config.refresh;
    this.header = config.header ?? HeaderName.Authorization;
    this.tokenPrefix = config.tokenPrefix === undefined ? 'Bearer' : config.tokenPrefix;
    this.triggerStatusCodes = new Set(config.refreshTriggerStatusCodes ?? [401]);
    this.onCredentialsUpdated = config.onCredentialsUpdated;
    this.onRefreshFailed = config.onRefreshFailed;
    this.credentials = config.credentials ? { ...config.credentials } : undefined;
  }

  get isAuthenticated(): boolean {
    return this.credentials !== undefined;
  }

  get isRefreshing(): boolean {
    return this.pending !== undefined;
  }

  getCredentials(): TokenPair | undefined {
    return this.credentials ? { ...this.credentials } : undefined;
  }

  /**
   * Replace the credentials. Cancels any refresh in flight.
   */
  setCredentials(credentials: TokenPair): void {
    this.supersedePendingRefresh();
    this.credentials = { ...credentials };
  }

  /**
   * Forget the credentials. Cancels any refresh in flight.
   */
  clearCredentials(): void {
    this.supersedePendingRefresh();
    this.credentials = undefined;
  }

  async authenticate(
    request: HttpRequest,
    options: AuthenticationOptions = {}
  ): Promise<Result<HttpRequest, AuthenticationError>> {
    const { signal } = options;

    if (this.pending) {
      // The outcome itself does not matter: on failure we fall through to
      // whatever credentials are left
      const waited = await this.waitForRefresh(this.pending, signal);
      if (waited.isErr() && waited.error instanceof CancelledError) {
        return err(waited.error);
      }
    }

    if (signal?.aborted) {
      return err(new CancelledError(signal.reason));
    }

    const credentials = this.credentials;
    if (!credentials) {
      return err(new NotAuthenticatedError());
    }

    const value = this.tokenPrefix === null ? credentials.accessToken : `${this.tokenPrefix} ${credentials.accessToken}`;
    return ok({ ...request, headers: withHeader(request.headers, this.header, value) });
  }

  shouldReauthenticate(error: TaskError, metadata: ResponseMetadata | undefined): boolean {
    const status = metadata?.status ?? metadataOf(error)?.status;
    return status !== undefined && this.triggerStatusCodes.has(status);
  }

  async reauthenticate(options: AuthenticationOptions = {}): Promise<Result<void, ReauthenticationError>> {
    const { signal } = options;
    if (signal?.aborted) {
      return err(new CancelledError(signal.reason));
    }

    if (this.pending) {
      this.logger.debug('Refresh already in flight, waiting for it');
      return this.waitForRefresh(this.pending, signal);
    }

    const credentials = this.credentials;
    if (!credentials) {
      return err(new NoRefreshTokenError());
    }

    return this.waitForRefresh(this.startRefresh(credentials.refreshToken), signal);
  }

  private waitForRefresh(
    pending: PendingRefresh,
    signal: AbortSignal | undefined
  ): Promise<Result<void, ReauthenticationError>> {
    return raceAbort<RefreshOutcome, Result<void, ReauthenticationError>>(pending.promise, signal, (reason) =>
      err(new CancelledError(reason))
    );
  }

  /**
   * Publish the refresh as the in-flight handle before the refresh function
   * runs, so every caller arriving from now on joins it.
   */
  private startRefresh(refreshToken: string): PendingRefresh {
    const controller = new AbortController();
    const generation = this.generation;

    const promise: Promise<RefreshOutcome> = Promise.resolve()
      .then(() => this.runRefresh(refreshToken, generation, controller.signal))
      .finally(() => {
        if (this.pending?.promise === promise) {
          this.pending = undefined;
        }
      });

    const pending = { controller, promise };
    this.pending = pending;
    return pending;
  }

  private async runRefresh(refreshToken: string, generation: number, signal: AbortSignal): Promise<RefreshOutcome> {
    if (signal.aborted || generation !== this.generation) {
      return this.supersededOutcome();
    }

    this.logger.debug('Refreshing credentials');

    let refreshed: TokenPair | typeof SUPERSEDED;
    try {
      refreshed = await raceAbort(this.refresh(refreshToken, { signal }), signal, (): typeof SUPERSEDED => SUPERSEDED);
    } catch (error) {
      if (generation !== this.generation) {
        return this.supersededOutcome();
      }
      const failure = new RefreshFailedError(error);
      this.logger.warn({ error: describeCause(error) }, 'Credential refresh failed');
      await this.notify('onRefreshFailed', () => this.onRefreshFailed?.(failure));
      return err(failure);
    }

    if (refreshed === SUPERSEDED || generation !== this.generation) {
      return this.supersededOutcome();
    }

    const credentials: TokenPair = { ...refreshed };
    this.credentials = credentials;
    this.logger.debug('Credentials refreshed');
    await this.notify('onCredentialsUpdated', () => this.onCredentialsUpdated?.({ ...credentials }));
    return ok(undefined);
  }

  /**
   * Outcome for waiters of a refresh that was overtaken by setCredentials or
   * clearCredentials: whatever credentials are current now.
   */
  private supersededOutcome(): RefreshOutcome {
    this.logger.debug('Refresh superseded by an explicit credential change');
    return this.credentials ? ok(undefined) : err(new NoRefreshTokenError());
  }

  private supersedePendingRefresh(): void {
    this.generation += 1;
    const pending = this.pending;
    this.pending = undefined;
    pending?.controller.abort(new Error('Refresh superseded by a credential change'));
  }

  private async notify(name: string, callback: () => void | Promise<void>): Promise<void> {
    try {
      await callback();
    } catch (error) {
      this.logger.error({ error: describeCause(error) }, `${name} callback failed`);
    }
  }
}
