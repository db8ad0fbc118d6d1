import { describe, expect, it, vi } from 'vitest';

import {
  TokenPairAuthentication,
  type RefreshFunction,
  type TokenPair,
} from '../auth/token-pair-authentication.js';
import {
  CancelledError,
  ErrorResponseError,
  NoRefreshTokenError,
  NotAuthenticatedError,
  RefreshFailedError,
  TransportFailureError,
  UnexpectedStatusError,
} from '../errors.js';
import type { HttpRequest } from '../types.js';

const initial: TokenPair = { accessToken: 'access-1', refreshToken: 'refresh-1' };
const rotated: TokenPair = { accessToken: 'access-2', refreshToken: 'refresh-2' };

const request: HttpRequest = { headers: {}, method: 'GET', url: 'https://api.example.com/me' };

function deferred<T>() {
  const handlers: { resolve?: (value: T) => void; reject?: (reason: unknown) => void } = {};
  const promise = new Promise<T>((resolve, reject) => {
    handlers.resolve = resolve;
    handlers.reject = reject;
  });
  return {
    promise,
    reject: (reason: unknown) => handlers.reject?.(reason),
    resolve: (value: T) => handlers.resolve?.(value),
  };
}

describe('TokenPairAuthentication', () => {
  describe('authenticate', () => {
    it('should attach the access token', async () => {
      const authentication = new TokenPairAuthentication({ credentials: initial, refresh: vi.fn() });

      const result = await authentication.authenticate(request);

      expect(result._unsafeUnwrap().headers).toEqual({ Authorization: 'Bearer access-1' });
    });

    it('should honour a custom header and bare tokens', async () => {
      const authentication = new TokenPairAuthentication({
        credentials: initial,
        header: 'X-Access-Token',
        refresh: vi.fn(),
        tokenPrefix: null,
      });

      const result = await authentication.authenticate(request);

      expect(result._unsafeUnwrap().headers).toEqual({ 'X-Access-Token': 'access-1' });
    });

    it('should fail without credentials', async () => {
      const authentication = new TokenPairAuthentication({ refresh: vi.fn() });

      expect(authentication.isAuthenticated).toBe(false);
      expect((await authentication.authenticate(request))._unsafeUnwrapErr()).toBeInstanceOf(NotAuthenticatedError);
    });

    it('should wait for a refresh in flight and use its token', async () => {
      const pending = deferred<TokenPair>();
      const authentication = new TokenPairAuthentication({ credentials: initial, refresh: () => pending.promise });

      const refreshing = authentication.reauthenticate();
      const authenticating = authentication.authenticate(request);
      pending.resolve(rotated);

      expect((await refreshing).isOk()).toBe(true);
      expect((await authenticating)._unsafeUnwrap().headers).toEqual({ Authorization: 'Bearer access-2' });
    });

    it('should stop waiting when its own signal aborts', async () => {
      const pending = deferred<TokenPair>();
      const authentication = new TokenPairAuthentication({ credentials: initial, refresh: () => pending.promise });
      const controller = new AbortController();

      const refreshing = authentication.reauthenticate();
      const authenticating = authentication.authenticate(request, { signal: controller.signal });
      controller.abort();

      expect((await authenticating)._unsafeUnwrapErr()).toBeInstanceOf(CancelledError);
      pending.resolve(rotated);
      expect((await refreshing).isOk()).toBe(true);
    });
  });

  describe('shouldReauthenticate', () => {
    it('should trigger on 401 by default', () => {
      const authentication = new TokenPairAuthentication({ credentials: initial, refresh: vi.fn() });
      const unauthorized = { headers: {}, status: 401 };
      const failing = { headers: {}, status: 500 };

      expect(authentication.shouldReauthenticate(new UnexpectedStatusError(unauthorized), unauthorized)).toBe(true);
      expect(authentication.shouldReauthenticate(new UnexpectedStatusError(failing), failing)).toBe(false);
    });

    it('should read the status from the error when no metadata is given', () => {
      const authentication = new TokenPairAuthentication({
        credentials: initial,
        refresh: vi.fn(),
        refreshTriggerStatusCodes: [401, 403],
      });

      const forbidden = new ErrorResponseError({ headers: {}, status: 403 }, { message: 'forbidden' });

      expect(authentication.shouldReauthenticate(forbidden, undefined)).toBe(true);
      const transportFailure = new TransportFailureError(new Error('socket hang up'));

      expect(authentication.shouldReauthenticate(transportFailure, undefined)).toBe(false);
    });
  });

  describe('reauthenticate', () => {
    it('should run one refresh for concurrent callers', async () => {
      const pending = deferred<TokenPair>();
      const refresh = vi.fn<RefreshFunction>(() => pending.promise);
      const onCredentialsUpdated = vi.fn();
      const authentication = new TokenPairAuthentication({ credentials: initial, onCredentialsUpdated, refresh });

      const calls = [authentication.reauthenticate(), authentication.reauthenticate(), authentication.reauthenticate()];
      expect(authentication.isRefreshing).toBe(true);
      pending.resolve(rotated);
      const results = await Promise.all(calls);

      expect(results.every((result) => result.isOk())).toBe(true);
      expect(refresh).toHaveBeenCalledTimes(1);
      expect(refresh.mock.calls[0]?.[0]).toBe('refresh-1');
      expect(onCredentialsUpdated).toHaveBeenCalledTimes(1);
      expect(onCredentialsUpdated).toHaveBeenCalledWith(rotated);
      expect(authentication.getCredentials()).toEqual(rotated);
      expect(authentication.isRefreshing).toBe(false);
    });

    it('should share a failure with every caller', async () => {
      const refresh = vi.fn<RefreshFunction>(() => Promise.reject(new Error('invalid_grant')));
      const onRefreshFailed = vi.fn();
      const authentication = new TokenPairAuthentication({ credentials: initial, onRefreshFailed, refresh });

      const results = await Promise.all([authentication.reauthenticate(), authentication.reauthenticate()]);

      for (const result of results) {
        const error = result._unsafeUnwrapErr();
        expect(error).toBeInstanceOf(RefreshFailedError);
        expect(error.message).toBe('Token refresh failed: invalid_grant');
      }
      expect(refresh).toHaveBeenCalledTimes(1);
      expect(onRefreshFailed).toHaveBeenCalledTimes(1);
      expect(authentication.getCredentials()).toEqual(initial);
    });

    it('should start a new refresh after the previous one settled', async () => {
      const refresh = vi.fn<RefreshFunction>(() => Promise.resolve(rotated));
      const authentication = new TokenPairAuthentication({ credentials: initial, refresh });

      await authentication.reauthenticate();
      await authentication.reauthenticate();

      expect(refresh).toHaveBeenCalledTimes(2);
      expect(refresh.mock.calls[1]?.[0]).toBe('refresh-2');
    });

    it('should fail without a refresh token', async () => {
      const refresh = vi.fn<RefreshFunction>();
      const authentication = new TokenPairAuthentication({ refresh });

      expect((await authentication.reauthenticate())._unsafeUnwrapErr()).toBeInstanceOf(NoRefreshTokenError);
      expect(refresh).not.toHaveBeenCalled();
    });

    it('should let one caller give up without cancelling the shared refresh', async () => {
      const pending = deferred<TokenPair>();
      const refresh = vi.fn<RefreshFunction>(() => pending.promise);
      const authentication = new TokenPairAuthentication({ credentials: initial, refresh });
      const controller = new AbortController();

      const impatient = authentication.reauthenticate({ signal: controller.signal });
      const patient = authentication.reauthenticate();
      await vi.waitFor(() => expect(refresh).toHaveBeenCalledTimes(1));
      controller.abort();

      expect((await impatient)._unsafeUnwrapErr()).toBeInstanceOf(CancelledError);
      expect(refresh.mock.calls[0]?.[1].signal.aborted).toBe(false);

      pending.resolve(rotated);
      expect((await patient).isOk()).toBe(true);
      expect(authentication.getCredentials()).toEqual(rotated);
    });

    it('should keep explicitly set credentials over a refresh in flight', async () => {
      const pending = deferred<TokenPair>();
      const refresh = vi.fn<RefreshFunction>(() => pending.promise);
      const authentication = new TokenPairAuthentication({ credentials: initial, refresh });
      const replacement: TokenPair = { accessToken: 'access-9', refreshToken: 'refresh-9' };

      const refreshing = authentication.reauthenticate();
      await vi.waitFor(() => expect(refresh).toHaveBeenCalledTimes(1));
      authentication.setCredentials(replacement);

      expect(refresh.mock.calls[0]?.[1].signal.aborted).toBe(true);
      expect((await refreshing).isOk()).toBe(true);
      pending.resolve(rotated);
      await pending.promise;

      expect(authentication.getCredentials()).toEqual(replacement);
      expect(authentication.isRefreshing).toBe(false);
    });

    it('should report no refresh token when credentials are cleared mid-refresh', async () => {
      const pending = deferred<TokenPair>();
      const refresh = vi.fn<RefreshFunction>(() => pending.promise);
      const authentication = new TokenPairAuthentication({ credentials: initial, refresh });

      const refreshing = authentication.reauthenticate();
      await vi.waitFor(() => expect(refresh).toHaveBeenCalledTimes(1));
      authentication.clearCredentials();

      expect((await refreshing)._unsafeUnwrapErr()).toBeInstanceOf(NoRefreshTokenError);
      expect(authentication.isAuthenticated).toBe(false);
    });

    it('should skip the refresh call when credentials are cleared in the same tick', async () => {
      const refresh = vi.fn<RefreshFunction>(() => Promise.resolve(rotated));
      const authentication = new TokenPairAuthentication({ credentials: initial, refresh });

      const refreshing = authentication.reauthenticate();
      authentication.clearCredentials();

      expect((await refreshing)._unsafeUnwrapErr()).toBeInstanceOf(NoRefreshTokenError);
      expect(refresh).not.toHaveBeenCalled();
    });

    it('should skip the refresh call when credentials are replaced in the same tick', async () => {
      const refresh = vi.fn<RefreshFunction>(() => Promise.resolve(rotated));
      const authentication = new TokenPairAuthentication({ credentials: initial, refresh });
      const replacement: TokenPair = { accessToken: 'access-9', refreshToken: 'refresh-9' };

      const refreshing = authentication.reauthenticate();
      authentication.setCredentials(replacement);

      expect((await refreshing).isOk()).toBe(true);
      expect(refresh).not.toHaveBeenCalled();
      expect(authentication.getCredentials()).toEqual(replacement);
    });

    it('should keep the refreshed credentials when a callback throws', async () => {
      const authentication = new TokenPairAuthentication({
        credentials: initial,
        onCredentialsUpdated: () => {
          throw new Error('storage unavailable');
        },
        refresh: () => Promise.resolve(rotated),
      });

      expect((await authentication.reauthenticate()).isOk()).toBe(true);
      expect(authentication.getCredentials()).toEqual(rotated);
    });
  });
});
