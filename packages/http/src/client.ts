import { getClientSettings } from '@endpointkit/env';
import { getLogger, type Logger } from '@endpointkit/logger';
import { err, ok, type Result } from 'neverthrow';

import type { AuthenticationMethod } from './auth/authentication-method.js';
import { NoAuthentication } from './auth/no-authentication.js';
import { sanitizeUrl } from './core/http-utils.js';
import { classifyResponse, type TransportOutcome } from './core/response-classifier.js';
import type { EndpointDefinition } from './endpoint.js';
import {
  CancelledError,
  describeCause,
  EndpointAssemblyError,
  MaxRetriesExceededError,
  metadataOf,
  ResponseParseError,
  type TaskError,
} from './errors.js';
import { assembleRequest } from './request-assembler.js';
import { isEnvironmentOf, resolveEnvironment, type ServerDefinition } from './server.js';
import { FetchTransport } from './transport.js';
import type {
  ClientEffects,
  EndpointClientHooks,
  HttpRequest,
  RequestOptions,
  ResponseDecoder,
  ResponseMetadata,
  Transport,
} from './types.js';

export interface EndpointClientConfig<TEnv extends string = string> {
  server: ServerDefinition<TEnv>;
  /** Defaults to the server's default environment. */
  environment?: TEnv | undefined;
  /** Defaults to NoAuthentication. */
  authentication?: AuthenticationMethod | undefined;
  /** Defaults to a FetchTransport. */
  transport?: Transport | undefined;
  /** Reauthentication retries per call. Defaults to 1, i.e. at most two attempts. */
  maxRetries?: number | undefined;
  hooks?: EndpointClientHooks | undefined;
}

interface Delivery<T, E> {
  attempts: number;
  result: Result<T, TaskError<E>>;
  status?: number | undefined;
}

function decodePayload<T>(
  decoder: ResponseDecoder<T>,
  payload: Uint8Array,
  metadata: ResponseMetadata | undefined
): Result<T, ResponseParseError> {
  try {
    return ok(decoder.decode(payload));
  } catch (error) {
    return err(new ResponseParseError(metadata, payload, error));
  }
}

/**
 * Delivers endpoint calls: assembles each attempt afresh, authenticates it,
 * sends it once, classifies and decodes the response, and retries after a
 * reauthentication when the authentication method asks for one.
 */
export class EndpointClient<TEnv extends string = string> {
  private readonly config: EndpointClientConfig<TEnv>;
  private readonly logger: Logger;
  private readonly effects: ClientEffects;
  private readonly authentication: AuthenticationMethod;
  private readonly transport: Transport;
  private readonly maxRetries: number;

  constructor(config: EndpointClientConfig<TEnv>, effects?: Partial<ClientEffects>) {
    const maxRetries = config.maxRetries ?? 1;
    if (!Number.isInteger(maxRetries) || maxRetries < 0) {
      throw new Error(`Invalid client configuration: maxRetries must be a non-negative integer, got ${maxRetries}`);
    }

    this.config = config;
    this.maxRetries = maxRetries;
    this.authentication = config.authentication ?? new NoAuthentication();
    this.transport = config.transport ?? new FetchTransport();
    this.logger = getLogger(`EndpointClient:${config.server.name}`);

    this.effects = {
      log: (level, message, metadata) => {
        if (metadata) {
          this.logger[level](metadata, message);
        } else {
          this.logger[level](message);
        }
      },
      now: () => Date.now(),
      ...effects,
    };

    this.logger.debug(
      `Endpoint client initialized - Server: ${config.server.name}, Environment: ${config.environment ?? config.server.defaultEnvironment}, MaxRetries: ${maxRetries}`
    );
  }

  /**
   * Perform one logical call. Resolves with the decoded response or the
   * task error that ended the call; never rejects.
   */
  async send<R, TResponse, TErrorResponse>(
    endpoint: EndpointDefinition<R, TResponse, TErrorResponse>,
    request: R,
    options: RequestOptions = {}
  ): Promise<Result<TResponse, TaskError<TErrorResponse>>> {
    const hooks = this.config.hooks;
    const startTime = this.effects.now();
    hooks?.onRequestStart?.({ endpoint: endpoint.name, method: endpoint.method, timestamp: startTime });

    const delivery = await this.deliver(endpoint, request, options.signal);
    const durationMs = this.effects.now() - startTime;

    if (delivery.result.isOk()) {
      hooks?.onRequestSuccess?.({
        attempts: delivery.attempts,
        durationMs,
        endpoint: endpoint.name,
        method: endpoint.method,
        status: delivery.status ?? 0,
      });
    } else {
      const error = delivery.result.error;
      this.effects.log('debug', `Request failed - Endpoint: ${endpoint.name}, Kind: ${error.kind}`, {
        attempts: delivery.attempts,
        error: error.message,
      });
      hooks?.onRequestFailure?.({
        attempts: delivery.attempts,
        durationMs,
        endpoint: endpoint.name,
        error: error.message,
        kind: error.kind,
        method: endpoint.method,
        status: delivery.status,
      });
    }

    return delivery.result;
  }

  /**
   * Close the transport when it holds resources. Idempotent when the
   * transport's close is.
   */
  async close(): Promise<void> {
    await this.transport.close?.();
  }

  private async deliver<R, TResponse, TErrorResponse>(
    endpoint: EndpointDefinition<R, TResponse, TErrorResponse>,
    request: R,
    signal: AbortSignal | undefined
  ): Promise<Delivery<TResponse, TErrorResponse>> {
    let attempt = 0;

    while (true) {
      attempt++;

      if (signal?.aborted) {
        return { attempts: attempt, result: err(new CancelledError(signal.reason)) };
      }

      const assembled = resolveEnvironment(this.config.server, this.config.environment).andThen((environment) =>
        assembleRequest(endpoint, request, environment)
      );
      if (assembled.isErr()) {
        this.effects.log('warn', `Request assembly failed - Endpoint: ${endpoint.name}`, {
          error: assembled.error.message,
        });
        return { attempts: attempt, result: err(new EndpointAssemblyError(assembled.error)) };
      }

      const authenticated = await this.authentication.authenticate(assembled.value, { signal });
      if (authenticated.isErr()) {
        return { attempts: attempt, result: err(authenticated.error) };
      }

      const outcome = await this.transmit(authenticated.value, attempt, signal);
      if (outcome.kind === 'failure' && signal?.aborted) {
        return { attempts: attempt, result: err(new CancelledError(signal.reason)) };
      }

      const metadata = outcome.kind === 'response' ? outcome.response.metadata : undefined;
      const result = classifyResponse(outcome, endpoint.errorDecoder).andThen((payload) =>
        decodePayload(endpoint.responseDecoder, payload, metadata)
      );

      if (result.isOk()) {
        return { attempts: attempt, result: ok(result.value), status: metadata?.status };
      }

      const error = result.error;
      const status = metadata?.status ?? metadataOf(error)?.status;

      if (!this.authentication.shouldReauthenticate(error, metadata)) {
        return { attempts: attempt, result: err(error), status };
      }

      if (attempt > this.maxRetries) {
        this.effects.log('warn', `Retry budget exhausted - Endpoint: ${endpoint.name}, Attempts: ${attempt}`, {
          status,
        });
        return { attempts: attempt, result: err(new MaxRetriesExceededError(attempt, error)), status };
      }

      this.effects.log('info', `Reauthenticating before retry - Endpoint: ${endpoint.name}, Attempt: ${attempt}`, {
        status,
      });
      this.config.hooks?.onReauthenticate?.({ attemptNumber: attempt, endpoint: endpoint.name, status });

      const reauthenticated = await this.authentication.reauthenticate({ signal });
      if (reauthenticated.isErr()) {
        return { attempts: attempt, result: err(reauthenticated.error), status };
      }
    }
  }

  private async transmit(request: HttpRequest, attempt: number, signal: AbortSignal | undefined): Promise<TransportOutcome> {
    this.effects.log(
      'debug',
      `Making HTTP request - URL: ${sanitizeUrl(request.url)}, Method: ${request.method}, Attempt: ${attempt}/${this.maxRetries + 1}`
    );

    try {
      const response = await this.transport.send(request, { signal });
      return { kind: 'response', response };
    } catch (error) {
      this.effects.log('warn', `Transport failed - URL: ${sanitizeUrl(request.url)}, Error: ${describeCause(error)}`, {
        attempt,
        method: request.method,
      });
      return { error, kind: 'failure' };
    }
  }
}

/**
 * Client with unspecified settings taken from the process environment
 * (ENDPOINTKIT_ENVIRONMENT, ENDPOINTKIT_MAX_RETRIES, ENDPOINTKIT_TIMEOUT_MS).
 */
export function createEndpointClient<TEnv extends string>(
  config: EndpointClientConfig<TEnv>,
  effects?: Partial<ClientEffects>
): EndpointClient<TEnv> {
  const settings = getClientSettings();
  const environment = config.environment ?? settings.environment;
  if (environment !== undefined && !isEnvironmentOf(config.server, environment)) {
    throw new Error(`Environment "${environment}" is not defined for server "${config.server.name}"`);
  }

  return new EndpointClient<TEnv>(
    {
      ...config,
      environment,
      maxRetries: config.maxRetries ?? settings.maxRetries,
      transport: config.transport ?? new FetchTransport({ timeoutMs: settings.timeoutMs }),
    },
    effects
  );
}
