import type { ResponseMetadata } from './types.js';

// Assembly errors: raised while turning a definition and an instance into a request

export class EndpointError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'EndpointError';
  }
}

export class InvalidParameterError extends EndpointError {
  constructor(
    public readonly parameterName: string,
    public readonly typeName: string,
    public readonly location: 'query' | 'form'
  ) {
    super(`Parameter "${parameterName}" of type ${typeName} cannot be represented as a ${location} value`);
    this.name = 'InvalidParameterError';
  }
}

export class InvalidHeaderError extends EndpointError {
  constructor(
    public readonly headerName: string,
    public readonly typeName: string
  ) {
    super(`Header "${headerName}" of type ${typeName} cannot be described as a header value`);
    this.name = 'InvalidHeaderError';
  }
}

export class InvalidUrlError extends EndpointError {
  constructor(
    public readonly path: string,
    public readonly baseUrl: string | undefined,
    options?: ErrorOptions
  ) {
    super(`Cannot build a URL from base "${baseUrl ?? '<none>'}" and path "${path}"`, options);
    this.name = 'InvalidUrlError';
  }
}

export class InvalidBodyError extends EndpointError {
  constructor(cause: unknown) {
    super(`Request body could not be encoded: ${describeCause(cause)}`, { cause });
    this.name = 'InvalidBodyError';
  }
}

/**
 * The transport handed back no metadata, or metadata that does not describe
 * an HTTP response.
 */
export class ProtocolViolationError extends Error {
  constructor(public readonly metadata: ResponseMetadata | undefined) {
    super(
      metadata
        ? `Transport returned a response that is not HTTP (status ${metadata.status})`
        : 'Transport returned no response metadata'
    );
    this.name = 'ProtocolViolationError';
  }
}

// Task errors: everything a call can fail with

export type TaskErrorKind =
  | 'endpointAssembly'
  | 'transportFailure'
  | 'offline'
  | 'errorResponse'
  | 'errorResponseParse'
  | 'unexpectedStatus'
  | 'responseParse'
  | 'notAuthenticated'
  | 'noRefreshToken'
  | 'refreshFailed'
  | 'maxRetriesExceeded'
  | 'refreshNotSupported'
  | 'cancelled';

export abstract class BaseTaskError extends Error {
  abstract readonly kind: TaskErrorKind;
}

export class EndpointAssemblyError extends BaseTaskError {
  readonly kind = 'endpointAssembly';

  constructor(public readonly endpointError: EndpointError) {
    super(endpointError.message, { cause: endpointError });
    this.name = 'EndpointAssemblyError';
  }
}

export class TransportFailureError extends BaseTaskError {
  readonly kind = 'transportFailure';

  constructor(cause: unknown) {
    super(`Transport failed: ${describeCause(cause)}`, { cause });
    this.name = 'TransportFailureError';
  }
}

export class OfflineError extends BaseTaskError {
  readonly kind = 'offline';

  constructor(cause: unknown) {
    super(`Network is unreachable: ${describeCause(cause)}`, { cause });
    this.name = 'OfflineError';
  }
}

export class ErrorResponseError<E = unknown> extends BaseTaskError {
  readonly kind = 'errorResponse';

  constructor(
    public readonly metadata: ResponseMetadata,
    public readonly response: E
  ) {
    super(`Server responded with status ${metadata.status}`);
    this.name = 'ErrorResponseError';
  }
}

export class ErrorResponseParseError extends BaseTaskError {
  readonly kind = 'errorResponseParse';

  constructor(
    public readonly metadata: ResponseMetadata,
    public readonly payload: Uint8Array,
    cause: unknown
  ) {
    super(`Error response with status ${metadata.status} could not be decoded: ${describeCause(cause)}`, { cause });
    this.name = 'ErrorResponseParseError';
  }
}

export class UnexpectedStatusError extends BaseTaskError {
  readonly kind = 'unexpectedStatus';

  constructor(public readonly metadata: ResponseMetadata) {
    super(`Unexpected response with status ${metadata.status}`);
    this.name = 'UnexpectedStatusError';
  }
}

export class ResponseParseError extends BaseTaskError {
  readonly kind = 'responseParse';

  constructor(
    public readonly metadata: ResponseMetadata | undefined,
    public readonly payload: Uint8Array,
    cause: unknown
  ) {
    super(`Response could not be decoded: ${describeCause(cause)}`, { cause });
    this.name = 'ResponseParseError';
  }
}

export class NotAuthenticatedError extends BaseTaskError {
  readonly kind = 'notAuthenticated';

  constructor() {
    super('No credentials available to authenticate the request');
    this.name = 'NotAuthenticatedError';
  }
}

export class NoRefreshTokenError extends BaseTaskError {
  readonly kind = 'noRefreshToken';

  constructor() {
    super('No refresh token available');
    this.name = 'NoRefreshTokenError';
  }
}

export class RefreshFailedError extends BaseTaskError {
  readonly kind = 'refreshFailed';

  constructor(cause: unknown) {
    super(`Token refresh failed: ${describeCause(cause)}`, { cause });
    this.name = 'RefreshFailedError';
  }
}

export class MaxRetriesExceededError extends BaseTaskError {
  readonly kind = 'maxRetriesExceeded';

  constructor(
    public readonly attempts: number,
    public readonly lastError: TaskError
  ) {
    super(`Gave up after ${attempts} attempts: ${lastError.message}`, { cause: lastError });
    this.name = 'MaxRetriesExceededError';
  }
}

export class RefreshNotSupportedError extends BaseTaskError {
  readonly kind = 'refreshNotSupported';

  constructor() {
    super('Authentication method does not support refreshing credentials');
    this.name = 'RefreshNotSupportedError';
  }
}

export class CancelledError extends BaseTaskError {
  readonly kind = 'cancelled';

  constructor(reason?: unknown) {
    super('Request was cancelled', { cause: reason });
    this.name = 'CancelledError';
  }
}

export type TaskError<E = unknown> =
  | EndpointAssemblyError
  | TransportFailureError
  | OfflineError
  | ErrorResponseError<E>
  | ErrorResponseParseError
  | UnexpectedStatusError
  | ResponseParseError
  | NotAuthenticatedError
  | NoRefreshTokenError
  | RefreshFailedError
  | MaxRetriesExceededError
  | RefreshNotSupportedError
  | CancelledError;

export type ResponseTaskError<E = unknown> =
  | TransportFailureError
  | OfflineError
  | ErrorResponseError<E>
  | ErrorResponseParseError
  | UnexpectedStatusError;

export type AuthenticationError = NotAuthenticatedError | CancelledError;

export type ReauthenticationError = NoRefreshTokenError | RefreshFailedError | RefreshNotSupportedError | CancelledError;

/**
 * Response metadata carried by an error, when the error came from a response.
 */
export function metadataOf(error: TaskError): ResponseMetadata | undefined {
  switch (error.kind) {
    case 'errorResponse':
    case 'errorResponseParse':
    case 'unexpectedStatus':
    case 'responseParse':
      return error.metadata;
    default:
      return undefined;
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
