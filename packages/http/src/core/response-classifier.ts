import { err, ok, type Result } from 'neverthrow';

import {
  ErrorResponseError,
  ErrorResponseParseError,
  OfflineError,
  ProtocolViolationError,
  TransportFailureError,
  UnexpectedStatusError,
  type ResponseTaskError,
} from '../errors.js';
import type { ResponseDecoder, ResponseMetadata, TransportResponse } from '../types.js';

/**
 * Result of one transport exchange: what the transport returned, or what it
 * threw.
 */
export type TransportOutcome =
  | { readonly kind: 'response'; readonly response: TransportResponse }
  | { readonly kind: 'failure'; readonly error: unknown };

/** Error codes that mean the host has no usable network. */
export const OFFLINE_ERROR_CODES: ReadonlySet<string> = new Set(['ENETUNREACH', 'ENETDOWN', 'ENOTFOUND', 'EAI_AGAIN']);

const EMPTY_PAYLOAD = new Uint8Array(0);

const codeOf = (value: unknown): string | undefined =>
  typeof value === 'object' && value !== null && 'code' in value && typeof value.code === 'string'
    ? value.code
    : undefined;

/**
 * Checks the error and its cause; fetch implementations wrap socket errors.
 */
export const isOfflineError = (error: unknown): boolean => {
  const code = codeOf(error) ?? (error instanceof Error ? codeOf(error.cause) : undefined);
  return code !== undefined && OFFLINE_ERROR_CODES.has(code);
};

export const isHttpStatus = (status: number): boolean => Number.isInteger(status) && status >= 100 && status <= 599;

export const isSuccessStatus = (status: number): boolean => status >= 200 && status <= 299;

/**
 * Map a transport outcome to the success payload or a typed failure.
 * Error payloads are decoded with the endpoint's error decoder.
 */
export function classifyResponse<E>(
  outcome: TransportOutcome,
  errorDecoder: ResponseDecoder<E>
): Result<Uint8Array, ResponseTaskError<E>> {
  if (outcome.kind === 'failure') {
    return err(isOfflineError(outcome.error) ? new OfflineError(outcome.error) : new TransportFailureError(outcome.error));
  }

  const { metadata, payload } = outcome.response;

  if (!metadata || !isHttpStatus(metadata.status)) {
    return err(new TransportFailureError(new ProtocolViolationError(metadata)));
  }

  if (metadata.status === 204) {
    return ok(EMPTY_PAYLOAD);
  }

  if (isSuccessStatus(metadata.status)) {
    return payload ? ok(payload) : err(new UnexpectedStatusError(metadata));
  }

  if (!payload) {
    return err(new UnexpectedStatusError(metadata));
  }

  return decodeErrorPayload(metadata, payload, errorDecoder);
}

function decodeErrorPayload<E>(
  metadata: ResponseMetadata,
  payload: Uint8Array,
  errorDecoder: ResponseDecoder<E>
): Result<never, ErrorResponseError<E> | ErrorResponseParseError> {
  try {
    return err(new ErrorResponseError(metadata, errorDecoder.decode(payload)));
  } catch (error) {
    return err(new ErrorResponseParseError(metadata, payload, error));
  }
}
