import { describe, expect, it } from 'vitest';

import { jsonDecoder } from '../codecs.js';
import { utf8Encode } from '../core/http-utils.js';
import { classifyResponse, isOfflineError, type TransportOutcome } from '../core/response-classifier.js';
import {
  ErrorResponseError,
  ErrorResponseParseError,
  OfflineError,
  ProtocolViolationError,
  TransportFailureError,
  UnexpectedStatusError,
} from '../errors.js';

interface ApiProblem {
  message: string;
}

const errorDecoder = jsonDecoder<ApiProblem>();

const response = (status: number, payload?: string): TransportOutcome => ({
  kind: 'response',
  response: {
    metadata: { headers: {}, status },
    payload: payload === undefined ? undefined : utf8Encode(payload),
  },
});

const codedError = (code: string): Error => Object.assign(new Error(`socket error ${code}`), { code });

describe('classifyResponse', () => {
  it('should return the payload for success statuses', () => {
    expect(classifyResponse(response(200, 'a'), errorDecoder)._unsafeUnwrap()).toEqual(utf8Encode('a'));
    expect(classifyResponse(response(299, 'b'), errorDecoder)._unsafeUnwrap()).toEqual(utf8Encode('b'));
  });

  it('should treat 204 as success with an empty payload', () => {
    expect(classifyResponse(response(204), errorDecoder)._unsafeUnwrap().length).toBe(0);
    expect(classifyResponse(response(204, '{"x":1}'), errorDecoder)._unsafeUnwrap().length).toBe(0);
  });

  it('should report a success status without payload as unexpected', () => {
    const error = classifyResponse(response(200), errorDecoder)._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(UnexpectedStatusError);
    expect(error.kind).toBe('unexpectedStatus');
  });

  it('should flag a response without metadata as a protocol violation', () => {
    const error = classifyResponse(
      { kind: 'response', response: { payload: new Uint8Array([1]) } },
      errorDecoder
    )._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(TransportFailureError);
    expect(error.cause).toBeInstanceOf(ProtocolViolationError);
    if (error.cause instanceof ProtocolViolationError) {
      expect(error.cause.metadata).toBeUndefined();
      expect(error.cause.message).toBe('Transport returned no response metadata');
    }
  });

  it('should report non-success statuses without payload as unexpected', () => {
    const error = classifyResponse(response(300), errorDecoder)._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(UnexpectedStatusError);
    if (error instanceof UnexpectedStatusError) {
      expect(error.metadata.status).toBe(300);
    }
  });

  it('should decode error payloads', () => {
    const error = classifyResponse(response(404, '{"message":"missing"}'), errorDecoder)._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(ErrorResponseError);
    if (error instanceof ErrorResponseError) {
      expect(error.metadata.status).toBe(404);
      expect(error.response).toEqual({ message: 'missing' });
    }
  });

  it('should decode a 199 payload as an error response', () => {
    expect(classifyResponse(response(199, '{"message":"early"}'), errorDecoder)._unsafeUnwrapErr()).toBeInstanceOf(
      ErrorResponseError
    );
  });

  it('should keep the payload when the error payload does not decode', () => {
    const error = classifyResponse(response(500, 'oops'), errorDecoder)._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(ErrorResponseParseError);
    if (error instanceof ErrorResponseParseError) {
      expect(error.payload).toEqual(utf8Encode('oops'));
      expect(error.metadata.status).toBe(500);
    }
  });

  it('should flag statuses outside the HTTP range as protocol violations', () => {
    const error = classifyResponse(response(42, ''), errorDecoder)._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(TransportFailureError);
    expect(error.cause).toBeInstanceOf(ProtocolViolationError);
  });

  it('should map network-down errors to offline', () => {
    const direct = classifyResponse({ error: codedError('ENOTFOUND'), kind: 'failure' }, errorDecoder);
    const wrapped = classifyResponse(
      { error: new TypeError('fetch failed', { cause: codedError('ENETUNREACH') }), kind: 'failure' },
      errorDecoder
    );

    expect(direct._unsafeUnwrapErr()).toBeInstanceOf(OfflineError);
    expect(wrapped._unsafeUnwrapErr()).toBeInstanceOf(OfflineError);
  });

  it('should map other transport errors to transport failures', () => {
    const cause = codedError('ECONNRESET');
    const error = classifyResponse({ error: cause, kind: 'failure' }, errorDecoder)._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(TransportFailureError);
    expect(error.cause).toBe(cause);
  });
});

describe('isOfflineError', () => {
  it('should ignore values without a code', () => {
    expect(isOfflineError(new Error('boom'))).toBe(false);
    expect(isOfflineError('ENOTFOUND')).toBe(false);
    expect(isOfflineError(codedError('EAI_AGAIN'))).toBe(true);
  });
});
