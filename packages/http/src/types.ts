export type HttpMethod = 'GET' | 'HEAD' | 'OPTIONS' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'TRACE' | 'CONNECT';

/**
 * A fully assembled request, ready for the transport.
 */
export interface HttpRequest {
  readonly method: HttpMethod;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body?: Uint8Array | undefined;
}

export interface ResponseMetadata {
  readonly status: number;
  readonly headers: Readonly<Record<string, string>>;
}

/**
 * What a transport hands back for one request. Either part may be missing;
 * the classifier decides what a missing part means.
 */
export interface TransportResponse {
  readonly payload?: Uint8Array | undefined;
  readonly metadata?: ResponseMetadata | undefined;
}

export interface TransportOptions {
  signal?: AbortSignal | undefined;
}

/**
 * Performs exactly one network exchange per call. Rejects with the
 * underlying error on transport failure.
 */
export interface Transport {
  send(request: HttpRequest, options?: TransportOptions): Promise<TransportResponse>;
  close?(): Promise<void>;
}

export interface BodyEncoder<TBody> {
  /** Set as Content-Type unless the request already carries one. */
  readonly contentType?: string | undefined;
  encode(value: TBody): Uint8Array;
}

/**
 * Turns a payload into a typed value. Throws when the payload does not fit.
 */
export interface ResponseDecoder<T> {
  decode(payload: Uint8Array): T;
}

export type RequestProcessor = (request: HttpRequest) => HttpRequest;

export interface QueryItem {
  readonly name: string;
  readonly value: string;
}

/**
 * Maps a raw query item to its encoded form. The output is placed in the URL
 * verbatim.
 */
export type QueryEncodingStrategy = (item: QueryItem) => QueryItem;

export interface RequestOptions {
  signal?: AbortSignal | undefined;
}

export interface EndpointClientHooks {
  /**
   * Called once when a logical request starts. Reauthentication retries do
   * not trigger additional start events.
   */
  onRequestStart?: ((event: { endpoint: string; method: HttpMethod; timestamp: number }) => void) | undefined;

  onRequestSuccess?:
    | ((event: { attempts: number; durationMs: number; endpoint: string; method: HttpMethod; status: number }) => void)
    | undefined;

  /**
   * Called once when a logical request fails, after any reauthentication
   * retry.
   */
  onRequestFailure?:
    | ((event: {
        attempts: number;
        durationMs: number;
        endpoint: string;
        error: string;
        kind: string;
        method: HttpMethod;
        status?: number | undefined;
      }) => void)
    | undefined;

  onReauthenticate?:
    | ((event: { attemptNumber: number; endpoint: string; status?: number | undefined }) => void)
    | undefined;
}

/**
 * Side effects the client depends on, injectable for tests.
 */
export interface ClientEffects {
  log: (level: 'debug' | 'info' | 'warn' | 'error', message: string, metadata?: Record<string, unknown>) => void;
  now: () => number;
}
