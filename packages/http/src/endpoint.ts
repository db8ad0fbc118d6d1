import { jsonBodyEncoder, jsonDecoder } from './codecs.js';
import type { HeaderBindings } from './core/headers.js';
import type { ParameterBinding } from './core/parameters.js';
import type { PathTemplate } from './core/path-template.js';
import { percentEncodedQuery, toPathSegment } from './core/representable.js';
import type { BodyEncoder, HttpMethod, QueryEncodingStrategy, ResponseDecoder } from './types.js';

export interface EncodedBody {
  readonly bytes: Uint8Array;
  readonly contentType?: string | undefined;
}

/**
 * Extracts and encodes a request's body. Returns undefined when the request
 * has no body; throws when encoding fails.
 */
export interface BodyBinding<R> {
  encode(request: R): EncodedBody | undefined;
}

export function body<R, B>(
  accessor: (request: R) => B | null | undefined,
  encoder: BodyEncoder<B> = jsonBodyEncoder<B>()
): BodyBinding<R> {
  return {
    encode: (request: R) => {
      const value = accessor(request);
      if (value === null || value === undefined) return undefined;
      return { bytes: encoder.encode(value), contentType: encoder.contentType };
    },
  };
}

/**
 * Immutable description of one HTTP operation. `R` is the request type the
 * caller fills in per call; every accessor reads from it.
 */
export interface EndpointDefinition<R = void, TResponse = unknown, TErrorResponse = unknown> {
  /** Label for logs and hooks; defaults to "METHOD /path-template". */
  readonly name: string;
  readonly method: HttpMethod;
  readonly path: PathTemplate<R>;
  readonly parameters: readonly ParameterBinding<R>[];
  readonly headers: HeaderBindings<R>;
  readonly body?: BodyBinding<R> | undefined;
  readonly responseDecoder: ResponseDecoder<TResponse>;
  readonly errorDecoder: ResponseDecoder<TErrorResponse>;
  readonly queryEncoding: QueryEncodingStrategy;
}

export interface EndpointOptions<R, TResponse, TErrorResponse> {
  name?: string | undefined;
  method: HttpMethod;
  path: PathTemplate<R>;
  parameters?: readonly ParameterBinding<R>[] | undefined;
  headers?: HeaderBindings<R> | undefined;
  body?: BodyBinding<R> | undefined;
  /** Defaults to JSON, with an empty payload decoding as undefined. */
  response?: ResponseDecoder<TResponse> | undefined;
  /** Defaults to JSON. */
  errorResponse?: ResponseDecoder<TErrorResponse> | undefined;
  queryEncoding?: QueryEncodingStrategy | undefined;
}

function describeTemplate<R>(template: PathTemplate<R>): string {
  const path = [...template.segments]
    .sort((a, b) => a.index - b.index)
    .map((segment) => {
      const text = segment.kind === 'literal' ? toPathSegment(segment.value) : '{}';
      return segment.includesSlash ? `/${text}` : text;
    })
    .join('')
    .replace(/\/{2,}/g, '/');
  return path.startsWith('/') ? path : `/${path}`;
}

export function defineEndpoint<R = void, TResponse = unknown, TErrorResponse = unknown>(
  options: EndpointOptions<R, TResponse, TErrorResponse>
): EndpointDefinition<R, TResponse, TErrorResponse> {
  return Object.freeze({
    body: options.body,
    errorDecoder: options.errorResponse ?? jsonDecoder<TErrorResponse>(),
    headers: Object.freeze({ ...options.headers }),
    method: options.method,
    name: options.name ?? `${options.method} ${describeTemplate(options.path)}`,
    parameters: Object.freeze([...(options.parameters ?? [])]),
    path: options.path,
    queryEncoding: options.queryEncoding ?? percentEncodedQuery,
    responseDecoder: options.response ?? jsonDecoder<TResponse>({ allowEmpty: true }),
  });
}
