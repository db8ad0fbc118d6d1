import { err, ok, type Result } from 'neverthrow';

import { HeaderName, hasHeader, resolveHeaders, withHeader } from './core/headers.js';
import { appendQuery, buildUrl, utf8Encode } from './core/http-utils.js';
import { encodeFormBody, encodeQueryString, resolveParameters } from './core/parameters.js';
import type { EndpointDefinition } from './endpoint.js';
import { InvalidBodyError, InvalidUrlError, type EndpointError } from './errors.js';
import type { Environment } from './server.js';
import type { HttpRequest } from './types.js';

export const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

const DOT_SEGMENT = /^(?:\.|%2e){1,2}$/i;

function validateUrl(baseUrl: string, path: string): Result<string, InvalidUrlError> {
  // URL parsing would resolve `.` and `..` and send the request elsewhere
  if (path.split('/').some((segment) => DOT_SEGMENT.test(segment))) {
    return err(new InvalidUrlError(path, baseUrl, { cause: new Error('Path contains a dot segment') }));
  }

  try {
    return ok(new URL(buildUrl(baseUrl, path)).toString());
  } catch (error) {
    return err(new InvalidUrlError(path, baseUrl, { cause: error }));
  }
}

/**
 * Turn an endpoint definition and one request into a transport-ready request.
 * Steps run in a fixed order: path, query and URL, headers, body, then the
 * environment's request processor.
 */
export function assembleRequest<R, TResponse, TErrorResponse>(
  endpoint: EndpointDefinition<R, TResponse, TErrorResponse>,
  request: R,
  environment: Environment
): Result<HttpRequest, EndpointError> {
  const path = endpoint.path.resolve(request);

  const parametersResult = resolveParameters(endpoint.parameters, request);
  if (parametersResult.isErr()) {
    return err(parametersResult.error);
  }
  const { form, query } = parametersResult.value;

  const urlResult = validateUrl(environment.baseUrl, path);
  if (urlResult.isErr()) {
    return err(urlResult.error);
  }
  const url = appendQuery(urlResult.value, encodeQueryString(query, endpoint.queryEncoding));

  const headersResult = resolveHeaders(endpoint.headers, request);
  if (headersResult.isErr()) {
    return err(headersResult.error);
  }
  let headers = headersResult.value;

  let encodedBody: Uint8Array | undefined;
  if (endpoint.body) {
    try {
      const encoded = endpoint.body.encode(request);
      if (encoded) {
        encodedBody = encoded.bytes;
        if (encoded.contentType && !hasHeader(headers, HeaderName.ContentType)) {
          headers = withHeader(headers, HeaderName.ContentType, encoded.contentType);
        }
      }
    } catch (error) {
      return err(new InvalidBodyError(error));
    }
  }

  if (encodedBody === undefined && form.length > 0) {
    encodedBody = utf8Encode(encodeFormBody(form));
    if (!hasHeader(headers, HeaderName.ContentType)) {
      headers = withHeader(headers, HeaderName.ContentType, FORM_CONTENT_TYPE);
    }
  }

  const assembled: HttpRequest = {
    body: encodedBody,
    headers,
    method: endpoint.method,
    url,
  };

  return ok(environment.requestProcessor(assembled));
}
