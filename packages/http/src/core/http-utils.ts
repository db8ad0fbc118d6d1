// Pure HTTP utility functions

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Join a base URL and a resolved path with exactly one `/`.
 */
export const buildUrl = (baseUrl: string, path: string): string => {
  const cleanBaseUrl = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;

  if (!path || path === '/') {
    return cleanBaseUrl;
  }

  const cleanPath = path.startsWith('/') ? path : `/${path}`;
  return `${cleanBaseUrl}${cleanPath}`;
};

/**
 * Append an already-encoded query string to a URL.
 */
export const appendQuery = (url: string, queryString: string): string => {
  if (queryString === '') return url;
  return `${url}${url.includes('?') ? '&' : '?'}${queryString}`;
};

const SENSITIVE_PARAMS = ['token', 'access_token', 'key', 'apikey', 'api_key', 'secret', 'password'];

/**
 * Sanitize URL for logging (mask credential-like query parameters)
 */
export const sanitizeUrl = (url: string): string => {
  try {
    const urlObj = new URL(url);

    for (const param of SENSITIVE_PARAMS) {
      if (urlObj.searchParams.has(param)) {
        urlObj.searchParams.set(param, '***');
      }
    }

    return urlObj.toString();
  } catch {
    return url;
  }
};

export const utf8Encode = (text: string): Uint8Array => textEncoder.encode(text);

/**
 * Strict UTF-8 decoding; throws on malformed input.
 */
export const utf8Decode = (bytes: Uint8Array): string => textDecoder.decode(bytes);
