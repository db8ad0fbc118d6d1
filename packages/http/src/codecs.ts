import type { ZodType } from 'zod';

import { utf8Decode, utf8Encode } from './core/http-utils.js';
import type { BodyEncoder, ResponseDecoder } from './types.js';

export const jsonBodyEncoder = <TBody>(): BodyEncoder<TBody> => ({
  contentType: 'application/json',
  encode: (value: TBody) => utf8Encode(JSON.stringify(value)),
});

export const textBodyEncoder = (contentType = 'text/plain; charset=utf-8'): BodyEncoder<string> => ({
  contentType,
  encode: (value: string) => utf8Encode(value),
});

export const bytesBodyEncoder = (contentType = 'application/octet-stream'): BodyEncoder<Uint8Array> => ({
  contentType,
  encode: (value: Uint8Array) => value,
});

export interface JsonDecoderOptions<T> {
  /** Validate the parsed value; a mismatch throws the ZodError. */
  schema?: ZodType<T> | undefined;
  /** Decode an empty payload as undefined instead of failing. */
  allowEmpty?: boolean | undefined;
}

export function jsonDecoder<T>(options: JsonDecoderOptions<T> = {}): ResponseDecoder<T> {
  const { allowEmpty = false, schema } = options;
  return {
    decode: (payload: Uint8Array): T => {
      if (payload.length === 0 && allowEmpty) {
        return schema ? schema.parse(undefined) : (undefined as T);
      }
      const data: unknown = JSON.parse(utf8Decode(payload));
      return schema ? schema.parse(data) : (data as T);
    },
  };
}

/**
 * For responses without a body; the payload is ignored.
 */
export const emptyDecoder = (): ResponseDecoder<undefined> => ({
  decode: () => undefined,
});

export const bytesDecoder = (): ResponseDecoder<Uint8Array> => ({
  decode: (payload: Uint8Array) => payload,
});

export const textDecoder = (): ResponseDecoder<string> => ({
  decode: (payload: Uint8Array) => utf8Decode(payload),
});
