// Pure conversions from caller values to the strings that end up in a request

import type { QueryEncodingStrategy, QueryItem } from '../types.js';

/**
 * A value that knows how to render itself as a path segment. The result is
 * placed in the path verbatim.
 */
export interface PathRepresentable {
  toPathSegment(): string;
}

/**
 * A value that knows how to render itself as a query or form value.
 * Returning undefined omits the parameter.
 */
export interface ParameterRepresentable {
  toParameterString(): string | undefined;
}

export type PathValue = string | number | bigint | boolean | PathRepresentable | null | undefined;

export type ParameterValue = string | number | bigint | boolean | Date | ParameterRepresentable;

export type ParameterConversion = { representable: true; value: string | undefined } | { representable: false };

const PATH_SAFE = /%(2F|3A|40|21|24|26|27|28|29|2A|2B|2C|3B|3D)/gi;
const QUERY_SAFE = /%(2F|3A|40|3F|21|24|27|28|29|2A|2C|3B)/gi;

/**
 * Percent-encode a string, keeping the characters RFC 3986 allows in a path.
 */
export const encodePathSafe = (value: string): string =>
  encodeURIComponent(value).replace(PATH_SAFE, (match) => decodeURIComponent(match));

/**
 * Percent-encode a query component. `+`, `&`, `=` and `#` stay encoded so the
 * value survives form-style decoding on the server.
 */
export const encodeQueryComponent = (value: string): string =>
  encodeURIComponent(value).replace(QUERY_SAFE, (match) => decodeURIComponent(match));

/**
 * Percent-encode a form body component, keeping `/` readable.
 */
export const encodeFormComponent = (value: string): string => encodeURIComponent(value).replace(/%2F/gi, '/');

export const percentEncodedQuery: QueryEncodingStrategy = (item: QueryItem) => ({
  name: encodeQueryComponent(item.name),
  value: encodeQueryComponent(item.value),
});

export const isParameterRepresentable = (value: unknown): value is ParameterRepresentable =>
  typeof value === 'object' &&
  value !== null &&
  'toParameterString' in value &&
  typeof value.toParameterString === 'function';

/**
 * Render a path value. Absent values render as the empty string so the
 * resolver can elide them.
 */
export const toPathSegment = (value: PathValue): string => {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return encodePathSafe(value);
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') return String(value);
  return value.toPathSegment();
};

/**
 * Calendar date in ISO form (YYYY-MM-DD), taken in UTC.
 */
export const formatDate = (date: Date): string => date.toISOString().slice(0, 10);

/**
 * Convert an arbitrary value to a parameter string. null and undefined are
 * representable and mean "absent".
 */
export const toParameterString = (value: unknown): ParameterConversion => {
  if (value === null || value === undefined) return { representable: true, value: undefined };
  if (typeof value === 'string') return { representable: true, value };
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
    return { representable: true, value: String(value) };
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? { representable: false } : { representable: true, value: formatDate(value) };
  }
  if (isParameterRepresentable(value)) return { representable: true, value: value.toParameterString() };
  return { representable: false };
};

/**
 * Describe a value as a header value, or undefined when it has no meaningful
 * textual form. Objects qualify only when they override toString.
 */
export const toHeaderValue = (value: unknown): string | undefined => {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') return String(value);
  if (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    typeof value.toString === 'function' &&
    value.toString !== Object.prototype.toString
  ) {
    return String(value);
  }
  return undefined;
};

/**
 * Type name used in assembly error messages.
 */
export const describeType = (value: unknown): string => {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'Array';
  if (typeof value === 'object') {
    const name: unknown = value.constructor?.name;
    return typeof name === 'string' && name !== '' ? name : 'Object';
  }
  return typeof value;
};
