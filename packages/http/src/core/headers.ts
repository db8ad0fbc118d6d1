import { err, ok, type Result } from 'neverthrow';

import { InvalidHeaderError } from '../errors.js';

import { describeType, toHeaderValue } from './representable.js';

export const HeaderName = {
  Accept: 'Accept',
  Authorization: 'Authorization',
  ContentType: 'Content-Type',
  Cookie: 'Cookie',
} as const;

export interface HeaderField<H> {
  readonly kind: 'field';
  readonly accessor: (headers: H) => unknown;
}

export interface HeaderLiteral {
  readonly kind: 'value';
  readonly value: string | number | boolean;
}

export type HeaderBinding<H> = HeaderField<H> | HeaderLiteral;

export type HeaderBindings<H> = Readonly<Record<string, HeaderBinding<H>>>;

export const field = <H>(accessor: (headers: H) => unknown): HeaderField<H> => ({ accessor, kind: 'field' });

export const fieldValue = (value: string | number | boolean): HeaderLiteral => ({ kind: 'value', value });

/**
 * Evaluate header bindings. Every binding must produce a describable value.
 */
export function resolveHeaders<H>(
  bindings: HeaderBindings<H>,
  headers: H
): Result<Record<string, string>, InvalidHeaderError> {
  const resolved: Record<string, string> = {};

  for (const [name, binding] of Object.entries(bindings)) {
    const raw = binding.kind === 'field' ? binding.accessor(headers) : binding.value;
    const value = toHeaderValue(raw);
    if (value === undefined) {
      return err(new InvalidHeaderError(name, describeType(raw)));
    }
    resolved[name] = value;
  }

  return ok(resolved);
}

// Case-insensitive helpers; header maps keep the caller's spelling

export function findHeaderName(headers: Readonly<Record<string, string>>, name: string): string | undefined {
  const lower = name.toLowerCase();
  return Object.keys(headers).find((key) => key.toLowerCase() === lower);
}

export function getHeader(headers: Readonly<Record<string, string>>, name: string): string | undefined {
  const key = findHeaderName(headers, name);
  return key === undefined ? undefined : headers[key];
}

export function hasHeader(headers: Readonly<Record<string, string>>, name: string): boolean {
  return findHeaderName(headers, name) !== undefined;
}

/**
 * Copy of `headers` with `name` set to `value`, replacing any spelling of
 * the same name.
 */
export function withHeader(
  headers: Readonly<Record<string, string>>,
  name: string,
  value: string
): Record<string, string> {
  const lower = name.toLowerCase();
  const next = Object.fromEntries(Object.entries(headers).filter(([key]) => key.toLowerCase() !== lower));
  next[name] = value;
  return next;
}
