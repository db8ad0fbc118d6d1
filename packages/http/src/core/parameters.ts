import { err, ok, type Result } from 'neverthrow';

import { InvalidParameterError } from '../errors.js';
import type { QueryEncodingStrategy, QueryItem } from '../types.js';

import { describeType, encodeFormComponent, toParameterString, type ParameterValue } from './representable.js';

export type ParameterLocation = 'query' | 'form';

export interface ParameterField<Q> {
  readonly kind: 'field';
  readonly location: ParameterLocation;
  readonly name: string;
  readonly accessor: (parameters: Q) => unknown;
}

/** A fixed value, always sent. */
export interface ParameterLiteral {
  readonly kind: 'value';
  readonly location: ParameterLocation;
  readonly name: string;
  readonly value: ParameterValue;
}

export type ParameterBinding<Q> = ParameterField<Q> | ParameterLiteral;

export const query = <Q>(name: string, accessor: (parameters: Q) => unknown): ParameterField<Q> => ({
  accessor,
  kind: 'field',
  location: 'query',
  name,
});

export const queryValue = (name: string, value: ParameterValue): ParameterLiteral => ({
  kind: 'value',
  location: 'query',
  name,
  value,
});

export const form = <Q>(name: string, accessor: (parameters: Q) => unknown): ParameterField<Q> => ({
  accessor,
  kind: 'field',
  location: 'form',
  name,
});

export const formValue = (name: string, value: ParameterValue): ParameterLiteral => ({
  kind: 'value',
  location: 'form',
  name,
  value,
});

export interface ResolvedParameters {
  readonly query: readonly QueryItem[];
  readonly form: readonly QueryItem[];
}

/**
 * Evaluate parameter bindings in declaration order. Absent values are
 * omitted; unrepresentable values fail the whole resolution.
 */
export function resolveParameters<Q>(
  bindings: readonly ParameterBinding<Q>[],
  parameters: Q
): Result<ResolvedParameters, InvalidParameterError> {
  const queryItems: QueryItem[] = [];
  const formItems: QueryItem[] = [];

  for (const binding of bindings) {
    const raw = binding.kind === 'field' ? binding.accessor(parameters) : binding.value;
    const converted = toParameterString(raw);
    if (!converted.representable) {
      return err(new InvalidParameterError(binding.name, describeType(raw), binding.location));
    }
    if (converted.value === undefined) continue;

    const item = { name: binding.name, value: converted.value };
    if (binding.location === 'query') {
      queryItems.push(item);
    } else {
      formItems.push(item);
    }
  }

  return ok({ form: formItems, query: queryItems });
}

/**
 * Render query items through the endpoint's encoding strategy. The result
 * goes into the URL verbatim.
 */
export function encodeQueryString(items: readonly QueryItem[], strategy: QueryEncodingStrategy): string {
  return items
    .map(strategy)
    .map((item) => `${item.name}=${item.value}`)
    .join('&');
}

/**
 * application/x-www-form-urlencoded body text.
 */
export function encodeFormBody(items: readonly QueryItem[]): string {
  return items.map((item) => `${encodeFormComponent(item.name)}=${encodeFormComponent(item.value)}`).join('&');
}
