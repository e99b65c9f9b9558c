/**
 * Typed literal values.
 *
 * Loosely-typed values from call sites (`{ age: 30 }`, `eq(col, 'x')`) are
 * converted once, at the builder boundary, into a closed tagged union.
 * Everything downstream (validator, compiler, binder) works on that union.
 */

import { ConstructionError } from '../errors';

import type { JsonObject, JsonValue } from '../types';

export type LiteralInput = string | number | bigint | boolean | null | JsonObject | JsonValue[];

export type Literal =
  | { readonly kind: 'text'; readonly value: string }
  | { readonly kind: 'integer'; readonly value: number | bigint }
  | { readonly kind: 'float'; readonly value: number }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'structured'; readonly value: JsonObject | JsonValue[] }
  | { readonly kind: 'null'; readonly value: null };

export type LiteralKind = Literal['kind'];

function freeze(literal: Literal): Literal {
  Object.freeze(literal);
  return literal;
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Name of a runtime value's type, for error messages
 */
export function describeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  if (typeof value === 'object') {
    return value.constructor?.name ?? 'object';
  }
  return typeof value;
}

export function toLiteral(input: LiteralInput | undefined): Literal {
  if (input === null) {
    return freeze({ kind: 'null', value: null });
  }

  switch (typeof input) {
    case 'string': {
      return freeze({ kind: 'text', value: input });
    }
    case 'bigint': {
      return freeze({ kind: 'integer', value: input });
    }
    case 'boolean': {
      return freeze({ kind: 'boolean', value: input });
    }
    case 'number': {
      if (!Number.isFinite(input)) {
        throw new ConstructionError(`Cannot bind non-finite number ${input}`);
      }
      return Number.isInteger(input)
        ? freeze({ kind: 'integer', value: input })
        : freeze({ kind: 'float', value: input });
    }
    case 'object': {
      if (Array.isArray(input) || isPlainObject(input)) {
        return freeze({ kind: 'structured', value: input });
      }
      throw new ConstructionError(`Cannot bind a value of type ${describeValue(input)}`);
    }
    default: {
      throw new ConstructionError(`Cannot bind a value of type ${describeValue(input)}`);
    }
  }
}

/**
 * Value handed to the driver for a bound literal.
 * Structured values travel as JSON text.
 */
export function toParam(literal: Literal): unknown {
  if (literal.kind === 'structured') {
    return JSON.stringify(literal.value);
  }
  return literal.value;
}

export function isLiteral(value: unknown): value is Literal {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    'value' in value &&
    (value.kind === 'text' ||
      value.kind === 'integer' ||
      value.kind === 'float' ||
      value.kind === 'boolean' ||
      value.kind === 'structured' ||
      value.kind === 'null')
  );
}
