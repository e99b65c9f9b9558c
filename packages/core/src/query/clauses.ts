/**
 * Clause argument parsing shared by the builders.
 * Everything here checks only what is visible at the call site.
 */

import { ConstructionError } from '../errors';
import { asc, isColumnRef } from '../expression/column';
import { toLiteral } from '../expression/literal';

import type { PayloadRow, ProjectionItem } from '../compiler/statement-state';
import type { ColumnRef, OrderTerm } from '../expression/column';
import type { Literal, LiteralInput } from '../expression/literal';

export type ProjectionInput = string | ColumnRef;

export type OrderInput = ColumnRef | OrderTerm;

export type ReturningInput = string | ColumnRef;

/**
 * Column name to value, as written by the caller
 */
export type PayloadInput = Record<string, LiteralInput>;

/**
 * Parse `'id'`, `'users.id'`, `'id as user_id'` (any case of AS) or a ColumnRef
 */
export function parseProjection(field: ProjectionInput): ProjectionItem {
  if (isColumnRef(field)) {
    return { kind: 'column', column: field };
  }

  const words = field.trim().split(/\s+/);
  const asIndex = words.findIndex((word) => word.toLowerCase() === 'as');
  let expression = field.trim();
  let alias: string | undefined;

  if (asIndex !== -1) {
    const aliasWord = words[asIndex + 1];
    if (asIndex === 0 || aliasWord === undefined || words.length !== asIndex + 2) {
      throw new ConstructionError(`Malformed projection "${field}": expected "column AS alias"`);
    }
    expression = words.slice(0, asIndex).join(' ');
    alias = aliasWord;
  }

  if (expression.length === 0) {
    throw new ConstructionError('Projection column name cannot be empty');
  }

  const dot = expression.lastIndexOf('.');
  if (dot !== -1) {
    return {
      kind: 'qualified',
      table: expression.slice(0, dot),
      name: expression.slice(dot + 1),
      alias,
    };
  }
  return { kind: 'name', name: expression, alias };
}

export function toOrderTerm(input: OrderInput): OrderTerm {
  return isColumnRef(input) ? asc(input) : input;
}

export function toPayloadRow(input: PayloadInput): PayloadRow {
  const row = new Map<string, Literal>();
  for (const [name, value] of Object.entries(input)) {
    try {
      row.set(name, toLiteral(value));
    } catch (error) {
      if (error instanceof ConstructionError) {
        throw new ConstructionError(`Column ${name}: ${error.message}`);
      }
      throw error;
    }
  }
  return row;
}

export function returningNames(columns: readonly ReturningInput[]): string[] {
  return columns.map((column) => (isColumnRef(column) ? column.name : column));
}

/**
 * LIMIT/OFFSET values: non-negative safe integers
 */
export function checkCount(value: number, clause: 'limit' | 'offset'): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ConstructionError(`${clause} must be a non-negative integer, got ${value}`);
  }
  return value;
}
