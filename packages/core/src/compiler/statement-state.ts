/**
 * Statement state
 *
 * The accumulator a builder mutates through its chained calls. One state
 * belongs to one builder; the compiler only ever reads it.
 */

import type { ColumnRef, OrderTerm } from '../expression/column';
import type { Literal } from '../expression/literal';
import type { Predicate } from '../expression/predicate';
import type { Table } from '../schema/table';

export type StatementKind = 'select' | 'insert' | 'update' | 'delete';

export type JoinKind = 'inner' | 'left' | 'right' | 'full';

/**
 * Any table, whatever its column names and record type
 */
export type AnyTable = Table<string, unknown>;

export interface JoinClause {
  readonly kind: JoinKind;
  readonly table: AnyTable;
  readonly on: Predicate;
}

/**
 * One entry of a SELECT list
 * - `name`: bare column of the base table (`'id'`, `'id as user_id'`)
 * - `qualified`: `'table.column'`, keyed by its qualified name in results
 * - `column`: a ColumnRef, possibly aliased
 */
export type ProjectionItem =
  | { readonly kind: 'name'; readonly name: string; readonly alias?: string }
  | {
      readonly kind: 'qualified';
      readonly table: string;
      readonly name: string;
      readonly alias?: string;
    }
  | { readonly kind: 'column'; readonly column: ColumnRef };

export type PayloadRow = ReadonlyMap<string, Literal>;

export interface StatementState {
  readonly kind: StatementKind;
  table?: AnyTable;
  projection: ProjectionItem[];
  distinct: boolean;
  joins: JoinClause[];
  /** Predicates from successive where() calls, ANDed at compile time */
  where: Predicate[];
  orderBy: OrderTerm[];
  limit?: number;
  offset?: number;
  /** Column names to return; empty means every column */
  returning?: string[];
  /** Insert rows, or the single update assignment row */
  values: PayloadRow[];
}

export function createStatementState(kind: StatementKind, table?: AnyTable): StatementState {
  return {
    kind,
    table,
    projection: [],
    distinct: false,
    joins: [],
    where: [],
    orderBy: [],
    values: [],
  };
}

/**
 * Copy with its own lists, so the two states never share a mutable array
 */
export function cloneStatementState(state: StatementState): StatementState {
  return {
    ...state,
    projection: [...state.projection],
    joins: [...state.joins],
    where: [...state.where],
    orderBy: [...state.orderBy],
    returning: state.returning === undefined ? undefined : [...state.returning],
    values: [...state.values],
  };
}
