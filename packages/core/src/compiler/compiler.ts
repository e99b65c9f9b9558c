/**
 * Compiler
 *
 * Turns a statement state into SQL text plus an ordered parameter list for
 * one dialect. Compilation reads the state and never changes it, so the
 * same state always compiles to the same output. It either returns a whole
 * statement or throws; no partial SQL escapes.
 *
 * @example
 * ```typescript
 * const { sql, params } = compile(state, new PostgreSQLDialect());
 * // SELECT "id", "name" FROM "users" WHERE "id" = $1   [42]
 * ```
 */

import { ConstructionError, InconsistentColumnsError, InvalidColumnError } from '../errors';
import { ColumnRef } from '../expression/column';
import { combinePredicates } from '../expression/predicate';
import { ParameterBinder } from './parameter-binder';
import { assertCapabilities } from './preflight';

import type {
  AnyTable,
  JoinKind,
  PayloadRow,
  ProjectionItem,
  StatementKind,
  StatementState,
} from './statement-state';
import type { SQLDialect } from '../dialect/sql-dialect';
import type { Literal } from '../expression/literal';
import type { Predicate } from '../expression/predicate';

export interface CompiledStatement {
  readonly sql: string;
  /** Driver values, in placeholder order */
  readonly params: readonly unknown[];
  readonly literals: readonly Literal[];
  readonly kind: StatementKind;
  /** Whether the statement produces rows */
  readonly returnsRows: boolean;
  /** Result keys for an explicit projection or RETURNING list */
  readonly projection?: readonly string[];
}

const JOIN_KEYWORDS: Record<JoinKind, string> = {
  inner: 'INNER JOIN',
  left: 'LEFT JOIN',
  right: 'RIGHT JOIN',
  full: 'FULL JOIN',
};

/**
 * Per-compilation rendering context
 */
class RenderContext {
  readonly binder: ParameterBinder;
  readonly qualify: boolean;
  private readonly tables: ReadonlySet<string>;

  constructor(
    readonly dialect: SQLDialect,
    readonly state: StatementState,
    readonly table: AnyTable,
  ) {
    this.binder = new ParameterBinder(dialect);
    this.qualify = state.joins.length > 0;
    this.tables = new Set([table.name, ...state.joins.map((join) => join.table.name)]);
  }

  id(identifier: string): string {
    return this.dialect.escapeIdentifier(identifier);
  }

  alias(name: string): string {
    return this.dialect.quoteIdentifier(name);
  }

  column(ref: ColumnRef): string {
    if (!this.tables.has(ref.table)) {
      throw new InvalidColumnError(
        `Column ${ref.qualifiedName} refers to a table that is not part of this statement`,
        ref.name,
        ref.table,
      );
    }
    return this.qualify ? `${this.id(ref.table)}.${this.id(ref.name)}` : this.id(ref.name);
  }

  predicate(node: Predicate): string {
    switch (node.type) {
      case 'comparison': {
        const right =
          node.right instanceof ColumnRef ? this.column(node.right) : this.binder.bind(node.right);
        return `${this.column(node.left)} ${node.operator} ${right}`;
      }
      case 'pattern': {
        const operator = node.caseSensitive ? 'LIKE' : 'ILIKE';
        return `${this.column(node.column)} ${operator} ${this.binder.bind(node.pattern)}`;
      }
      case 'null-check': {
        return `${this.column(node.column)} ${node.isNull ? 'IS NULL' : 'IS NOT NULL'}`;
      }
      case 'membership': {
        if (node.values.length === 0) {
          return node.negated ? '1=1' : '1=0';
        }
        const placeholders = node.values.map((value) => this.binder.bind(value));
        const operator = node.negated ? 'NOT IN' : 'IN';
        return `${this.column(node.column)} ${operator} (${placeholders.join(', ')})`;
      }
      case 'range': {
        const low = this.binder.bind(node.low);
        const high = this.binder.bind(node.high);
        return `${this.column(node.column)} BETWEEN ${low} AND ${high}`;
      }
      case 'and':
      case 'or': {
        const joiner = node.type === 'and' ? ' AND ' : ' OR ';
        return node.children.map((child) => `(${this.predicate(child)})`).join(joiner);
      }
    }
  }

  appendWhere(parts: string[]): void {
    const root = combinePredicates(this.state.where);
    if (root) {
      parts.push('WHERE', this.predicate(root));
    }
  }

  appendReturning(parts: string[]): string[] | undefined {
    const { returning } = this.state;
    if (returning === undefined) {
      return undefined;
    }
    if (returning.length === 0) {
      parts.push('RETURNING *');
      return undefined;
    }
    parts.push(`RETURNING ${returning.map((name) => this.id(name)).join(', ')}`);
    return [...returning];
  }
}

// ============ Projection ============

function checkBaseColumn(table: AnyTable, name: string): void {
  if (!table.hasColumn(name)) {
    throw new InvalidColumnError(`Column ${name} not in table ${table.name}`, name, table.name);
  }
}

function renderProjectionItem(ctx: RenderContext, item: ProjectionItem): [string, string] {
  switch (item.kind) {
    case 'name': {
      checkBaseColumn(ctx.table, item.name);
      const sql = ctx.id(item.name);
      return item.alias === undefined
        ? [sql, item.name]
        : [`${sql} AS ${ctx.alias(item.alias)}`, item.alias];
    }
    case 'qualified': {
      const sql = `${ctx.id(item.table)}.${ctx.id(item.name)}`;
      return item.alias === undefined
        ? [sql, `${item.table}.${item.name}`]
        : [`${sql} AS ${ctx.alias(item.alias)}`, item.alias];
    }
    case 'column': {
      const { column } = item;
      const sql = ctx.column(column);
      return column.alias === undefined
        ? [sql, column.name]
        : [`${sql} AS ${ctx.alias(column.alias)}`, column.alias];
    }
  }
}

// ============ Statements ============

function compileSelect(ctx: RenderContext): CompiledStatement {
  const { state } = ctx;
  const parts: string[] = ['SELECT'];
  if (state.distinct) {
    parts.push('DISTINCT');
  }

  let projection: string[] | undefined;
  if (state.projection.length > 0) {
    const rendered = state.projection.map((item) => renderProjectionItem(ctx, item));
    parts.push(rendered.map(([sql]) => sql).join(', '));
    projection = rendered.map(([, key]) => key);
  } else {
    parts.push('*');
  }

  parts.push('FROM', ctx.id(ctx.table.name));

  for (const join of state.joins) {
    parts.push(JOIN_KEYWORDS[join.kind], ctx.id(join.table.name), 'ON', ctx.predicate(join.on));
  }

  ctx.appendWhere(parts);

  if (state.orderBy.length > 0) {
    parts.push(
      'ORDER BY',
      state.orderBy.map((term) => `${ctx.column(term.column)} ${term.direction}`).join(', '),
    );
  }

  ctx.dialect.appendLimitOffset(parts, state.limit, state.offset);

  return finish(ctx, parts, true, projection);
}

function payloadColumns(row: PayloadRow): string[] {
  return [...row.keys()];
}

/**
 * Every row must assign the same set of columns as row 0, in any order
 */
export function assertConsistentRows(rows: readonly PayloadRow[], offset = 0): void {
  const [first] = rows;
  if (first === undefined) {
    return;
  }
  const expected = payloadColumns(first);
  rows.forEach((row, index) => {
    const sameSet = row.size === first.size && expected.every((name) => row.has(name));
    if (!sameSet) {
      throw new InconsistentColumnsError(index + offset, expected, payloadColumns(row));
    }
  });
}

function compileInsert(ctx: RenderContext): CompiledStatement {
  const rows = ctx.state.values;
  const [first] = rows;
  if (first === undefined) {
    throw new ConstructionError(`No values specified for INSERT into ${ctx.table.name}`);
  }
  assertConsistentRows(rows);

  const columns = payloadColumns(first);
  const parts: string[] = [
    'INSERT INTO',
    ctx.id(ctx.table.name),
    `(${columns.map((name) => ctx.id(name)).join(', ')})`,
    'VALUES',
  ];

  const tuples = rows.map((row) => {
    const placeholders = columns.map((name) => {
      const literal = row.get(name);
      if (literal === undefined) {
        throw new InconsistentColumnsError(rows.indexOf(row), columns, payloadColumns(row));
      }
      return ctx.binder.bind(literal);
    });
    return `(${placeholders.join(', ')})`;
  });
  parts.push(tuples.join(', '));

  const projection = ctx.appendReturning(parts);
  return finish(ctx, parts, ctx.state.returning !== undefined, projection);
}

function compileUpdate(ctx: RenderContext): CompiledStatement {
  const [assignments] = ctx.state.values;
  if (assignments === undefined || assignments.size === 0) {
    throw new ConstructionError(`UPDATE of ${ctx.table.name} requires at least one assignment`);
  }

  const parts: string[] = ['UPDATE', ctx.id(ctx.table.name), 'SET'];
  const clauses: string[] = [];
  for (const [name, literal] of assignments) {
    clauses.push(`${ctx.id(name)} = ${ctx.binder.bind(literal)}`);
  }
  parts.push(clauses.join(', '));

  ctx.appendWhere(parts);
  ctx.dialect.appendLimitOffset(parts, ctx.state.limit);

  const projection = ctx.appendReturning(parts);
  return finish(ctx, parts, ctx.state.returning !== undefined, projection);
}

function compileDelete(ctx: RenderContext): CompiledStatement {
  const parts: string[] = ['DELETE FROM', ctx.id(ctx.table.name)];

  ctx.appendWhere(parts);
  ctx.dialect.appendLimitOffset(parts, ctx.state.limit);

  const projection = ctx.appendReturning(parts);
  return finish(ctx, parts, ctx.state.returning !== undefined, projection);
}

function finish(
  ctx: RenderContext,
  parts: string[],
  returnsRows: boolean,
  projection: string[] | undefined,
): CompiledStatement {
  return Object.freeze({
    sql: parts.join(' '),
    params: Object.freeze(ctx.binder.params),
    literals: Object.freeze([...ctx.binder.literals]),
    kind: ctx.state.kind,
    returnsRows,
    projection: projection === undefined ? undefined : Object.freeze(projection),
  });
}

/**
 * Compile a statement state for one dialect
 */
export function compile(state: StatementState, dialect: SQLDialect): CompiledStatement {
  const { table } = state;
  if (!table) {
    throw new ConstructionError(`No table selected for ${state.kind.toUpperCase()}`);
  }

  for (const name of state.returning ?? []) {
    checkBaseColumn(table, name);
  }

  assertCapabilities(state, dialect);

  const ctx = new RenderContext(dialect, state, table);
  switch (state.kind) {
    case 'select': {
      return compileSelect(ctx);
    }
    case 'insert': {
      return compileInsert(ctx);
    }
    case 'update': {
      return compileUpdate(ctx);
    }
    case 'delete': {
      return compileDelete(ctx);
    }
  }
}
