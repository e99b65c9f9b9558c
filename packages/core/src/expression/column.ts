/**
 * Column references and ordering terms.
 *
 * A ColumnRef is a value: two refs are equal when table, column and alias
 * all match. Refs never change after construction; `as()` returns a new one.
 */

export type OrderDirection = 'ASC' | 'DESC';

export class ColumnRef {
  readonly kind = 'column';

  constructor(
    readonly table: string,
    readonly name: string,
    readonly alias?: string,
  ) {
    Object.freeze(this);
  }

  /**
   * `table.column`, the key used for qualified projections
   */
  get qualifiedName(): string {
    return `${this.table}.${this.name}`;
  }

  /**
   * Aliased copy of this column, for use in a projection
   *
   * @example
   * ```typescript
   * qb.select(users.col('name').as('user_name')).from(users);
   * // SELECT "name" AS "user_name" FROM "users"
   * ```
   */
  as(alias: string): ColumnRef {
    return new ColumnRef(this.table, this.name, alias);
  }

  /**
   * Same column with the alias dropped
   */
  unaliased(): ColumnRef {
    return this.alias === undefined ? this : new ColumnRef(this.table, this.name);
  }

  equals(other: ColumnRef): boolean {
    return this.table === other.table && this.name === other.name && this.alias === other.alias;
  }

  toString(): string {
    return this.alias === undefined ? this.qualifiedName : `${this.qualifiedName} AS ${this.alias}`;
  }
}

export interface OrderTerm {
  readonly kind: 'order';
  readonly column: ColumnRef;
  readonly direction: OrderDirection;
}

function orderTerm(column: ColumnRef, direction: OrderDirection): OrderTerm {
  const term: OrderTerm = { kind: 'order', column: column.unaliased(), direction };
  return Object.freeze(term);
}

export function asc(column: ColumnRef): OrderTerm {
  return orderTerm(column, 'ASC');
}

export function desc(column: ColumnRef): OrderTerm {
  return orderTerm(column, 'DESC');
}

export function alias(column: ColumnRef, name: string): ColumnRef {
  return column.as(name);
}

export function isColumnRef(value: unknown): value is ColumnRef {
  return value instanceof ColumnRef;
}
