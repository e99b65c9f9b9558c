/**
 * Table
 *
 * Wraps a caller-supplied table descriptor: name, ordered columns and an
 * optional hydrator. Nothing here reads a database catalog.
 *
 * @example
 * ```typescript
 * const users = defineTable('users', {
 *   id: { type: 'integer', primaryKey: true },
 *   name: { type: 'text' },
 *   age: { type: 'integer', nullable: true },
 * });
 *
 * eq(users.col('id'), 42);
 * ```
 */

import { InvalidColumnError } from '../errors';
import { ColumnRef } from '../expression/column';
import { validateIdentifier } from '../utils/validation';

import type { ColumnDescriptor, ColumnOptions, Hydrator, TableDescriptor } from './column-types';
import type { Row } from '../types';

export class Table<TColumn extends string = string, TRecord = Row> {
  readonly name: string;
  readonly descriptor: TableDescriptor<TRecord>;
  private readonly byName: ReadonlyMap<string, ColumnDescriptor>;

  constructor(descriptor: TableDescriptor<TRecord>) {
    validateIdentifier(descriptor.name, 'table');
    const byName = new Map<string, ColumnDescriptor>();
    for (const column of descriptor.columns) {
      validateIdentifier(column.name, 'column');
      byName.set(column.name, column);
    }

    this.name = descriptor.name;
    this.descriptor = descriptor;
    this.byName = byName;
  }

  get columnNames(): string[] {
    return this.descriptor.columns.map((column) => column.name);
  }

  get hydrator(): Hydrator<TRecord> | undefined {
    return this.descriptor.hydrator;
  }

  /**
   * Reference to one of this table's columns
   */
  col(name: TColumn): ColumnRef {
    if (!this.byName.has(name)) {
      throw new InvalidColumnError(
        `Column ${name} not in table ${this.name}`,
        name,
        this.name,
      );
    }
    return new ColumnRef(this.name, name);
  }

  hasColumn(name: string): boolean {
    return this.byName.has(name);
  }

  getColumn(name: string): ColumnDescriptor | undefined {
    return this.byName.get(name);
  }
}

export interface TableOptions<TRecord> {
  hydrator?: Hydrator<TRecord>;
}

/**
 * Build a Table from a column map. Key order is declaration order.
 */
export function defineTable<TColumns extends Record<string, ColumnOptions>, TRecord = Row>(
  name: string,
  columns: TColumns,
  options: TableOptions<TRecord> = {},
): Table<Extract<keyof TColumns, string>, TRecord> {
  const descriptors: ColumnDescriptor[] = Object.entries(columns).map(([columnName, column]) =>
    Object.freeze({
      name: columnName,
      type: column.type,
      nullable: column.nullable ?? false,
      primaryKey: column.primaryKey ?? false,
    }),
  );

  return new Table<Extract<keyof TColumns, string>, TRecord>(
    Object.freeze({
      name,
      columns: Object.freeze(descriptors),
      hydrator: options.hydrator,
    }),
  );
}
