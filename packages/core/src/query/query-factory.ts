/**
 * Query Builder Factory
 *
 * Main entry point for the query builder API. The dialect is fixed per
 * factory and passed explicitly into every compilation.
 *
 * @example
 * ```typescript
 * const qb = createQueryBuilder({
 *   dialect: 'postgresql',
 *   executor: new PostgreSQLExecutor(),
 *   logger: createConsoleLogger(),
 * });
 *
 * // Select
 * const rows = await qb.select('id', 'name').from(users).where(eq(users.col('id'), 42));
 *
 * // Insert
 * await qb.insert(users).values({ name: 'Ada' });
 *
 * // Update
 * await qb.update(users).set({ name: 'Grace' }).where(eq(users.col('id'), 1));
 *
 * // Delete
 * await qb.delete(users).where(eq(users.col('id'), 1));
 * ```
 */

import { createStatementState } from '../compiler/statement-state';
import { DialectFactory } from '../dialect/dialect-factory';
import { SQLDialect } from '../dialect/sql-dialect';
import { DeleteBuilder } from './delete-builder';
import { InsertBuilder } from './insert-builder';
import { QueryContext } from './query-context';
import { SelectBuilder } from './select-builder';
import { NO_ROWS } from './statement-builder';
import { UpdateBuilder } from './update-builder';

import type { ProjectionInput } from './clauses';
import type { QueryContextOptions } from './query-context';
import type { AnyTable } from '../compiler/statement-state';
import type { DialectDatabaseType } from '../dialect/dialect-factory';
import type { Executor } from '../execution/executor';

export interface QueryBuilderOptions extends QueryContextOptions {
  /** Dialect name or instance */
  dialect: DialectDatabaseType | SQLDialect;
  executor: Executor;
}

export interface QueryBuilder {
  readonly dialect: SQLDialect;

  /**
   * Context shared by every builder, including the execution bridge
   * whose `query`/`queryError` events can be observed
   */
  readonly context: QueryContext;

  /**
   * Create a new SELECT query builder
   */
  select(...fields: ProjectionInput[]): SelectBuilder;

  /**
   * SELECT DISTINCT over the projected row
   */
  selectDistinct(...fields: ProjectionInput[]): SelectBuilder;

  /**
   * Create a new INSERT query builder
   */
  insert(table: AnyTable): InsertBuilder;

  /**
   * Create a new UPDATE query builder
   */
  update(table: AnyTable): UpdateBuilder;

  /**
   * Create a new DELETE query builder
   */
  delete(table: AnyTable): DeleteBuilder;
}

/**
 * Create a query builder instance with the provided options
 */
export function createQueryBuilder(options: QueryBuilderOptions): QueryBuilder {
  const { dialect: dialectOption, executor, ...contextOptions } = options;
  const dialect =
    dialectOption instanceof SQLDialect ? dialectOption : DialectFactory.getDialect(dialectOption);
  const context = new QueryContext(dialect, executor, contextOptions);

  return {
    dialect,
    context,

    select(...fields: ProjectionInput[]): SelectBuilder {
      return new SelectBuilder(context, createStatementState('select')).columns(...fields);
    },

    selectDistinct(...fields: ProjectionInput[]): SelectBuilder {
      return this.select(...fields).distinct();
    },

    insert(table: AnyTable): InsertBuilder {
      return new InsertBuilder(context, createStatementState('insert', table), NO_ROWS);
    },

    update(table: AnyTable): UpdateBuilder {
      return new UpdateBuilder(context, createStatementState('update', table), NO_ROWS);
    },

    delete(table: AnyTable): DeleteBuilder {
      return new DeleteBuilder(context, createStatementState('delete', table), NO_ROWS);
    },
  };
}
