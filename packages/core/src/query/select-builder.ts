/**
 * Select Query Builder
 *
 * @example
 * ```typescript
 * const rows = await qb
 *   .select('id', 'name')
 *   .from(users)
 *   .where(eq(users.col('status'), 'active'))
 *   .orderBy(desc(users.col('created_at')))
 *   .limit(10);
 * ```
 */

import { ConstructionError } from '../errors';
import { cloneStatementState } from '../compiler/statement-state';
import { hydrateRows } from '../result/materializer';
import { checkCount, parseProjection, toOrderTerm } from './clauses';
import { StatementBuilder } from './statement-builder';
import { WhereBuilder } from './where-builder';

import type { OrderInput, ProjectionInput } from './clauses';
import type { QueryContext } from './query-context';
import type { CompiledStatement } from '../compiler/compiler';
import type { AnyTable, JoinKind, StatementState } from '../compiler/statement-state';
import type { RawResult } from '../execution/executor';
import type { Predicate } from '../expression/predicate';
import type { Hydrator } from '../schema/column-types';
import type { Table } from '../schema/table';
import type { Row } from '../types';

export class SelectBuilder<TRecord = Row> extends StatementBuilder<Row[]> {
  private readonly whereBuilder: WhereBuilder;

  constructor(
    ctx: QueryContext,
    state: StatementState,
    private readonly hydrator?: Hydrator<TRecord>,
  ) {
    super(ctx, state);
    this.whereBuilder = new WhereBuilder(state.where);
  }

  // ============ Core Selection Methods ============

  /**
   * Add columns to the projection. With none at all, every column is selected.
   */
  columns(...fields: ProjectionInput[]): this {
    this.assertMutable();
    this.state.projection.push(...fields.map((field) => parseProjection(field)));
    return this;
  }

  /**
   * DISTINCT over the whole projected row
   */
  distinct(): this {
    this.assertMutable();
    this.state.distinct = true;
    return this;
  }

  /**
   * Set the base table. Returns a builder typed by the table's record.
   */
  from<TTableRecord>(table: Table<string, TTableRecord>): SelectBuilder<TTableRecord> {
    this.assertMutable();
    const state = cloneStatementState(this.state);
    state.table = table;
    return new SelectBuilder<TTableRecord>(this.ctx, state, table.hydrator);
  }

  // ============ WHERE Methods (delegated to WhereBuilder) ============

  where(...predicates: Predicate[]): this {
    this.assertMutable();
    this.whereBuilder.where(predicates);
    return this;
  }

  orWhere(...predicates: Predicate[]): this {
    this.assertMutable();
    this.whereBuilder.orWhere(predicates);
    return this;
  }

  // ============ JOIN Methods ============

  innerJoin(table: AnyTable, on: Predicate): this {
    return this.join('inner', table, on);
  }

  leftJoin(table: AnyTable, on: Predicate): this {
    return this.join('left', table, on);
  }

  rightJoin(table: AnyTable, on: Predicate): this {
    return this.join('right', table, on);
  }

  fullJoin(table: AnyTable, on: Predicate): this {
    return this.join('full', table, on);
  }

  private join(kind: JoinKind, table: AnyTable, on: Predicate): this {
    this.assertMutable();
    this.state.joins.push({ kind, table, on });
    return this;
  }

  // ============ Ordering / Pagination ============

  /**
   * Plain columns sort ascending
   */
  orderBy(...terms: OrderInput[]): this {
    this.assertMutable();
    this.state.orderBy.push(...terms.map((term) => toOrderTerm(term)));
    return this;
  }

  limit(count: number): this {
    this.assertMutable();
    this.state.limit = checkCount(count, 'limit');
    return this;
  }

  offset(count: number): this {
    this.assertMutable();
    this.state.offset = checkCount(count, 'offset');
    return this;
  }

  // ============ Execution ============

  protected shape(result: RawResult, statement: CompiledStatement): Row[] {
    return this.ctx.materialize(result, statement);
  }

  /**
   * Execute and hydrate every row through the table's hydrator
   */
  async records(): Promise<TRecord[]> {
    const hydrator = this.requireHydrator();
    return hydrateRows(await this.execute(), hydrator);
  }

  /**
   * Blocking counterpart of records()
   */
  recordsSync(): TRecord[] {
    const hydrator = this.requireHydrator();
    return hydrateRows(this.run(), hydrator);
  }

  private requireHydrator(): Hydrator<TRecord> {
    if (!this.hydrator) {
      const table = this.state.table?.name ?? '(none)';
      throw new ConstructionError(`Table ${table} has no hydrator; use execute() for plain rows`);
    }
    return this.hydrator;
  }
}
