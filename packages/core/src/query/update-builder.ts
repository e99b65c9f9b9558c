/**
 * Update Query Builder
 *
 * @example
 * ```typescript
 * await qb
 *   .update(users)
 *   .set({ status: 'inactive', last_login: null })
 *   .where(lt(users.col('last_login_year'), 2020));
 * ```
 */

import { ConstructionError } from '../errors';
import { cloneStatementState } from '../compiler/statement-state';
import { validatePayload } from '../validation/value-validator';
import { checkCount, returningNames, toPayloadRow } from './clauses';
import { RETURNED_ROWS, StatementBuilder } from './statement-builder';
import { WhereBuilder } from './where-builder';

import type { PayloadInput, ReturningInput } from './clauses';
import type { QueryContext } from './query-context';
import type { ResultShape } from './statement-builder';
import type { CompiledStatement } from '../compiler/compiler';
import type { StatementState } from '../compiler/statement-state';
import type { RawResult } from '../execution/executor';
import type { Literal } from '../expression/literal';
import type { Predicate } from '../expression/predicate';
import type { Row } from '../types';

export class UpdateBuilder<TResult = undefined> extends StatementBuilder<TResult> {
  private readonly whereBuilder: WhereBuilder;

  constructor(
    ctx: QueryContext,
    state: StatementState,
    private readonly resultShape: ResultShape<TResult>,
  ) {
    super(ctx, state);
    this.whereBuilder = new WhereBuilder(state.where);
  }

  /**
   * Assign columns. Later calls merge into earlier ones; `null` is a value.
   */
  set(assignments: PayloadInput): this {
    this.assertMutable();
    const incoming = toPayloadRow(assignments);
    if (incoming.size === 0) {
      throw new ConstructionError('set() requires at least one column');
    }

    const [current] = this.state.values;
    const merged = new Map<string, Literal>(current ?? []);
    for (const [name, literal] of incoming) {
      merged.set(name, literal);
    }
    this.state.values.splice(0, this.state.values.length, merged);
    return this;
  }

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

  /**
   * Only on dialects with LIMIT on UPDATE; others fail at compile time
   */
  limit(count: number): this {
    this.assertMutable();
    this.state.limit = checkCount(count, 'limit');
    return this;
  }

  returning(...columns: ReturningInput[]): UpdateBuilder<Row[]> {
    this.assertMutable();
    const state = cloneStatementState(this.state);
    state.returning = returningNames(columns);
    return new UpdateBuilder(this.ctx, state, RETURNED_ROWS);
  }

  protected override validate(): void {
    if (this.state.table) {
      validatePayload(this.state.table, this.state.values, 'update');
    }
  }

  protected shape(result: RawResult, statement: CompiledStatement): TResult {
    return this.resultShape(statement.returnsRows ? this.ctx.materialize(result, statement) : []);
  }
}
