/**
 * Delete Query Builder
 *
 * Without a filter every row is deleted; there is no guard.
 *
 * @example
 * ```typescript
 * await qb.delete(sessions).where(lt(sessions.col('expires_at'), now));
 * ```
 */

import { cloneStatementState } from '../compiler/statement-state';
import { checkCount, returningNames } from './clauses';
import { RETURNED_ROWS, StatementBuilder } from './statement-builder';
import { WhereBuilder } from './where-builder';

import type { ReturningInput } from './clauses';
import type { QueryContext } from './query-context';
import type { ResultShape } from './statement-builder';
import type { CompiledStatement } from '../compiler/compiler';
import type { StatementState } from '../compiler/statement-state';
import type { RawResult } from '../execution/executor';
import type { Predicate } from '../expression/predicate';
import type { Row } from '../types';

export class DeleteBuilder<TResult = undefined> extends StatementBuilder<TResult> {
  private readonly whereBuilder: WhereBuilder;

  constructor(
    ctx: QueryContext,
    state: StatementState,
    private readonly resultShape: ResultShape<TResult>,
  ) {
    super(ctx, state);
    this.whereBuilder = new WhereBuilder(state.where);
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

  limit(count: number): this {
    this.assertMutable();
    this.state.limit = checkCount(count, 'limit');
    return this;
  }

  returning(...columns: ReturningInput[]): DeleteBuilder<Row[]> {
    this.assertMutable();
    const state = cloneStatementState(this.state);
    state.returning = returningNames(columns);
    return new DeleteBuilder(this.ctx, state, RETURNED_ROWS);
  }

  protected shape(result: RawResult, statement: CompiledStatement): TResult {
    return this.resultShape(statement.returnsRows ? this.ctx.materialize(result, statement) : []);
  }
}
