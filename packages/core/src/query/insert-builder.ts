/**
 * Insert Query Builder
 *
 * @example
 * ```typescript
 * await qb.insert(users).values({ name: 'Ada', age: 36 });
 *
 * // Bulk insert, returning the new rows
 * const rows = await qb
 *   .insert(users)
 *   .values([{ name: 'Ada' }, { name: 'Grace' }])
 *   .returning('id');
 * ```
 */

import { ConstructionError } from '../errors';
import { assertConsistentRows } from '../compiler/compiler';
import { cloneStatementState } from '../compiler/statement-state';
import { validatePayload } from '../validation/value-validator';
import { returningNames, toPayloadRow } from './clauses';
import { RETURNED_ROWS, StatementBuilder } from './statement-builder';

import type { PayloadInput, ReturningInput } from './clauses';
import type { QueryContext } from './query-context';
import type { ResultShape } from './statement-builder';
import type { CompiledStatement } from '../compiler/compiler';
import type { StatementState } from '../compiler/statement-state';
import type { RawResult } from '../execution/executor';
import type { Row } from '../types';

export class InsertBuilder<TResult = undefined> extends StatementBuilder<TResult> {
  constructor(
    ctx: QueryContext,
    state: StatementState,
    private readonly resultShape: ResultShape<TResult>,
  ) {
    super(ctx, state);
  }

  /**
   * Add one row or several. Every row must assign the same columns.
   */
  values(data: PayloadInput | PayloadInput[]): this {
    this.assertMutable();
    const inputs = Array.isArray(data) ? data : [data];
    if (inputs.length === 0) {
      throw new ConstructionError('values() requires at least one row');
    }

    const rows = inputs.map((input) => toPayloadRow(input));
    rows.forEach((row, index) => {
      if (row.size === 0) {
        throw new ConstructionError(
          `Insert row ${this.state.values.length + index} assigns no columns`,
        );
      }
    });

    assertConsistentRows([...this.state.values, ...rows]);
    this.state.values.push(...rows);
    return this;
  }

  /**
   * Return the inserted rows. No columns means every column.
   */
  returning(...columns: ReturningInput[]): InsertBuilder<Row[]> {
    this.assertMutable();
    const state = cloneStatementState(this.state);
    state.returning = returningNames(columns);
    return new InsertBuilder(this.ctx, state, RETURNED_ROWS);
  }

  protected override validate(): void {
    if (this.state.table) {
      validatePayload(this.state.table, this.state.values, 'insert');
    }
  }

  protected shape(result: RawResult, statement: CompiledStatement): TResult {
    return this.resultShape(statement.returnsRows ? this.ctx.materialize(result, statement) : []);
  }
}
