/**
 * Statement Builder
 *
 * Shared lifecycle of every builder: clause calls mutate the state until
 * the single execution trigger (`execute()`, awaiting, `run()`). After the
 * trigger the compiled statement is cached and further clause calls or
 * triggers throw.
 */

import { CallingConventionMismatchError, ConstructionError } from '../errors';

import type { QueryContext } from './query-context';
import type { CompiledStatement } from '../compiler/compiler';
import type { StatementState } from '../compiler/statement-state';
import type { CallingConvention, RawResult } from '../execution/executor';
import type { Row } from '../types';

/**
 * Maps materialized rows to a write builder's result: nothing without
 * RETURNING, the rows themselves with it
 */
export type ResultShape<TResult> = (rows: Row[]) => TResult;

export const NO_ROWS: ResultShape<undefined> = () => undefined;

export const RETURNED_ROWS: ResultShape<Row[]> = (rows) => rows;

export interface SQLWithParams {
  sql: string;
  params: unknown[];
}

export abstract class StatementBuilder<TResult> implements PromiseLike<TResult> {
  private executed?: CompiledStatement;

  constructor(
    protected readonly ctx: QueryContext,
    protected readonly state: StatementState,
  ) {}

  /**
   * Payload checks that must run before every compile
   */
  protected validate(): void {}

  protected abstract shape(result: RawResult, statement: CompiledStatement): TResult;

  /**
   * Guard for clause calls
   */
  protected assertMutable(): void {
    if (this.executed) {
      throw new ConstructionError(
        `Cannot modify a ${this.state.kind.toUpperCase()} statement after it has been executed`,
      );
    }
  }

  protected compileStatement(): CompiledStatement {
    if (this.executed) {
      return this.executed;
    }
    this.validate();
    return this.ctx.compile(this.state);
  }

  /**
   * Compile for execution and mark the builder consumed
   */
  protected consume(convention: CallingConvention): CompiledStatement {
    if (this.executed) {
      throw new ConstructionError(
        `${this.state.kind.toUpperCase()} statement has already been executed`,
      );
    }
    const statement = this.compileStatement();
    if (this.ctx.convention !== convention) {
      throw new CallingConventionMismatchError(convention, this.ctx.convention);
    }
    this.executed = statement;
    return statement;
  }

  get isExecuted(): boolean {
    return this.executed !== undefined;
  }

  /**
   * Rendered SQL and parameters, without executing
   */
  toSQL(): SQLWithParams {
    const { sql, params } = this.compileStatement();
    return { sql, params: [...params] };
  }

  get sql(): string {
    return this.compileStatement().sql;
  }

  get params(): unknown[] {
    return [...this.compileStatement().params];
  }

  /**
   * Execute on a non-blocking executor
   */
  async execute(): Promise<TResult> {
    const statement = this.consume('non-blocking');
    const result = await this.ctx.runNonBlocking(statement);
    return this.shape(result, statement);
  }

  /**
   * Execute on a blocking executor
   */
  run(): TResult {
    const statement = this.consume('blocking');
    return this.shape(this.ctx.runBlocking(statement), statement);
  }

  then<TResult1 = TResult, TResult2 = never>(
    onfulfilled?: ((value: TResult) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null,
  ): Promise<TResult1 | TResult2> {
    return this.execute().then(onfulfilled, onrejected);
  }
}
