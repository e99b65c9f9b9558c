/**
 * Query Context
 *
 * Shared context for all query builders containing:
 * - Database dialect
 * - Execution bridge over the caller's executor
 * - Result collision policy and logger
 *
 * This separates execution concerns from query building.
 */

import { compile } from '../compiler/compiler';
import { ExecutionBridge } from '../execution/execution-bridge';
import { materializeRows } from '../result/materializer';
import { truncateSql } from '../utils/logger';

import type { CompiledStatement } from '../compiler/compiler';
import type { StatementState } from '../compiler/statement-state';
import type { SQLDialect } from '../dialect/sql-dialect';
import type { ExecutionBridgeOptions } from '../execution/execution-bridge';
import type { CallingConvention, Executor, RawResult } from '../execution/executor';
import type { CollisionPolicy } from '../result/materializer';
import type { Logger, Row } from '../types';

export interface QueryContextOptions extends ExecutionBridgeOptions {
  collisionPolicy?: CollisionPolicy;
}

export class QueryContext {
  readonly bridge: ExecutionBridge;
  readonly collisionPolicy: CollisionPolicy;
  private readonly logger?: Logger;

  constructor(
    public readonly dialect: SQLDialect,
    executor: Executor,
    options: QueryContextOptions = {},
  ) {
    this.bridge = new ExecutionBridge(executor, options);
    this.collisionPolicy = options.collisionPolicy ?? 'last-wins';
    this.logger = options.logger;
  }

  get convention(): CallingConvention {
    return this.bridge.convention;
  }

  compile(state: StatementState): CompiledStatement {
    const statement = compile(state, this.dialect);
    this.logger?.debug(`Compiled ${state.kind} for ${this.dialect.name}: ${truncateSql(statement.sql)}`);
    return statement;
  }

  runBlocking(statement: CompiledStatement): RawResult {
    return this.bridge.runBlocking(statement);
  }

  runNonBlocking(statement: CompiledStatement): Promise<RawResult> {
    return this.bridge.runNonBlocking(statement);
  }

  materialize(result: RawResult, statement: CompiledStatement): Row[] {
    return materializeRows(result, statement.projection, this.collisionPolicy);
  }
}
