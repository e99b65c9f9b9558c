/**
 * Execution Bridge
 *
 * Hands compiled statements to the executor through one of two entry
 * points. Asking a blocking executor for a promise, or a non-blocking one
 * for an immediate result, fails before the executor is touched.
 * Executor errors propagate unchanged and are never retried.
 *
 * @example
 * ```typescript
 * const bridge = new ExecutionBridge(executor, { logger });
 * bridge.on('query', ({ sql, duration }) => metrics.observe(sql, duration));
 * const result = await bridge.runNonBlocking(statement);
 * ```
 */

import { EventEmitter } from 'eventemitter3';

import { QUERY_DEFAULTS } from '../constants';
import { CallingConventionMismatchError } from '../errors';
import { formatParams, truncateSql } from '../utils/logger';

import type { CallingConvention, Executor, RawResult } from './executor';
import type { CompiledStatement } from '../compiler/compiler';
import type { Logger } from '../types';

export interface QueryEvent {
  sql: string;
  params: readonly unknown[];
  duration: number;
  rowCount: number;
}

export interface QueryErrorEvent {
  sql: string;
  params: readonly unknown[];
  error: unknown;
  duration: number;
}

export interface ExecutionEvents {
  query: (event: QueryEvent) => void;
  queryError: (event: QueryErrorEvent) => void;
}

export interface ExecutionBridgeOptions {
  logger?: Logger;
  /** Statements slower than this (ms) are logged at warn */
  slowQueryThreshold?: number;
  /** Include parameter values in log lines */
  logParams?: boolean;
}

export class ExecutionBridge extends EventEmitter<ExecutionEvents> {
  private readonly logger?: Logger;
  private readonly slowQueryThreshold: number;
  private readonly logParams: boolean;

  constructor(
    readonly executor: Executor,
    options: ExecutionBridgeOptions = {},
  ) {
    super();
    this.logger = options.logger;
    this.slowQueryThreshold = options.slowQueryThreshold ?? QUERY_DEFAULTS.SLOW_QUERY_THRESHOLD;
    this.logParams = options.logParams ?? false;
  }

  get convention(): CallingConvention {
    return this.executor.convention;
  }

  /**
   * Execute and return before the caller continues
   */
  runBlocking(statement: CompiledStatement): RawResult {
    const { executor } = this;
    if (executor.convention !== 'blocking') {
      throw new CallingConventionMismatchError('blocking', executor.convention);
    }

    this.logStatement(statement);
    const startTime = Date.now();
    let result: RawResult;
    try {
      result = executor.query(statement.sql, statement.params);
    } catch (error) {
      this.fail(statement, error, startTime);
      throw error;
    }
    // The statement has run; listener or logger failures are not query failures
    this.complete(statement, result, startTime);
    return result;
  }

  /**
   * Execute through the executor's promise-based entry point
   */
  async runNonBlocking(statement: CompiledStatement): Promise<RawResult> {
    const { executor } = this;
    if (executor.convention !== 'non-blocking') {
      throw new CallingConventionMismatchError('non-blocking', executor.convention);
    }

    this.logStatement(statement);
    const startTime = Date.now();
    let result: RawResult;
    try {
      result = await executor.query(statement.sql, statement.params);
    } catch (error) {
      this.fail(statement, error, startTime);
      throw error;
    }
    this.complete(statement, result, startTime);
    return result;
  }

  private logStatement(statement: CompiledStatement): void {
    if (this.logParams) {
      this.logger?.debug(`Executing: ${truncateSql(statement.sql)}`, formatParams(statement.params));
    } else {
      this.logger?.debug(`Executing: ${truncateSql(statement.sql)}`);
    }
  }

  private complete(statement: CompiledStatement, result: RawResult, startTime: number): void {
    const duration = Date.now() - startTime;
    if (duration >= this.slowQueryThreshold) {
      this.logger?.warn(`Slow query (${duration}ms): ${truncateSql(statement.sql)}`);
    }
    this.emit('query', {
      sql: statement.sql,
      params: statement.params,
      duration,
      rowCount: result.rowCount,
    });
  }

  private fail(statement: CompiledStatement, error: unknown, startTime: number): void {
    const duration = Date.now() - startTime;
    const message = error instanceof Error ? error.message : String(error);
    if (this.logParams) {
      this.logger?.error(
        `Query failed: ${truncateSql(statement.sql)}`,
        formatParams(statement.params),
        message,
      );
    } else {
      this.logger?.error(`Query failed: ${truncateSql(statement.sql)}`, message);
    }
    this.emit('queryError', { sql: statement.sql, params: statement.params, error, duration });
  }
}
