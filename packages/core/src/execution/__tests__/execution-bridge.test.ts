import { describe, it, expect, vi } from 'vitest';

import { compile } from '../../compiler/compiler';
import { createStatementState } from '../../compiler/statement-state';
import { PostgreSQLDialect } from '../../dialect/postgresql-dialect';
import { CallingConventionMismatchError } from '../../errors';
import { eq } from '../../expression/predicate';
import { defineTable } from '../../schema/table';
import { ExecutionBridge } from '../execution-bridge';

import type { QueryErrorEvent, QueryEvent } from '../execution-bridge';
import type { BlockingExecutor, NonBlockingExecutor, RawResult } from '../executor';
import type { Logger } from '../../types';

const users = defineTable('users', { id: { type: 'integer' }, name: { type: 'text' } });

function statement() {
  const state = createStatementState('select', users);
  state.where.push(eq(users.col('id'), 1));
  return compile(state, new PostgreSQLDialect());
}

const result: RawResult = { columns: ['id', 'name'], rows: [[1, 'Ann']], rowCount: 1 };

function createLogger(): Logger {
  return { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
}

function blockingExecutor(query = vi.fn((): RawResult => result)): BlockingExecutor {
  return { convention: 'blocking', query };
}

function nonBlockingExecutor(
  query = vi.fn(async (): Promise<RawResult> => result),
): NonBlockingExecutor {
  return { convention: 'non-blocking', query };
}

describe('ExecutionBridge', () => {
  it('should pass sql and params to a blocking executor', () => {
    const query = vi.fn((): RawResult => result);
    const bridge = new ExecutionBridge(blockingExecutor(query));

    expect(bridge.runBlocking(statement())).toBe(result);
    expect(query).toHaveBeenCalledWith('SELECT * FROM "users" WHERE "id" = $1', [1]);
    expect(bridge.convention).toBe('blocking');
  });

  it('should await a non-blocking executor', async () => {
    const bridge = new ExecutionBridge(nonBlockingExecutor());
    await expect(bridge.runNonBlocking(statement())).resolves.toBe(result);
  });

  it('should refuse a promise from a blocking executor without calling it', async () => {
    const query = vi.fn((): RawResult => result);
    const bridge = new ExecutionBridge(blockingExecutor(query));

    await expect(bridge.runNonBlocking(statement())).rejects.toThrow(
      new CallingConventionMismatchError('non-blocking', 'blocking'),
    );
    expect(query).not.toHaveBeenCalled();
  });

  it('should refuse a blocking call on a non-blocking executor without calling it', () => {
    const query = vi.fn(async (): Promise<RawResult> => result);
    const bridge = new ExecutionBridge(nonBlockingExecutor(query));

    expect(() => bridge.runBlocking(statement())).toThrow(CallingConventionMismatchError);
    expect(query).not.toHaveBeenCalled();
  });

  it('should emit query events', () => {
    const bridge = new ExecutionBridge(blockingExecutor());
    const events: QueryEvent[] = [];
    bridge.on('query', (event) => events.push(event));

    bridge.runBlocking(statement());

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      sql: 'SELECT * FROM "users" WHERE "id" = $1',
      params: [1],
      rowCount: 1,
    });
  });

  it('should rethrow executor errors unchanged and emit queryError', async () => {
    const failure = new Error('relation "users" does not exist');
    const logger = createLogger();
    const bridge = new ExecutionBridge(
      nonBlockingExecutor(vi.fn(async (): Promise<RawResult> => Promise.reject(failure))),
      { logger },
    );
    const errors: QueryErrorEvent[] = [];
    bridge.on('queryError', (event) => errors.push(event));

    await expect(bridge.runNonBlocking(statement())).rejects.toBe(failure);

    expect(errors.map((event) => event.error)).toEqual([failure]);
    expect(logger.error).toHaveBeenCalledWith(
      'Query failed: SELECT * FROM "users" WHERE "id" = $1',
      'relation "users" does not exist',
    );
  });

  it('should rethrow errors from a blocking executor', () => {
    const failure = new Error('disk I/O error');
    const bridge = new ExecutionBridge(
      blockingExecutor(
        vi.fn((): RawResult => {
          throw failure;
        }),
      ),
    );
    expect(() => bridge.runBlocking(statement())).toThrow(failure);
  });

  it('should not report a query that ran as failed when a listener throws', async () => {
    const query = vi.fn(async (): Promise<RawResult> => result);
    const logger = createLogger();
    const bridge = new ExecutionBridge(nonBlockingExecutor(query), { logger });
    const errors: QueryErrorEvent[] = [];
    bridge.on('queryError', (event) => errors.push(event));
    bridge.on('query', () => {
      throw new Error('listener failed');
    });

    await expect(bridge.runNonBlocking(statement())).rejects.toThrow('listener failed');

    expect(query).toHaveBeenCalledTimes(1);
    expect(errors).toEqual([]);
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('should keep blocking listener failures apart from query failures', () => {
    const bridge = new ExecutionBridge(blockingExecutor());
    const errors: QueryErrorEvent[] = [];
    bridge.on('queryError', (event) => errors.push(event));
    bridge.on('query', () => {
      throw new Error('listener failed');
    });

    expect(() => bridge.runBlocking(statement())).toThrow('listener failed');
    expect(errors).toEqual([]);
  });

  it('should log statements at debug, with params when asked', () => {
    const logger = createLogger();
    const bridge = new ExecutionBridge(blockingExecutor(), { logger, logParams: true });

    bridge.runBlocking(statement());

    expect(logger.debug).toHaveBeenCalledWith(
      'Executing: SELECT * FROM "users" WHERE "id" = $1',
      '[1]',
    );
  });

  it('should warn about slow queries', () => {
    const logger = createLogger();
    const bridge = new ExecutionBridge(blockingExecutor(), { logger, slowQueryThreshold: 0 });

    bridge.runBlocking(statement());

    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      expect.stringMatching(/^Slow query \(\d+ms\): SELECT \* FROM "users"/),
    );
  });
});
