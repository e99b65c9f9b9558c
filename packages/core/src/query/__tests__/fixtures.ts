import { vi } from 'vitest';

import { defineTable } from '../../schema/table';
import { createQueryBuilder } from '../query-factory';

import type { DialectDatabaseType } from '../../dialect/dialect-factory';
import type { BlockingExecutor, NonBlockingExecutor, RawResult } from '../../execution/executor';
import type { QueryContextOptions } from '../query-context';

export interface User {
  id: number;
  name: string;
}

export const users = defineTable(
  'users',
  {
    id: { type: 'integer', primaryKey: true },
    name: { type: 'text' },
    age: { type: 'integer', nullable: true },
    team_id: { type: 'foreign-key', nullable: true },
  },
  {
    hydrator: {
      populate: (row): User => ({ id: Number(row['id']), name: String(row['name']) }),
    },
  },
);

export const teams = defineTable('teams', {
  id: { type: 'integer', primaryKey: true },
  name: { type: 'text' },
});

export const EMPTY_RESULT: RawResult = { columns: [], rows: [], rowCount: 0 };

/**
 * Promise-based executor that records every call and answers with `result`
 */
export function createAsyncExecutor(result: RawResult = EMPTY_RESULT) {
  const query = vi.fn(async (_sql: string, _params: readonly unknown[]): Promise<RawResult> => result);
  const executor: NonBlockingExecutor = { convention: 'non-blocking', query };
  return { executor, query };
}

export function createSyncExecutor(result: RawResult = EMPTY_RESULT) {
  const query = vi.fn((_sql: string, _params: readonly unknown[]): RawResult => result);
  const executor: BlockingExecutor = { convention: 'blocking', query };
  return { executor, query };
}

export function asyncQueryBuilder(
  dialect: DialectDatabaseType = 'postgresql',
  result: RawResult = EMPTY_RESULT,
  options: QueryContextOptions = {},
) {
  const { executor, query } = createAsyncExecutor(result);
  return { qb: createQueryBuilder({ dialect, executor, ...options }), query };
}

export function syncQueryBuilder(
  dialect: DialectDatabaseType = 'sqlite',
  result: RawResult = EMPTY_RESULT,
  options: QueryContextOptions = {},
) {
  const { executor, query } = createSyncExecutor(result);
  return { qb: createQueryBuilder({ dialect, executor, ...options }), query };
}
