export { SQLiteExecutor, toSQLiteParam } from './executor/sqlite-executor';
export type { SQLiteExecutorOptions } from './executor/sqlite-executor';

// Re-export core types
export type { BlockingExecutor, ConnectionConfig, RawResult } from '@sqlbind/core';
