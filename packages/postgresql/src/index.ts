export { PostgreSQLExecutor } from './executor/postgresql-executor';
export type { PostgreSQLExecutorOptions } from './executor/postgresql-executor';
export { PostgreSQLConnectionPool } from './pool/connection-pool';
export { toPgPoolConfig } from './utils/pg-config';

// Re-export core types
export type { ConnectionConfig, NonBlockingExecutor, RawResult } from '@sqlbind/core';
