export { MySQLExecutor } from './executor/mysql-executor';
export type { MySQLExecutorOptions } from './executor/mysql-executor';
export { MySQLConnectionPool } from './pool/connection-pool';
export { toMySQLPoolOptions } from './utils/mysql-config';

// Re-export core types
export type { ConnectionConfig, NonBlockingExecutor, RawResult } from '@sqlbind/core';
