/**
 * MySQL executor
 *
 * Non-blocking execution collaborator over a mysql2 pool. Statements run as
 * server-side prepared statements with rows returned as arrays; writes
 * report affected rows.
 */

import {
  ConnectionError,
  QueryError,
  toError,
  validateConnectionConfig,
  validateSQL,
} from '@sqlbind/core';

import { MySQLConnectionPool } from '../pool/connection-pool';
import { toMySQLPoolOptions } from '../utils/mysql-config';

import type {
  ConnectionConfig,
  Logger,
  NonBlockingExecutor,
  PoolStats,
  RawResult,
} from '@sqlbind/core';
import type { PoolOptions, ResultSetHeader, RowDataPacket } from 'mysql2/promise';

export interface MySQLExecutorOptions {
  logger?: Logger;
  /** Raw mysql2 pool options, applied over the mapped ConnectionConfig */
  mysql2Options?: PoolOptions;
}

export class MySQLExecutor implements NonBlockingExecutor {
  readonly convention = 'non-blocking';

  private pool?: MySQLConnectionPool;
  private readonly logger?: Logger;
  private readonly mysql2Options?: PoolOptions;

  constructor(options: MySQLExecutorOptions = {}) {
    this.logger = options.logger;
    this.mysql2Options = options.mysql2Options;
  }

  get isConnected(): boolean {
    return this.pool?.isInitialized ?? false;
  }

  async connect(config: ConnectionConfig): Promise<void> {
    validateConnectionConfig(config);

    const pool = new MySQLConnectionPool(toMySQLPoolOptions(config, this.mysql2Options));
    await pool.initialize();
    this.pool = pool;

    this.logger?.info('Connected to MySQL database', { database: config.database });
  }

  async disconnect(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = undefined;
      this.logger?.info('Disconnected from MySQL database');
    }
  }

  async query(sql: string, params: readonly unknown[]): Promise<RawResult> {
    validateSQL(sql);

    const { pool } = this;
    if (!pool) {
      throw new ConnectionError('Database pool not initialized');
    }

    const connection = await pool.getConnection();
    try {
      const [result, fields] = await connection.execute<RowDataPacket[][] | ResultSetHeader>(
        { sql, rowsAsArray: true },
        [...params],
      );

      if (Array.isArray(result)) {
        return {
          columns: fields.map((field) => field.name),
          rows: result,
          rowCount: result.length,
        };
      }

      return { columns: [], rows: [], rowCount: result.affectedRows };
    } catch (error) {
      const cause = toError(error);
      throw new QueryError(`Query failed: ${cause.message}`, sql, [...params], cause);
    } finally {
      pool.release(connection);
    }
  }

  getPoolStats(): PoolStats {
    return this.pool?.getStats() ?? { total: 0, idle: 0, active: 0, waiting: 0 };
  }
}
