/**
 * PostgreSQL executor
 *
 * Non-blocking execution collaborator over a pg pool. Each statement checks
 * out a client right before it runs and releases it before the result is
 * handed back, so no client outlives a single statement.
 *
 * @example
 * ```typescript
 * const executor = new PostgreSQLExecutor({ logger });
 * await executor.connect({ host: 'localhost', database: 'app', user: 'app', password: 'test-secret' });
 * const qb = createQueryBuilder({ dialect: 'postgresql', executor });
 * ```
 */

import {
  ConnectionError,
  QueryError,
  toError,
  validateConnectionConfig,
  validateSQL,
} from '@sqlbind/core';

import { PostgreSQLConnectionPool } from '../pool/connection-pool';
import { toPgPoolConfig } from '../utils/pg-config';

import type {
  ConnectionConfig,
  Logger,
  NonBlockingExecutor,
  PoolStats,
  RawResult,
} from '@sqlbind/core';
import type { PoolConfig } from 'pg';

export interface PostgreSQLExecutorOptions {
  logger?: Logger;
  /** Raw pg pool options, applied over the mapped ConnectionConfig */
  pgOptions?: PoolConfig;
}

export class PostgreSQLExecutor implements NonBlockingExecutor {
  readonly convention = 'non-blocking';

  private pool?: PostgreSQLConnectionPool;
  private readonly logger?: Logger;
  private readonly pgOptions?: PoolConfig;

  constructor(options: PostgreSQLExecutorOptions = {}) {
    this.logger = options.logger;
    this.pgOptions = options.pgOptions;
  }

  get isConnected(): boolean {
    return this.pool?.isInitialized ?? false;
  }

  async connect(config: ConnectionConfig): Promise<void> {
    validateConnectionConfig(config);

    const pool = new PostgreSQLConnectionPool(toPgPoolConfig(config, this.pgOptions), this.logger);
    await pool.initialize();
    this.pool = pool;

    this.logger?.info('Connected to PostgreSQL database', { database: config.database });
  }

  async disconnect(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = undefined;
      this.logger?.info('Disconnected from PostgreSQL database');
    }
  }

  async query(sql: string, params: readonly unknown[]): Promise<RawResult> {
    validateSQL(sql);

    if (!this.pool) {
      throw new ConnectionError('Database pool not initialized');
    }

    const client = await this.pool.getClient();
    try {
      const result = await client.query({ text: sql, values: [...params], rowMode: 'array' });
      return {
        columns: result.fields.map((field) => field.name),
        rows: result.rows,
        rowCount: result.rowCount ?? result.rows.length,
      };
    } catch (error) {
      const cause = toError(error);
      throw new QueryError(`Query failed: ${cause.message}`, sql, [...params], cause);
    } finally {
      client.release();
    }
  }

  getPoolStats(): PoolStats {
    return this.pool?.getStats() ?? { total: 0, idle: 0, active: 0, waiting: 0 };
  }
}
