import { ConnectionError, toError } from '@sqlbind/core';
import { Pool } from 'pg';

import type { Logger, PoolStats } from '@sqlbind/core';
import type { PoolClient, PoolConfig } from 'pg';

export class PostgreSQLConnectionPool {
  private pool?: Pool;

  constructor(
    private readonly config: PoolConfig,
    private readonly logger?: Logger,
  ) {}

  async initialize(): Promise<void> {
    try {
      this.pool = new Pool(this.config);

      this.pool.on('error', (err) => {
        this.logger?.error('Unexpected error on idle PostgreSQL client', err.message);
      });

      const client = await this.pool.connect();
      try {
        await client.query('SELECT 1');
      } finally {
        client.release();
      }
    } catch (error) {
      const failed = this.pool;
      this.pool = undefined;
      await failed?.end();
      throw new ConnectionError('Failed to initialize PostgreSQL connection pool', toError(error));
    }
  }

  async getClient(): Promise<PoolClient> {
    if (!this.pool) {
      throw new ConnectionError('Connection pool not initialized');
    }

    try {
      return await this.pool.connect();
    } catch (error) {
      throw new ConnectionError('Failed to get client from pool', toError(error));
    }
  }

  async end(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = undefined;
    }
  }

  get isInitialized(): boolean {
    return this.pool !== undefined;
  }

  getStats(): PoolStats {
    if (!this.pool) {
      return {
        total: 0,
        idle: 0,
        active: 0,
        waiting: 0,
      };
    }

    return {
      total: this.pool.totalCount,
      idle: this.pool.idleCount,
      active: this.pool.totalCount - this.pool.idleCount,
      waiting: this.pool.waitingCount,
    };
  }
}
