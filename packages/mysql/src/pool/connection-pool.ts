import { ConnectionError, POOL_DEFAULTS, toError } from '@sqlbind/core';
import * as mysql from 'mysql2/promise';

import type { PoolStats } from '@sqlbind/core';

export class MySQLConnectionPool {
  private pool?: mysql.Pool;
  private active = 0;
  private waiting = 0;

  constructor(private readonly options: mysql.PoolOptions) {}

  async initialize(): Promise<void> {
    try {
      this.pool = mysql.createPool(this.options);

      const connection = await this.pool.getConnection();
      try {
        await connection.ping();
      } finally {
        connection.release();
      }
    } catch (error) {
      this.pool = undefined;
      throw new ConnectionError('Failed to initialize MySQL connection pool', toError(error));
    }
  }

  async getConnection(): Promise<mysql.PoolConnection> {
    if (!this.pool) {
      throw new ConnectionError('Connection pool not initialized');
    }

    this.waiting++;
    try {
      const connection = await this.pool.getConnection();
      this.active++;
      return connection;
    } catch (error) {
      throw new ConnectionError('Failed to get connection from pool', toError(error));
    } finally {
      this.waiting--;
    }
  }

  release(connection: mysql.PoolConnection): void {
    connection.release();
    this.active = Math.max(0, this.active - 1);
  }

  async end(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = undefined;
      this.active = 0;
    }
  }

  get isInitialized(): boolean {
    return this.pool !== undefined;
  }

  /**
   * mysql2 exposes no pool counters; these are tracked by this wrapper
   */
  getStats(): PoolStats {
    if (!this.pool) {
      return {
        total: 0,
        idle: 0,
        active: 0,
        waiting: 0,
      };
    }

    const total = this.options.connectionLimit ?? POOL_DEFAULTS.max;
    return {
      total,
      idle: Math.max(0, total - this.active),
      active: this.active,
      waiting: this.waiting,
    };
  }
}
