/**
 * SQLite executor
 *
 * Blocking execution collaborator over sql.js. Opening loads the engine
 * and is asynchronous; every statement after that runs synchronously.
 * Statements that return data (SELECT, or writes with RETURNING) are read
 * as raw tuples; other writes report the number of changed rows.
 *
 * A file-backed database is read into memory on open and written back on
 * close unless it was opened `readonly`.
 *
 * @example
 * ```typescript
 * const executor = new SQLiteExecutor();
 * await executor.open({ filename: ':memory:' });
 * const qb = createQueryBuilder({ dialect: 'sqlite', executor });
 * const rows = qb.select().from(users).run();
 * ```
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs';

import {
  ConnectionError,
  QueryError,
  ValidationError,
  describeValue,
  toError,
  validateConnectionConfig,
  validateSQL,
} from '@sqlbind/core';
import initSqlJs from 'sql.js';

import type { BlockingExecutor, ConnectionConfig, Logger, RawResult } from '@sqlbind/core';
import type { Database, SqlJsStatic, SqlValue, Statement } from 'sql.js';

export interface SQLiteExecutorOptions {
  logger?: Logger;
}

const MEMORY = ':memory:';

let engine: Promise<SqlJsStatic> | undefined;

function loadEngine(): Promise<SqlJsStatic> {
  engine ??= initSqlJs();
  return engine;
}

/**
 * sql.js binds numbers, strings, byte arrays and null.
 * Booleans are stored as 1/0; bigints as numbers while they fit, otherwise as text.
 */
export function toSQLiteParam(value: unknown): SqlValue {
  if (value === null || typeof value === 'string' || typeof value === 'number') {
    return value;
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (typeof value === 'bigint') {
    return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)
      ? Number(value)
      : value.toString();
  }
  if (value instanceof Uint8Array) {
    return value;
  }
  throw new ValidationError(`Cannot bind a ${describeValue(value)} parameter to SQLite`);
}

export class SQLiteExecutor implements BlockingExecutor {
  readonly convention = 'blocking';

  private db?: Database;
  private filename?: string;
  private readOnly = false;
  private readonly logger?: Logger;

  constructor(options: SQLiteExecutorOptions = {}) {
    this.logger = options.logger;
  }

  get isOpen(): boolean {
    return this.db !== undefined;
  }

  async open(config: ConnectionConfig): Promise<void> {
    validateConnectionConfig(config, 'file');
    const filename = config.filename ?? MEMORY;

    try {
      const SQL = await loadEngine();
      this.db =
        filename !== MEMORY && existsSync(filename)
          ? new SQL.Database(readFileSync(filename))
          : new SQL.Database();
    } catch (error) {
      throw new ConnectionError(`Failed to open SQLite database ${filename}`, toError(error));
    }

    this.filename = filename;
    this.readOnly = config.readonly ?? false;
    this.logger?.info('Opened SQLite database', { filename });
  }

  close(): void {
    const db = this.db;
    if (!db) {
      return;
    }

    this.db = undefined;
    try {
      if (this.filename && this.filename !== MEMORY && !this.readOnly) {
        writeFileSync(this.filename, db.export());
      }
    } catch (error) {
      throw new ConnectionError(`Failed to write SQLite database ${this.filename}`, toError(error));
    } finally {
      db.close();
    }
    this.logger?.info('Closed SQLite database');
  }

  /**
   * Run a statement that is not built by a query builder, e.g. DDL
   */
  exec(sql: string): void {
    validateSQL(sql);
    const db = this.connection();
    try {
      db.exec(sql);
    } catch (error) {
      const cause = toError(error);
      throw new QueryError(`Query failed: ${cause.message}`, sql, [], cause);
    }
  }

  query(sql: string, params: readonly unknown[]): RawResult {
    validateSQL(sql);
    const db = this.connection();
    const bound = params.map((value) => toSQLiteParam(value));

    let statement: Statement | undefined;
    try {
      statement = db.prepare(sql);
      statement.bind(bound);
      const columns = statement.getColumnNames();
      const rows: unknown[][] = [];
      while (statement.step()) {
        rows.push(statement.get());
      }

      if (columns.length > 0) {
        return { columns, rows, rowCount: rows.length };
      }
      return { columns: [], rows: [], rowCount: db.getRowsModified() };
    } catch (error) {
      const cause = toError(error);
      throw new QueryError(`Query failed: ${cause.message}`, sql, [...params], cause);
    } finally {
      statement?.free();
    }
  }

  private connection(): Database {
    if (!this.db) {
      throw new ConnectionError('SQLite database is not open');
    }
    return this.db;
  }
}
