/**
 * Connection configuration handed to an execution collaborator
 * @example
 * ```typescript
 * const config: ConnectionConfig = {
 *   host: 'localhost',
 *   port: 5432,
 *   user: 'app',
 *   password: 'test-secret',
 *   database: 'app',
 *   pool: {
 *     max: 10,
 *     idleTimeout: 60000
 *   }
 * };
 * ```
 */
export interface ConnectionConfig {
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  connectionString?: string;
  ssl?: boolean | SslOptions;

  /** Database file for file-backed engines (`:memory:` for a private in-memory database) */
  filename?: string;

  /** Pool configuration */
  pool?: PoolConfig;

  connectionTimeout?: number;
  idleTimeout?: number;
  /** File-backed engines only: never write changes back to `filename` */
  readonly?: boolean;
}

/**
 * TLS settings understood by every networked driver
 */
export interface SslOptions {
  rejectUnauthorized?: boolean;
  ca?: string;
  cert?: string;
  key?: string;
}

/**
 * Connection pool configuration
 */
export interface PoolConfig {
  /** Minimum number of connections in pool (pg only; mysql2 keeps no minimum) */
  min?: number;

  /** Maximum number of connections in pool */
  max?: number;

  /** Time before idle connection is closed (ms) */
  idleTimeout?: number;

  /** Maximum waiting requests in queue, 0 = unlimited (mysql2 only) */
  queueLimit?: number;
}

export interface PoolStats {
  total: number;
  idle: number;
  waiting: number;
  active: number;
}

/**
 * A materialized result row
 */
export type Row = Record<string, unknown>;

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonObject | JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}
