/**
 * Constants
 *
 * Centralized configuration constants to eliminate magic numbers.
 * All timing values are in milliseconds unless otherwise noted.
 */

// ============ Connection Defaults ============

export const CONNECTION_DEFAULTS = {
  /** Default MySQL port */
  MYSQL_PORT: 3306,
  /** Default PostgreSQL port */
  POSTGRESQL_PORT: 5432,
  /** Default connection timeout (10 seconds) */
  CONNECTION_TIMEOUT: 10_000,
  /** Default idle timeout (30 seconds) */
  IDLE_TIMEOUT: 30_000,
  /** Maximum port number */
  MAX_PORT: 65_535,
  /** Minimum port number */
  MIN_PORT: 1,
} as const;

// ============ Pool Defaults ============

/**
 * Pool defaults for the networked executors.
 * Matches PoolConfig interface for easy spreading
 *
 * @example
 * ```typescript
 * const poolConfig = {
 *   ...POOL_DEFAULTS,
 *   max: 20, // Override specific values
 * };
 * ```
 */
export const POOL_DEFAULTS = {
  /** Minimum connections in pool */
  min: 0,
  /** Maximum connections in pool */
  max: 10,
  /** Maximum waiting requests in queue */
  queueLimit: 100,
} as const;

// ============ Query Defaults ============

export const QUERY_DEFAULTS = {
  /** Slow query threshold (1 second) */
  SLOW_QUERY_THRESHOLD: 1000,
} as const;

// ============ Logging Defaults ============

export const LOGGING_DEFAULTS = {
  /** Prefix for console log lines */
  PREFIX: '[sqlbind]',
  /** Maximum SQL length in logs (200 chars) */
  MAX_SQL_LENGTH: 200,
  /** Maximum params length in logs (100 chars) */
  MAX_PARAMS_LENGTH: 100,
} as const;

// ============ Dialect Limits ============

export const LIMIT_DEFAULTS = {
  /** MySQL's max unsigned bigint, used as "no limit" before a bare OFFSET */
  MYSQL_UNBOUNDED_LIMIT: '18446744073709551615',
  /** SQLite treats a negative LIMIT as unbounded */
  SQLITE_UNBOUNDED_LIMIT: '-1',
} as const;
