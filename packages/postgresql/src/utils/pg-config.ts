import { CONNECTION_DEFAULTS, POOL_DEFAULTS, ValidationError } from '@sqlbind/core';

import type { ConnectionConfig } from '@sqlbind/core';
import type { PoolConfig } from 'pg';

/**
 * Map a ConnectionConfig onto pg's pool options. Explicit pg options win.
 */
export function toPgPoolConfig(config: ConnectionConfig, overrides: PoolConfig = {}): PoolConfig {
  if (config.pool?.queueLimit !== undefined) {
    throw new ValidationError('pg pools have no queue limit; remove pool.queueLimit', 'pool.queueLimit');
  }

  const poolConfig: PoolConfig = {
    host: config.host,
    port: config.port ?? CONNECTION_DEFAULTS.POSTGRESQL_PORT,
    user: config.user,
    password: config.password,
    database: config.database,
    min: config.pool?.min ?? POOL_DEFAULTS.min,
    max: config.pool?.max ?? POOL_DEFAULTS.max,
    idleTimeoutMillis: config.pool?.idleTimeout ?? config.idleTimeout ?? CONNECTION_DEFAULTS.IDLE_TIMEOUT,
    connectionTimeoutMillis: config.connectionTimeout ?? CONNECTION_DEFAULTS.CONNECTION_TIMEOUT,
  };

  if (config.ssl !== undefined) {
    poolConfig.ssl = config.ssl;
  }

  if (config.connectionString) {
    poolConfig.connectionString = config.connectionString;
  }

  return { ...poolConfig, ...overrides };
}
