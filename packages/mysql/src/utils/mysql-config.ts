import { CONNECTION_DEFAULTS, POOL_DEFAULTS, ValidationError } from '@sqlbind/core';

import type { ConnectionConfig } from '@sqlbind/core';
import type { PoolOptions } from 'mysql2/promise';

/**
 * Map a ConnectionConfig onto mysql2 pool options. Explicit mysql2 options win.
 */
export function toMySQLPoolOptions(
  config: ConnectionConfig,
  overrides: PoolOptions = {},
): PoolOptions {
  if (config.pool?.min) {
    throw new ValidationError('mysql2 pools keep no minimum of connections; remove pool.min', 'pool.min');
  }

  const options: PoolOptions = {
    host: config.host,
    port: config.port ?? CONNECTION_DEFAULTS.MYSQL_PORT,
    user: config.user,
    password: config.password,
    database: config.database,
    connectionLimit: config.pool?.max ?? POOL_DEFAULTS.max,
    queueLimit: config.pool?.queueLimit ?? POOL_DEFAULTS.queueLimit,
    idleTimeout: config.pool?.idleTimeout ?? config.idleTimeout ?? CONNECTION_DEFAULTS.IDLE_TIMEOUT,
    connectTimeout: config.connectionTimeout ?? CONNECTION_DEFAULTS.CONNECTION_TIMEOUT,
    waitForConnections: true,
  };

  if (config.connectionString) {
    options.uri = config.connectionString;
  }

  if (typeof config.ssl === 'object') {
    options.ssl = config.ssl;
  } else if (config.ssl === true) {
    options.ssl = {};
  }

  return { ...options, ...overrides };
}
