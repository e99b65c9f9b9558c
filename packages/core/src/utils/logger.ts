import { LOGGING_DEFAULTS } from '../constants';

import type { Logger } from '../types';

/**
 * Console-backed logger
 *
 * @example
 * ```typescript
 * const qb = createQueryBuilder({
 *   dialect: 'postgresql',
 *   executor,
 *   logger: createConsoleLogger(),
 * });
 * ```
 */
/* eslint-disable no-console */
export function createConsoleLogger(prefix: string = LOGGING_DEFAULTS.PREFIX): Logger {
  return {
    debug: (msg, ...args) => console.debug(`${prefix} ${msg}`, ...args),
    info: (msg, ...args) => console.info(`${prefix} ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`${prefix} ${msg}`, ...args),
    error: (msg, ...args) => console.error(`${prefix} ${msg}`, ...args),
  };
}
/* eslint-enable no-console */

/**
 * Truncate long SQL for logging
 */
export function truncateSql(sql: string, maxLength: number = LOGGING_DEFAULTS.MAX_SQL_LENGTH): string {
  if (sql.length <= maxLength) {
    return sql;
  }
  return `${sql.slice(0, maxLength)}...`;
}

/**
 * Format parameters for logging
 */
export function formatParams(
  params: readonly unknown[],
  maxLength: number = LOGGING_DEFAULTS.MAX_PARAMS_LENGTH,
): string {
  const str = JSON.stringify(params, (_key, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value,
  );
  if (str.length <= maxLength) {
    return str;
  }
  return `${str.slice(0, maxLength)}...`;
}
