import { CONNECTION_DEFAULTS } from '../constants';
import { ValidationError } from '../errors';

import type { ConnectionConfig } from '../types';

export type ConnectionTarget = 'network' | 'file';

/**
 * Validate a connection config before an executor opens it.
 * Networked engines need host and database (or a connection string);
 * file-backed engines need a filename.
 */
export function validateConnectionConfig(
  config: ConnectionConfig,
  target: ConnectionTarget = 'network',
): void {
  if (!config) {
    throw new ValidationError('Connection configuration is required');
  }

  if (target === 'file') {
    if (!config.filename) {
      throw new ValidationError('Filename is required for file-backed databases', 'filename');
    }
    return;
  }

  if (config.readonly) {
    throw new ValidationError('readonly is only supported for file-backed databases', 'readonly');
  }

  if (!config.connectionString) {
    if (!config.host) {
      throw new ValidationError('Host is required when connectionString is not provided', 'host');
    }

    if (!config.database) {
      throw new ValidationError(
        'Database name is required when connectionString is not provided',
        'database',
      );
    }
  }

  if (
    config.port !== undefined &&
    (!Number.isInteger(config.port) ||
      config.port < CONNECTION_DEFAULTS.MIN_PORT ||
      config.port > CONNECTION_DEFAULTS.MAX_PORT)
  ) {
    throw new ValidationError('Port must be a number between 1 and 65535', 'port');
  }

  if (config.pool?.max !== undefined && config.pool.max < 1) {
    throw new ValidationError('Pool size must be a positive number', 'pool.max');
  }

  if (config.connectionTimeout !== undefined && config.connectionTimeout < 0) {
    throw new ValidationError('Connection timeout must be a non-negative number', 'connectionTimeout');
  }

  if (config.idleTimeout !== undefined && config.idleTimeout < 0) {
    throw new ValidationError('Idle timeout must be a non-negative number', 'idleTimeout');
  }
}

export function validateSQL(sql: string): void {
  if (typeof sql !== 'string' || sql.trim().length === 0) {
    throw new ValidationError('SQL query must be a non-empty string');
  }
}

const IDENTIFIER_PATTERN = /^[A-Z_a-z][\w$]*$/;

/**
 * Table and column names must be plain identifiers
 */
export function validateIdentifier(name: string, field: 'table' | 'column'): void {
  if (typeof name !== 'string' || !IDENTIFIER_PATTERN.test(name)) {
    throw new ValidationError(
      `${field === 'table' ? 'Table' : 'Column'} name "${String(name)}" must start with a letter or underscore and contain only letters, numbers, underscores and $`,
      field,
    );
  }
}
