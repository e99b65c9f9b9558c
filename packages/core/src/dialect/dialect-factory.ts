/**
 * Dialect Factory
 *
 * Creates appropriate SQL dialect based on database type.
 * Implements Factory pattern for clean dialect instantiation.
 */

import { ValidationError } from '../errors';
import { MySQLDialect } from './mysql-dialect';
import { PostgreSQLDialect } from './postgresql-dialect';
import { SQLiteDialect } from './sqlite-dialect';

import type { DialectName } from './capabilities';
import type { SQLDialect } from './sql-dialect';

export type DialectDatabaseType = DialectName | 'mariadb' | 'postgres' | 'sqlite3';

const SUPPORTED_TYPES: readonly string[] = [
  'mysql',
  'mariadb',
  'postgresql',
  'postgres',
  'sqlite',
  'sqlite3',
];

const dialectCache = new Map<DialectName, SQLDialect>();

export class DialectFactory {
  /**
   * Get dialect for database type (cached)
   */
  static getDialect(type: DialectDatabaseType): SQLDialect {
    const normalizedType = this.normalizeType(type);

    const cached = dialectCache.get(normalizedType);
    if (cached) {
      return cached;
    }

    const dialect = this.createDialect(normalizedType);
    dialectCache.set(normalizedType, dialect);
    return dialect;
  }

  /**
   * Create new dialect instance (not cached)
   */
  static createDialect(type: DialectDatabaseType): SQLDialect {
    switch (this.normalizeType(type)) {
      case 'mysql': {
        return new MySQLDialect();
      }
      case 'postgresql': {
        return new PostgreSQLDialect();
      }
      case 'sqlite': {
        return new SQLiteDialect();
      }
    }
  }

  /**
   * Normalize database type aliases
   */
  static normalizeType(type: string): DialectName {
    switch (type) {
      case 'mysql':
      case 'mariadb': {
        return 'mysql';
      }
      case 'postgresql':
      case 'postgres': {
        return 'postgresql';
      }
      case 'sqlite':
      case 'sqlite3': {
        return 'sqlite';
      }
      default: {
        throw new ValidationError(`Unknown database type: ${type}`, 'dialect');
      }
    }
  }

  /**
   * Check if database type is supported
   */
  static isSupported(type: string): type is DialectDatabaseType {
    return SUPPORTED_TYPES.includes(type);
  }

  /**
   * Clear dialect cache (useful for testing)
   */
  static clearCache(): void {
    dialectCache.clear();
  }
}
