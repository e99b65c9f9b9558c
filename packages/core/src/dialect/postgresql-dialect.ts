/**
 * PostgreSQL Dialect Implementation
 *
 * Handles PostgreSQL-specific SQL syntax:
 * - Double quote (") identifier quoting
 * - Numbered ($1, $2) parameter placeholders
 * - RETURNING and ILIKE support
 */

import { SQLDialect } from './sql-dialect';

export class PostgreSQLDialect extends SQLDialect {
  readonly name = 'postgresql';

  placeholder(position: number): string {
    return `$${position}`;
  }
}
