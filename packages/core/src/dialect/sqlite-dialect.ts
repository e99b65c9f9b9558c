/**
 * SQLite Dialect Implementation
 *
 * - Double quote (") identifier quoting
 * - Positional (?) parameter placeholders
 * - RETURNING (3.35+), no ILIKE
 */

import { LIMIT_DEFAULTS } from '../constants';
import { SQLDialect } from './sql-dialect';

export class SQLiteDialect extends SQLDialect {
  readonly name = 'sqlite';

  placeholder(): string {
    return '?';
  }

  /**
   * SQLite only accepts OFFSET after a LIMIT; a negative limit means none
   */
  override appendLimitOffset(parts: string[], limit?: number, offset?: number): void {
    if (offset !== undefined && limit === undefined) {
      parts.push(`LIMIT ${LIMIT_DEFAULTS.SQLITE_UNBOUNDED_LIMIT}`, `OFFSET ${offset}`);
      return;
    }
    super.appendLimitOffset(parts, limit, offset);
  }
}
