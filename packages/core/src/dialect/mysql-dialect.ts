/**
 * MySQL Dialect Implementation
 *
 * Handles MySQL-specific SQL syntax:
 * - Backtick (`) identifier quoting
 * - Positional (?) parameter placeholders
 * - LIMIT on UPDATE/DELETE, no RETURNING
 */

import { LIMIT_DEFAULTS } from '../constants';
import { SQLDialect } from './sql-dialect';

export class MySQLDialect extends SQLDialect {
  readonly name = 'mysql';

  /**
   * MySQL uses ? for all positional parameters
   */
  placeholder(_position: number): string {
    return '?';
  }

  /**
   * MySQL-specific: OFFSET requires LIMIT.
   * A bare offset gets the max unsigned bigint as its limit.
   */
  override appendLimitOffset(parts: string[], limit?: number, offset?: number): void {
    if (offset !== undefined && limit === undefined) {
      parts.push(`LIMIT ${LIMIT_DEFAULTS.MYSQL_UNBOUNDED_LIMIT}`, `OFFSET ${offset}`);
      return;
    }
    super.appendLimitOffset(parts, limit, offset);
  }
}
