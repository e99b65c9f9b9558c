/**
 * SQL Dialect Base Class
 *
 * Provides the dialect-specific pieces of SQL generation: identifier
 * escaping, placeholder syntax and LIMIT/OFFSET rendering. Dialects hold no
 * per-query state, so one instance can serve any number of concurrent
 * compilations.
 */

import { UnsupportedFeatureError } from '../errors';
import { DIALECT_CAPABILITIES, FEATURE_FLAGS } from './capabilities';

import type { DialectCapabilities, DialectFeature, DialectName } from './capabilities';

export abstract class SQLDialect {
  abstract readonly name: DialectName;

  get capabilities(): DialectCapabilities {
    return DIALECT_CAPABILITIES[this.name];
  }

  /**
   * Placeholder for the parameter at a 1-based position
   * MySQL/SQLite: ?
   * PostgreSQL: $1, $2, $3...
   */
  abstract placeholder(position: number): string;

  /**
   * Escape an identifier (table name, column name).
   * `schema.table` is split and each part quoted separately.
   */
  escapeIdentifier(identifier: string): string {
    return identifier
      .split('.')
      .map((part) => this.quoteIdentifier(part))
      .join('.');
  }

  /**
   * Quote a name as one identifier, dots included (aliases)
   */
  quoteIdentifier(name: string): string {
    const { open, close } = this.capabilities.identifierQuote;
    return `${open}${name.replaceAll(close, close + close)}${close}`;
  }

  supports(feature: DialectFeature): boolean {
    return this.capabilities[FEATURE_FLAGS[feature]];
  }

  assertSupports(feature: DialectFeature): void {
    if (!this.supports(feature)) {
      throw new UnsupportedFeatureError(feature, this.name);
    }
  }

  /**
   * Append LIMIT/OFFSET. Values are validated integers and are inlined.
   */
  appendLimitOffset(parts: string[], limit?: number, offset?: number): void {
    if (limit !== undefined) {
      parts.push(`LIMIT ${limit}`);
    }
    if (offset !== undefined) {
      parts.push(`OFFSET ${offset}`);
    }
  }
}
