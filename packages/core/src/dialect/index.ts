/**
 * SQL Dialect Abstraction Layer
 *
 * Capability table plus one stateless dialect per supported backend.
 *
 * @module dialect
 */

export { SQLDialect } from './sql-dialect';
export { MySQLDialect } from './mysql-dialect';
export { PostgreSQLDialect } from './postgresql-dialect';
export { SQLiteDialect } from './sqlite-dialect';
export { DialectFactory, type DialectDatabaseType } from './dialect-factory';
export {
  DIALECT_CAPABILITIES,
  FEATURE_FLAGS,
  type DialectCapabilities,
  type DialectFeature,
  type DialectName,
  type IdentifierQuote,
  type PlaceholderStyle,
} from './capabilities';
