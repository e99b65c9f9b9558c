/**
 * Dialect Capability Table
 *
 * Read-only profile of every supported backend. The compiler consults it
 * before rendering any clause; an unsupported clause is an error, never a
 * silent rewrite.
 */

export type DialectName = 'postgresql' | 'mysql' | 'sqlite';

export type PlaceholderStyle = 'numbered' | 'sequential';

export interface IdentifierQuote {
  readonly open: string;
  readonly close: string;
}

export interface DialectCapabilities {
  readonly identifierQuote: IdentifierQuote;
  readonly placeholderStyle: PlaceholderStyle;
  readonly supportsReturning: boolean;
  readonly supportsIlike: boolean;
  readonly supportsFullJoin: boolean;
  readonly supportsLimitOnUpdate: boolean;
  readonly supportsLimitOnDelete: boolean;
}

/**
 * Clauses a dialect may lack, keyed by the name used in error messages
 */
export type DialectFeature =
  | 'RETURNING'
  | 'ILIKE'
  | 'FULL JOIN'
  | 'LIMIT on UPDATE'
  | 'LIMIT on DELETE';

type CapabilityFlag = Exclude<keyof DialectCapabilities, 'identifierQuote' | 'placeholderStyle'>;

export const FEATURE_FLAGS: Readonly<Record<DialectFeature, CapabilityFlag>> = Object.freeze({
  RETURNING: 'supportsReturning',
  ILIKE: 'supportsIlike',
  'FULL JOIN': 'supportsFullJoin',
  'LIMIT on UPDATE': 'supportsLimitOnUpdate',
  'LIMIT on DELETE': 'supportsLimitOnDelete',
});

function profile(capabilities: DialectCapabilities): DialectCapabilities {
  Object.freeze(capabilities.identifierQuote);
  return Object.freeze(capabilities);
}

export const DIALECT_CAPABILITIES: Readonly<Record<DialectName, DialectCapabilities>> =
  Object.freeze({
    postgresql: profile({
      identifierQuote: { open: '"', close: '"' },
      placeholderStyle: 'numbered',
      supportsReturning: true,
      supportsIlike: true,
      supportsFullJoin: true,
      supportsLimitOnUpdate: false,
      supportsLimitOnDelete: false,
    }),
    mysql: profile({
      identifierQuote: { open: '`', close: '`' },
      placeholderStyle: 'sequential',
      supportsReturning: false,
      supportsIlike: false,
      supportsFullJoin: false,
      supportsLimitOnUpdate: true,
      supportsLimitOnDelete: true,
    }),
    sqlite: profile({
      identifierQuote: { open: '"', close: '"' },
      placeholderStyle: 'sequential',
      supportsReturning: true,
      supportsIlike: false,
      supportsFullJoin: true,
      supportsLimitOnUpdate: false,
      supportsLimitOnDelete: false,
    }),
  });
