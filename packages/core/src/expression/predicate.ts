/**
 * Predicate tree
 *
 * Immutable nodes describing WHERE and JOIN conditions. Constructors only
 * build values; nothing here renders SQL or touches a connection.
 *
 * @example
 * ```typescript
 * and(
 *   eq(users.col('status'), 'active'),
 *   or(gt(users.col('age'), 30), isNull(users.col('age'))),
 * );
 * ```
 */

import { ConstructionError } from '../errors';
import { ColumnRef } from './column';
import { toLiteral } from './literal';

import type { Literal, LiteralInput } from './literal';

export type ComparisonOperator = '=' | '<>' | '<' | '<=' | '>' | '>=';

export interface ComparisonPredicate {
  readonly type: 'comparison';
  readonly operator: ComparisonOperator;
  readonly left: ColumnRef;
  /** A column on the right makes this a column-to-column condition (joins) */
  readonly right: Literal | ColumnRef;
}

export interface PatternPredicate {
  readonly type: 'pattern';
  readonly column: ColumnRef;
  readonly pattern: Literal;
  readonly caseSensitive: boolean;
}

export interface NullCheckPredicate {
  readonly type: 'null-check';
  readonly column: ColumnRef;
  readonly isNull: boolean;
}

export interface MembershipPredicate {
  readonly type: 'membership';
  readonly column: ColumnRef;
  readonly values: readonly Literal[];
  readonly negated: boolean;
}

export interface RangePredicate {
  readonly type: 'range';
  readonly column: ColumnRef;
  readonly low: Literal;
  readonly high: Literal;
}

export interface ConjunctionPredicate {
  readonly type: 'and';
  readonly children: readonly Predicate[];
}

export interface DisjunctionPredicate {
  readonly type: 'or';
  readonly children: readonly Predicate[];
}

export type Predicate =
  | ComparisonPredicate
  | PatternPredicate
  | NullCheckPredicate
  | MembershipPredicate
  | RangePredicate
  | ConjunctionPredicate
  | DisjunctionPredicate;

export type ComparisonOperand = LiteralInput | ColumnRef;

function freeze<T extends Predicate>(node: T): T {
  Object.freeze(node);
  return node;
}

function comparison(
  operator: ComparisonOperator,
  left: ColumnRef,
  right: ComparisonOperand,
): ComparisonPredicate {
  return freeze({
    type: 'comparison',
    operator,
    left: left.unaliased(),
    right: right instanceof ColumnRef ? right.unaliased() : toLiteral(right),
  });
}

// ============ Comparison ============

/**
 * `column = value`. Comparing with `null` yields `IS NULL`.
 */
export function eq(column: ColumnRef, value: ComparisonOperand): Predicate {
  return value === null ? isNull(column) : comparison('=', column, value);
}

/**
 * `column <> value`. Comparing with `null` yields `IS NOT NULL`.
 */
export function ne(column: ColumnRef, value: ComparisonOperand): Predicate {
  return value === null ? isNotNull(column) : comparison('<>', column, value);
}

export function lt(column: ColumnRef, value: ComparisonOperand): Predicate {
  return comparison('<', column, value);
}

export function lte(column: ColumnRef, value: ComparisonOperand): Predicate {
  return comparison('<=', column, value);
}

export function gt(column: ColumnRef, value: ComparisonOperand): Predicate {
  return comparison('>', column, value);
}

export function gte(column: ColumnRef, value: ComparisonOperand): Predicate {
  return comparison('>=', column, value);
}

// ============ Pattern ============

export function like(column: ColumnRef, pattern: string): Predicate {
  return freeze({
    type: 'pattern',
    column: column.unaliased(),
    pattern: toLiteral(pattern),
    caseSensitive: true,
  });
}

/**
 * Case-insensitive LIKE. Only dialects with ILIKE support can compile it.
 */
export function ilike(column: ColumnRef, pattern: string): Predicate {
  return freeze({
    type: 'pattern',
    column: column.unaliased(),
    pattern: toLiteral(pattern),
    caseSensitive: false,
  });
}

// ============ NULL checks ============

export function isNull(column: ColumnRef): Predicate {
  return freeze({ type: 'null-check', column: column.unaliased(), isNull: true });
}

export function isNotNull(column: ColumnRef): Predicate {
  return freeze({ type: 'null-check', column: column.unaliased(), isNull: false });
}

// ============ Membership / range ============

/**
 * `column IN (...)`. An empty list matches no rows.
 */
export function inArray(column: ColumnRef, values: readonly LiteralInput[]): Predicate {
  return freeze({
    type: 'membership',
    column: column.unaliased(),
    values: Object.freeze(values.map((value) => toLiteral(value))),
    negated: false,
  });
}

/**
 * `column NOT IN (...)`. An empty list matches every row.
 */
export function notInArray(column: ColumnRef, values: readonly LiteralInput[]): Predicate {
  return freeze({
    type: 'membership',
    column: column.unaliased(),
    values: Object.freeze(values.map((value) => toLiteral(value))),
    negated: true,
  });
}

/**
 * `column BETWEEN low AND high`. Bounds are rendered as given, never swapped.
 */
export function between(column: ColumnRef, low: LiteralInput, high: LiteralInput): Predicate {
  return freeze({
    type: 'range',
    column: column.unaliased(),
    low: toLiteral(low),
    high: toLiteral(high),
  });
}

// ============ Logical ============

export function and(...children: Predicate[]): Predicate {
  if (children.length === 0) {
    throw new ConstructionError('and() requires at least one condition');
  }
  return freeze({ type: 'and', children: Object.freeze([...children]) });
}

export function or(...children: Predicate[]): Predicate {
  if (children.length === 0) {
    throw new ConstructionError('or() requires at least one condition');
  }
  return freeze({ type: 'or', children: Object.freeze([...children]) });
}

/**
 * Fold predicates from successive filter calls into one root.
 * A single predicate stays as it is; several become a conjunction.
 */
export function combinePredicates(predicates: readonly Predicate[]): Predicate | undefined {
  if (predicates.length === 0) {
    return undefined;
  }
  const [first] = predicates;
  if (predicates.length === 1 && first !== undefined) {
    return first;
  }
  return and(...predicates);
}

/**
 * Depth-first, left-to-right walk over every node of a tree
 */
export function walkPredicate(predicate: Predicate, visit: (node: Predicate) => void): void {
  visit(predicate);
  if (predicate.type === 'and' || predicate.type === 'or') {
    for (const child of predicate.children) {
      walkPredicate(child, visit);
    }
  }
}

/**
 * Every column a tree mentions, in traversal order
 */
export function collectColumns(predicate: Predicate): ColumnRef[] {
  const columns: ColumnRef[] = [];
  walkPredicate(predicate, (node) => {
    switch (node.type) {
      case 'comparison': {
        columns.push(node.left);
        if (node.right instanceof ColumnRef) {
          columns.push(node.right);
        }
        break;
      }
      case 'pattern':
      case 'null-check':
      case 'membership':
      case 'range': {
        columns.push(node.column);
        break;
      }
      case 'and':
      case 'or': {
        break;
      }
    }
  });
  return columns;
}
