/**
 * Expression tree: column references, typed literals and predicates.
 *
 * @module expression
 */

export { ColumnRef, asc, desc, alias, isColumnRef, type OrderTerm, type OrderDirection } from './column';
export {
  toLiteral,
  toParam,
  describeValue,
  isLiteral,
  type Literal,
  type LiteralInput,
  type LiteralKind,
} from './literal';
export {
  eq,
  ne,
  lt,
  lte,
  gt,
  gte,
  like,
  ilike,
  isNull,
  isNotNull,
  inArray,
  notInArray,
  between,
  and,
  or,
  combinePredicates,
  walkPredicate,
  collectColumns,
  type Predicate,
  type ComparisonOperator,
  type ComparisonOperand,
  type ComparisonPredicate,
  type PatternPredicate,
  type NullCheckPredicate,
  type MembershipPredicate,
  type RangePredicate,
  type ConjunctionPredicate,
  type DisjunctionPredicate,
} from './predicate';
