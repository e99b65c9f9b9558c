/**
 * Statement builders
 *
 * @module query
 */

export { createQueryBuilder, type QueryBuilder, type QueryBuilderOptions } from './query-factory';
export { QueryContext, type QueryContextOptions } from './query-context';
export {
  StatementBuilder,
  NO_ROWS,
  RETURNED_ROWS,
  type ResultShape,
  type SQLWithParams,
} from './statement-builder';
export { SelectBuilder } from './select-builder';
export { InsertBuilder } from './insert-builder';
export { UpdateBuilder } from './update-builder';
export { DeleteBuilder } from './delete-builder';
export { WhereBuilder } from './where-builder';
export {
  parseProjection,
  type OrderInput,
  type PayloadInput,
  type ProjectionInput,
  type ReturningInput,
} from './clauses';
