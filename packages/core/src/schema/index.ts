/**
 * Schema descriptors consumed by the query builder
 *
 * @module schema
 */

export { Table, defineTable, type TableOptions } from './table';
export {
  type SemanticType,
  type ColumnDescriptor,
  type ColumnOptions,
  type Hydrator,
  type TableDescriptor,
} from './column-types';
