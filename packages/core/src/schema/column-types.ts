import type { Row } from '../types';

/**
 * Semantic type tags understood by the value validator
 */
export type SemanticType = 'text' | 'integer' | 'float' | 'boolean' | 'structured' | 'foreign-key';

export interface ColumnDescriptor {
  readonly name: string;
  readonly type: SemanticType;
  readonly nullable: boolean;
  readonly primaryKey: boolean;
}

/**
 * Column declaration accepted by defineTable()
 */
export interface ColumnOptions {
  type: SemanticType;
  /** Defaults to false */
  nullable?: boolean;
  /** Defaults to false */
  primaryKey?: boolean;
}

/**
 * Turns a materialized row into a caller-defined record
 */
export interface Hydrator<TRecord> {
  populate(row: Row): TRecord;
}

export interface TableDescriptor<TRecord = Row> {
  readonly name: string;
  /** In declaration order */
  readonly columns: readonly ColumnDescriptor[];
  readonly hydrator?: Hydrator<TRecord>;
}
