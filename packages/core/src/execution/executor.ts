/**
 * Execution collaborator contract
 *
 * An executor owns the physical connection and is either blocking or
 * non-blocking, fixed when it is created. The core picks the entry point
 * from the convention tag, never by probing the return value.
 */

export type CallingConvention = 'blocking' | 'non-blocking';

/**
 * Rows as positional tuples plus the driver's column names
 */
export interface RawResult {
  columns: string[];
  rows: unknown[][];
  /** Rows returned, or rows affected for writes */
  rowCount: number;
}

export interface BlockingExecutor {
  readonly convention: 'blocking';
  query(sql: string, params: readonly unknown[]): RawResult;
}

export interface NonBlockingExecutor {
  readonly convention: 'non-blocking';
  query(sql: string, params: readonly unknown[]): Promise<RawResult>;
}

export type Executor = BlockingExecutor | NonBlockingExecutor;
