/**
 * Statement compilation
 *
 * @module compiler
 */

export { compile, assertConsistentRows, type CompiledStatement } from './compiler';
export { ParameterBinder } from './parameter-binder';
export { assertCapabilities } from './preflight';
export {
  createStatementState,
  cloneStatementState,
  type AnyTable,
  type JoinClause,
  type JoinKind,
  type PayloadRow,
  type ProjectionItem,
  type StatementKind,
  type StatementState,
} from './statement-state';
