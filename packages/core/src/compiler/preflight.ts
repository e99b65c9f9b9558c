import { walkPredicate } from '../expression/predicate';

import type { StatementState } from './statement-state';
import type { SQLDialect } from '../dialect/sql-dialect';
import type { Predicate } from '../expression/predicate';

function usesIlike(predicates: readonly Predicate[]): boolean {
  let found = false;
  for (const predicate of predicates) {
    walkPredicate(predicate, (node) => {
      if (node.type === 'pattern' && !node.caseSensitive) {
        found = true;
      }
    });
  }
  return found;
}

/**
 * Reject every clause the dialect lacks before any SQL text exists
 */
export function assertCapabilities(state: StatementState, dialect: SQLDialect): void {
  if (state.returning !== undefined) {
    dialect.assertSupports('RETURNING');
  }

  if (state.joins.some((join) => join.kind === 'full')) {
    dialect.assertSupports('FULL JOIN');
  }

  if (usesIlike([...state.joins.map((join) => join.on), ...state.where])) {
    dialect.assertSupports('ILIKE');
  }

  if (state.limit !== undefined) {
    if (state.kind === 'update') {
      dialect.assertSupports('LIMIT on UPDATE');
    } else if (state.kind === 'delete') {
      dialect.assertSupports('LIMIT on DELETE');
    }
  }
}
