/**
 * Where Builder
 *
 * Accumulates filter predicates for SelectBuilder, UpdateBuilder and
 * DeleteBuilder.
 *
 * - where(a, b) then where(c): a AND b AND c
 * - orWhere(d): (everything so far) OR (d)
 */

import { ConstructionError } from '../errors';
import { and, combinePredicates, or } from '../expression/predicate';

import type { Predicate } from '../expression/predicate';

export class WhereBuilder {
  constructor(private readonly predicates: Predicate[]) {}

  /**
   * Add conditions, ANDed with everything already present
   */
  where(predicates: readonly Predicate[]): void {
    if (predicates.length === 0) {
      throw new ConstructionError('where() requires at least one condition');
    }
    this.predicates.push(...predicates);
  }

  /**
   * OR a group of conditions with everything already present
   */
  orWhere(predicates: readonly Predicate[]): void {
    if (predicates.length === 0) {
      throw new ConstructionError('orWhere() requires at least one condition');
    }
    const existing = combinePredicates(this.predicates);
    if (existing === undefined) {
      this.predicates.push(...predicates);
      return;
    }
    const [single] = predicates;
    const alternative = predicates.length === 1 && single ? single : and(...predicates);
    this.predicates.splice(0, this.predicates.length, or(existing, alternative));
  }

  get isEmpty(): boolean {
    return this.predicates.length === 0;
  }
}
