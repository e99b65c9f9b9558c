import { toParam } from '../expression/literal';

import type { SQLDialect } from '../dialect/sql-dialect';
import type { Literal } from '../expression/literal';

/**
 * Collects literals in the order their placeholders are written.
 * One binder per compilation; the Kth placeholder maps to the Kth parameter.
 */
export class ParameterBinder {
  private readonly bound: Literal[] = [];

  constructor(private readonly dialect: SQLDialect) {}

  bind(literal: Literal): string {
    this.bound.push(literal);
    return this.dialect.placeholder(this.bound.length);
  }

  get literals(): readonly Literal[] {
    return this.bound;
  }

  get params(): unknown[] {
    return this.bound.map((literal) => toParam(literal));
  }
}
