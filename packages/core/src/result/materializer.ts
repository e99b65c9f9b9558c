/**
 * Result Materializer
 *
 * Turns positional result tuples into name→value rows, and rows into
 * caller-defined records through a hydrator.
 */

import { AmbiguousColumnError } from '../errors';

import type { RawResult } from '../execution/executor';
import type { Hydrator } from '../schema/column-types';
import type { Row } from '../types';

/**
 * How duplicate result keys resolve.
 * `last-wins` keeps the value of the last column with that key, which for a
 * join is the last-joined table. `strict` refuses the result.
 */
export type CollisionPolicy = 'last-wins' | 'strict';

/**
 * Keys for each result position: the compiled projection when it covers
 * every column, otherwise the driver's column names
 */
export function resultKeys(result: RawResult, projection?: readonly string[]): readonly string[] {
  if (projection !== undefined && projection.length === result.columns.length) {
    return projection;
  }
  return result.columns;
}

function duplicates(keys: readonly string[]): string[] {
  const seen = new Set<string>();
  const repeated = new Set<string>();
  for (const key of keys) {
    if (seen.has(key)) {
      repeated.add(key);
    }
    seen.add(key);
  }
  return [...repeated];
}

export function materializeRows(
  result: RawResult,
  projection?: readonly string[],
  policy: CollisionPolicy = 'last-wins',
): Row[] {
  const keys = resultKeys(result, projection);

  if (policy === 'strict') {
    const colliding = duplicates(keys);
    if (colliding.length > 0) {
      throw new AmbiguousColumnError(colliding);
    }
  }

  return result.rows.map((tuple) => {
    const row: Row = {};
    keys.forEach((key, index) => {
      row[key] = tuple[index];
    });
    return row;
  });
}

export function hydrateRows<TRecord>(rows: readonly Row[], hydrator: Hydrator<TRecord>): TRecord[] {
  return rows.map((row) => hydrator.populate(row));
}
