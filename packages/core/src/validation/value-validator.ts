/**
 * Value Validator
 *
 * Checks insert/update payloads against the table descriptor before the
 * compiler runs. Rows are walked in order; within a row unknown keys are
 * reported first, then declared columns in declaration order. The first
 * failure is thrown.
 */

import { InvalidColumnError, TypeMismatchError } from '../errors';

import type { PayloadRow } from '../compiler/statement-state';
import type { LiteralKind } from '../expression/literal';
import type { SemanticType } from '../schema/column-types';
import type { Table } from '../schema/table';

export type PayloadKind = 'insert' | 'update';

/**
 * Literal kinds each semantic type accepts, nullability aside
 */
export const ACCEPTED_KINDS: Readonly<Record<SemanticType, readonly LiteralKind[]>> = Object.freeze({
  text: ['text'],
  integer: ['integer'],
  float: ['integer', 'float'],
  boolean: ['boolean'],
  structured: ['structured', 'text', 'integer', 'float', 'boolean'],
  'foreign-key': ['integer'],
});

export function validatePayload(
  table: Table<string, unknown>,
  rows: readonly PayloadRow[],
  kind: PayloadKind,
): void {
  rows.forEach((row, index) => {
    const rowIndex = kind === 'insert' ? index : undefined;

    for (const name of row.keys()) {
      if (!table.hasColumn(name)) {
        throw new InvalidColumnError(
          `Column ${name} not in table ${table.name}`,
          name,
          table.name,
          rowIndex,
        );
      }
    }

    for (const column of table.descriptor.columns) {
      const literal = row.get(column.name);
      if (literal === undefined) {
        continue;
      }
      if (literal.kind === 'null' ? column.nullable : ACCEPTED_KINDS[column.type].includes(literal.kind)) {
        continue;
      }
      const expected: string[] = column.nullable ? [column.type, 'null'] : [column.type];
      throw new TypeMismatchError(column.name, expected, literal.kind, rowIndex);
    }
  });
}
