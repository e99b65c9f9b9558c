import { describe, it, expect } from 'vitest';

import {
  ConstructionError,
  InconsistentColumnsError,
  InvalidColumnError,
  TypeMismatchError,
  UnsupportedFeatureError,
} from '../../errors';
import { asyncQueryBuilder, syncQueryBuilder, users } from './fixtures';

describe('InsertBuilder', () => {
  it('should render a single row', async () => {
    const { qb, query } = asyncQueryBuilder();

    const result = await qb.insert(users).values({ name: 'Ann', age: 30 });

    expect(result).toBeUndefined();
    expect(query).toHaveBeenCalledWith('INSERT INTO "users" ("name", "age") VALUES ($1, $2)', [
      'Ann',
      30,
    ]);
  });

  it('should render several rows in order', () => {
    const { qb } = asyncQueryBuilder('mysql');
    const builder = qb.insert(users).values([
      { name: 'Ann', age: 30 },
      { age: 41, name: 'Bob' },
    ]);

    expect(builder.toSQL()).toEqual({
      sql: 'INSERT INTO `users` (`name`, `age`) VALUES (?, ?), (?, ?)',
      params: ['Ann', 30, 'Bob', 41],
    });
  });

  it('should append rows from later values() calls', () => {
    const { qb } = asyncQueryBuilder();
    const builder = qb.insert(users).values({ name: 'Ann' }).values({ name: 'Bob' });
    expect(builder.sql).toBe('INSERT INTO "users" ("name") VALUES ($1), ($2)');
  });

  it('should reject rows whose columns differ from the first row', () => {
    const { qb } = asyncQueryBuilder();
    let caught: unknown;
    try {
      qb.insert(users).values([{ name: 'Ann' }, { name: 'Bob', extra: 1 }]);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(InconsistentColumnsError);
    if (caught instanceof InconsistentColumnsError) {
      expect(caught.rowIndex).toBe(1);
    }
  });

  it('should count earlier values() rows in the reported index', () => {
    const { qb } = asyncQueryBuilder();
    const builder = qb.insert(users).values([{ name: 'Ann' }, { name: 'Bob' }]);
    expect(() => builder.values({ age: 3 })).toThrow(
      'Row 2 has columns [age] but row 0 has [name]',
    );
  });

  it('should reject empty input', () => {
    const { qb } = asyncQueryBuilder();
    expect(() => qb.insert(users).values([])).toThrow('values() requires at least one row');
    expect(() => qb.insert(users).values({})).toThrow('Insert row 0 assigns no columns');
    expect(() => qb.insert(users).toSQL()).toThrow('No values specified for INSERT into users');
  });

  it('should reject values that cannot be bound', () => {
    const { qb } = asyncQueryBuilder();
    expect(() => qb.insert(users).values({ age: Number.NaN })).toThrow(
      new ConstructionError('Column age: Cannot bind non-finite number NaN'),
    );
  });

  it('should validate payloads against the table before compiling', async () => {
    const { qb, query } = asyncQueryBuilder();

    expect(() => qb.insert(users).values({ email: 'a@example.com' }).toSQL()).toThrow(
      InvalidColumnError,
    );
    await expect(qb.insert(users).values({ name: 5 }).execute()).rejects.toThrow(
      new TypeMismatchError('name', ['text'], 'integer', 0),
    );
    expect(query).not.toHaveBeenCalled();
  });

  it('should return rows with RETURNING', async () => {
    const { qb } = asyncQueryBuilder('postgresql', { columns: ['id'], rows: [[7]], rowCount: 1 });
    const builder = qb.insert(users).values({ name: 'Ann' }).returning(users.col('id'));

    expect(builder.sql).toBe('INSERT INTO "users" ("name") VALUES ($1) RETURNING "id"');
    await expect(builder.execute()).resolves.toEqual([{ id: 7 }]);
  });

  it('should refuse RETURNING on mysql before anything runs', () => {
    const { qb, query } = asyncQueryBuilder('mysql');
    const builder = qb.insert(users).values({ name: 'Ann' }).returning();
    expect(() => builder.toSQL()).toThrow(new UnsupportedFeatureError('RETURNING', 'mysql'));
    expect(query).not.toHaveBeenCalled();
  });

  it('should run on a blocking executor', () => {
    const { qb, query } = syncQueryBuilder('sqlite', { columns: [], rows: [], rowCount: 1 });
    expect(qb.insert(users).values({ name: 'Ann', team_id: null }).run()).toBeUndefined();
    expect(query).toHaveBeenCalledWith('INSERT INTO "users" ("name", "team_id") VALUES (?, ?)', [
      'Ann',
      null,
    ]);
  });
});
