import { describe, it, expect } from 'vitest';

import {
  AmbiguousColumnError,
  CallingConventionMismatchError,
  ConstructionError,
  InvalidColumnError,
} from '../../errors';
import { desc } from '../../expression/column';
import { eq, gt, inArray, like } from '../../expression/predicate';
import { asyncQueryBuilder, syncQueryBuilder, teams, users } from './fixtures';

import type { RawResult } from '../../execution/executor';

const annResult: RawResult = { columns: ['id', 'name'], rows: [[1, 'Ann']], rowCount: 1 };

describe('SelectBuilder', () => {
  describe('rendering', () => {
    it('should render a projection with a filter', () => {
      const { qb } = asyncQueryBuilder();
      const { sql, params } = qb
        .select('id', 'name')
        .from(users)
        .where(eq(users.col('id'), 42))
        .toSQL();

      expect(sql).toBe('SELECT "id", "name" FROM "users" WHERE "id" = $1');
      expect(params).toEqual([42]);
    });

    it('should select every column when no columns are given', () => {
      const { qb } = asyncQueryBuilder('mysql');
      expect(qb.select().from(users).sql).toBe('SELECT * FROM `users`');
    });

    it('should accept aliases in any case and column references', () => {
      const { qb } = asyncQueryBuilder();
      const builder = qb.select('name As user_name', users.col('id').as('user_id')).from(users);
      expect(builder.sql).toBe('SELECT "name" AS "user_name", "id" AS "user_id" FROM "users"');
    });

    it('should reject malformed projections at the call site', () => {
      const { qb } = asyncQueryBuilder();
      expect(() => qb.select('id as')).toThrow(
        new ConstructionError('Malformed projection "id as": expected "column AS alias"'),
      );
      expect(() => qb.select('as name')).toThrow(ConstructionError);
    });

    it('should reject columns the table does not declare', () => {
      const { qb } = asyncQueryBuilder();
      expect(() => qb.select('email').from(users).toSQL()).toThrow(InvalidColumnError);
    });

    it('should render DISTINCT', () => {
      const { qb } = asyncQueryBuilder();
      expect(qb.selectDistinct('name').from(users).sql).toBe('SELECT DISTINCT "name" FROM "users"');
    });

    it('should render an empty IN list as a false condition', () => {
      const { qb } = asyncQueryBuilder();
      const builder = qb.select().from(users).where(inArray(users.col('id'), []));
      expect(builder.toSQL()).toEqual({ sql: 'SELECT * FROM "users" WHERE 1=0', params: [] });
    });

    it('should combine where() and orWhere()', () => {
      const { qb } = asyncQueryBuilder();
      const builder = qb
        .select('id')
        .from(users)
        .where(gt(users.col('age'), 18), like(users.col('name'), 'A%'))
        .orWhere(eq(users.col('id'), 1));

      expect(builder.sql).toBe(
        'SELECT "id" FROM "users" WHERE (("age" > $1) AND ("name" LIKE $2)) OR ("id" = $3)',
      );
      expect(builder.params).toEqual([18, 'A%', 1]);
    });

    it('should render joins with qualified columns', () => {
      const { qb } = asyncQueryBuilder();
      const builder = qb
        .select(users.col('name'), 'teams.name as team')
        .from(users)
        .innerJoin(teams, eq(users.col('team_id'), teams.col('id')))
        .orderBy(teams.col('name'), desc(users.col('id')));

      expect(builder.sql).toBe(
        'SELECT "users"."name", "teams"."name" AS "team" FROM "users" INNER JOIN "teams" ON "users"."team_id" = "teams"."id" ORDER BY "teams"."name" ASC, "users"."id" DESC',
      );
    });

    it('should render limit and offset', () => {
      const { qb } = asyncQueryBuilder('mysql');
      expect(qb.select().from(users).limit(10).offset(5).sql).toBe(
        'SELECT * FROM `users` LIMIT 10 OFFSET 5',
      );
    });

    it('should reject negative or fractional counts', () => {
      const { qb } = asyncQueryBuilder();
      const builder = qb.select().from(users);
      expect(() => builder.limit(-1)).toThrow('limit must be a non-negative integer, got -1');
      expect(() => builder.offset(1.5)).toThrow('offset must be a non-negative integer, got 1.5');
    });

    it('should require a table', () => {
      const { qb } = asyncQueryBuilder();
      expect(() => qb.select('id').toSQL()).toThrow('No table selected for SELECT');
    });

    it('should leave the builder it was called on untouched by from()', () => {
      const { qb } = asyncQueryBuilder();
      const base = qb.select('id');
      const fromUsers = base.from(users);
      expect(fromUsers).not.toBe(base);
      expect(() => base.toSQL()).toThrow(ConstructionError);
      expect(fromUsers.sql).toBe('SELECT "id" FROM "users"');
    });

    it('should compile the same builder to the same output', () => {
      const { qb } = asyncQueryBuilder();
      const builder = qb.select().from(users).where(eq(users.col('name'), 'Ann'));
      expect(builder.toSQL()).toEqual(builder.toSQL());
    });
  });

  describe('execution', () => {
    it('should execute when awaited', async () => {
      const { qb, query } = asyncQueryBuilder('postgresql', annResult);

      const rows = await qb.select('id', 'name').from(users).where(eq(users.col('id'), 1));

      expect(rows).toEqual([{ id: 1, name: 'Ann' }]);
      expect(query).toHaveBeenCalledTimes(1);
      expect(query).toHaveBeenCalledWith('SELECT "id", "name" FROM "users" WHERE "id" = $1', [1]);
    });

    it('should execute only once', async () => {
      const { qb, query } = asyncQueryBuilder('postgresql', annResult);
      const builder = qb.select().from(users);

      await builder.execute();

      expect(builder.isExecuted).toBe(true);
      await expect(builder.execute()).rejects.toThrow(
        new ConstructionError('SELECT statement has already been executed'),
      );
      expect(() => builder.where(eq(users.col('id'), 1))).toThrow(
        'Cannot modify a SELECT statement after it has been executed',
      );
      expect(query).toHaveBeenCalledTimes(1);
    });

    it('should keep returning the executed statement from toSQL()', async () => {
      const { qb } = asyncQueryBuilder('postgresql', annResult);
      const builder = qb.select().from(users).where(eq(users.col('id'), 3));
      await builder.execute();
      expect(builder.toSQL()).toEqual({ sql: 'SELECT * FROM "users" WHERE "id" = $1', params: [3] });
    });

    it('should hydrate records through the table hydrator', async () => {
      const { qb } = asyncQueryBuilder('postgresql', annResult);
      const records = await qb.select('id', 'name').from(users).records();
      expect(records).toEqual([{ id: 1, name: 'Ann' }]);
    });

    it('should refuse records() for a table without a hydrator', async () => {
      const { qb, query } = asyncQueryBuilder();
      await expect(qb.select().from(teams).records()).rejects.toThrow(
        'Table teams has no hydrator; use execute() for plain rows',
      );
      expect(query).not.toHaveBeenCalled();
    });

    it('should let the last joined column win by default', async () => {
      const { qb } = asyncQueryBuilder('postgresql', {
        columns: ['id', 'name', 'id', 'name'],
        rows: [[1, 'Ann', 9, 'Blue']],
        rowCount: 1,
      });
      const rows = await qb
        .select()
        .from(users)
        .innerJoin(teams, eq(users.col('team_id'), teams.col('id')))
        .execute();
      expect(rows).toEqual([{ id: 9, name: 'Blue' }]);
    });

    it('should refuse colliding columns under the strict policy', async () => {
      const { qb } = asyncQueryBuilder(
        'postgresql',
        { columns: ['id', 'name', 'id', 'name'], rows: [[1, 'Ann', 9, 'Blue']], rowCount: 1 },
        { collisionPolicy: 'strict' },
      );
      await expect(
        qb.select().from(users).innerJoin(teams, eq(users.col('team_id'), teams.col('id'))).execute(),
      ).rejects.toThrow(AmbiguousColumnError);
    });

    it('should run on a blocking executor', () => {
      const { qb, query } = syncQueryBuilder('sqlite', annResult);
      const builder = qb.select('id', 'name').from(users).where(eq(users.col('id'), 1));

      expect(builder.run()).toEqual([{ id: 1, name: 'Ann' }]);
      expect(query).toHaveBeenCalledWith('SELECT "id", "name" FROM "users" WHERE "id" = ?', [1]);
      expect(builder.recordsSync.bind(builder)).toThrow(ConstructionError);
    });

    it('should reject the wrong calling convention without consuming the builder', async () => {
      const { qb, query } = syncQueryBuilder('sqlite', annResult);
      const builder = qb.select().from(users);

      await expect(builder.execute()).rejects.toThrow(
        new CallingConventionMismatchError('non-blocking', 'blocking'),
      );
      expect(query).not.toHaveBeenCalled();
      expect(builder.isExecuted).toBe(false);
      expect(builder.recordsSync()).toEqual([{ id: 1, name: 'Ann' }]);
    });

    it('should refuse run() on a non-blocking executor', () => {
      const { qb } = asyncQueryBuilder();
      expect(() => qb.select().from(users).run()).toThrow(CallingConventionMismatchError);
    });
  });
});
