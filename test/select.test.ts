/**
 * select.test.ts: SELECT construction: joins, aliases, subqueries, paging
 */
import { describe, test, expect } from 'vitest';
import {
    defineSchema, fn, op, select, sql, values, wrapNode, z,
    JoinAmbiguityError, AliasConflictError, SchemaConsistencyError,
} from '../src/index';
import { category, favorite, note, person, relationship, tweet, users } from './fixtures';

// ── select list ─────────────────────────────────────────────

describe('select list', () => {
    test('select: join, aggregate alias and AND-ed where', () => {
        const { sql: text, params } = person
            .select(person.c.first, person.c.last, fn.COUNT(note.c.id).alias('ct'))
            .join(note)
            .where(person.c.last.eq('Leifer'), person.c.id.lt(4))
            .compile();
        expect(text).toBe(
            'SELECT "t1"."first", "t1"."last", COUNT("t2"."id") AS "ct" FROM "person" AS "t1" ' +
            'INNER JOIN "note" AS "t2" ON ("t2"."author_id" = "t1"."id") ' +
            'WHERE (("t1"."last" = ?) AND ("t1"."id" < ?))',
        );
        expect(params).toEqual(['Leifer', 4]);
    });

    test('select: no arguments selects every field in table order', () => {
        expect(users.select().compile()).toEqual({
            sql: 'SELECT "t1"."id", "t1"."username" FROM "users" AS "t1"',
            params: [],
        });
    });

    test('select: re-selecting replaces the list; an empty call clears an explicit one', () => {
        const q = person.select(person.c.first);
        expect(q.select(person.c.id, person.c.dob).compile().sql).toBe('SELECT "t1"."id", "t1"."dob" FROM "person" AS "t1"');
        expect(q.select().compile().sql).toBe('SELECT  FROM "person" AS "t1"');
        expect(users.select().select().compile().sql).toBe('SELECT "t1"."id", "t1"."username" FROM "users" AS "t1"');
    });

    test('select: selectExtend appends', () => {
        const { sql: text } = users.select(users.c.id).selectExtend(users.c.username).compile();
        expect(text).toBe('SELECT "t1"."id", "t1"."username" FROM "users" AS "t1"');
    });

    test('select: builders never mutate the receiver', () => {
        const base = users.select(users.c.username);
        const narrowed = base.where(users.c.id.gt(1));
        expect(base.compile().sql).toBe('SELECT "t1"."username" FROM "users" AS "t1"');
        expect(narrowed.compile()).toEqual(narrowed.compile());
        expect(narrowed.compile().params).toEqual([1]);
    });

    test('select: distinct', () => {
        expect(person.select(person.c.last).distinct().compile().sql).toBe('SELECT DISTINCT "t1"."last" FROM "person" AS "t1"');
    });

    test('select: storage column names', () => {
        const s = defineSchema({ person: z.object({ first: z.string() }) }, { columnNames: { person: { first: 'first_name' } } });
        const p = s.table('person');
        expect(p.select(p.c.first, p.c.first.alias('first')).compile().sql)
            .toBe('SELECT "t1"."first_name", "t1"."first_name" AS "first" FROM "person" AS "t1"');
    });

    test('select: schema-qualified table names', () => {
        const s = defineSchema({ entry: z.object({ content: z.string() }) }, { dbSchemas: { entry: 'archive' } });
        const entry = s.table('entry');
        expect(entry.select().compile().sql).toBe('SELECT "t1"."id", "t1"."content" FROM "archive"."entry" AS "t1"');
    });
});

// ── joins ───────────────────────────────────────────────────

describe('joins', () => {
    test('select: forward join infers the predicate', () => {
        const { sql: text } = tweet.select(tweet.c.content, users.c.username).join(users).compile();
        expect(text).toBe(
            'SELECT "t1"."content", "t2"."username" FROM "tweet" AS "t1" ' +
            'INNER JOIN "users" AS "t2" ON ("t1"."user_id" = "t2"."id")',
        );
    });

    test('select: chained joins advance the cursor', () => {
        const { sql: text } = favorite.select(favorite.c.id, tweet.c.content, users.c.username).join(tweet).join(users).compile();
        expect(text).toBe(
            'SELECT "t1"."id", "t2"."content", "t3"."username" FROM "favorite" AS "t1" ' +
            'INNER JOIN "tweet" AS "t2" ON ("t1"."tweet_id" = "t2"."id") ' +
            'INNER JOIN "users" AS "t3" ON ("t2"."user_id" = "t3"."id")',
        );
    });

    test('select: from() moves the join cursor to the new source', () => {
        const { sql: text } = users.select(tweet.c.content).from(tweet).join(favorite).compile();
        expect(text).toBe(
            'SELECT "t1"."content" FROM "tweet" AS "t1" ' +
            'INNER JOIN "favorite" AS "t2" ON ("t2"."tweet_id" = "t1"."id")',
        );
    });

    test('select: switch() returns the cursor to the primary source', () => {
        const author = users.alias('author');
        const { sql: text } = favorite.select(favorite.c.id).join(tweet).switch().join(author).compile();
        expect(text).toBe(
            'SELECT "t1"."id" FROM "favorite" AS "t1" ' +
            'INNER JOIN "tweet" AS "t2" ON ("t1"."tweet_id" = "t2"."id") ' +
            'INNER JOIN "users" AS "author" ON ("t1"."user_id" = "author"."id")',
        );
    });

    test('select: switch() to an unknown source throws', () => {
        expect(() => favorite.select().switch(person)).toThrow(SchemaConsistencyError);
    });

    test('select: two foreign keys between the tables require `on`', () => {
        expect(() => users.select().join(relationship)).toThrow(JoinAmbiguityError);
        expect(() => person.select().join(users)).toThrow(JoinAmbiguityError);
    });

    test('select: explicit `on` picks the relation and its accessor', () => {
        const q = users.select(users.c.username).join(relationship, { on: relationship.c.fromUser.eq(users.c.id) });
        expect(q.compile().sql).toBe(
            'SELECT "t1"."username" FROM "users" AS "t1" ' +
            'INNER JOIN "relationship" AS "t2" ON ("t2"."from_user_id" = "t1"."id")',
        );
        expect(q.joins[0].accessor).toBe('following');
        expect(q.joins[0].foreignKey?.name).toBe('fromUser');
    });

    test('select: an aliased `on` names the accessor', () => {
        const q = tweet.select().join(users, { on: tweet.c.user.eq(users.c.id).alias('author') });
        expect(q.joins[0].accessor).toBe('author');
        expect(q.compile().sql).toBe(
            'SELECT "t1"."id", "t1"."user_id", "t1"."content", "t1"."timestamp" FROM "tweet" AS "t1" ' +
            'INNER JOIN "users" AS "t2" ON ("t1"."user_id" = "t2"."id")',
        );
    });

    test('select: an accessor equal to the object-id name is rejected', () => {
        expect(() => tweet.select().join(users, { on: tweet.c.user.eq(users.c.id).alias('user_id') })).toThrow(AliasConflictError);
    });

    test('select: left outer join with group by', () => {
        const { sql: text } = users
            .select(users.c.username, fn.COUNT(tweet.c.id).alias('ct'))
            .leftOuterJoin(tweet)
            .groupBy(users.c.username)
            .compile();
        expect(text).toBe(
            'SELECT "t1"."username", COUNT("t2"."id") AS "ct" FROM "users" AS "t1" ' +
            'LEFT OUTER JOIN "tweet" AS "t2" ON ("t2"."user_id" = "t1"."id") GROUP BY "t1"."username"',
        );
    });

    test('select: cross join has no predicate', () => {
        expect(person.select(person.c.first).crossJoin(users).compile().sql)
            .toBe('SELECT "t1"."first" FROM "person" AS "t1" CROSS JOIN "users" AS "t2"');
    });

    test('select: group by a table expands to its columns', () => {
        const { sql: text } = users.select(users.c.username, fn.COUNT(tweet.c.id)).join(tweet).groupBy(users).compile();
        expect(text).toBe(
            'SELECT "t1"."username", COUNT("t2"."id") FROM "users" AS "t1" ' +
            'INNER JOIN "tweet" AS "t2" ON ("t2"."user_id" = "t1"."id") GROUP BY "t1"."id", "t1"."username"',
        );
    });

    test('select: self join through a named alias', () => {
        const parent = category.alias('parent');
        const { sql: text } = category.select(category.c.name, parent.c.name.alias('parentName')).join(parent).compile();
        expect(text).toBe(
            'SELECT "t1"."name", "parent"."name" AS "parentName" FROM "category" AS "t1" ' +
            'INNER JOIN "category" AS "parent" ON ("t1"."parent_id" = "parent"."name")',
        );
    });
});

// ── where / having / ordering ───────────────────────────────

describe('predicates & ordering', () => {
    test('select: successive where() calls AND together', () => {
        const { sql: text, params } = person.select(person.c.id)
            .where(person.c.first.eq('a'))
            .where(person.c.last.eq('b'), person.c.id.gt(1))
            .compile();
        expect(text).toBe('SELECT "t1"."id" FROM "person" AS "t1" WHERE (("t1"."first" = ?) AND (("t1"."last" = ?) AND ("t1"."id" > ?)))');
        expect(params).toEqual(['a', 'b', 1]);
    });

    test('select: orWhere() ORs with the existing predicate', () => {
        const { sql: text } = person.select(person.c.id).where(person.c.first.eq('a')).orWhere(person.c.first.eq('b')).compile();
        expect(text).toBe('SELECT "t1"."id" FROM "person" AS "t1" WHERE (("t1"."first" = ?) OR ("t1"."first" = ?))');
    });

    test('select: group by, having, order by, limit and offset', () => {
        const { sql: text, params } = tweet
            .select(tweet.c.user, fn.COUNT(tweet.c.id).alias('ct'))
            .groupBy(tweet.c.user)
            .having(fn.COUNT(tweet.c.id).gt(2))
            .orderBy(fn.COUNT(tweet.c.id).desc())
            .limit(10)
            .offset(20)
            .compile();
        expect(text).toBe(
            'SELECT "t1"."user_id", COUNT("t1"."id") AS "ct" FROM "tweet" AS "t1" GROUP BY "t1"."user_id" ' +
            'HAVING (COUNT("t1"."id") > ?) ORDER BY COUNT("t1"."id") DESC LIMIT ? OFFSET ?',
        );
        expect(params).toEqual([2, 10, 20]);
    });

    test('select: paginate is 1-based', () => {
        expect(users.select(users.c.id).paginate(3, 10).compile().params).toEqual([10, 20]);
        expect(users.select(users.c.id).paginate(1).compile().params).toEqual([20, 0]);
    });

    test('select: offset without limit uses the dialect limit literal', () => {
        const q = users.select(users.c.id).offset(5);
        expect(q.compile().sql).toBe('SELECT "t1"."id" FROM "users" AS "t1" OFFSET ?');
        expect(q.compile({ dialect: 'sqlite' }).sql).toBe('SELECT "t1"."id" FROM "users" AS "t1" LIMIT -1 OFFSET ?');
        expect(q.compile({ dialect: 'mysql' }).sql).toBe('SELECT `t1`.`id` FROM `users` AS `t1` LIMIT 18446744073709551615 OFFSET ?');
    });
});

// ── subqueries ──────────────────────────────────────────────

describe('subqueries', () => {
    test('select: named subquery in FROM', () => {
        const inner = users.select(users.c.id, users.c.username).where(users.c.id.lt(10)).alias('sq');
        const { sql: text, params } = select(inner.c.username).from(inner).compile();
        expect(text).toBe(
            'SELECT "sq"."username" FROM (SELECT "t1"."id", "t1"."username" FROM "users" AS "t1" WHERE ("t1"."id" < ?)) AS "sq"',
        );
        expect(params).toEqual([10]);
    });

    test('select: unnamed subquery in FROM is aliased before its contents', () => {
        const inner = users.select(users.c.username);
        expect(select(inner.c.username).from(inner).compile().sql)
            .toBe('SELECT "t1"."username" FROM (SELECT "t2"."username" FROM "users" AS "t2") AS "t1"');
    });

    test('select: correlated subquery in the select list', () => {
        const ct = tweet.select(fn.COUNT(tweet.c.id)).where(tweet.c.user.eq(users.c.id));
        expect(users.select(users.c.username, wrapNode(ct).alias('n')).compile().sql).toBe(
            'SELECT "t1"."username", (SELECT COUNT("t2"."id") FROM "tweet" AS "t2" WHERE ("t2"."user_id" = "t1"."id")) AS "n" ' +
            'FROM "users" AS "t1"',
        );
    });

    test('select: IN subquery', () => {
        const ids = users.select(users.c.id).where(users.c.username.startswith('h'));
        const { sql: text, params } = tweet.select(tweet.c.content).where(tweet.c.user.in(ids)).compile();
        expect(text).toBe(
            'SELECT "t1"."content" FROM "tweet" AS "t1" ' +
            'WHERE ("t1"."user_id" IN (SELECT "t2"."id" FROM "users" AS "t2" WHERE ("t2"."username" LIKE ?)))',
        );
        expect(params).toEqual(['h%']);
    });

    test('select: a whole-row select of the referenced table narrows to its key', () => {
        const named = users.select().where(users.c.username.eq('huey'));
        const { sql: text, params } = tweet.select(tweet.c.content).where(tweet.c.user.in(named)).compile();
        expect(text).toBe(
            'SELECT "t1"."content" FROM "tweet" AS "t1" ' +
            'WHERE ("t1"."user_id" IN (SELECT "t2"."id" FROM "users" AS "t2" WHERE ("t2"."username" = ?)))',
        );
        expect(params).toEqual(['huey']);
        expect(named.state.columns).toHaveLength(2);
    });

    test('select: subqueries of other tables keep their select list', () => {
        const { sql: text } = tweet.select(tweet.c.id).where(tweet.c.user.in(tweet.select())).compile();
        expect(text).toBe(
            'SELECT "t1"."id" FROM "tweet" AS "t1" WHERE ("t1"."user_id" IN ' +
            '(SELECT "t2"."id", "t2"."user_id", "t2"."content", "t2"."timestamp" FROM "tweet" AS "t2"))',
        );
    });

    test('select: NOT EXISTS', () => {
        const tweeted = tweet.select(sql('1')).where(tweet.c.user.eq(users.c.id));
        const { sql: text } = users.select(users.c.username).where(op.exists(tweeted).not()).compile();
        expect(text).toBe(
            'SELECT "t1"."username" FROM "users" AS "t1" ' +
            'WHERE NOT EXISTS(SELECT 1 FROM "tweet" AS "t2" WHERE ("t2"."user_id" = "t1"."id"))',
        );
    });

    test('select: count() wraps the query without its ordering', () => {
        const { sql: text, params } = users.select().where(users.c.id.gt(1)).orderBy(users.c.username).count().compile();
        expect(text).toBe(
            'SELECT COUNT(1) FROM (SELECT "t1"."id", "t1"."username" FROM "users" AS "t1" WHERE ("t1"."id" > ?)) AS "_wrapped"',
        );
        expect(params).toEqual([1]);
    });
});

// ── value lists ─────────────────────────────────────────────

describe('value lists', () => {
    const vl = values([[1, 'huey'], [2, 'zaizee']], { columns: ['id', 'username'], alias: 'tmp' });

    test('select: value list as the FROM source', () => {
        const { sql: text, params } = select(vl.c.username).from(vl).where(vl.c.id.gt(1)).compile();
        expect(text).toBe('SELECT "tmp"."username" FROM (VALUES (?, ?), (?, ?)) AS "tmp"("id", "username") WHERE ("tmp"."id" > ?)');
        expect(params).toEqual([1, 'huey', 2, 'zaizee', 1]);
    });

    test('select: joining a value list needs `on`', () => {
        const { sql: text } = users.select(users.c.username).join(vl, { on: vl.c.id.eq(users.c.id) }).compile();
        expect(text).toBe(
            'SELECT "t1"."username" FROM "users" AS "t1" ' +
            'INNER JOIN (VALUES (?, ?), (?, ?)) AS "tmp"("id", "username") ON ("tmp"."id" = "t1"."id")',
        );
        expect(() => users.select().join(vl)).toThrow(JoinAmbiguityError);
    });
});
