/**
 * ast.test.ts: Expression nodes: operators, coercion, rendering
 */
import { describe, test, expect } from 'vitest';
import { fn, op, sql, values, dialects, CompositeKeyNode } from '../src/index';
import type { ASTNode } from '../src/index';
import { CompileContext } from '../src/context';
import { ckm, note, person, users, category } from './fixtures';

/** `SELECT "t1"."id" FROM "person" AS "t1" WHERE <expr>` */
const where = (expr: ASTNode) =>
    person.select(person.c.id).where(expr).compile();

const PREFIX = 'SELECT "t1"."id" FROM "person" AS "t1" WHERE ';

// ── comparison ──────────────────────────────────────────────

describe('comparison', () => {
    test('ast: eq binds the value through the column coercer', () => {
        const { sql: text, params } = where(person.c.id.eq('1337'));
        expect(text).toBe(`${PREFIX}("t1"."id" = ?)`);
        expect(params).toEqual([1337]);
    });

    test('ast: byte arrays bind as text on string columns', () => {
        const { params } = users.select(users.c.id).where(users.c.username.eq(new TextEncoder().encode('huey'))).compile();
        expect(params).toEqual(['huey']);
    });

    test('ast: eq(null) and ne(null) render IS / IS NOT NULL', () => {
        expect(where(person.c.dob.eq(null)).sql).toBe(`${PREFIX}("t1"."dob" IS NULL)`);
        expect(where(person.c.dob.ne(null)).sql).toBe(`${PREFIX}("t1"."dob" IS NOT NULL)`);
        expect(where(person.c.dob.isNotNull()).params).toEqual([]);
    });

    test('ast: in() binds each coerced item', () => {
        const { sql: text, params } = where(person.c.id.in(['1', 2]));
        expect(text).toBe(`${PREFIX}("t1"."id" IN (?, ?))`);
        expect(params).toEqual([1, 2]);
    });

    test('ast: empty in() / notIn() become constant predicates', () => {
        expect(where(person.c.id.in([])).sql).toBe(`${PREFIX}(1 = 0)`);
        expect(where(person.c.id.notIn([])).sql).toBe(`${PREFIX}(1 = 1)`);
    });

    test('ast: between renders both bounds', () => {
        const { sql: text, params } = where(person.c.id.between(1, '5'));
        expect(text).toBe(`${PREFIX}("t1"."id" BETWEEN ? AND ?)`);
        expect(params).toEqual([1, 5]);
    });

    test('ast: foreign-key columns accept the referenced row', () => {
        const { sql: text, params } = note.select(note.c.id).where(note.c.author.eq({ id: 1337 })).compile();
        expect(text).toBe('SELECT "t1"."id" FROM "note" AS "t1" WHERE ("t1"."author_id" = ?)');
        expect(params).toEqual([1337]);
    });

    test('ast: foreign keys to text keys take the target field', () => {
        const { params } = category.select(category.c.name).where(category.c.parent.eq({ name: 'root' })).compile();
        expect(params).toEqual(['root']);
    });

    test('ast: object-id accessor is the same column', () => {
        const { sql: text } = note.select(note.c.author_id).compile();
        expect(text).toBe('SELECT "t1"."author_id" FROM "note" AS "t1"');
    });
});

// ── pattern matching ────────────────────────────────────────

describe('pattern matching', () => {
    test('ast: contains / startswith / endswith wrap the pattern', () => {
        expect(where(person.c.first.contains('ue')).params).toEqual(['%ue%']);
        expect(where(person.c.first.startswith('hu')).params).toEqual(['hu%']);
        expect(where(person.c.first.endswith('ey')).params).toEqual(['%ey']);
        expect(where(person.c.first.like('h_ey')).sql).toBe(`${PREFIX}("t1"."first" LIKE ?)`);
    });
});

// ── arithmetic & boolean ────────────────────────────────────

describe('arithmetic & boolean', () => {
    test('ast: arithmetic operands inherit the column coercer', () => {
        const { sql: text, params } = where(person.c.id.lt(person.c.id.minus('5')));
        expect(text).toBe(`${PREFIX}("t1"."id" < ("t1"."id" - ?))`);
        expect(params).toEqual([5]);
    });

    test('ast: and / or / not nest with explicit parentheses', () => {
        const expr = person.c.first.eq('a').or(person.c.first.eq('b')).and(person.c.last.eq('c').not());
        const { sql: text, params } = where(expr);
        expect(text).toBe(`${PREFIX}((("t1"."first" = ?) OR ("t1"."first" = ?)) AND NOT ("t1"."last" = ?))`);
        expect(params).toEqual(['a', 'b', 'c']);
    });

    test('ast: op.and folds left to right', () => {
        const { sql: text } = where(op.and(person.c.id.gt(1), person.c.id.lt(9), person.c.first.ne('x')));
        expect(text).toBe(`${PREFIX}((("t1"."id" > ?) AND ("t1"."id" < ?)) AND ("t1"."first" != ?))`);
    });

    test('ast: op.neg and concat', () => {
        const { sql: text, params } = person.select(op.neg(person.c.id), person.c.first.concat(' ').concat(person.c.last)).compile();
        expect(text).toBe('SELECT -"t1"."id", (("t1"."first" || ?) || "t1"."last") FROM "person" AS "t1"');
        expect(params).toEqual([' ']);
    });

    test('ast: nodes are immutable', () => {
        const base = person.c.id.eq(1);
        base.and(person.c.id.eq(2));
        expect(where(base).sql).toBe(`${PREFIX}("t1"."id" = ?)`);
    });
});

// ── wrappers ────────────────────────────────────────────────

describe('wrappers', () => {
    test('ast: aliases render AS only in the select list', () => {
        const { sql: text } = person.select(fn.COUNT(person.c.id).alias('ct')).groupBy(person.c.first.alias('f')).compile();
        expect(text).toBe('SELECT COUNT("t1"."id") AS "ct" FROM "person" AS "t1" GROUP BY "t1"."first"');
    });

    test('ast: cast', () => {
        expect(person.select(person.c.id.cast('TEXT')).compile().sql).toBe('SELECT CAST("t1"."id" AS TEXT) FROM "person" AS "t1"');
    });

    test('ast: ordering with nulls placement', () => {
        const { sql: text } = person.select(person.c.id).orderBy(person.c.dob.desc({ nulls: 'LAST' }), person.c.id.asc()).compile();
        expect(text).toBe('SELECT "t1"."id" FROM "person" AS "t1" ORDER BY "t1"."dob" DESC NULLS LAST, "t1"."id" ASC');
    });

    test('ast: raw fragments splice their own parameters', () => {
        const { sql: text, params } = where(person.c.dob.eq(sql('date(?)', '2024-01-01')));
        expect(text).toBe(`${PREFIX}("t1"."dob" = date(?))`);
        expect(params).toEqual(['2024-01-01']);
    });

    test('ast: raw placeholders are renumbered for numbered dialects', () => {
        const { sql: text, params } = person.select(person.c.id)
            .where(person.c.id.gt(1), sql('? = ?', 'a', 'b'))
            .compile({ dialect: 'postgres' });
        expect(text).toBe('SELECT "t1"."id" FROM "person" AS "t1" WHERE (("t1"."id" > $1) AND $2 = $3)');
        expect(params).toEqual([1, 'a', 'b']);
    });
});

// ── composite keys & value lists ────────────────────────────

describe('composite keys & value lists', () => {
    test('ast: composite key equality expands to AND', () => {
        expect(ckm.pk).toBeInstanceOf(CompositeKeyNode);
        const { sql: text, params } = ckm.select(ckm.c.value).where(ckm.pk.eq(['k1', 'a'])).compile();
        expect(text).toBe('SELECT "t1"."value" FROM "ckm" AS "t1" WHERE (("t1"."category" = ?) AND ("t1"."key" = ?))');
        expect(params).toEqual(['k1', 'a']);
    });

    test('ast: composite key rejects a value of the wrong length', () => {
        expect(() => ckm.pk.eq(['k1'])).toThrow(TypeError);
    });

    test('ast: value list inside IN', () => {
        const { sql: text, params } = where(person.c.id.in(values([[1], [2]])));
        expect(text).toBe(`${PREFIX}("t1"."id" IN (VALUES (?), (?)))`);
        expect(params).toEqual([1, 2]);
    });
});

// ── identifiers ─────────────────────────────────────────────

describe('identifiers', () => {
    test('ast: embedded quote characters are doubled', () => {
        const ctx = new CompileContext(dialects.generic, { returning: 'ignore' });
        expect(ctx.quote('we"ird')).toBe('"we""ird"');
        const mysql = new CompileContext(dialects.mysql, { returning: 'ignore' });
        expect(mysql.quote('a`b')).toBe('`a``b`');
    });
});
