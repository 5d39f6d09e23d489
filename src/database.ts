/**
 * database.ts: Runs compiled queries through a driver
 *
 * ```ts
 * const db = new Database(schema, new SqliteDriver(':memory:'), { debug: true });
 * db.execute(users.insert({ username: 'huey' }));
 * const rows = db.all(users.select().where(users.c.username.eq('huey')));
 * db.deleteInstance(users, rows[0], { recursive: true });
 * ```
 */
import { resolveDialect } from './dialect';
import type { Dialect, DialectName } from './dialect';
import { compile } from './compiler';
import { planDelete } from './dependencies';
import type { Driver } from './driver';
import type { Query, SelectLike } from './query';
import type { Schema, Table } from './schema';
import type { CompiledQuery, ReturningPolicy, Row, SchemaMap } from './types';

export type DatabaseOptions = {
    /** Default: `sqlite` */
    dialect?: Dialect | DialectName;
    /**
     * Log every SQL statement to the console. Useful for debugging.
     * Default: `false`.
     */
    debug?: boolean;
    returning?: ReturningPolicy;
};

export class Database<S extends SchemaMap = SchemaMap> {
    private readonly dialect: Dialect;

    constructor(
        readonly schema: Schema<S>,
        private readonly driver: Driver,
        private readonly options: DatabaseOptions = {},
    ) {
        this.dialect = resolveDialect(options.dialect ?? 'sqlite');
    }

    compile(query: Query): CompiledQuery {
        return compile(query, { dialect: this.dialect, returning: this.options.returning });
    }

    private prepare(query: Query): CompiledQuery {
        const compiled = this.compile(query);
        if (this.options.debug) console.log('[relquery]', compiled.sql, compiled.params);
        return compiled;
    }

    /** Run a statement; returns the number of rows changed */
    execute(query: Query): number {
        const { sql, params } = this.prepare(query);
        return this.driver.run(sql, params).changes;
    }

    all(query: Query): Row[] {
        const { sql, params } = this.prepare(query);
        return this.driver.all(sql, params);
    }

    get(query: Query): Row | null {
        return this.all(query)[0] ?? null;
    }

    /** Number of rows `query` returns */
    count(query: SelectLike): number {
        const row = this.get(query.count());
        return row ? Number(Object.values(row)[0]) : 0;
    }

    atomic<T>(callback: () => T): T {
        return this.driver.transaction(callback);
    }

    /**
     * Delete one row by primary key. With `recursive`, every row that
     * depends on it through foreign keys goes first, in one transaction.
     * Returns the total number of rows deleted.
     */
    deleteInstance(table: Table, row: Readonly<Record<string, unknown>>, options: { recursive?: boolean } = {}): number {
        const plan = planDelete(table, row);
        const statements = options.recursive ? plan : plan.slice(-1);
        return this.atomic(() => statements.reduce((total, { query }) => total + this.execute(query), 0));
    }

    /** Create the indexes declared in the schema's `indexes` and `unique` options */
    createIndexes(): void {
        const { indexes = {}, unique = {} } = this.schema.options;
        for (const [tableName, defs] of Object.entries(indexes)) {
            const table = this.schema.table(tableName);
            for (const def of defs) {
                this.execute(table.index(Array.isArray(def) ? def : [def]));
            }
        }
        for (const [tableName, groups] of Object.entries(unique)) {
            const table = this.schema.table(tableName);
            for (const columns of groups) {
                this.execute(table.index(columns, { unique: true }));
            }
        }
    }
}
