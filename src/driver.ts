/**
 * driver.ts: The boundary between compiled SQL and a database client
 */
import BetterSqlite3 from 'better-sqlite3';
import { transformValueForStorage } from './schema';
import type { Row } from './types';

export interface Driver {
    /** Run a statement that returns no rows */
    run(sql: string, params: readonly unknown[]): { changes: number };
    /** Run a statement and collect its rows */
    all(sql: string, params: readonly unknown[]): Row[];
    /** Run `callback` atomically: commit on return, roll back on throw */
    transaction<T>(callback: () => T): T;
}

function isRow(value: unknown): value is Row {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * better-sqlite3 driver. Dates bind as ISO text and booleans as 1/0.
 *
 * ```ts
 * const driver = new SqliteDriver(':memory:');
 * ```
 */
export class SqliteDriver implements Driver {
    readonly db: BetterSqlite3.Database;
    private depth = 0;

    constructor(filename: string | BetterSqlite3.Database = ':memory:') {
        this.db = typeof filename === 'string' ? new BetterSqlite3(filename) : filename;
        this.db.pragma('foreign_keys = ON');
    }

    private bind(params: readonly unknown[]): unknown[] {
        return params.map(transformValueForStorage);
    }

    run(sql: string, params: readonly unknown[]): { changes: number } {
        const result = this.db.prepare(sql).run(...this.bind(params));
        return { changes: result.changes };
    }

    all(sql: string, params: readonly unknown[]): Row[] {
        const rows: unknown[] = this.db.prepare(sql).all(...this.bind(params));
        return rows.filter(isRow);
    }

    /** Nested calls join the outermost transaction */
    transaction<T>(callback: () => T): T {
        if (this.depth > 0) return callback();
        this.db.exec('BEGIN TRANSACTION');
        this.depth++;
        try {
            const result = callback();
            this.db.exec('COMMIT');
            return result;
        } catch (error) {
            this.db.exec('ROLLBACK');
            throw error;
        } finally {
            this.depth--;
        }
    }

    close(): void {
        this.db.close();
    }
}
