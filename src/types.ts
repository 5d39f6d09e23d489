/**
 * types.ts: Shared type definitions for relquery
 *
 * Schema declaration shapes, compile options and the small value types
 * passed between the builder, the compiler and the driver.
 */
import { z } from 'zod';

export type ZodType = z.ZodTypeAny;

/** Every table is declared as a `z.object()` */
export type SchemaMap = Record<string, z.AnyZodObject>;

/** Per-column hook turning a host value into a bindable parameter */
export type Coercer = (value: unknown) => unknown;

/** A row as handed back by a driver */
export type Row = Record<string, unknown>;

/** The result of compiling a query */
export type CompiledQuery = {
    sql: string;
    params: unknown[];
};

// =============================================================================
// Schema Declaration
// =============================================================================

/**
 * A relation declared on a child table.
 *
 * Shorthand `{ note: { author: 'person' } }` means `note.author_id` references
 * the primary key of `person`, reverse relation `person.note`.
 */
export type RelationSpec = string | {
    /** Referenced table */
    table: string;
    /** Referenced field (defaults to the target's primary key) */
    field?: string;
    /** Storage column (defaults to `<relation>_id`) */
    column?: string;
    /** Reverse relation name on the target (defaults to the child table name) */
    backref?: string;
    /** Name of the raw-id accessor (defaults to `<relation>_id`) */
    objectIdName?: string;
};

/** Relations config: `{ childTable: { relationName: 'parentTable' } }` */
export type RelationsConfig = Record<string, Record<string, RelationSpec>>;

/** Index definition: single column or composite columns */
export type IndexDef = string | string[];

export type SchemaOptions = {
    relations?: RelationsConfig;
    /**
     * Primary keys per table. A string names one field, an array of two or
     * more fields declares a composite key, `false` declares no key at all.
     * Tables not listed get an implicit auto-increment `id`.
     */
    primaryKeys?: Record<string, string | string[] | false>;
    /** Mark a declared single-field primary key as auto-incrementing */
    autoIncrement?: Record<string, boolean>;
    /** Storage column names: `{ person: { first: 'first_name' } }` */
    columnNames?: Record<string, Record<string, string>>;
    /** Database schema (namespace) per table: `{ note: 'notes' }` */
    dbSchemas?: Record<string, string>;
    /** Coercion overrides: `{ users: { username: (v) => String(v) } }` */
    coerce?: Record<string, Record<string, Coercer>>;
    /** Indexes created by `Database.createIndexes()` */
    indexes?: Record<string, IndexDef[]>;
    /**
     * Unique constraints per table. Each entry is an array of column groups.
     * `{ users: [['email'], ['name', 'org_id']] }` → two UNIQUE indexes.
     */
    unique?: Record<string, string[][]>;
};

// =============================================================================
// Query Vocabulary
// =============================================================================

export type JoinKind = 'INNER' | 'LEFT_OUTER' | 'RIGHT_OUTER' | 'FULL_OUTER' | 'CROSS';

export type CompoundOperator = 'UNION' | 'UNION ALL' | 'INTERSECT' | 'EXCEPT';

export type OrderDirection = 'ASC' | 'DESC';

export type NullsOrder = 'FIRST' | 'LAST';

/** What to do with an explicit RETURNING the dialect cannot render */
export type ReturningPolicy = 'ignore' | 'error';
