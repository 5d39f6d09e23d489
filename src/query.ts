/**
 * query.ts: Immutable query values: SELECT, compound SELECT, INSERT,
 * UPDATE, DELETE, CREATE INDEX and raw SQL
 *
 * Every builder method returns a new query; the receiver is never changed,
 * so a query can be extended in several directions and compiled any number
 * of times with identical output.
 *
 * ```ts
 * const q = person
 *     .select(person.c.first, fn.COUNT(note.c.id).alias('ct'))
 *     .join(note)
 *     .where(person.c.last.eq('Leifer'))
 *     .groupBy(person.c.first);
 * const { sql, params } = q.compile();
 * ```
 */
import { ColumnNode, SubqueryNode, ValueNode, createColumnProxy, fn, isNode, isQuery, narrowKeySubquery, reduceNodes, sql } from './ast';
import type { ASTNode, Source } from './ast';
import { compile } from './compiler';
import type { CompileOptions } from './compiler';
import { InvalidMutationError, SchemaConsistencyError } from './errors';
import { resolveFilter } from './filter';
import type { FilterInput } from './filter';
import { resolveJoin } from './join';
import type { JoinStep } from './join';
import type { Field, Table, TableAlias } from './schema';
import type { CompiledQuery, CompoundOperator, JoinKind } from './types';

export type Query = SelectQuery | CompoundSelectQuery | InsertQuery | UpdateQuery | DeleteQuery | IndexQuery | RawQuery;

/** Things a select list (or RETURNING) accepts; tables expand to their columns */
export type Selectable = ASTNode | Table | TableAlias | Query;

/** Things usable as a compound branch or an INSERT … SELECT source */
export type SelectLike = SelectQuery | CompoundSelectQuery;

abstract class BaseQuery {
    abstract readonly queryType: string;

    compile(options?: CompileOptions): CompiledQuery {
        if (!isQuery(this)) throw new TypeError('compile() called on an unknown query type');
        return compile(this, options);
    }
}

function sourceColumns(source: Table | TableAlias): ColumnNode[] {
    const table = source.sourceType === 'table' ? source : source.table;
    return table.fields.map(field => new ColumnNode(source, field.name, field));
}

function expandSelectables(items: readonly Selectable[]): ASTNode[] {
    const nodes: ASTNode[] = [];
    for (const item of items) {
        if (isNode(item)) nodes.push(item);
        else if (isQuery(item)) nodes.push(new SubqueryNode(item));
        else nodes.push(...sourceColumns(item));
    }
    return nodes;
}

function andWhere(current: ASTNode | null, conditions: readonly unknown[]): ASTNode | null {
    if (conditions.length === 0) return current;
    const node = reduceNodes('AND', conditions);
    return current ? reduceNodes('AND', [current, node]) : node;
}

// =============================================================================
// SELECT
// =============================================================================

export type SelectState = {
    /** Source whose columns form the default select list; root of filters */
    readonly primary: Table | TableAlias | null;
    readonly columns: readonly ASTNode[];
    /** True until the select list is set explicitly */
    readonly isDefault: boolean;
    readonly from: readonly Source[];
    readonly joins: readonly JoinStep[];
    /** Where the next `join()` starts from */
    readonly cursor: Source | null;
    readonly where: ASTNode | null;
    readonly groupBy: readonly ASTNode[];
    readonly having: ASTNode | null;
    readonly orderBy: readonly ASTNode[];
    readonly limit: number | null;
    readonly offset: number | null;
    readonly distinct: boolean;
    readonly alias: string | null;
};

export type JoinOptions = {
    kind?: JoinKind;
    /** Join condition; wrap it in `.alias(name)` to name the join */
    on?: ASTNode;
};

const EMPTY_SELECT: SelectState = {
    primary: null,
    columns: [],
    isDefault: false,
    from: [],
    joins: [],
    cursor: null,
    where: null,
    groupBy: [],
    having: null,
    orderBy: [],
    limit: null,
    offset: null,
    distinct: false,
    alias: null,
};

export function selectFrom(source: Table | TableAlias, items: readonly Selectable[]): SelectQuery {
    const isDefault = items.length === 0;
    return new SelectQuery({
        ...EMPTY_SELECT,
        primary: source,
        columns: isDefault ? sourceColumns(source) : expandSelectables(items),
        isDefault,
        from: [source],
        cursor: source,
    });
}

/** A SELECT with no table behind it: `select(fn.NOW())`, or FROM sources set later */
export function select(...items: Selectable[]): SelectQuery {
    return new SelectQuery({ ...EMPTY_SELECT, columns: expandSelectables(items) });
}

/** `SELECT COUNT(1) FROM (<query without ORDER BY>) AS "_wrapped"` */
function countOf(query: SelectLike): SelectQuery {
    const inner = query.orderBy().alias('_wrapped');
    return new SelectQuery({
        ...EMPTY_SELECT,
        columns: [fn.COUNT(sql('1'))],
        from: [inner],
        cursor: inner,
    });
}

export class SelectQuery extends BaseQuery {
    readonly queryType = 'select' as const;
    readonly sourceType = 'query' as const;

    constructor(readonly state: SelectState) {
        super();
    }

    private with(patch: Partial<SelectState>): SelectQuery {
        return new SelectQuery({ ...this.state, ...patch });
    }

    /** Join steps, in order */
    get joins(): readonly JoinStep[] {
        return this.state.joins;
    }

    /** Output columns, for use as a source: `subq.c.username` */
    get c(): Record<string, ColumnNode> {
        return createColumnProxy(this);
    }

    /**
     * Replace the select list. With no arguments a default select list is
     * kept; an explicit one is cleared.
     */
    select(...items: Selectable[]): SelectQuery {
        if (items.length === 0 && this.state.isDefault) return this;
        return this.with({ columns: expandSelectables(items), isDefault: false });
    }

    selectExtend(...items: Selectable[]): SelectQuery {
        return this.with({ columns: [...this.state.columns, ...expandSelectables(items)], isDefault: false });
    }

    /** Replace the FROM sources; a join cursor left without its source moves to the first one */
    from(...sources: Source[]): SelectQuery {
        const { cursor, joins } = this.state;
        const kept = cursor !== null && (sources.includes(cursor) || joins.some(j => j.dest === cursor));
        return this.with({ from: sources, cursor: kept ? cursor : sources[0] ?? null });
    }

    join(dest: Source, options: JoinKind | JoinOptions = {}): SelectQuery {
        const { kind = 'INNER', on } = typeof options === 'string' ? { kind: options, on: undefined } : options;
        const cursor = this.state.cursor;
        if (!cursor) throw new SchemaConsistencyError('join() needs a FROM source to join from');
        const step = resolveJoin(cursor, dest, kind, on ?? null);
        return this.with({ joins: [...this.state.joins, step], cursor: dest });
    }

    leftOuterJoin(dest: Source, on?: ASTNode): SelectQuery {
        return this.join(dest, { kind: 'LEFT_OUTER', on });
    }

    crossJoin(dest: Source): SelectQuery {
        return this.join(dest, 'CROSS');
    }

    /** Move the join cursor back to the primary source, or to any joined source */
    switch(source?: Source): SelectQuery {
        const target = source ?? this.state.primary ?? this.state.from[0];
        if (!target) throw new SchemaConsistencyError('switch() on a query without sources');
        const known = this.state.from.includes(target) || this.state.joins.some(j => j.dest === target);
        if (!known) throw new SchemaConsistencyError('switch() target is not a source of this query');
        return this.with({ cursor: target });
    }

    where(...conditions: unknown[]): SelectQuery {
        return this.with({ where: andWhere(this.state.where, conditions) });
    }

    orWhere(...conditions: unknown[]): SelectQuery {
        if (conditions.length === 0) return this;
        const node = reduceNodes('AND', conditions);
        return this.with({ where: this.state.where ? reduceNodes('OR', [this.state.where, node]) : node });
    }

    /** Relation-path lookups: `{ user__username: 'huey' }` */
    filter(input: FilterInput): SelectQuery {
        const root = this.state.primary ?? this.state.from[0];
        if (!root) throw new SchemaConsistencyError('filter() on a query without sources');
        const { predicate, joins } = resolveFilter(input, root, this.state.from, this.state.joins);
        return this.with({ where: andWhere(this.state.where, [predicate]), joins });
    }

    groupBy(...items: (ASTNode | Table | TableAlias)[]): SelectQuery {
        return this.with({ groupBy: expandSelectables(items) });
    }

    groupByExtend(...items: (ASTNode | Table | TableAlias)[]): SelectQuery {
        return this.with({ groupBy: [...this.state.groupBy, ...expandSelectables(items)] });
    }

    having(...conditions: unknown[]): SelectQuery {
        return this.with({ having: andWhere(this.state.having, conditions) });
    }

    /** Replace the ordering; no arguments clears it */
    orderBy(...items: ASTNode[]): SelectQuery {
        return this.with({ orderBy: items });
    }

    orderByExtend(...items: ASTNode[]): SelectQuery {
        return this.with({ orderBy: [...this.state.orderBy, ...items] });
    }

    limit(limit: number | null): SelectQuery {
        return this.with({ limit });
    }

    offset(offset: number | null): SelectQuery {
        return this.with({ offset });
    }

    /** 1-based pages */
    paginate(page: number, perPage = 20): SelectQuery {
        return this.with({ limit: perPage, offset: Math.max(page - 1, 0) * perPage });
    }

    distinct(distinct = true): SelectQuery {
        return this.with({ distinct });
    }

    alias(alias: string | null): SelectQuery {
        return this.with({ alias });
    }

    union(rhs: SelectLike): CompoundSelectQuery { return compound('UNION', this, rhs); }
    unionAll(rhs: SelectLike): CompoundSelectQuery { return compound('UNION ALL', this, rhs); }
    intersect(rhs: SelectLike): CompoundSelectQuery { return compound('INTERSECT', this, rhs); }
    except(rhs: SelectLike): CompoundSelectQuery { return compound('EXCEPT', this, rhs); }

    count(): SelectQuery {
        return countOf(this);
    }
}

// =============================================================================
// Compound SELECT
// =============================================================================

export type CompoundState = {
    readonly op: CompoundOperator;
    readonly lhs: SelectLike;
    readonly rhs: SelectLike;
    readonly orderBy: readonly ASTNode[];
    readonly limit: number | null;
    readonly offset: number | null;
    readonly alias: string | null;
};

function compound(op: CompoundOperator, lhs: SelectLike, rhs: SelectLike): CompoundSelectQuery {
    return new CompoundSelectQuery({ op, lhs, rhs, orderBy: [], limit: null, offset: null, alias: null });
}

export class CompoundSelectQuery extends BaseQuery {
    readonly queryType = 'compound' as const;
    readonly sourceType = 'query' as const;

    constructor(readonly state: CompoundState) {
        super();
    }

    private with(patch: Partial<CompoundState>): CompoundSelectQuery {
        return new CompoundSelectQuery({ ...this.state, ...patch });
    }

    get c(): Record<string, ColumnNode> {
        return createColumnProxy(this);
    }

    orderBy(...items: ASTNode[]): CompoundSelectQuery {
        return this.with({ orderBy: items });
    }

    orderByExtend(...items: ASTNode[]): CompoundSelectQuery {
        return this.with({ orderBy: [...this.state.orderBy, ...items] });
    }

    limit(limit: number | null): CompoundSelectQuery {
        return this.with({ limit });
    }

    offset(offset: number | null): CompoundSelectQuery {
        return this.with({ offset });
    }

    paginate(page: number, perPage = 20): CompoundSelectQuery {
        return this.with({ limit: perPage, offset: Math.max(page - 1, 0) * perPage });
    }

    alias(alias: string | null): CompoundSelectQuery {
        return this.with({ alias });
    }

    union(rhs: SelectLike): CompoundSelectQuery { return compound('UNION', this, rhs); }
    unionAll(rhs: SelectLike): CompoundSelectQuery { return compound('UNION ALL', this, rhs); }
    intersect(rhs: SelectLike): CompoundSelectQuery { return compound('INTERSECT', this, rhs); }
    except(rhs: SelectLike): CompoundSelectQuery { return compound('EXCEPT', this, rhs); }

    count(): SelectQuery {
        return countOf(this);
    }
}

// =============================================================================
// Mutations: shared helpers
// =============================================================================

/** Values keyed by logical field name, or by column */
export type InsertValues = Readonly<Record<string, unknown>> | ReadonlyMap<ColumnNode | string, unknown>;

export type Assignment = {
    readonly field: Field;
    readonly value: ASTNode;
};

function isMapValues(values: InsertValues): values is ReadonlyMap<ColumnNode | string, unknown> {
    return values instanceof Map;
}

function isPositional(row: InsertValues | readonly unknown[]): row is readonly unknown[] {
    return Array.isArray(row);
}

/** Field of `table` named by a column or a logical / object-id name */
function resolveField(table: Table, key: ColumnNode | string): Field {
    if (typeof key !== 'string') {
        if (!key.field || key.field.table !== table) {
            throw new SchemaConsistencyError(`Column "${key.name}" does not belong to "${table.name}"`);
        }
        return key.field;
    }
    const column = table.c[key];
    if (column && column.field) return column.field;
    return table.field(key);
}

function valueEntries(table: Table, values: InsertValues): Map<Field, unknown> {
    const entries = new Map<Field, unknown>();
    const pairs: Iterable<[ColumnNode | string, unknown]> = isMapValues(values) ? values.entries() : Object.entries(values);
    for (const [key, value] of pairs) {
        entries.set(resolveField(table, key), value);
    }
    return entries;
}

/** Literal bound through the field's coercion hook; nodes and queries pass through */
function fieldValue(field: Field, value: unknown): ASTNode {
    if (isNode(value)) return value;
    const query = narrowKeySubquery(field, value);
    if (isQuery(query)) return new SubqueryNode(query);
    return new ValueNode(value, field.coerce);
}

function defaultValue(field: Field): ASTNode {
    return new ValueNode(field.defaultValue ? field.defaultValue() : null, field.coerce);
}

function sortByTable(table: Table, fields: Iterable<Field>): Field[] {
    const wanted = new Set(fields);
    return table.fields.filter(f => wanted.has(f));
}

function assignments(table: Table, values: InsertValues): Assignment[] {
    const entries = valueEntries(table, values);
    return sortByTable(table, entries.keys()).map(field => ({ field, value: fieldValue(field, entries.get(field)) }));
}

// =============================================================================
// INSERT
// =============================================================================

export type InsertSource = SelectLike | RawQuery;

export type ConflictAction = 'update' | 'ignore' | 'replace';

export type OnConflict = {
    readonly action: ConflictAction;
    readonly target: readonly Field[];
    /** Index predicate of a partial conflict target (rendered unqualified) */
    readonly conflictWhere: ASTNode | null;
    /** Columns set from the proposed row: `col = EXCLUDED.col` */
    readonly preserve: readonly Field[];
    readonly update: readonly Assignment[];
    readonly where: ASTNode | null;
};

export type OnConflictOptions = {
    target?: readonly (ColumnNode | string)[];
    conflictWhere?: ASTNode;
    preserve?: readonly (ColumnNode | string)[];
    update?: InsertValues;
    where?: ASTNode;
};

export type InsertState = {
    readonly table: Table;
    readonly columns: readonly Field[];
    readonly rows: readonly (readonly ASTNode[])[];
    readonly source: InsertSource | null;
    readonly onConflict: OnConflict | null;
    /** Null: the primary key, where the dialect supports RETURNING */
    readonly returning: readonly ASTNode[] | null;
};

export function buildInsert(table: Table, values: InsertValues): InsertQuery {
    const given = valueEntries(table, values);
    const columns = table.fields.filter(f => given.has(f) || f.defaultValue !== null);
    const row = columns.map(f => given.has(f) ? fieldValue(f, given.get(f)) : defaultValue(f));
    return new InsertQuery({
        table,
        columns,
        rows: columns.length > 0 ? [row] : [],
        source: null,
        onConflict: null,
        returning: null,
    });
}

/**
 * Multi-row insert. Without `fields`, dict rows use the union of their keys
 * (plus fields with defaults) and positional rows use every field that is
 * not auto-incrementing.
 */
export function buildInsertMany(
    table: Table,
    rows: readonly (InsertValues | readonly unknown[])[],
    fields?: readonly (ColumnNode | string)[],
): InsertQuery {
    if (rows.length === 0) throw new InvalidMutationError(`insertMany() on "${table.name}" needs at least one row`);

    let columns: Field[];
    if (fields) {
        columns = fields.map(key => resolveField(table, key));
    } else if (rows.every(isPositional)) {
        columns = table.fields.filter(f => !f.autoIncrement);
    } else {
        const seen = new Set<Field>();
        for (const row of rows) {
            if (isPositional(row)) throw new InvalidMutationError('insertMany() cannot mix positional and keyed rows without `fields`');
            for (const field of valueEntries(table, row).keys()) seen.add(field);
        }
        columns = table.fields.filter(f => seen.has(f) || f.defaultValue !== null);
    }

    const nodes = rows.map((row, index) => {
        if (isPositional(row)) {
            if (row.length !== columns.length) {
                throw new InvalidMutationError(`insertMany() row ${index} has ${row.length} values for ${columns.length} columns`);
            }
            return columns.map((field, i) => fieldValue(field, row[i]));
        }
        const given = valueEntries(table, row);
        return columns.map(f => given.has(f) ? fieldValue(f, given.get(f)) : defaultValue(f));
    });

    return new InsertQuery({ table, columns, rows: nodes, source: null, onConflict: null, returning: null });
}

/** `INSERT INTO table (fields…) <query>` */
export function buildInsertFrom(table: Table, source: InsertSource, fields: readonly (ColumnNode | string)[]): InsertQuery {
    return new InsertQuery({
        table,
        columns: fields.map(key => resolveField(table, key)),
        rows: [],
        source,
        onConflict: null,
        returning: null,
    });
}

export class InsertQuery extends BaseQuery {
    readonly queryType = 'insert' as const;

    constructor(readonly state: InsertState) {
        super();
    }

    private with(patch: Partial<InsertState>): InsertQuery {
        return new InsertQuery({ ...this.state, ...patch });
    }

    /**
     * Upsert. `preserve` copies columns from the proposed row; `update`
     * assigns values or expressions. With neither: DO NOTHING.
     */
    onConflict(options: OnConflictOptions = {}): InsertQuery {
        const table = this.state.table;
        return this.with({
            onConflict: {
                action: 'update',
                target: (options.target ?? []).map(key => resolveField(table, key)),
                conflictWhere: options.conflictWhere ?? null,
                preserve: (options.preserve ?? []).map(key => resolveField(table, key)),
                update: options.update ? assignments(table, options.update) : [],
                where: options.where ?? null,
            },
        });
    }

    onConflictIgnore(): InsertQuery {
        return this.with({ onConflict: { action: 'ignore', target: [], conflictWhere: null, preserve: [], update: [], where: null } });
    }

    onConflictReplace(): InsertQuery {
        return this.with({ onConflict: { action: 'replace', target: [], conflictWhere: null, preserve: [], update: [], where: null } });
    }

    /** Explicit RETURNING list; no arguments disables the implicit one */
    returning(...items: Selectable[]): InsertQuery {
        return this.with({ returning: expandSelectables(items) });
    }
}

// =============================================================================
// UPDATE / DELETE
// =============================================================================

export type UpdateState = {
    readonly table: Table;
    readonly assignments: readonly Assignment[];
    readonly from: readonly Source[];
    readonly where: ASTNode | null;
    readonly returning: readonly ASTNode[];
};

export function buildUpdate(table: Table, values: InsertValues): UpdateQuery {
    const assigned = assignments(table, values);
    if (assigned.length === 0) throw new InvalidMutationError(`update() on "${table.name}" has nothing to set`);
    return new UpdateQuery({ table, assignments: assigned, from: [], where: null, returning: [] });
}

export class UpdateQuery extends BaseQuery {
    readonly queryType = 'update' as const;

    constructor(readonly state: UpdateState) {
        super();
    }

    private with(patch: Partial<UpdateState>): UpdateQuery {
        return new UpdateQuery({ ...this.state, ...patch });
    }

    /** `UPDATE … SET … FROM sources` */
    from(...sources: Source[]): UpdateQuery {
        return this.with({ from: sources });
    }

    where(...conditions: unknown[]): UpdateQuery {
        return this.with({ where: andWhere(this.state.where, conditions) });
    }

    returning(...items: Selectable[]): UpdateQuery {
        return this.with({ returning: expandSelectables(items) });
    }
}

export type DeleteState = {
    readonly table: Table;
    readonly where: ASTNode | null;
    readonly returning: readonly ASTNode[];
};

export class DeleteQuery extends BaseQuery {
    readonly queryType = 'delete' as const;

    constructor(readonly state: DeleteState) {
        super();
    }

    where(...conditions: unknown[]): DeleteQuery {
        return new DeleteQuery({ ...this.state, where: andWhere(this.state.where, conditions) });
    }

    returning(...items: Selectable[]): DeleteQuery {
        return new DeleteQuery({ ...this.state, returning: expandSelectables(items) });
    }
}

// =============================================================================
// CREATE INDEX
// =============================================================================

export type IndexOptions = {
    unique?: boolean;
    where?: ASTNode;
    /** Defaults to `<table>_<column>_…` */
    name?: string;
};

export type IndexState = {
    readonly table: Table;
    readonly name: string;
    readonly expressions: readonly ASTNode[];
    readonly unique: boolean;
    readonly where: ASTNode | null;
};

/** Column named by an index entry, if it is a plain or ordered column */
function indexedColumn(node: ASTNode): ColumnNode | null {
    if (node.type === 'column') return node;
    if (node.type === 'ordering' && node.node.type === 'column') return node.node;
    return null;
}

export function buildIndex(table: Table, columns: readonly (ASTNode | string)[], options: IndexOptions): IndexQuery {
    if (columns.length === 0) throw new SchemaConsistencyError(`Index on "${table.name}" needs at least one column`);
    const expressions = columns.map(col => typeof col === 'string' ? table.column(col) : col);
    const names = expressions.map(indexedColumn).flatMap(col => col ? [col.storageName] : []);
    return new IndexQuery({
        table,
        name: options.name ?? [table.name, ...names].join('_'),
        expressions,
        unique: options.unique ?? false,
        where: options.where ?? null,
    });
}

export class IndexQuery extends BaseQuery {
    readonly queryType = 'index' as const;

    constructor(readonly state: IndexState) {
        super();
    }

    /** Partial index predicate */
    where(...conditions: unknown[]): IndexQuery {
        return new IndexQuery({ ...this.state, where: andWhere(this.state.where, conditions) });
    }

    unique(unique = true): IndexQuery {
        return new IndexQuery({ ...this.state, unique });
    }
}

// =============================================================================
// Raw
// =============================================================================

/** SQL passed through verbatim, with `?` parameters */
export class RawQuery extends BaseQuery {
    readonly queryType = 'raw' as const;

    constructor(readonly sql: string, readonly params: readonly unknown[] = []) {
        super();
    }
}

export function rawQuery(text: string, ...params: unknown[]): RawQuery {
    return new RawQuery(text, params);
}
