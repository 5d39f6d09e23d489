/**
 * schema.ts: Tables, fields and foreign keys built from zod object schemas
 *
 * ```ts
 * const schema = defineSchema({
 *     person: z.object({ first: z.string(), last: z.string() }),
 *     note: z.object({ author: z.number(), content: z.string() }),
 * }, {
 *     relations: { note: { author: 'person' } },
 * });
 * const note = schema.table('note');   // columns: id, author_id, content
 * ```
 *
 * The schema is built once and is immutable afterwards.
 */
import { z } from 'zod';
import { ColumnNode, CompositeKeyNode } from './ast';
import type { ASTNode } from './ast';
import { SchemaConsistencyError } from './errors';
import {
    DeleteQuery, RawQuery,
    buildInsert, buildInsertMany, buildInsertFrom, buildUpdate, buildIndex, selectFrom,
} from './query';
import type {
    IndexQuery, InsertQuery, InsertSource, IndexOptions, InsertValues, Selectable, SelectQuery, UpdateQuery,
} from './query';
import type { FilterInput } from './filter';
import type { Coercer, RelationSpec, SchemaMap, SchemaOptions, ZodType } from './types';

// =============================================================================
// Value Coercion
// =============================================================================

/** Transform a JS value to its storage form (Date → ISO text, boolean → 1/0) */
export function transformValueForStorage(value: unknown): unknown {
    if (value instanceof Date) return value.toISOString();
    if (typeof value === 'boolean') return value ? 1 : 0;
    return value;
}

function coerceNumber(value: unknown): unknown {
    if (typeof value === 'string' && value.trim() !== '' && !Number.isNaN(Number(value))) return Number(value);
    return transformValueForStorage(value);
}

function coerceString(value: unknown): unknown {
    if (value instanceof Uint8Array) return new TextDecoder().decode(value);
    if (typeof value === 'number' || typeof value === 'bigint') return String(value);
    return transformValueForStorage(value);
}

/** Strip optional / nullable / default / effects wrappers */
function unwrapType(zodType: ZodType): ZodType {
    if (zodType instanceof z.ZodOptional || zodType instanceof z.ZodNullable) return unwrapType(zodType.unwrap());
    if (zodType instanceof z.ZodDefault) return unwrapType(zodType.removeDefault());
    if (zodType instanceof z.ZodEffects) return unwrapType(zodType.innerType());
    return zodType;
}

/** Default coercion hook for a column of the given zod type */
export function coercerFor(zodType: ZodType): Coercer {
    const inner = unwrapType(zodType);
    if (inner instanceof z.ZodNumber || inner instanceof z.ZodBigInt) return coerceNumber;
    if (inner instanceof z.ZodString || inner instanceof z.ZodEnum) return coerceString;
    return transformValueForStorage;
}

function defaultProviderFor(zodType: ZodType): (() => unknown) | null {
    if (zodType instanceof z.ZodDefault) {
        const def = zodType._def;
        return () => def.defaultValue();
    }
    if (zodType instanceof z.ZodOptional || zodType instanceof z.ZodNullable) return defaultProviderFor(zodType.unwrap());
    return null;
}

function isNullableType(zodType: ZodType): boolean {
    if (zodType instanceof z.ZodOptional || zodType instanceof z.ZodNullable) return true;
    if (zodType instanceof z.ZodDefault) return isNullableType(zodType.removeDefault());
    return false;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
        && !(value instanceof Date) && !(value instanceof Uint8Array);
}

/** FK values may be given as the referenced row: `{ id: 1337 }` → 1337 */
function foreignKeyCoercer(target: Field): Coercer {
    return (value) => {
        if (isRecord(value) && target.name in value) return target.coerce(value[target.name]);
        return target.coerce(value);
    };
}

// =============================================================================
// Field / ForeignKey
// =============================================================================

export type FieldOptions = {
    columnName: string;
    zodType: ZodType | null;
    coerce: Coercer;
    defaultValue: (() => unknown) | null;
    nullable: boolean;
    primaryKey: boolean;
    autoIncrement: boolean;
};

export class Field {
    readonly columnName: string;
    readonly zodType: ZodType | null;
    readonly coerce: Coercer;
    readonly defaultValue: (() => unknown) | null;
    readonly nullable: boolean;
    readonly primaryKey: boolean;
    readonly autoIncrement: boolean;

    constructor(readonly table: Table, readonly name: string, options: FieldOptions) {
        this.columnName = options.columnName;
        this.zodType = options.zodType;
        this.coerce = options.coerce;
        this.defaultValue = options.defaultValue;
        this.nullable = options.nullable;
        this.primaryKey = options.primaryKey;
        this.autoIncrement = options.autoIncrement;
    }

    get foreignKey(): ForeignKey | null {
        return this.table.foreignKeys.find(fk => fk.field === this) ?? null;
    }
}

export class ForeignKey {
    constructor(
        /** The referencing column on the dependent table */
        readonly field: Field,
        readonly target: Table,
        readonly targetField: Field,
        /** Forward relation name, used by joins and lookups */
        readonly name: string,
        /** Reverse relation name on the target table */
        readonly backref: string,
        readonly objectIdName: string,
    ) {}

    get table(): Table {
        return this.field.table;
    }
}

export type Relation = {
    foreignKey: ForeignKey;
    direction: 'forward' | 'backward';
    /** The table on the far side of the relation */
    target: Table;
};

// =============================================================================
// Table / TableAlias
// =============================================================================

export class Table {
    readonly sourceType = 'table' as const;
    private readonly _fields: Field[] = [];
    private readonly _foreignKeys: ForeignKey[] = [];
    private readonly _backrefs: ForeignKey[] = [];
    private _primaryKey: Field[] = [];
    private _columns: Record<string, ColumnNode> | null = null;

    constructor(
        readonly name: string,
        /** Database schema (namespace) the table lives in */
        readonly schemaName: string | null,
        readonly zodSchema: z.AnyZodObject,
    ) {}

    get fields(): readonly Field[] { return this._fields; }
    get primaryKey(): readonly Field[] { return this._primaryKey; }
    /** Outgoing foreign keys, in declaration order */
    get foreignKeys(): readonly ForeignKey[] { return this._foreignKeys; }
    /** Foreign keys of other tables that reference this one */
    get backrefs(): readonly ForeignKey[] { return this._backrefs; }

    /** Columns by logical name; FK columns are also reachable by object-id name */
    get c(): Record<string, ColumnNode> {
        if (!this._columns) this._columns = buildColumns(this, this);
        return this._columns;
    }

    /** The primary key as an expression: a column, or a composite key */
    get pk(): ASTNode {
        return primaryKeyNode(this, this);
    }

    hasField(name: string): boolean {
        return this._fields.some(f => f.name === name);
    }

    field(name: string): Field {
        const field = this._fields.find(f => f.name === name);
        if (!field) throw new SchemaConsistencyError(`Table "${this.name}" has no field "${name}"`);
        return field;
    }

    column(name: string): ColumnNode {
        return new ColumnNode(this, name, this.field(name));
    }

    /** Resolve a forward relation name or a backref name */
    relation(name: string): Relation | null {
        const forward = this._foreignKeys.find(fk => fk.name === name);
        if (forward) return { foreignKey: forward, direction: 'forward', target: forward.target };
        const backward = this._backrefs.find(fk => fk.backref === name);
        if (backward) return { foreignKey: backward, direction: 'backward', target: backward.table };
        return null;
    }

    /** A second reference to this table; unnamed aliases get `t<N>` when compiled */
    alias(name: string | null = null): TableAlias {
        return new TableAlias(this, name);
    }

    // ---------- query entry points ----------

    select(...items: Selectable[]): SelectQuery {
        return selectFrom(this, items);
    }

    filter(lookups: FilterInput): SelectQuery {
        return selectFrom(this, []).filter(lookups);
    }

    insert(values: InsertValues = {}): InsertQuery {
        return buildInsert(this, values);
    }

    insertMany(rows: readonly (InsertValues | readonly unknown[])[], fields?: readonly (ColumnNode | string)[]): InsertQuery {
        return buildInsertMany(this, rows, fields);
    }

    insertFrom(source: InsertSource, fields: readonly (ColumnNode | string)[]): InsertQuery {
        return buildInsertFrom(this, source, fields);
    }

    replace(values: InsertValues = {}): InsertQuery {
        return buildInsert(this, values).onConflictReplace();
    }

    update(values: InsertValues): UpdateQuery {
        return buildUpdate(this, values);
    }

    delete(): DeleteQuery {
        return new DeleteQuery({ table: this, where: null, returning: [] });
    }

    index(columns: readonly (ASTNode | string)[], options: IndexOptions = {}): IndexQuery {
        return buildIndex(this, columns, options);
    }

    raw(text: string, ...params: unknown[]): RawQuery {
        return new RawQuery(text, params);
    }

    // ---------- construction (used by defineSchema only) ----------

    /** @internal */
    _addField(field: Field): void {
        this._fields.push(field);
        if (field.primaryKey) this._primaryKey.push(field);
    }

    /** @internal */
    _addForeignKey(fk: ForeignKey): void {
        this._foreignKeys.push(fk);
        fk.target._backrefs.push(fk);
    }
}

export class TableAlias {
    readonly sourceType = 'table-alias' as const;
    private _columns: Record<string, ColumnNode> | null = null;

    constructor(readonly table: Table, readonly name: string | null) {}

    get c(): Record<string, ColumnNode> {
        if (!this._columns) this._columns = buildColumns(this.table, this);
        return this._columns;
    }

    get pk(): ASTNode {
        return primaryKeyNode(this.table, this);
    }

    column(name: string): ColumnNode {
        return new ColumnNode(this, name, this.table.field(name));
    }

    select(...items: Selectable[]): SelectQuery {
        return selectFrom(this, items);
    }

    filter(lookups: FilterInput): SelectQuery {
        return selectFrom(this, []).filter(lookups);
    }
}

function buildColumns(table: Table, source: Table | TableAlias): Record<string, ColumnNode> {
    const columns: Record<string, ColumnNode> = {};
    for (const field of table.fields) {
        columns[field.name] = new ColumnNode(source, field.name, field);
    }
    for (const fk of table.foreignKeys) {
        if (!(fk.objectIdName in columns)) columns[fk.objectIdName] = new ColumnNode(source, fk.field.name, fk.field);
    }
    return columns;
}

function primaryKeyNode(table: Table, source: Table | TableAlias): ASTNode {
    const key = table.primaryKey;
    if (key.length === 0) throw new SchemaConsistencyError(`Table "${table.name}" has no primary key`);
    const columns = key.map(f => new ColumnNode(source, f.name, f));
    if (columns.length === 1) return columns[0];
    return new CompositeKeyNode(columns);
}

// =============================================================================
// Schema
// =============================================================================

const RelationSpecSchema = z.union([
    z.string(),
    z.object({
        table: z.string(),
        field: z.string().optional(),
        column: z.string().optional(),
        backref: z.string().optional(),
        objectIdName: z.string().optional(),
    }).strict(),
]);

const PrimaryKeySchema = z.union([z.string(), z.array(z.string()), z.literal(false)]);

type NormalizedRelation = {
    table: string;
    field: string | null;
    column: string | null;
    backref: string | null;
    objectIdName: string | null;
};

function normalizeRelation(childTable: string, name: string, spec: RelationSpec): NormalizedRelation {
    const parsed = RelationSpecSchema.safeParse(spec);
    if (!parsed.success) {
        throw new SchemaConsistencyError(`Invalid relation ${childTable}.${name}: ${parsed.error.issues.map(i => i.message).join('; ')}`);
    }
    const value = parsed.data;
    if (typeof value === 'string') {
        return { table: value, field: null, column: null, backref: null, objectIdName: null };
    }
    return {
        table: value.table,
        field: value.field ?? null,
        column: value.column ?? null,
        backref: value.backref ?? null,
        objectIdName: value.objectIdName ?? null,
    };
}

export class Schema<S extends SchemaMap = SchemaMap> {
    constructor(
        private readonly tableMap: ReadonlyMap<string, Table>,
        readonly options: SchemaOptions,
    ) {}

    table(name: Extract<keyof S, string> | (string & {})): Table {
        const table = this.tableMap.get(name);
        if (!table) throw new SchemaConsistencyError(`Unknown table "${name}"`);
        return table;
    }

    get tables(): Table[] {
        return [...this.tableMap.values()];
    }
}

type PlannedField = {
    name: string;
    zodType: ZodType | null;
    relation: NormalizedRelation | null;
};

/**
 * Build the schema. Each table gets its fields in this order: an implicit
 * `id` (unless a primary key is declared), the declared single primary key,
 * the zod shape's keys, then relations that are not part of the shape.
 */
export function defineSchema<S extends SchemaMap>(schemas: S, options: SchemaOptions = {}): Schema<S> {
    const relations = options.relations ?? {};
    const tables = new Map<string, Table>();

    for (const [name, zodSchema] of Object.entries(schemas)) {
        tables.set(name, new Table(name, options.dbSchemas?.[name] ?? null, zodSchema));
    }
    for (const childTable of Object.keys(relations)) {
        if (!tables.has(childTable)) throw new SchemaConsistencyError(`Relations declared for unknown table "${childTable}"`);
    }

    // ---------- plan each table's field list ----------
    const plans = new Map<string, { fields: PlannedField[]; primaryKey: string[]; autoIncrement: boolean }>();
    for (const [name, table] of tables) {
        const shape: Record<string, ZodType> = table.zodSchema.shape;
        const tableRelations = relations[name] ?? {};
        const fields: PlannedField[] = Object.entries(shape).map(([key, zodType]) => ({
            name: key,
            zodType,
            relation: key in tableRelations ? normalizeRelation(name, key, tableRelations[key]) : null,
        }));
        for (const [key, spec] of Object.entries(tableRelations)) {
            if (!(key in shape)) fields.push({ name: key, zodType: null, relation: normalizeRelation(name, key, spec) });
        }

        const declared = options.primaryKeys?.[name];
        const pkParse = PrimaryKeySchema.optional().safeParse(declared);
        if (!pkParse.success) throw new SchemaConsistencyError(`Invalid primary key for "${name}"`);
        const pk = pkParse.data;
        let primaryKey: string[];
        let autoIncrement = options.autoIncrement?.[name] ?? false;

        if (pk === undefined) {
            primaryKey = ['id'];
            autoIncrement = options.autoIncrement?.[name] ?? true;
            if (!fields.some(f => f.name === 'id')) fields.unshift({ name: 'id', zodType: z.number().int(), relation: null });
        } else if (pk === false) {
            primaryKey = [];
        } else if (typeof pk === 'string') {
            primaryKey = [pk];
        } else {
            if (pk.length < 2) throw new SchemaConsistencyError(`Composite key on "${name}" needs at least two fields`);
            if (autoIncrement) throw new SchemaConsistencyError(`Composite key on "${name}" cannot be auto-incrementing`);
            primaryKey = pk;
        }

        for (const key of primaryKey) {
            if (!fields.some(f => f.name === key)) throw new SchemaConsistencyError(`Primary key field "${name}.${key}" is not declared`);
        }
        if (primaryKey.length === 1) {
            const index = fields.findIndex(f => f.name === primaryKey[0]);
            fields.unshift(...fields.splice(index, 1));
        }
        plans.set(name, { fields, primaryKey, autoIncrement });
    }

    // ---------- plain fields first: FK targets must exist ----------
    const built = new Map<string, Map<string, Field>>();
    for (const [name, table] of tables) {
        const plan = plans.get(name);
        if (!plan) continue;
        const byName = new Map<string, Field>();
        for (const planned of plan.fields) {
            if (planned.relation || !planned.zodType) continue;
            const isPk = plan.primaryKey.includes(planned.name);
            byName.set(planned.name, new Field(table, planned.name, {
                columnName: options.columnNames?.[name]?.[planned.name] ?? planned.name,
                zodType: planned.zodType,
                coerce: options.coerce?.[name]?.[planned.name] ?? coercerFor(planned.zodType),
                defaultValue: defaultProviderFor(planned.zodType),
                nullable: isNullableType(planned.zodType),
                primaryKey: isPk,
                autoIncrement: isPk && plan.autoIncrement,
            }));
        }
        built.set(name, byName);
    }

    // ---------- foreign-key fields ----------
    const pendingKeys: Array<{ table: Table; field: Field; target: Table; targetField: Field; relation: NormalizedRelation }> = [];
    for (const [name, table] of tables) {
        const plan = plans.get(name);
        const byName = built.get(name);
        if (!plan || !byName) continue;
        for (const planned of plan.fields) {
            const relation = planned.relation;
            if (!relation) continue;
            const target = tables.get(relation.table);
            const targetFields = built.get(relation.table);
            if (!target || !targetFields) {
                throw new SchemaConsistencyError(`Relation ${name}.${planned.name} references unknown table "${relation.table}"`);
            }
            const targetPlan = plans.get(relation.table);
            const targetName = relation.field ?? (targetPlan && targetPlan.primaryKey.length === 1 ? targetPlan.primaryKey[0] : null);
            if (!targetName) {
                throw new SchemaConsistencyError(`Relation ${name}.${planned.name} needs a target field: "${relation.table}" has no single-field primary key`);
            }
            const targetField = targetFields.get(targetName);
            if (!targetField) {
                throw new SchemaConsistencyError(`Relation ${name}.${planned.name} references unknown field "${relation.table}.${targetName}"`);
            }
            const isPk = plan.primaryKey.includes(planned.name);
            const field = new Field(table, planned.name, {
                columnName: relation.column ?? options.columnNames?.[name]?.[planned.name] ?? `${planned.name}_id`,
                zodType: planned.zodType,
                coerce: options.coerce?.[name]?.[planned.name] ?? foreignKeyCoercer(targetField),
                defaultValue: planned.zodType ? defaultProviderFor(planned.zodType) : null,
                nullable: planned.zodType ? isNullableType(planned.zodType) : false,
                primaryKey: isPk,
                autoIncrement: false,
            });
            byName.set(planned.name, field);
            pendingKeys.push({ table, field, target, targetField, relation });
        }
    }

    for (const [name, table] of tables) {
        const plan = plans.get(name);
        const byName = built.get(name);
        if (!plan || !byName) continue;
        for (const planned of plan.fields) {
            const field = byName.get(planned.name);
            if (field) table._addField(field);
        }
    }

    // ---------- link relations, checking reverse names ----------
    for (const { table, field, target, targetField, relation } of pendingKeys) {
        const backref = relation.backref ?? table.name;
        if (target.relation(backref) || target.hasField(backref)) {
            throw new SchemaConsistencyError(`Relation ${table.name}.${field.name}: "${target.name}" already has a field or relation named "${backref}"`);
        }
        table._addForeignKey(new ForeignKey(
            field, target, targetField, field.name, backref,
            relation.objectIdName ?? `${field.name}_id`,
        ));
    }

    return new Schema<S>(tables, options);
}
