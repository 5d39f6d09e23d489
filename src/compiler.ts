/**
 * compiler.ts: Query tree → { sql, params }
 *
 * A single left-to-right walk. Every placeholder is emitted in the same
 * step that pushes its parameter, so parameter order always matches the
 * textual order of the SQL.
 *
 * Alias rules:
 *   - a SELECT registers its FROM sources, then its JOIN destinations,
 *     before rendering anything (so they get the lowest `t<N>`)
 *   - each nested SELECT gets a new scope; columns resolve innermost-first
 *   - a compound SELECT renders in a fresh alias context (restarting at t1)
 *   - UPDATE / DELETE / INSERT targets are referenced by their table name
 */
import { isNode } from './ast';
import type { ASTNode, ColumnNode, Source } from './ast';
import { AliasContext, CompileContext } from './context';
import { resolveDialect } from './dialect';
import type { Dialect, DialectName } from './dialect';
import { CompilationPolicyError } from './errors';
import type { JoinStep } from './join';
import type {
    CompoundSelectQuery, DeleteQuery, IndexQuery, InsertQuery, OnConflict, Query,
    SelectLike, SelectQuery, UpdateQuery,
} from './query';
import type { Table } from './schema';
import type { CompiledQuery, JoinKind, ReturningPolicy } from './types';

export type CompileOptions = {
    /** Dialect or preset name (default: `generic`) */
    dialect?: Dialect | DialectName;
    /** An explicit RETURNING on a dialect without it: drop silently, or throw */
    returning?: ReturningPolicy;
};

export function compile(query: Query, options: CompileOptions = {}): CompiledQuery {
    const ctx = new CompileContext(resolveDialect(options.dialect), { returning: options.returning ?? 'ignore' });
    const sql = renderQuery(query, ctx);
    return { sql, params: ctx.params };
}

function renderQuery(query: Query, ctx: CompileContext): string {
    switch (query.queryType) {
        case 'select': return renderSelect(query, ctx, false);
        case 'compound': return ctx.withAliases(new AliasContext(), () => renderCompound(query, ctx));
        case 'insert': return renderInsert(query, ctx);
        case 'update': return renderUpdate(query, ctx);
        case 'delete': return renderDelete(query, ctx);
        case 'index': return renderIndex(query, ctx);
        case 'raw': return ctx.raw(query.sql, query.params);
    }
}

// =============================================================================
// Expressions
// =============================================================================

function tableName(table: Table, ctx: CompileContext): string {
    return table.schemaName
        ? `${ctx.quote(table.schemaName)}.${ctx.quote(table.name)}`
        : ctx.quote(table.name);
}

function renderColumn(node: ColumnNode, ctx: CompileContext): string {
    const column = ctx.quote(node.storageName);
    if (!ctx.qualify) return column;
    return `${ctx.quote(ctx.aliases.get(node.source))}.${column}`;
}

function renderList(nodes: readonly ASTNode[], ctx: CompileContext): string {
    return nodes.map(node => renderNode(node, ctx)).join(', ');
}

function renderBinary(op: string, lhs: ASTNode, rhs: ASTNode, ctx: CompileContext): string {
    if ((op === 'IN' || op === 'NOT IN') && rhs.type === 'tuple' && rhs.items.length === 0) {
        return op === 'IN' ? '(1 = 0)' : '(1 = 1)';
    }
    const left = renderNode(lhs, ctx);
    if (op === 'BETWEEN' && rhs.type === 'tuple' && rhs.items.length === 2) {
        const low = renderNode(rhs.items[0], ctx);
        const high = renderNode(rhs.items[1], ctx);
        return `(${left} BETWEEN ${low} AND ${high})`;
    }
    return `(${left} ${op} ${renderNode(rhs, ctx)})`;
}

function renderValuesRows(rows: readonly (readonly unknown[])[], ctx: CompileContext): string {
    return rows.map(row => `(${row.map(cell => renderCell(cell, ctx)).join(', ')})`).join(', ');
}

function renderCell(cell: unknown, ctx: CompileContext): string {
    return isNode(cell) ? renderNode(cell, ctx) : ctx.bind(cell);
}

export function renderNode(node: ASTNode, ctx: CompileContext): string {
    switch (node.type) {
        case 'column':
            return renderColumn(node, ctx);
        case 'value':
            return ctx.bind(node.coerce ? node.coerce(node.value) : node.value);
        case 'function': {
            const [only] = node.args;
            if (node.args.length === 1 && only.type === 'subquery') {
                return `${node.name}(${renderQuery(only.query, ctx)})`;
            }
            return `${node.name}(${renderList(node.args, ctx)})`;
        }
        case 'binary':
            return renderBinary(node.op, node.lhs, node.rhs, ctx);
        case 'unary':
            return node.op === 'NOT' ? `NOT ${renderNode(node.operand, ctx)}` : `${node.op}${renderNode(node.operand, ctx)}`;
        case 'ordering': {
            const nulls = node.nulls ? ` NULLS ${node.nulls}` : '';
            return `${renderNode(node.node, ctx)} ${node.direction}${nulls}`;
        }
        case 'alias':
            return renderNode(node.node, ctx);
        case 'subquery':
            return `(${renderQuery(node.query, ctx)})`;
        case 'values':
            return `(VALUES ${renderValuesRows(node.rows, ctx)})`;
        case 'raw':
            return ctx.raw(node.sql, node.params);
        case 'composite-key':
        case 'tuple':
            return `(${renderList(node.type === 'tuple' ? node.items : node.columns, ctx)})`;
        case 'cast':
            return `CAST(${renderNode(node.node, ctx)} AS ${node.castType})`;
    }
}

/** Select-list / RETURNING entry: aliases render `expr AS "name"` */
function renderSelectItem(node: ASTNode, ctx: CompileContext): string {
    if (node.type === 'alias') return `${renderNode(node.node, ctx)} AS ${ctx.quote(node.name)}`;
    return renderNode(node, ctx);
}

function renderSelectList(nodes: readonly ASTNode[], ctx: CompileContext): string {
    return nodes.map(node => renderSelectItem(node, ctx)).join(', ');
}

// =============================================================================
// Sources & joins
// =============================================================================

/** FROM / JOIN entry; the source must already be registered in scope */
function renderSource(source: Source, ctx: CompileContext): string {
    const alias = ctx.quote(ctx.aliases.get(source));
    switch (source.sourceType) {
        case 'table':
            return `${tableName(source, ctx)} AS ${alias}`;
        case 'table-alias':
            return `${tableName(source.table, ctx)} AS ${alias}`;
        case 'query':
            return `(${renderQuery(source, ctx)}) AS ${alias}`;
        case 'values': {
            const columns = source.columnNames ? `(${source.columnNames.map(c => ctx.quote(c)).join(', ')})` : '';
            return `(VALUES ${renderValuesRows(source.rows, ctx)}) AS ${alias}${columns}`;
        }
    }
}

const JOIN_KEYWORDS: Record<JoinKind, string> = {
    INNER: 'INNER JOIN',
    LEFT_OUTER: 'LEFT OUTER JOIN',
    RIGHT_OUTER: 'RIGHT OUTER JOIN',
    FULL_OUTER: 'FULL OUTER JOIN',
    CROSS: 'CROSS JOIN',
};

function renderJoin(join: JoinStep, ctx: CompileContext): string {
    const sql = `${JOIN_KEYWORDS[join.kind]} ${renderSource(join.dest, ctx)}`;
    return join.on ? `${sql} ON ${renderNode(join.on, ctx)}` : sql;
}

function renderLimitOffset(limit: number | null, offset: number | null, ctx: CompileContext): string {
    let sql = '';
    if (limit !== null) {
        sql += ` LIMIT ${ctx.bind(limit)}`;
    } else if (offset !== null && ctx.dialect.limitMax !== null) {
        sql += ` LIMIT ${ctx.dialect.limitMax}`;
    }
    if (offset !== null) sql += ` OFFSET ${ctx.bind(offset)}`;
    return sql;
}

// =============================================================================
// SELECT / compound
// =============================================================================

function renderSelect(query: SelectQuery, ctx: CompileContext, parenthesize: boolean): string {
    const s = query.state;
    const rendered = ctx.scoped(() => {
        for (const source of s.from) ctx.aliases.add(source);
        for (const join of s.joins) ctx.aliases.add(join.dest);

        let sql = `SELECT ${s.distinct ? 'DISTINCT ' : ''}${renderSelectList(s.columns, ctx)}`;
        if (s.from.length > 0) sql += ` FROM ${s.from.map(source => renderSource(source, ctx)).join(', ')}`;
        for (const join of s.joins) sql += ` ${renderJoin(join, ctx)}`;
        if (s.where) sql += ` WHERE ${renderNode(s.where, ctx)}`;
        if (s.groupBy.length > 0) sql += ` GROUP BY ${renderList(s.groupBy, ctx)}`;
        if (s.having) sql += ` HAVING ${renderNode(s.having, ctx)}`;
        if (s.orderBy.length > 0) sql += ` ORDER BY ${renderList(s.orderBy, ctx)}`;
        sql += renderLimitOffset(s.limit, s.offset, ctx);
        return sql;
    });
    return parenthesize ? `(${rendered})` : rendered;
}

function hasOwnOrdering(query: SelectLike): boolean {
    return query.state.orderBy.length > 0 || query.state.limit !== null || query.state.offset !== null;
}

/** Same-operator chains flatten; anything else stays a single branch */
function collectBranches(query: CompoundSelectQuery): SelectLike[] {
    const branches: SelectLike[] = [];
    const visit = (node: SelectLike): void => {
        if (node.queryType === 'compound' && node.state.op === query.state.op && !hasOwnOrdering(node)) {
            visit(node.state.lhs);
            visit(node.state.rhs);
        } else {
            branches.push(node);
        }
    };
    visit(query.state.lhs);
    visit(query.state.rhs);
    return branches;
}

function renderCompound(query: CompoundSelectQuery, ctx: CompileContext): string {
    const { dialect } = ctx;
    const parts = collectBranches(query).map(branch => {
        if (branch.queryType === 'compound') return `(${renderCompound(branch, ctx)})`;
        if (hasOwnOrdering(branch) && !dialect.parenthesizeCompoundBranches && !dialect.compoundBranchOrdering) {
            throw new CompilationPolicyError(`The ${dialect.name} dialect does not allow ORDER BY / LIMIT / OFFSET on unparenthesized compound branches`);
        }
        return renderSelect(branch, ctx, dialect.parenthesizeCompoundBranches);
    });

    let sql = parts.join(` ${query.state.op} `);
    const { orderBy, limit, offset } = query.state;
    if (orderBy.length > 0) sql += ` ORDER BY ${ctx.withQualify(false, () => renderList(orderBy, ctx))}`;
    sql += renderLimitOffset(limit, offset, ctx);
    return sql;
}

// =============================================================================
// Mutations
// =============================================================================

/** Explicit or implicit RETURNING clause, or '' */
function renderReturning(table: Table, explicit: readonly ASTNode[] | null, ctx: CompileContext): string {
    const { dialect } = ctx;
    if (explicit === null) {
        if (!dialect.supportsReturning || table.primaryKey.length === 0) return '';
        const columns = table.primaryKey.map(field => `${ctx.quote(table.name)}.${ctx.quote(field.columnName)}`);
        return ` RETURNING ${columns.join(', ')}`;
    }
    if (explicit.length === 0) return '';
    if (!dialect.supportsReturning) {
        if (ctx.settings.returning === 'error') {
            throw new CompilationPolicyError(`The ${dialect.name} dialect does not support RETURNING`);
        }
        return '';
    }
    return ` RETURNING ${renderSelectList(explicit, ctx)}`;
}

function renderConflictPrefix(conflict: OnConflict | null, dialect: Dialect): string {
    if (!conflict || conflict.action === 'update') return 'INSERT INTO';
    if (dialect.name === 'mysql') return conflict.action === 'ignore' ? 'INSERT IGNORE INTO' : 'REPLACE INTO';
    if (dialect.name === 'postgres') {
        if (conflict.action === 'replace') throw new CompilationPolicyError('The postgres dialect has no INSERT OR REPLACE; use onConflict()');
        return 'INSERT INTO';
    }
    return conflict.action === 'ignore' ? 'INSERT OR IGNORE INTO' : 'INSERT OR REPLACE INTO';
}

function renderConflictClause(conflict: OnConflict | null, ctx: CompileContext): string {
    if (!conflict) return '';
    if (conflict.action === 'ignore') return ctx.dialect.name === 'postgres' ? ' ON CONFLICT DO NOTHING' : '';
    if (conflict.action === 'replace') return '';
    if (!ctx.dialect.supportsOnConflict) {
        throw new CompilationPolicyError(`The ${ctx.dialect.name} dialect does not support ON CONFLICT`);
    }

    let sql = ' ON CONFLICT';
    if (conflict.target.length > 0) {
        sql += ` (${conflict.target.map(f => ctx.quote(f.columnName)).join(', ')})`;
    }
    const { conflictWhere } = conflict;
    if (conflictWhere) sql += ` WHERE ${ctx.withQualify(false, () => renderNode(conflictWhere, ctx))}`;

    if (conflict.preserve.length === 0 && conflict.update.length === 0) return `${sql} DO NOTHING`;

    const sets = [
        ...conflict.preserve.map(f => `${ctx.quote(f.columnName)} = EXCLUDED.${ctx.quote(f.columnName)}`),
        ...conflict.update.map(({ field, value }) => `${ctx.quote(field.columnName)} = ${renderNode(value, ctx)}`),
    ];
    sql += ` DO UPDATE SET ${sets.join(', ')}`;
    if (conflict.where) sql += ` WHERE ${renderNode(conflict.where, ctx)}`;
    return sql;
}

function renderInsert(query: InsertQuery, ctx: CompileContext): string {
    const s = query.state;
    return ctx.scoped(() => {
        ctx.aliases.set(s.table, s.table.name);
        let sql = `${renderConflictPrefix(s.onConflict, ctx.dialect)} ${tableName(s.table, ctx)}`;
        if (s.columns.length > 0) sql += ` (${s.columns.map(f => ctx.quote(f.columnName)).join(', ')})`;

        if (s.source) {
            sql += ` ${renderQuery(s.source, ctx)}`;
        } else if (s.rows.length === 0 || s.columns.length === 0) {
            sql += ' DEFAULT VALUES';
        } else {
            sql += ` VALUES ${s.rows.map(row => `(${renderList(row, ctx)})`).join(', ')}`;
        }

        sql += renderConflictClause(s.onConflict, ctx);
        sql += renderReturning(s.table, s.returning, ctx);
        return sql;
    });
}

function renderUpdate(query: UpdateQuery, ctx: CompileContext): string {
    const s = query.state;
    return ctx.scoped(() => {
        ctx.aliases.set(s.table, s.table.name);
        for (const source of s.from) ctx.aliases.add(source);

        const sets = s.assignments.map(({ field, value }) => `${ctx.quote(field.columnName)} = ${renderNode(value, ctx)}`);
        let sql = `UPDATE ${tableName(s.table, ctx)} SET ${sets.join(', ')}`;
        if (s.from.length > 0) sql += ` FROM ${s.from.map(source => renderSource(source, ctx)).join(', ')}`;
        if (s.where) sql += ` WHERE ${renderNode(s.where, ctx)}`;
        sql += renderReturning(s.table, s.returning, ctx);
        return sql;
    });
}

function renderDelete(query: DeleteQuery, ctx: CompileContext): string {
    const s = query.state;
    return ctx.scoped(() => {
        ctx.aliases.set(s.table, s.table.name);
        let sql = `DELETE FROM ${tableName(s.table, ctx)}`;
        if (s.where) sql += ` WHERE ${renderNode(s.where, ctx)}`;
        sql += renderReturning(s.table, s.returning, ctx);
        return sql;
    });
}

function renderIndex(query: IndexQuery, ctx: CompileContext): string {
    const s = query.state;
    return ctx.withQualify(false, () => {
        let sql = `CREATE ${s.unique ? 'UNIQUE ' : ''}INDEX IF NOT EXISTS ${ctx.quote(s.name)} ON ${tableName(s.table, ctx)} (${renderList(s.expressions, ctx)})`;
        if (s.where) sql += ` WHERE ${renderNode(s.where, ctx)}`;
        return sql;
    });
}
