/**
 * filter.ts: Relation-path lookups: `{ user__username__startswith: 'h' }`
 *
 * A key is a `__`-separated path. Leading segments walk relations (forward
 * FKs or backrefs) from the query's primary source, adding INNER joins as
 * needed; the last segment names a field, optionally followed by an
 * operator (`eq` when omitted).
 *
 * ```ts
 * tweet.filter({ user__username: 'huey', id__lt: 10 })
 * users.select().filter(dq({ tweets__content__contains: 'x' }).or({ id: 1 }))
 * ```
 */
import { ColumnNode, UnaryNode, reduceNodes } from './ast';
import type { ASTNode, Source } from './ast';
import { sourceName } from './context';
import { SchemaConsistencyError } from './errors';
import { foreignKeyPredicate, sourceTable } from './join';
import type { JoinStep } from './join';

export const LOOKUP_OPERATORS = [
    'eq', 'ne', 'lt', 'lte', 'gt', 'gte', 'in', 'notin', 'isnull',
    'like', 'contains', 'startswith', 'endswith', 'between',
] as const;

export type LookupOperator = typeof LOOKUP_OPERATORS[number];

/** `{ path__op: value }`; `$or` takes a list of lookup maps */
export type Lookups = Record<string, unknown>;

export type FilterTree =
    | { kind: 'lookups'; lookups: Lookups }
    | { kind: 'and' | 'or'; lhs: FilterTree; rhs: FilterTree }
    | { kind: 'not'; node: FilterTree };

/** Composable filter: `dq(a).or(b).not()` */
export class DQ {
    constructor(readonly tree: FilterTree) {}

    and(other: DQ | Lookups): DQ {
        return new DQ({ kind: 'and', lhs: this.tree, rhs: toTree(other) });
    }

    or(other: DQ | Lookups): DQ {
        return new DQ({ kind: 'or', lhs: this.tree, rhs: toTree(other) });
    }

    not(): DQ {
        return new DQ({ kind: 'not', node: this.tree });
    }
}

export type FilterInput = Lookups | DQ;

export function dq(lookups: Lookups): DQ {
    return new DQ({ kind: 'lookups', lookups });
}

function toTree(input: FilterInput): FilterTree {
    return input instanceof DQ ? input.tree : { kind: 'lookups', lookups: input };
}

function isOperator(segment: string): segment is LookupOperator {
    return LOOKUP_OPERATORS.some(op => op === segment);
}

export type ParsedLookup = {
    path: string[];
    field: string;
    operator: LookupOperator;
};

export function parseLookup(key: string): ParsedLookup {
    const segments = key.split('__');
    let operator: LookupOperator = 'eq';
    const last = segments[segments.length - 1];
    if (segments.length > 1 && isOperator(last)) {
        operator = last;
        segments.pop();
    }
    const field = segments.pop();
    if (!field || segments.some(s => s === '')) throw new SchemaConsistencyError(`Malformed lookup "${key}"`);
    return { path: segments, field, operator };
}

function applyOperator(column: ColumnNode, operator: LookupOperator, value: unknown): ASTNode {
    switch (operator) {
        case 'eq': return column.eq(value);
        case 'ne': return column.ne(value);
        case 'lt': return column.lt(value);
        case 'lte': return column.lte(value);
        case 'gt': return column.gt(value);
        case 'gte': return column.gte(value);
        case 'in':
        case 'notin':
            if (!Array.isArray(value)) throw new TypeError(`Lookup "${operator}" expects an array`);
            return operator === 'in' ? column.in(value) : column.notIn(value);
        case 'isnull': return column.isNull(Boolean(value));
        case 'like': return column.like(value);
        case 'contains': return column.contains(String(value));
        case 'startswith': return column.startswith(String(value));
        case 'endswith': return column.endswith(String(value));
        case 'between':
            if (!Array.isArray(value) || value.length !== 2) throw new TypeError('Lookup "between" expects [low, high]');
            return column.between(value[0], value[1]);
    }
}

// =============================================================================
// Resolution
// =============================================================================

export type FilterResolution = {
    predicate: ASTNode;
    /** The query's joins plus any the filter added, in order */
    joins: JoinStep[];
};

class Resolver {
    readonly joins: JoinStep[];

    constructor(
        private readonly root: Source,
        private readonly sources: readonly Source[],
        joins: readonly JoinStep[],
    ) {
        this.joins = [...joins];
    }

    private isUsed(source: Source): boolean {
        return this.sources.includes(source) || this.joins.some(j => j.dest === source);
    }

    /** Follow one relation segment from `cursor`, reusing or adding a join */
    private step(cursor: Source, segment: string): Source {
        const named = this.joins.find(j => j.from === cursor && (j.accessor === segment || sourceName(j.dest) === segment));
        if (named) return named.dest;

        const table = sourceTable(cursor);
        const relation = table?.relation(segment) ?? null;
        if (!table || !relation) {
            const owner = table ? `"${table.name}"` : 'a subquery';
            throw new SchemaConsistencyError(`"${segment}" is not a relation of ${owner}`);
        }

        const fk = relation.foreignKey;
        const existing = this.joins.find(j => j.from === cursor && j.foreignKey === fk && sourceTable(j.dest) === relation.target);
        if (existing) return existing.dest;

        const dest: Source = this.isUsed(relation.target) ? relation.target.alias() : relation.target;
        const forward = relation.direction === 'forward';
        this.joins.push({
            from: cursor,
            dest,
            kind: 'INNER',
            on: foreignKeyPredicate(cursor, dest, fk, forward),
            accessor: segment,
            foreignKey: fk,
        });
        return dest;
    }

    private column(source: Source, name: string): ColumnNode {
        const table = sourceTable(source);
        if (!table) return new ColumnNode(source, name);
        const known = table.c[name];
        const field = known ? known.field : table.field(name);
        return new ColumnNode(source, field ? field.name : name, field);
    }

    private lookup(key: string, value: unknown): ASTNode {
        const { path, field, operator } = parseLookup(key);
        let cursor = this.root;
        for (const segment of path) cursor = this.step(cursor, segment);
        return applyOperator(this.column(cursor, field), operator, value);
    }

    private lookups(lookups: Lookups): ASTNode {
        const parts: ASTNode[] = [];
        for (const [key, value] of Object.entries(lookups)) {
            if (key === '$or') {
                if (!Array.isArray(value) || value.length === 0) throw new TypeError('"$or" expects a non-empty array of lookups');
                parts.push(reduceNodes('OR', value.map(sub => this.resolve(toTree(sub)))));
            } else {
                parts.push(this.lookup(key, value));
            }
        }
        if (parts.length === 0) throw new SchemaConsistencyError('Empty filter');
        return reduceNodes('AND', parts);
    }

    resolve(tree: FilterTree): ASTNode {
        switch (tree.kind) {
            case 'lookups': return this.lookups(tree.lookups);
            case 'and': return reduceNodes('AND', [this.resolve(tree.lhs), this.resolve(tree.rhs)]);
            case 'or': return reduceNodes('OR', [this.resolve(tree.lhs), this.resolve(tree.rhs)]);
            case 'not': return new UnaryNode('NOT', this.resolve(tree.node));
        }
    }
}

/**
 * Resolve a filter against a query's primary source, its FROM sources and
 * its existing joins.
 */
export function resolveFilter(
    input: FilterInput,
    root: Source,
    sources: readonly Source[],
    joins: readonly JoinStep[],
): FilterResolution {
    const resolver = new Resolver(root, sources, joins);
    const predicate = resolver.resolve(toTree(input));
    return { predicate, joins: resolver.joins };
}
