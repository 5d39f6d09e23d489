/**
 * ast.ts: Expression nodes
 *
 * Every node is immutable: fluent methods (`eq`, `and`, `alias`, …) return
 * new nodes and never touch the receiver. Nodes carry no aliases or
 * placeholders; those are assigned by the compiler.
 *
 * ```ts
 * person.c.last.eq('Leifer').and(person.c.id.lt(4))
 * fn.COUNT(note.c.id).alias('ct')
 * ```
 */
import type { Field, Table, TableAlias } from './schema';
import type { Query, SelectQuery, CompoundSelectQuery } from './query';
import type { Coercer, NullsOrder, OrderDirection } from './types';

/** Anything that can appear in FROM or JOIN */
export type Source = Table | TableAlias | SelectQuery | CompoundSelectQuery | ValuesList;

export type ASTNode =
    | ColumnNode
    | ValueNode
    | FunctionNode
    | BinaryNode
    | UnaryNode
    | OrderingNode
    | AliasNode
    | SubqueryNode
    | ValuesList
    | RawNode
    | CompositeKeyNode
    | TupleNode
    | CastNode;

const NODE_TYPES = new Set<string>([
    'column', 'value', 'function', 'binary', 'unary', 'ordering', 'alias',
    'subquery', 'values', 'raw', 'composite-key', 'tuple', 'cast',
]);

/** Operators whose right operand takes the left column's coercion hook */
const COERCED_OPERATORS = new Set([
    '=', '!=', '<', '<=', '>', '>=', 'IN', 'NOT IN', 'BETWEEN',
    '+', '-', '*', '/', '%', '&', '|',
]);

export function isNode(value: unknown): value is ASTNode {
    return value instanceof Node && NODE_TYPES.has(value.type);
}

export function isQuery(value: unknown): value is Query {
    return typeof value === 'object' && value !== null && 'queryType' in value;
}

function asNode(value: Node): ASTNode {
    if (isNode(value)) return value;
    throw new TypeError(`Unknown expression node type: ${value.type}`);
}

/**
 * Lift a host value into the tree: nodes pass through, queries become
 * subqueries, arrays become tuples, anything else a bound literal.
 */
export function wrapNode(value: unknown, converter: Coercer | null = null): ASTNode {
    if (isNode(value)) return value;
    if (isQuery(value)) return new SubqueryNode(value);
    if (Array.isArray(value)) return new TupleNode(value.map(v => wrapNode(v, converter)));
    return new ValueNode(value, converter);
}

/**
 * A foreign key compared with (or assigned) a whole-row select of its
 * target table takes the referenced column only:
 * `tweet.c.user.in(users.select())` selects `users.id`.
 */
export function narrowKeySubquery(field: Field | null, value: unknown): unknown {
    const fk = field?.foreignKey;
    if (!fk || !isQuery(value) || value.queryType !== 'select' || !value.state.isDefault) return value;
    const primary = value.state.primary;
    if (!primary) return value;
    const table = primary.sourceType === 'table' ? primary : primary.table;
    if (table !== fk.target) return value;
    return value.select(primary.column(fk.targetField.name));
}

// =============================================================================
// Base
// =============================================================================

export abstract class Node {
    abstract readonly type: string;

    /** Coercion hook applied to raw right operands */
    converter(): Coercer | null {
        return null;
    }

    /** Right operand as it should be compared */
    protected comparand(rhs: unknown): unknown {
        return rhs;
    }

    protected binary(op: string, rhs: unknown): BinaryNode {
        const converter = COERCED_OPERATORS.has(op) ? this.converter() : null;
        return new BinaryNode(op, asNode(this), wrapNode(this.comparand(rhs), converter));
    }

    // ---------- comparison ----------

    eq(rhs: unknown): ASTNode {
        if (rhs === null) return new BinaryNode('IS', asNode(this), NULL);
        return this.binary('=', rhs);
    }

    ne(rhs: unknown): ASTNode {
        if (rhs === null) return new BinaryNode('IS NOT', asNode(this), NULL);
        return this.binary('!=', rhs);
    }

    lt(rhs: unknown): ASTNode { return this.binary('<', rhs); }
    lte(rhs: unknown): ASTNode { return this.binary('<=', rhs); }
    gt(rhs: unknown): ASTNode { return this.binary('>', rhs); }
    gte(rhs: unknown): ASTNode { return this.binary('>=', rhs); }

    in(rhs: readonly unknown[] | Query | ASTNode): ASTNode {
        return this.binary('IN', rhs);
    }

    notIn(rhs: readonly unknown[] | Query | ASTNode): ASTNode {
        return this.binary('NOT IN', rhs);
    }

    isNull(flag = true): ASTNode {
        return new BinaryNode(flag ? 'IS' : 'IS NOT', asNode(this), NULL);
    }

    isNotNull(): ASTNode {
        return this.isNull(false);
    }

    between(low: unknown, high: unknown): ASTNode {
        const converter = this.converter();
        return new BinaryNode('BETWEEN', asNode(this), new TupleNode([wrapNode(low, converter), wrapNode(high, converter)]));
    }

    // ---------- pattern matching ----------

    like(pattern: unknown): ASTNode { return this.binary('LIKE', pattern); }
    contains(text: string): ASTNode { return this.binary('LIKE', `%${text}%`); }
    startswith(text: string): ASTNode { return this.binary('LIKE', `${text}%`); }
    endswith(text: string): ASTNode { return this.binary('LIKE', `%${text}`); }

    // ---------- arithmetic ----------

    concat(rhs: unknown): ASTNode { return this.binary('||', rhs); }
    plus(rhs: unknown): ASTNode { return this.binary('+', rhs); }
    minus(rhs: unknown): ASTNode { return this.binary('-', rhs); }
    mul(rhs: unknown): ASTNode { return this.binary('*', rhs); }
    div(rhs: unknown): ASTNode { return this.binary('/', rhs); }
    mod(rhs: unknown): ASTNode { return this.binary('%', rhs); }
    binAnd(rhs: unknown): ASTNode { return this.binary('&', rhs); }
    binOr(rhs: unknown): ASTNode { return this.binary('|', rhs); }

    // ---------- boolean ----------

    and(rhs: unknown): ASTNode { return this.binary('AND', rhs); }
    or(rhs: unknown): ASTNode { return this.binary('OR', rhs); }
    not(): ASTNode { return new UnaryNode('NOT', asNode(this)); }

    // ---------- wrappers ----------

    asc(options: { nulls?: NullsOrder } = {}): OrderingNode {
        return new OrderingNode(asNode(this), 'ASC', options.nulls ?? null);
    }

    desc(options: { nulls?: NullsOrder } = {}): OrderingNode {
        return new OrderingNode(asNode(this), 'DESC', options.nulls ?? null);
    }

    alias(name: string): ASTNode {
        return new AliasNode(asNode(this), name);
    }

    cast(castType: string): ASTNode {
        return new CastNode(asNode(this), castType);
    }
}

// =============================================================================
// Nodes
// =============================================================================

/** A column of a source; `field` is null for columns of subqueries and value lists */
export class ColumnNode extends Node {
    readonly type = 'column' as const;

    constructor(
        readonly source: Source,
        readonly name: string,
        readonly field: Field | null = null,
    ) {
        super();
    }

    /** Name as stored in the database */
    get storageName(): string {
        return this.field ? this.field.columnName : this.name;
    }

    converter(): Coercer | null {
        return this.field ? this.field.coerce : null;
    }

    protected comparand(rhs: unknown): unknown {
        return narrowKeySubquery(this.field, rhs);
    }
}

export class ValueNode extends Node {
    readonly type = 'value' as const;

    constructor(readonly value: unknown, readonly coerce: Coercer | null = null) {
        super();
    }
}

export class FunctionNode extends Node {
    readonly type = 'function' as const;

    constructor(readonly name: string, readonly args: readonly ASTNode[]) {
        super();
    }
}

export class BinaryNode extends Node {
    readonly type = 'binary' as const;

    constructor(readonly op: string, readonly lhs: ASTNode, readonly rhs: ASTNode) {
        super();
    }

    converter(): Coercer | null {
        return COERCED_OPERATORS.has(this.op) ? this.lhs.converter() : null;
    }
}

export class UnaryNode extends Node {
    readonly type = 'unary' as const;

    constructor(readonly op: string, readonly operand: ASTNode) {
        super();
    }
}

export class OrderingNode extends Node {
    readonly type = 'ordering' as const;

    constructor(
        readonly node: ASTNode,
        readonly direction: OrderDirection,
        readonly nulls: NullsOrder | null = null,
    ) {
        super();
    }
}

export class AliasNode extends Node {
    readonly type = 'alias' as const;

    constructor(readonly node: ASTNode, readonly name: string) {
        super();
    }

    alias(name: string): ASTNode {
        return new AliasNode(this.node, name);
    }
}

export class SubqueryNode extends Node {
    readonly type = 'subquery' as const;

    constructor(readonly query: Query) {
        super();
    }
}

/** SQL text spliced verbatim, with its own `?` parameters */
export class RawNode extends Node {
    readonly type = 'raw' as const;

    constructor(readonly sql: string, readonly params: readonly unknown[] = []) {
        super();
    }
}

/** Parenthesized, comma-separated list: IN operands and BETWEEN bounds */
export class TupleNode extends Node {
    readonly type = 'tuple' as const;

    constructor(readonly items: readonly ASTNode[]) {
        super();
    }
}

export class CastNode extends Node {
    readonly type = 'cast' as const;

    constructor(readonly node: ASTNode, readonly castType: string) {
        super();
    }
}

/** The columns of a composite primary key, compared as a unit */
export class CompositeKeyNode extends Node {
    readonly type = 'composite-key' as const;

    constructor(readonly columns: readonly ColumnNode[]) {
        super();
    }

    eq(rhs: unknown): ASTNode {
        if (!Array.isArray(rhs)) return super.eq(rhs);
        if (rhs.length !== this.columns.length) {
            throw new TypeError(`Composite key has ${this.columns.length} columns, got ${rhs.length} values`);
        }
        const parts = this.columns.map((col, i) => col.eq(rhs[i]));
        return reduceNodes('AND', parts);
    }
}

/**
 * A literal row set: `(VALUES (?, ?), …) AS "name"("a", "b")`.
 * Usable as a source (FROM, JOIN) or as an expression.
 */
export class ValuesList extends Node {
    readonly type = 'values' as const;
    readonly sourceType = 'values' as const;

    constructor(
        readonly rows: readonly (readonly unknown[])[],
        readonly columnNames: readonly string[] | null = null,
        readonly name: string | null = null,
    ) {
        super();
    }

    /** Name the value list as a source */
    alias(name: string): ValuesList {
        return new ValuesList(this.rows, this.columnNames, name);
    }

    columns(...names: string[]): ValuesList {
        return new ValuesList(this.rows, names, this.name);
    }

    get c(): Record<string, ColumnNode> {
        return createColumnProxy(this);
    }
}

const NULL = new RawNode('NULL');

// =============================================================================
// Helpers
// =============================================================================

/** Fold nodes left to right with AND / OR; a single node is returned as is */
export function reduceNodes(op: 'AND' | 'OR', nodes: readonly unknown[]): ASTNode {
    if (nodes.length === 0) throw new TypeError(`${op} needs at least one operand`);
    let result = wrapNode(nodes[0]);
    for (const node of nodes.slice(1)) {
        result = new BinaryNode(op, result, wrapNode(node));
    }
    return result;
}

/**
 * Column accessor for sources whose columns are only known by name
 * (subqueries, value lists): `subq.c.username`.
 */
export function createColumnProxy(source: Source): Record<string, ColumnNode> {
    const target: Record<string, ColumnNode> = {};
    return new Proxy(target, {
        get(_target, prop) {
            if (typeof prop !== 'string') return undefined;
            return new ColumnNode(source, prop);
        },
    });
}

/** Visit `node` and every node below it (subqueries are not entered) */
export function walkNodes(node: ASTNode, visit: (node: ASTNode) => void): void {
    visit(node);
    switch (node.type) {
        case 'binary':
            walkNodes(node.lhs, visit);
            walkNodes(node.rhs, visit);
            break;
        case 'unary':
            walkNodes(node.operand, visit);
            break;
        case 'function':
            node.args.forEach(arg => walkNodes(arg, visit));
            break;
        case 'tuple':
            node.items.forEach(item => walkNodes(item, visit));
            break;
        case 'composite-key':
            node.columns.forEach(col => walkNodes(col, visit));
            break;
        case 'alias':
        case 'ordering':
        case 'cast':
            walkNodes(node.node, visit);
            break;
        default:
            break;
    }
}

export type FunctionProxy = Record<string, (...args: unknown[]) => FunctionNode>;

/**
 * SQL function calls: `fn.COUNT(col)`, `fn.lower(col)`.
 * The property name is emitted verbatim.
 */
export const fn: FunctionProxy = new Proxy<FunctionProxy>({}, {
    get(_target, name) {
        if (typeof name !== 'string') return undefined;
        return (...args: unknown[]) => new FunctionNode(name, args.map(arg => wrapNode(arg)));
    },
});

/** Raw SQL fragment: `sql('1')`, `sql('date(?)', day)` */
export function sql(text: string, ...params: unknown[]): RawNode {
    return new RawNode(text, params);
}

/** A bound literal with an optional coercion hook */
export function literal(value: unknown, coerce: Coercer | null = null): ValueNode {
    return new ValueNode(value, coerce);
}

/** Literal row set: `values([[1, 'huey']], { columns: ['id', 'username'], alias: 'tmp' })` */
export function values(
    rows: readonly (readonly unknown[])[],
    options: { columns?: readonly string[]; alias?: string } = {},
): ValuesList {
    return new ValuesList(rows, options.columns ?? null, options.alias ?? null);
}

/** Functional operator helpers */
export const op = {
    and: (...nodes: unknown[]): ASTNode => reduceNodes('AND', nodes),
    or: (...nodes: unknown[]): ASTNode => reduceNodes('OR', nodes),
    not: (node: unknown): ASTNode => new UnaryNode('NOT', wrapNode(node)),
    neg: (node: unknown): ASTNode => new UnaryNode('-', wrapNode(node)),
    eq: (lhs: unknown, rhs: unknown): ASTNode => wrapNode(lhs).eq(rhs),
    ne: (lhs: unknown, rhs: unknown): ASTNode => wrapNode(lhs).ne(rhs),
    lt: (lhs: unknown, rhs: unknown): ASTNode => wrapNode(lhs).lt(rhs),
    lte: (lhs: unknown, rhs: unknown): ASTNode => wrapNode(lhs).lte(rhs),
    gt: (lhs: unknown, rhs: unknown): ASTNode => wrapNode(lhs).gt(rhs),
    gte: (lhs: unknown, rhs: unknown): ASTNode => wrapNode(lhs).gte(rhs),
    exists: (query: Query): ASTNode => new FunctionNode('EXISTS', [new SubqueryNode(query)]),
};
