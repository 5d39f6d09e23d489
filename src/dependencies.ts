/**
 * dependencies.ts: Foreign-key dependency graph and cascading-delete plans
 *
 * ```ts
 * for (const { query } of planDelete(users, { id: 1 })) db.execute(query);
 * ```
 *
 * Every dependent table gets one DELETE whose predicate reaches the root
 * row through a chain of `fk IN (SELECT …)` subqueries. Statements come
 * leaf-first so that no statement removes rows another one still needs
 * to find; the root's own DELETE is always last. A self-referencing key
 * reaches one level: the root's direct children, or the rows pointing at
 * a dependent's matches.
 */
import { ColumnNode, reduceNodes } from './ast';
import type { ASTNode } from './ast';
import { SchemaConsistencyError } from './errors';
import type { DeleteQuery } from './query';
import type { Field, ForeignKey, Table } from './schema';

export type DependencyEdge = {
    /** Table holding the foreign key */
    readonly dependent: Table;
    readonly foreignKey: ForeignKey;
    /** Table the key points at */
    readonly target: Table;
};

export type DependencyGraph = {
    readonly root: Table;
    /** Dependent tables in discovery (breadth-first) order, root excluded */
    readonly tables: readonly Table[];
    readonly depth: ReadonlyMap<Table, number>;
    readonly edges: readonly DependencyEdge[];
};

export type PlannedDelete = {
    readonly table: Table;
    readonly query: DeleteQuery;
    /** Distance from the root; 0 for the root's own statement */
    readonly depth: number;
};

/**
 * Walk incoming foreign keys breadth-first from `root`. Each table is
 * visited once; self-referencing keys are recorded but not followed.
 */
export function dependencyGraph(root: Table): DependencyGraph {
    const tables: Table[] = [];
    const depth = new Map<Table, number>([[root, 0]]);
    const edges: DependencyEdge[] = [];
    const queue: Table[] = [root];

    for (let current = queue.shift(); current; current = queue.shift()) {
        const currentDepth = depth.get(current) ?? 0;
        for (const fk of current.backrefs) {
            const dependent = fk.table;
            edges.push({ dependent, foreignKey: fk, target: current });
            if (depth.has(dependent)) continue;
            depth.set(dependent, currentDepth + 1);
            tables.push(dependent);
            queue.push(dependent);
        }
    }

    return { root, tables, depth, edges };
}

/** Edges reachable from `table` */
export function dependencyEdges(table: Table): DependencyEdge[] {
    return [...dependencyGraph(table).edges];
}

function column(field: Field): ColumnNode {
    return new ColumnNode(field.table, field.name, field);
}

function selfKeys(table: Table): ForeignKey[] {
    return table.foreignKeys.filter(fk => fk.target === table);
}

class DeletePlanner {
    private readonly dependents: Set<Table>;
    /** Rows of the root table whose self-referencing key points at the root row */
    readonly rootChildren: ASTNode | null;

    constructor(
        private readonly graph: DependencyGraph,
        private readonly row: Readonly<Record<string, unknown>>,
    ) {
        this.dependents = new Set(graph.tables);
        const children = selfKeys(graph.root).map(fk => column(fk.field).eq(this.rootValue(fk.targetField)));
        this.rootChildren = children.length > 0 ? reduceNodes('OR', children) : null;
    }

    rootValue(field: Field): unknown {
        if (!(field.name in this.row) || this.row[field.name] === undefined) {
            throw new SchemaConsistencyError(`Cannot plan delete from "${this.graph.root.name}": row has no "${field.name}"`);
        }
        return this.row[field.name];
    }

    /**
     * Rows of `table` that depend on the root row. Keys pointing at tables
     * already on `path` are skipped, which keeps cyclic schemas finite.
     * A self-referencing key adds the rows pointing at those matches.
     */
    predicate(table: Table, path: ReadonlySet<Table>): ASTNode | null {
        const root = this.graph.root;
        const parts: ASTNode[] = [];
        for (const fk of table.foreignKeys) {
            const target = fk.target;
            if (target === table) continue;
            if (target === root) {
                parts.push(column(fk.field).eq(this.rootValue(fk.targetField)));
                if (this.rootChildren) {
                    parts.push(column(fk.field).in(root.select(column(fk.targetField)).where(this.rootChildren)));
                }
            } else if (this.dependents.has(target) && !path.has(target)) {
                const inner = this.predicate(target, new Set([...path, target]));
                if (!inner) continue;
                parts.push(column(fk.field).in(target.select(column(fk.targetField)).where(inner)));
            }
        }
        if (parts.length === 0) return null;

        const direct = reduceNodes('OR', parts);
        for (const fk of selfKeys(table)) {
            parts.push(column(fk.field).in(table.select(column(fk.targetField)).where(direct)));
        }
        return reduceNodes('OR', parts);
    }

    /**
     * Leaf-to-root order: a table is ready once every other dependent table
     * referencing it has been emitted. Ready tables go deepest first, then
     * in discovery order; a cycle is broken by the deepest remaining table.
     */
    order(): Table[] {
        const { tables, depth } = this.graph;
        const rank = (table: Table): [number, number] => [depth.get(table) ?? 0, tables.indexOf(table)];
        const referrers = new Map<Table, Set<Table>>();
        for (const table of tables) referrers.set(table, new Set());
        for (const edge of this.graph.edges) {
            if (edge.dependent !== edge.target && this.dependents.has(edge.target)) {
                referrers.get(edge.target)?.add(edge.dependent);
            }
        }

        const ordered: Table[] = [];
        const remaining = [...tables];
        const pick = (candidates: Table[]): Table => candidates.reduce((best, table) => {
            const [bestDepth, bestIndex] = rank(best);
            const [tableDepth, tableIndex] = rank(table);
            return tableDepth > bestDepth || (tableDepth === bestDepth && tableIndex < bestIndex) ? table : best;
        });

        while (remaining.length > 0) {
            const ready = remaining.filter(table => {
                const refs = referrers.get(table);
                return !refs || [...refs].every(ref => ordered.includes(ref));
            });
            const next = pick(ready.length > 0 ? ready : remaining);
            ordered.push(next);
            remaining.splice(remaining.indexOf(next), 1);
        }
        return ordered;
    }
}

/**
 * Plan the DELETE statements removing `row` of `table` and everything that
 * depends on it. `row` must carry every field a foreign key points at
 * (normally the primary key).
 */
export function planDelete(table: Table, row: Readonly<Record<string, unknown>>): PlannedDelete[] {
    if (table.primaryKey.length === 0) {
        throw new SchemaConsistencyError(`Cannot delete from "${table.name}" by row: it has no primary key`);
    }
    const graph = dependencyGraph(table);
    const planner = new DeletePlanner(graph, row);
    const plan: PlannedDelete[] = [];

    for (const dependent of planner.order()) {
        const predicate = planner.predicate(dependent, new Set([dependent]));
        if (!predicate) continue;
        plan.push({ table: dependent, query: dependent.delete().where(predicate), depth: graph.depth.get(dependent) ?? 0 });
    }
    if (planner.rootChildren) {
        plan.push({ table, query: table.delete().where(planner.rootChildren), depth: 1 });
    }

    const key = table.primaryKey.map(field => column(field).eq(planner.rootValue(field)));
    plan.push({ table, query: table.delete().where(reduceNodes('AND', key)), depth: 0 });
    return plan;
}
