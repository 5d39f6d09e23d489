/**
 * join.ts: Join steps and foreign-key join resolution
 */
import { ColumnNode, walkNodes } from './ast';
import type { ASTNode, Source } from './ast';
import { AliasConflictError, JoinAmbiguityError } from './errors';
import { sourceName } from './context';
import type { Field, ForeignKey, Table } from './schema';
import type { JoinKind } from './types';

export type JoinStep = {
    readonly from: Source;
    readonly dest: Source;
    readonly kind: JoinKind;
    /** Null only for CROSS joins */
    readonly on: ASTNode | null;
    /** Name the joined relation is reachable under (filters, row assembly) */
    readonly accessor: string;
    readonly foreignKey: ForeignKey | null;
};

/** The table behind a source, if it is one */
export function sourceTable(source: Source): Table | null {
    if (source.sourceType === 'table') return source;
    if (source.sourceType === 'table-alias') return source.table;
    return null;
}

function columnOf(source: Source, field: Field): ColumnNode {
    return new ColumnNode(source, field.name, field);
}

/** Forward FKs from `from` to `dest`, then backward ones; each FK once */
export function candidateForeignKeys(from: Table, dest: Table): ForeignKey[] {
    const found: ForeignKey[] = [];
    for (const fk of from.foreignKeys) {
        if (fk.target === dest) found.push(fk);
    }
    for (const fk of dest.foreignKeys) {
        if (fk.target === from && !found.includes(fk)) found.push(fk);
    }
    return found;
}

/**
 * Join predicate for `fk`, with the referencing column on the left.
 * Forward (`from` holds the FK): `from.fk = dest.target`.
 * Backward (`dest` holds the FK): `dest.fk = from.target`.
 */
export function foreignKeyPredicate(from: Source, dest: Source, fk: ForeignKey, forward: boolean): ASTNode {
    if (forward) return columnOf(from, fk.field).eq(columnOf(dest, fk.targetField));
    return columnOf(dest, fk.field).eq(columnOf(from, fk.targetField));
}

/** Self-referential keys always resolve forward */
function isForward(from: Source, fk: ForeignKey): boolean {
    return sourceTable(from) === fk.table;
}

function accessorFor(from: Source, dest: Source, fk: ForeignKey | null): string {
    if (fk) return isForward(from, fk) ? fk.name : fk.backref;
    const destTable = sourceTable(dest);
    return sourceName(dest) ?? destTable?.name ?? 'subquery';
}

/** FKs between the two tables whose columns appear in `on` */
function foreignKeysIn(on: ASTNode, fromTable: Table | null, destTable: Table | null): ForeignKey[] {
    const found: ForeignKey[] = [];
    walkNodes(on, node => {
        if (node.type !== 'column' || !node.field) return;
        const fk = node.field.foreignKey;
        if (!fk || found.includes(fk)) return;
        const tables = [fk.table, fk.target];
        if (fromTable && destTable && tables.includes(fromTable) && tables.includes(destTable)) found.push(fk);
    });
    return found;
}

/**
 * Build a join step from the cursor `from` to `dest`.
 *
 * Without `on`, exactly one FK must link the two tables. An `on` wrapped in
 * `alias(name)` names the join's accessor; the name may not be the
 * object-id accessor of the FK the join follows.
 */
export function resolveJoin(from: Source, dest: Source, kind: JoinKind, on: ASTNode | null): JoinStep {
    if (kind === 'CROSS') {
        return { from, dest, kind, on: null, accessor: accessorFor(from, dest, null), foreignKey: null };
    }

    const fromTable = sourceTable(from);
    const destTable = sourceTable(dest);

    if (!on) {
        if (!fromTable || !destTable) {
            throw new JoinAmbiguityError('Cannot infer a join condition for a subquery or value list; pass `on`');
        }
        const fks = candidateForeignKeys(fromTable, destTable);
        if (fks.length !== 1) {
            throw new JoinAmbiguityError(fks.length === 0
                ? `No foreign key between "${fromTable.name}" and "${destTable.name}"`
                : `${fks.length} foreign keys between "${fromTable.name}" and "${destTable.name}" (${fks.map(fk => fk.name).join(', ')}); pass \`on\``);
        }
        const fk = fks[0];
        return { from, dest, kind, on: foreignKeyPredicate(from, dest, fk, isForward(from, fk)), accessor: accessorFor(from, dest, fk), foreignKey: fk };
    }

    let predicate = on;
    let explicitAccessor: string | null = null;
    if (on.type === 'alias') {
        predicate = on.node;
        explicitAccessor = on.name;
    }

    const inOn = foreignKeysIn(predicate, fromTable, destTable);
    let fk: ForeignKey | null = inOn.length === 1 ? inOn[0] : null;
    if (!fk && inOn.length === 0 && fromTable && destTable) {
        const candidates = candidateForeignKeys(fromTable, destTable);
        if (candidates.length === 1) fk = candidates[0];
    }

    if (explicitAccessor !== null) {
        const conflict = (fk ? [fk] : inOn).find(k => k.objectIdName === explicitAccessor);
        if (conflict) {
            throw new AliasConflictError(`Join alias "${explicitAccessor}" is the object-id accessor of ${conflict.table.name}.${conflict.name}`);
        }
    }

    return {
        from,
        dest,
        kind,
        on: predicate,
        accessor: explicitAccessor ?? accessorFor(from, dest, fk),
        foreignKey: fk,
    };
}
