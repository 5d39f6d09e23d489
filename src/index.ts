/**
 * relquery: Composable queries over zod-described schemas, compiled to
 * parameterized SQL.
 *
 * @module relquery
 */
export { Database } from './database';
export type { DatabaseOptions } from './database';
export { SqliteDriver } from './driver';
export type { Driver } from './driver';

export type {
    SchemaMap, SchemaOptions, RelationSpec, RelationsConfig, IndexDef,
    Coercer, Row, CompiledQuery, JoinKind, CompoundOperator, OrderDirection,
    NullsOrder, ReturningPolicy,
} from './types';

export { z } from 'zod';

export {
    defineSchema, coercerFor, transformValueForStorage,
    Schema, Table, TableAlias, Field, ForeignKey,
} from './schema';
export type { Relation } from './schema';

export {
    Node, ColumnNode, ValueNode, FunctionNode, BinaryNode, UnaryNode, OrderingNode,
    AliasNode, SubqueryNode, RawNode, TupleNode, CastNode, CompositeKeyNode, ValuesList,
    fn, op, sql, literal, values, wrapNode, reduceNodes, isNode, isQuery,
} from './ast';
export type { ASTNode, Source, FunctionProxy } from './ast';

export {
    SelectQuery, CompoundSelectQuery, InsertQuery, UpdateQuery, DeleteQuery, IndexQuery, RawQuery,
    select, rawQuery,
} from './query';
export type {
    Query, Selectable, SelectLike, SelectState, CompoundState, InsertState, UpdateState,
    DeleteState, IndexState, InsertValues, OnConflictOptions, IndexOptions, JoinOptions,
} from './query';

export type { JoinStep } from './join';
export { dq, DQ, parseLookup, LOOKUP_OPERATORS } from './filter';
export type { Lookups, LookupOperator, FilterInput } from './filter';

export { compile } from './compiler';
export type { CompileOptions } from './compiler';
export { dialects, defineDialect } from './dialect';
export type { Dialect, DialectName } from './dialect';

export { dependencyGraph, dependencyEdges, planDelete } from './dependencies';
export type { DependencyEdge, DependencyGraph, PlannedDelete } from './dependencies';

export {
    QueryError, JoinAmbiguityError, AliasConflictError, InvalidMutationError,
    SchemaConsistencyError, CompilationPolicyError,
} from './errors';
