/**
 * errors.ts: Error classes thrown while building or compiling queries
 */

export class QueryError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** A join without `on` matched zero or several foreign keys. */
export class JoinAmbiguityError extends QueryError {}

/** A join accessor collides with the relation's object-id accessor. */
export class AliasConflictError extends QueryError {}

/** An INSERT or UPDATE that would write nothing. */
export class InvalidMutationError extends QueryError {}

/** The schema cannot satisfy what was asked of it. */
export class SchemaConsistencyError extends QueryError {}

/** The dialect refuses a construct the query uses. */
export class CompilationPolicyError extends QueryError {}
