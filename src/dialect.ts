/**
 * dialect.ts: Dialect capability flags and presets
 *
 * The compiler never branches on a dialect's name for anything a flag
 * can express; `name` only selects the keyword used for
 * INSERT-OR-IGNORE / INSERT-OR-REPLACE.
 */
import { z } from 'zod';
import { SchemaConsistencyError } from './errors';

export const DialectSchema = z.object({
    name: z.enum(['generic', 'sqlite', 'postgres', 'mysql']),
    supportsReturning: z.boolean(),
    supportsOnConflict: z.boolean(),
    parenthesizeCompoundBranches: z.boolean(),
    /** Whether unparenthesized compound branches may carry ORDER BY / LIMIT */
    compoundBranchOrdering: z.boolean(),
    identifierQuote: z.string().length(1),
    paramStyle: z.enum(['qmark', 'numbered']),
    /** Literal emitted as LIMIT when only OFFSET is set (null: no LIMIT) */
    limitMax: z.string().nullable(),
});

export type Dialect = Readonly<z.infer<typeof DialectSchema>>;
export type DialectName = Dialect['name'];

const generic: Dialect = {
    name: 'generic',
    supportsReturning: false,
    supportsOnConflict: true,
    parenthesizeCompoundBranches: false,
    compoundBranchOrdering: true,
    identifierQuote: '"',
    paramStyle: 'qmark',
    limitMax: null,
};

export const dialects: Readonly<Record<DialectName, Dialect>> = {
    generic,
    sqlite: {
        ...generic,
        name: 'sqlite',
        compoundBranchOrdering: false,
        limitMax: '-1',
    },
    postgres: {
        ...generic,
        name: 'postgres',
        supportsReturning: true,
        compoundBranchOrdering: false,
        paramStyle: 'numbered',
    },
    mysql: {
        ...generic,
        name: 'mysql',
        supportsOnConflict: false,
        parenthesizeCompoundBranches: true,
        identifierQuote: '`',
        limitMax: '18446744073709551615',
    },
};

/**
 * Build a dialect from a preset plus overrides.
 *
 * ```ts
 * const pg = defineDialect({ supportsReturning: true }, 'sqlite');
 * ```
 */
export function defineDialect(overrides: Partial<Dialect>, base: DialectName = 'generic'): Dialect {
    const result = DialectSchema.safeParse({ ...dialects[base], ...overrides });
    if (!result.success) {
        throw new SchemaConsistencyError(`Invalid dialect: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
    }
    return result.data;
}

export function resolveDialect(dialect: Dialect | DialectName | undefined): Dialect {
    if (dialect === undefined) return generic;
    return typeof dialect === 'string' ? dialects[dialect] : dialect;
}
