/**
 * context.ts: Per-compile state: alias scopes and bound parameters
 *
 * One CompileContext lives for exactly one `compile()` call. Nothing here
 * is shared between compiles, so the same query can be compiled from
 * several places at once.
 */
import type { Source } from './ast';
import type { Dialect } from './dialect';
import type { ReturningPolicy } from './types';

/** Explicit name of a source, if it has one */
export function sourceName(source: Source): string | null {
    switch (source.sourceType) {
        case 'table': return null;
        case 'table-alias': return source.name;
        case 'query': return source.state.alias;
        case 'values': return source.name;
    }
}

/**
 * Alias allocation.
 *
 * A single counter numbers unnamed sources `t1`, `t2`, … in the order they
 * are first registered. Each nested SELECT pushes a scope; lookups search
 * the innermost scope first so correlated references resolve to the
 * enclosing query's alias.
 */
export class AliasContext {
    private counter = 0;
    private readonly scopes: Map<Source, string>[] = [new Map()];

    push(): void {
        this.scopes.push(new Map());
    }

    pop(): void {
        if (this.scopes.length === 1) throw new Error('AliasContext: cannot pop the root scope');
        this.scopes.pop();
    }

    private get current(): Map<Source, string> {
        return this.scopes[this.scopes.length - 1];
    }

    /** Register `source` in the current scope */
    add(source: Source): string {
        const existing = this.current.get(source);
        if (existing !== undefined) return existing;
        const alias = sourceName(source) ?? `t${++this.counter}`;
        this.current.set(source, alias);
        return alias;
    }

    /** Pin an alias, e.g. the bare table name of an UPDATE target */
    set(source: Source, alias: string): void {
        this.current.set(source, alias);
    }

    /** Alias of `source`, searching outward; registers it here if unseen */
    get(source: Source): string {
        for (let i = this.scopes.length - 1; i >= 0; i--) {
            const alias = this.scopes[i].get(source);
            if (alias !== undefined) return alias;
        }
        return this.add(source);
    }
}

export type CompileSettings = {
    returning: ReturningPolicy;
};

export class CompileContext {
    readonly params: unknown[] = [];
    aliases = new AliasContext();
    /** Whether column references carry their source alias */
    qualify = true;

    constructor(readonly dialect: Dialect, readonly settings: CompileSettings) {}

    /** Quote an identifier, doubling embedded quote characters */
    quote(name: string): string {
        const q = this.dialect.identifierQuote;
        return `${q}${name.split(q).join(q + q)}${q}`;
    }

    /** Bind a value, returning its placeholder */
    bind(value: unknown): string {
        this.params.push(value === undefined ? null : value);
        return this.dialect.paramStyle === 'numbered' ? `$${this.params.length}` : '?';
    }

    /** Splice raw SQL, renumbering its `?` placeholders for numbered dialects */
    raw(text: string, params: readonly unknown[]): string {
        if (this.dialect.paramStyle === 'qmark') {
            this.params.push(...params);
            return text;
        }
        let index = 0;
        return text.replace(/\?/g, () => {
            if (index >= params.length) return '?';
            return this.bind(params[index++]);
        });
    }

    /** Run `fn` inside a fresh alias context (numbering restarts at t1) */
    withAliases<T>(aliases: AliasContext, fn: () => T): T {
        const saved = this.aliases;
        this.aliases = aliases;
        try {
            return fn();
        } finally {
            this.aliases = saved;
        }
    }

    /** Run `fn` inside a new alias scope */
    scoped<T>(fn: () => T): T {
        this.aliases.push();
        const aliases = this.aliases;
        try {
            return fn();
        } finally {
            aliases.pop();
        }
    }

    withQualify<T>(qualify: boolean, fn: () => T): T {
        const saved = this.qualify;
        this.qualify = qualify;
        try {
            return fn();
        } finally {
            this.qualify = saved;
        }
    }
}
