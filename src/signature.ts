/**
 * @module callable-values/signature
 * Declared parameter lists and the binding of positional/named arguments to them.
 *
 * Binding order:
 * 1. Positionals fill positional parameters left to right; surplus goes to `rest`.
 * 2. Named entries bind by parameter name; leftovers go to `keywords`.
 * 3. Unbound parameters take their default or are reported missing.
 */

import { type NamedInput, namedEntriesOf, splitArguments } from './arguments';
import { InvalidSignatureError, SignatureMismatchError } from './errors';

// ============================================================================
// 1. INVOCABLE PROTOCOL
// ============================================================================

/** Method key through which records hand merged arguments to a target. */
export const INVOKE: unique symbol = Symbol('callable-values.invoke');

export interface Invocable<R> {
    [INVOKE](positionals: ReadonlyArray<unknown>, named: ReadonlyMap<string, unknown>): R;
}

export function isInvocable(v: unknown): v is Invocable<unknown> {
    return (typeof v === 'object' || typeof v === 'function') && v !== null
        && INVOKE in v && typeof v[INVOKE] === 'function';
}

// ============================================================================
// 2. PARAMETERS
// ============================================================================

export type Parameter =
    | { readonly kind: 'positional'; readonly name: string }
    | { readonly kind: 'optional'; readonly name: string; readonly default: unknown }
    | { readonly kind: 'rest'; readonly name: string }
    | { readonly kind: 'keywords'; readonly name: string };

/** Required parameter, fillable by position or by name. */
export function param(name: string): Parameter {
    return { kind: 'positional', name };
}

export function optional(name: string, defaultValue: unknown): Parameter {
    return { kind: 'optional', name, default: defaultValue };
}

/** Collects surplus positionals; parameters declared after it are keyword-only. */
export function rest(name: string): Parameter {
    return { kind: 'rest', name };
}

/** Collects named arguments that match no parameter. Must be last. */
export function keywords(name: string): Parameter {
    return { kind: 'keywords', name };
}

/** Bound argument object handed to a target implementation, keyed by parameter name. */
export type BoundArguments = Readonly<Record<string, unknown>>;

type NamedParameter = Extract<Parameter, { kind: 'positional' | 'optional' }>;

// ============================================================================
// 3. SIGNATURE
// ============================================================================

export class Signature {
    readonly name: string;
    readonly parameters: ReadonlyArray<Parameter>;

    // Parameters fillable by position, in order.
    readonly #positional: NamedParameter[] = [];
    // Parameters after `rest`.
    readonly #keywordOnly: NamedParameter[] = [];
    readonly #rest: string | undefined;
    readonly #keywords: string | undefined;

    constructor(parameters: ReadonlyArray<Parameter>, name = 'target') {
        this.name = name;
        this.parameters = Object.freeze([...parameters]);

        const seen = new Set<string>();
        let restName: string | undefined;
        let keywordsName: string | undefined;
        let sawOptional = false;

        for (const p of parameters) {
            if (seen.has(p.name)) {
                throw new InvalidSignatureError(`duplicate parameter '${p.name}' in ${name}()`);
            }
            seen.add(p.name);
            if (keywordsName !== undefined) {
                throw new InvalidSignatureError(`parameter '${p.name}' follows keywords collector '${keywordsName}'`);
            }

            switch (p.kind) {
                case 'rest':
                    if (restName !== undefined) {
                        throw new InvalidSignatureError(`${name}() declares more than one rest parameter`);
                    }
                    restName = p.name;
                    break;
                case 'keywords':
                    keywordsName = p.name;
                    break;
                case 'optional':
                    sawOptional = true;
                    (restName === undefined ? this.#positional : this.#keywordOnly).push(p);
                    break;
                case 'positional':
                    if (restName === undefined) {
                        if (sawOptional) {
                            throw new InvalidSignatureError(`required parameter '${p.name}' follows an optional one`);
                        }
                        this.#positional.push(p);
                    } else {
                        this.#keywordOnly.push(p);
                    }
                    break;
            }
        }

        this.#rest = restName;
        this.#keywords = keywordsName;
    }

    /**
     * Binds arguments to the declared parameters.
     * @throws SignatureMismatchError on surplus positionals, unexpected or duplicated
     * names, and missing required parameters.
     */
    bind(positionals: ReadonlyArray<unknown>, named: ReadonlyMap<string, unknown>): BoundArguments {
        const bound = new Map<string, unknown>();
        const positional = this.#positional;

        if (positionals.length > positional.length && this.#rest === undefined) {
            throw new SignatureMismatchError(
                `${this.name}() takes ${positional.length} positional argument${positional.length === 1 ? '' : 's'}`
                + ` but ${positionals.length} ${positionals.length === 1 ? 'was' : 'were'} given`,
            );
        }

        const filled = Math.min(positionals.length, positional.length);
        for (let i = 0; i < filled; i++) bound.set(positional[i].name, positionals[i]);

        const collected: Array<[string, unknown]> = [];
        for (const [key, value] of named) {
            const target = this.#lookup(key);
            if (target === undefined) {
                if (this.#keywords === undefined) {
                    throw new SignatureMismatchError(`${this.name}() got an unexpected keyword argument '${key}'`);
                }
                collected.push([key, value]);
            } else if (bound.has(target.name)) {
                throw new SignatureMismatchError(`${this.name}() got multiple values for argument '${key}'`);
            } else {
                bound.set(target.name, value);
            }
        }

        const missing: string[] = [];
        const entries: Array<[string, unknown]> = [];
        for (const p of this.parameters) {
            switch (p.kind) {
                case 'rest':
                    entries.push([p.name, Object.freeze(positionals.slice(filled))]);
                    break;
                case 'keywords':
                    entries.push([p.name, Object.fromEntries(collected)]);
                    break;
                case 'optional':
                    entries.push([p.name, bound.has(p.name) ? bound.get(p.name) : p.default]);
                    break;
                case 'positional':
                    if (bound.has(p.name)) entries.push([p.name, bound.get(p.name)]);
                    else missing.push(`'${p.name}'`);
                    break;
            }
        }

        if (missing.length > 0) {
            throw new SignatureMismatchError(
                `${this.name}() missing ${missing.length} required argument${missing.length === 1 ? '' : 's'}: `
                + missing.join(', '),
            );
        }
        return Object.freeze(Object.fromEntries(entries));
    }

    #lookup(name: string): NamedParameter | undefined {
        return this.#positional.find(p => p.name === name) ?? this.#keywordOnly.find(p => p.name === name);
    }

    toString(): string {
        const parts = this.parameters.map(p => {
            switch (p.kind) {
                case 'rest': return `...${p.name}`;
                case 'keywords': return `**${p.name}`;
                case 'optional': return `${p.name}=`;
                case 'positional': return p.name;
            }
        });
        return `${this.name}(${parts.join(', ')})`;
    }
}

// ============================================================================
// 4. DEFINED TARGETS
// ============================================================================

/** An implementation paired with a Signature; the usual target of `record.call`. */
export class DefinedTarget<R> implements Invocable<R> {
    readonly signature: Signature;
    readonly #impl: (args: BoundArguments) => R;

    constructor(signature: Signature, impl: (args: BoundArguments) => R) {
        this.signature = signature;
        this.#impl = impl;
    }

    get name(): string { return this.signature.name; }

    [INVOKE](positionals: ReadonlyArray<unknown>, named: ReadonlyMap<string, unknown>): R {
        return this.#impl(this.signature.bind(positionals, named));
    }

    /** Direct call; a trailing `kw({...})` supplies named arguments. */
    invoke(...args: unknown[]): R {
        const { positionals, named } = splitArguments(args);
        return this[INVOKE](positionals, named);
    }

    /** Same as `invoke`, taking the two argument groups separately. */
    apply(positionals: ReadonlyArray<unknown>, named?: NamedInput): R {
        return this[INVOKE](positionals, new Map(namedEntriesOf(named)));
    }
}

/**
 * Declares a target.
 * @example
 * const gather = defineTarget([param('a'), param('b'), optional('c', 0)], ({ a, b, c }) => [a, b, c]);
 */
export function defineTarget<R>(
    parameters: ReadonlyArray<Parameter>,
    impl: (args: BoundArguments) => R,
    name: string = impl.name || 'target',
): DefinedTarget<R> {
    return new DefinedTarget(new Signature(parameters, name), impl);
}
