/**
 * @module callable-values/arguments
 * Positional/named argument plumbing. JavaScript has no keyword arguments, so a
 * trailing `kw({...})` marker carries them.
 */

/** Named input accepted by constructors and `kw`. */
export type NamedInput = Readonly<Record<string, unknown>> | ReadonlyMap<string, unknown>;

/** Frozen carrier for named arguments. Only meaningful as the last argument. */
export class Keywords {
    readonly #entries: ReadonlyMap<string, unknown>;

    constructor(named: NamedInput) {
        this.#entries = new Map(namedEntriesOf(named));
        Object.freeze(this);
    }

    /** A fresh copy on every read; the marker itself never changes. */
    get entries(): ReadonlyMap<string, unknown> { return new Map(this.#entries); }

    toString(): string {
        return `kw(${[...this.#entries.keys()].join(', ')})`;
    }
}

/** Wraps named arguments for `values(...)`, `record.call(...)` and `target.invoke(...)`. */
export function kw(named: NamedInput): Keywords {
    return new Keywords(named);
}

export interface SplitArguments {
    positionals: ReadonlyArray<unknown>;
    named: ReadonlyMap<string, unknown>;
}

const NO_NAMED: ReadonlyMap<string, unknown> = new Map();

/** Separates a trailing Keywords marker from the positional arguments. */
export function splitArguments(args: ReadonlyArray<unknown>): SplitArguments {
    const last = args.length > 0 ? args[args.length - 1] : undefined;
    if (last instanceof Keywords) {
        return { positionals: args.slice(0, -1), named: last.entries };
    }
    return { positionals: args, named: NO_NAMED };
}

export function namedEntriesOf(named: NamedInput | undefined): Array<[string, unknown]> {
    if (named === undefined) return [];
    if (isNamedMap(named)) return [...named.entries()];
    return Object.entries(named);
}

function isNamedMap(named: NamedInput): named is ReadonlyMap<string, unknown> {
    return named instanceof Map;
}
