/**
 * @module callable-values/values
 * Reference backend: a frozen positional array beside a Map of named members.
 */

import { type NamedInput, namedEntriesOf } from './arguments';
import { ValueRecord } from './record';
import { INVOKE } from './signature';

const EMPTY_NAMED: ReadonlyMap<string, unknown> = new Map();

export class PlainValues extends ValueRecord {
    readonly #positionals: ReadonlyArray<unknown>;
    // Absent rather than empty when there are no named members.
    readonly #named: ReadonlyMap<string, unknown> | null;

    constructor(positionals: ReadonlyArray<unknown> = [], named?: NamedInput) {
        super();
        this.#positionals = Object.freeze([...positionals]);
        const entries = namedEntriesOf(named);
        this.#named = entries.length > 0 ? new Map(entries) : null;
    }

    /** Lets `record.call(PlainValues)` rebuild a record from bound arguments. */
    static [INVOKE](positionals: ReadonlyArray<unknown>, named: ReadonlyMap<string, unknown>): PlainValues {
        return new PlainValues(positionals, named);
    }

    get length(): number { return this.#positionals.length; }
    get namedSize(): number { return this.#named === null ? 0 : this.#named.size; }

    toArray(): ReadonlyArray<unknown> { return this.#positionals; }

    entries(): IterableIterator<[string, unknown]> {
        return (this.#named ?? EMPTY_NAMED).entries();
    }

    toMap(): ReadonlyMap<string, unknown> { return new Map(this.#named ?? EMPTY_NAMED); }

    has(name: string): boolean {
        return this.#named !== null && this.#named.has(name);
    }

    protected item(index: number): unknown { return this.#positionals[index]; }

    protected named(name: string): unknown { return this.#named?.get(name); }
}
