/**
 * @module callable-values/compact-values
 * "Compact Layout" backend.
 *
 * Architecture:
 * - `#slots`: one dense array, positionals first, named values after them.
 * - `#names`: names of the trailing slots, in insertion order.
 * - `#index`: open-addressing table (linear probing) over name hashes. It stores
 *   `nameIndex + 1`, so 0 marks an empty bucket.
 */

import { type NamedInput, namedEntriesOf } from './arguments';
import { hashString } from './hash';
import { ValueRecord } from './record';
import { INVOKE } from './signature';

const LOAD_FACTOR = 0.75;
const MIN_BUCKETS = 8;
const NO_INDEX = new Uint32Array(0);

export class CompactValues extends ValueRecord {
    readonly #slots: ReadonlyArray<unknown>;
    readonly #names: ReadonlyArray<string>;
    readonly #argc: number;
    readonly #index: Uint32Array;
    readonly #mask: number;

    // Built lazily; the dense slots are the source of truth.
    #positionals: ReadonlyArray<unknown> | null = null;

    constructor(positionals: ReadonlyArray<unknown> = [], named?: NamedInput) {
        super();
        const entries = namedEntriesOf(named);
        const slots = [...positionals];
        const names: string[] = [];
        for (const [name, value] of entries) {
            names.push(name);
            slots.push(value);
        }

        this.#argc = positionals.length;
        this.#slots = Object.freeze(slots);
        this.#names = Object.freeze(names);

        if (names.length === 0) {
            this.#index = NO_INDEX;
            this.#mask = 0;
            return;
        }

        let buckets = MIN_BUCKETS;
        while (buckets * LOAD_FACTOR < names.length) buckets <<= 1;
        this.#index = new Uint32Array(buckets);
        this.#mask = buckets - 1;

        for (let i = 0; i < names.length; i++) {
            let idx = hashString(names[i]) & this.#mask;
            while (this.#index[idx] !== 0) idx = (idx + 1) & this.#mask;
            this.#index[idx] = i + 1;
        }
    }

    /** Lets `record.call(CompactValues)` rebuild a record from bound arguments. */
    static [INVOKE](positionals: ReadonlyArray<unknown>, named: ReadonlyMap<string, unknown>): CompactValues {
        return new CompactValues(positionals, named);
    }

    get length(): number { return this.#argc; }
    get namedSize(): number { return this.#names.length; }

    toArray(): ReadonlyArray<unknown> {
        if (this.#positionals === null) {
            this.#positionals = this.#names.length === 0
                ? this.#slots
                : Object.freeze(this.#slots.slice(0, this.#argc));
        }
        return this.#positionals;
    }

    *entries(): IterableIterator<[string, unknown]> {
        const names = this.#names;
        for (let i = 0; i < names.length; i++) yield [names[i], this.#slots[this.#argc + i]];
    }

    toMap(): ReadonlyMap<string, unknown> {
        return new Map(this.entries());
    }

    has(name: string): boolean {
        return this.#find(name) !== -1;
    }

    protected item(index: number): unknown { return this.#slots[index]; }

    protected named(name: string): unknown {
        const i = this.#find(name);
        return i === -1 ? undefined : this.#slots[this.#argc + i];
    }

    /** Position of `name` in `#names`, or -1. */
    #find(name: string): number {
        if (this.#names.length === 0) return -1;
        let idx = hashString(name) & this.#mask;
        while (true) {
            const entry = this.#index[idx];
            if (entry === 0) return -1;
            const ptr = entry - 1;
            if (this.#names[ptr] === name) return ptr;
            idx = (idx + 1) & this.#mask;
        }
    }
}
