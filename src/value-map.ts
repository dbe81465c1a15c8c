/**
 * @module callable-values/value-map
 * Hash map keyed by value equality rather than identity.
 *
 * Architecture: **Structure of Arrays (SoA)**
 * - `#keys`, `#vals`, `#hashes`: dense parallel arrays, iteration in insertion
 *   order until a deletion swaps the last entry into the gap.
 * - `#indices`: sparse open-addressing table (linear probing) storing the dense
 *   position + 1, so 0 marks an empty bucket.
 *
 * A record, the frozen array of its positionals and an equal record from another
 * backend all reach the same entry.
 */

import { hashValue, valuesEqual } from './hash';

const LOAD_FACTOR = 0.75;
const MIN_BUCKETS = 16;

export class ValueMap<K, V> implements Iterable<[K, V]> {
    #keys: K[] = [];
    #vals: V[] = [];
    #hashes: number[] = [];

    #indices: Uint32Array;
    #bucketCount = MIN_BUCKETS;
    #mask = MIN_BUCKETS - 1;

    constructor(entries?: Iterable<readonly [K, V]>) {
        this.#indices = new Uint32Array(MIN_BUCKETS);
        if (entries !== undefined) {
            for (const [key, value] of entries) this.set(key, value);
        }
    }

    get size(): number { return this.#keys.length; }
    isEmpty(): boolean { return this.#keys.length === 0; }

    ensureCapacity(capacity: number): void {
        if (capacity <= this.#bucketCount * LOAD_FACTOR) return;

        let target = this.#bucketCount;
        while (target * LOAD_FACTOR < capacity) target *= 2;

        this.#bucketCount = target;
        this.#mask = target - 1;

        // Only the lookup table is rebuilt; dense arrays stay where they are.
        this.#indices = new Uint32Array(target);
        for (let i = 0; i < this.#hashes.length; i++) {
            let idx = this.#hashes[i] & this.#mask;
            while (this.#indices[idx] !== 0) idx = (idx + 1) & this.#mask;
            this.#indices[idx] = i + 1;
        }
    }

    /**
     * Bucket holding `key`, or -1.
     * @throws UnhashableValueError when `key` cannot be hashed.
     */
    #locate(key: K, h: number): number {
        let idx = h & this.#mask;
        while (true) {
            const entry = this.#indices[idx];
            if (entry === 0) return -1;
            const ptr = entry - 1;
            if (this.#hashes[ptr] === h && valuesEqual(this.#keys[ptr], key)) return idx;
            idx = (idx + 1) & this.#mask;
        }
    }

    /**
     * Associates `value` with `key`, replacing the value of an equal key.
     * @complexity Amortized O(1).
     */
    set(key: K, value: V): this {
        const h = hashValue(key);
        const found = this.#locate(key, h);
        if (found !== -1) {
            this.#vals[this.#indices[found] - 1] = value;
            return this;
        }

        this.ensureCapacity(this.#keys.length + 1);
        let idx = h & this.#mask;
        while (this.#indices[idx] !== 0) idx = (idx + 1) & this.#mask;

        this.#hashes.push(h);
        this.#keys.push(key);
        this.#vals.push(value);
        this.#indices[idx] = this.#keys.length;
        return this;
    }

    get(key: K): V | undefined {
        const idx = this.#locate(key, hashValue(key));
        return idx === -1 ? undefined : this.#vals[this.#indices[idx] - 1];
    }

    has(key: K): boolean {
        return this.#locate(key, hashValue(key)) !== -1;
    }

    /**
     * Removes a key with "Swap & Pop": the last entry of every parallel array moves
     * into the gap so the arrays stay dense.
     * @complexity O(1)
     */
    delete(key: K): boolean {
        const h = hashValue(key);
        const idx = this.#locate(key, h);
        if (idx === -1) return false;

        const ptr = this.#indices[idx] - 1;
        this.#removeIndex(idx);

        const last = this.#keys.length - 1;
        if (ptr < last) {
            this.#keys[ptr] = this.#keys[last];
            this.#vals[ptr] = this.#vals[last];
            this.#hashes[ptr] = this.#hashes[last];
            this.#updateIndex(this.#hashes[last], last + 1, ptr + 1);
        }
        this.#keys.pop();
        this.#vals.pop();
        this.#hashes.pop();
        return true;
    }

    clear(): void {
        this.#keys = [];
        this.#vals = [];
        this.#hashes = [];
        this.#bucketCount = MIN_BUCKETS;
        this.#mask = MIN_BUCKETS - 1;
        this.#indices = new Uint32Array(MIN_BUCKETS);
    }

    /** Repoints the bucket of an entry that moved in the dense arrays. */
    #updateIndex(hash: number, oldLoc: number, newLoc: number): void {
        let idx = hash & this.#mask;
        while (this.#indices[idx] !== oldLoc) idx = (idx + 1) & this.#mask;
        this.#indices[idx] = newLoc;
    }

    /**
     * Clears a bucket and shifts later members of the probe chain back into the hole
     * when that brings them closer to their ideal bucket.
     */
    #removeIndex(holeIdx: number): void {
        let i = (holeIdx + 1) & this.#mask;
        while (this.#indices[i] !== 0) {
            const entry = this.#indices[i];
            const ideal = this.#hashes[entry - 1] & this.#mask;
            const distHole = (holeIdx - ideal + this.#bucketCount) & this.#mask;
            const distI = (i - ideal + this.#bucketCount) & this.#mask;

            if (distHole < distI) {
                this.#indices[holeIdx] = entry;
                holeIdx = i;
            }
            i = (i + 1) & this.#mask;
        }
        this.#indices[holeIdx] = 0;
    }

    *keys(): IterableIterator<K> {
        for (let i = 0; i < this.#keys.length; i++) yield this.#keys[i];
    }

    *values(): IterableIterator<V> {
        for (let i = 0; i < this.#vals.length; i++) yield this.#vals[i];
    }

    *entries(): IterableIterator<[K, V]> {
        for (let i = 0; i < this.#keys.length; i++) yield [this.#keys[i], this.#vals[i]];
    }

    [Symbol.iterator](): Iterator<[K, V]> { return this.entries(); }

    toString(): string { return `ValueMap{${this.size}}`; }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
