/**
 * @module callable-values/record
 * The ValueRecord contract: an immutable positional sequence fused with a named
 * mapping, hashable, comparable and invocable.
 *
 * Backends only decide storage. Equality, hashing, subscript resolution,
 * invocation and the textual form live here so every backend behaves the same.
 */

import { inspect } from 'node:util';
import { splitArguments } from './arguments';
import { IndexOutOfRangeError, KeyNotFoundError, SignatureMismatchError } from './errors';
import {
    combineHashes,
    hashEntries,
    hashSequence,
    isMapping,
    mappingLookup,
    mappingSize,
    sequencesEqual,
    type Structural,
    valuesEqual,
} from './hash';
import { INVOKE, type Invocable, isInvocable } from './signature';

export abstract class ValueRecord implements Structural, Iterable<unknown> {
    #hashed: number | undefined = undefined;

    /** Number of positional members. */
    abstract get length(): number;

    /** Number of named members. */
    abstract get namedSize(): number;

    /** Positional members as a frozen array. */
    abstract toArray(): ReadonlyArray<unknown>;

    /** Named members in insertion order. */
    abstract entries(): IterableIterator<[string, unknown]>;

    abstract has(name: string): boolean;

    /** Positional member at an already validated, non-negative index. */
    protected abstract item(index: number): unknown;

    /** Named member for a name `has` has confirmed. */
    protected abstract named(name: string): unknown;

    /** Named members as a new map; changing it leaves the record untouched. */
    abstract toMap(): ReadonlyMap<string, unknown>;

    // ------------------------------------------------------------------------
    // Views
    // ------------------------------------------------------------------------

    isEmpty(): boolean {
        return this.length === 0 && this.namedSize === 0;
    }

    /**
     * Integer keys read positionals (negative counts from the end); any other key
     * reads the named mapping.
     */
    get(key: number | string): unknown {
        if (typeof key === 'number' && Number.isInteger(key)) {
            const len = this.length;
            const index = key < 0 ? key + len : key;
            if (index < 0 || index >= len) throw new IndexOutOfRangeError(key, len);
            return this.item(index);
        }
        const name = String(key);
        if (!this.has(name)) throw new KeyNotFoundError(name);
        return this.named(name);
    }

    /** Range-style access over the positionals, clamped like `Array.prototype.slice`. */
    slice(start?: number, end?: number): ReadonlyArray<unknown> {
        return Object.freeze(this.toArray().slice(start, end));
    }

    *keys(): IterableIterator<string> {
        for (const [key] of this.entries()) yield key;
    }

    [Symbol.iterator](): Iterator<unknown> {
        return this.toArray()[Symbol.iterator]();
    }

    toObject(): Record<string, unknown> {
        return Object.fromEntries(this.entries());
    }

    // ------------------------------------------------------------------------
    // Hashing
    // ------------------------------------------------------------------------

    /**
     * Memoized hash. Without named members it equals `hashValue(this.toArray())`.
     * @throws UnhashableValueError when a positional or named member is unhashable.
     */
    get hashCode(): number {
        if (this.#hashed !== undefined) return this.#hashed;

        let h = hashSequence(this.toArray());
        if (this.namedSize > 0) h = combineHashes(h, hashEntries(this.entries()));

        this.#hashed = h;
        return h;
    }

    // ------------------------------------------------------------------------
    // Equality
    // ------------------------------------------------------------------------

    /**
     * Records compare by shape and members; arrays only against records without
     * named members; mappings only against records without positionals.
     */
    equals(other: unknown): boolean {
        if (this === other) return true;

        if (other instanceof ValueRecord) {
            if (this.#hashed !== undefined && other.#hashed !== undefined && this.#hashed !== other.#hashed) {
                return false;
            }
            if (this.length !== other.length || this.namedSize !== other.namedSize) return false;

            // Named first: size already matched, so a key miss settles it cheaply.
            for (const [key, value] of this.entries()) {
                if (!other.has(key) || !valuesEqual(value, other.named(key))) return false;
            }
            return sequencesEqual(this.toArray(), other.toArray());
        }

        if (Array.isArray(other)) {
            return this.namedSize === 0 && sequencesEqual(this.toArray(), other);
        }

        if (isMapping(other)) {
            if (this.length !== 0) return false;
            let size = 0;
            for (const [key, value] of this.entries()) {
                const found = mappingLookup(other, key);
                if (!found.found || !valuesEqual(value, found.value)) return false;
                size++;
            }
            return size === mappingSize(other);
        }

        return false;
    }

    notEquals(other: unknown): boolean {
        return !this.equals(other);
    }

    // ------------------------------------------------------------------------
    // Invocation
    // ------------------------------------------------------------------------

    /**
     * Applies the members to `target`.
     *
     * Extra positionals are only accepted when the record carries none. Extra named
     * arguments (a trailing `kw({...})`) are merged over the record's own, extras
     * winning.
     * @throws SignatureMismatchError when no target is given, when it is not callable,
     * or when the merged arguments do not fit it.
     */
    call<R>(target: Invocable<R>, ...extra: unknown[]): R;
    call<F extends (...args: never[]) => unknown>(target: F, ...extra: unknown[]): ReturnType<F>;
    call(target?: unknown, ...extra: unknown[]): unknown;
    call(target?: unknown, ...extra: unknown[]): unknown {
        if (target === undefined) {
            throw new SignatureMismatchError(
                'values objects must be called with at least one argument, the function to apply',
            );
        }

        const { positionals: extraPositionals, named: extraNamed } = splitArguments(extra);

        let positionals = this.toArray();
        if (extraPositionals.length > 0) {
            if (positionals.length > 0) {
                throw new SignatureMismatchError(
                    `positional arguments cannot be added to ${this.toString()}, which already carries ${positionals.length}`,
                );
            }
            positionals = extraPositionals;
        }

        // Always a fresh map: targets receive it and may hold on to it.
        const named = new Map(this.entries());
        for (const [key, value] of extraNamed) named.set(key, value);

        if (isInvocable(target)) return target[INVOKE](positionals, named);

        if (typeof target !== 'function') {
            throw new SignatureMismatchError(`'${typeof target}' object is not callable`);
        }
        const args = named.size > 0 ? [...positionals, Object.fromEntries(named)] : positionals;
        return Reflect.apply(target, undefined, args);
    }

    // ------------------------------------------------------------------------
    // Display
    // ------------------------------------------------------------------------

    toString(): string {
        const members = this.toArray().map(v => inspect(v));
        for (const [key, value] of this.entries()) members.push(`${key}=${inspect(value)}`);
        return `values(${members.join(', ')})`;
    }

    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
