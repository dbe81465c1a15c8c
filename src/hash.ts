/**
 * @module callable-values/hash
 * Hashing and value-equality engine shared by both record backends and ValueMap.
 *
 * Contract:
 * - `valuesEqual(a, b)` implies `hashValue(a) === hashValue(b)` whenever both are hashable.
 * - Mutable containers (arrays that are not frozen, plain objects, Map, Set) compare
 *   structurally but refuse to hash.
 * - Functions and class instances hash and compare by identity.
 */

import { UnhashableValueError } from './errors';

// ============================================================================
// 1. TYPE DEFINITIONS
// ============================================================================

/**
 * Interface for objects that support value semantics.
 * Any object implementing it can sit inside a record or key a ValueMap.
 */
export interface Structural {
    readonly hashCode: number;
    equals(other: unknown): boolean;
}

/** A key/value container compared entry-wise: a plain object or a Map. */
export type Mapping = Readonly<Record<string, unknown>> | ReadonlyMap<unknown, unknown>;

export function isStructural(v: unknown): v is Structural {
    return typeof v === 'object' && v !== null
        && 'equals' in v && typeof v.equals === 'function'
        && 'hashCode' in v;
}

function isPlainObject(v: unknown): v is Readonly<Record<string, unknown>> {
    if (typeof v !== 'object' || v === null || Array.isArray(v)) return false;
    const proto: unknown = Object.getPrototypeOf(v);
    return proto === Object.prototype || proto === null;
}

function isMap(v: unknown): v is ReadonlyMap<unknown, unknown> {
    return v instanceof Map;
}

export function isMapping(v: unknown): v is Mapping {
    return isMap(v) || isPlainObject(v);
}

// ============================================================================
// 2. HASH ENGINE (FNV-1a)
// ============================================================================

const FNV_PRIME = 16777619;
const FNV_OFFSET = 2166136261;
const HASH_MULTIPLIER = 1000003;

const UNDEFINED_HASH = 0x2f3a9b1d;
const NULL_HASH = 0x5bd1e995;
const TRUE_HASH = 0x27d4eb2f;
const FALSE_HASH = 0x165667b1;
const NAN_HASH = 0x7ff80001;

const floatBuffer = new ArrayBuffer(8);
const floatView = new Float64Array(floatBuffer);
const wordView = new Int32Array(floatBuffer);

/** Agrees with SameValueZero: one hash for every NaN payload, and for 0 and -0. */
function hashNumber(val: number): number {
    if (val !== val) return NAN_HASH;
    // -0 is an integer too, and `^` folds it to 0.
    if (Number.isInteger(val)) return Math.imul(FNV_OFFSET ^ val, FNV_PRIME) >>> 0;

    floatView[0] = val;
    let h = FNV_OFFSET;
    for (let word = 0; word < 2; word++) h = Math.imul(h ^ wordView[word], FNV_PRIME);
    return h >>> 0;
}

export function hashString(str: string): number {
    let h = FNV_OFFSET;
    for (let i = 0; i < str.length; i++) h = Math.imul(h ^ str.charCodeAt(i), FNV_PRIME);
    return h >>> 0;
}

// Identity hashes for functions and opaque objects.
const identities = new WeakMap<object, number>();
let nextIdentity = 1;

function hashIdentity(obj: object): number {
    let id = identities.get(obj);
    if (id === undefined) {
        id = nextIdentity++;
        identities.set(obj, id);
    }
    return hashNumber(id);
}

function typeNameOf(v: object): string {
    if (Array.isArray(v)) return 'Array';
    const proto: unknown = Object.getPrototypeOf(v);
    if (proto === null) return 'Object';
    return v.constructor.name || 'Object';
}

/**
 * Computes a 32-bit unsigned hash for any hashable value.
 * @throws UnhashableValueError for mutable arrays, plain objects, Map and Set.
 */
export function hashValue(v: unknown): number {
    switch (typeof v) {
        case 'number': return hashNumber(v);
        case 'string': return hashString(v);
        case 'boolean': return v ? TRUE_HASH : FALSE_HASH;
        case 'undefined': return UNDEFINED_HASH;
        case 'bigint': return (hashString(v.toString()) ^ TRUE_HASH) >>> 0;
        case 'symbol': return (hashString(v.description ?? '') ^ FALSE_HASH) >>> 0;
        case 'function': return hashIdentity(v);
    }
    if (v === null) return NULL_HASH;
    if (typeof v !== 'object') return 0;

    // Records cache this, so nested records are hashed once.
    if (isStructural(v)) return v.hashCode;

    if (Array.isArray(v)) {
        if (!Object.isFrozen(v)) throw new UnhashableValueError('Array');
        return hashSequence(v);
    }
    if (isPlainObject(v) || isMap(v) || v instanceof Set) {
        throw new UnhashableValueError(typeNameOf(v));
    }
    return hashIdentity(v);
}

/** Order-sensitive hash of a sequence; identical to hashing the frozen array. */
export function hashSequence(items: ReadonlyArray<unknown>): number {
    let h = FNV_OFFSET;
    const len = items.length;
    for (let i = 0; i < len; i++) {
        h ^= hashValue(items[i]);
        h = Math.imul(h, FNV_PRIME);
    }
    return h >>> 0;
}

/**
 * Order-independent hash of named entries.
 * Each pair is hashed as a two-element sequence and shuffled before the XOR so
 * that equal pairs cannot cancel each other out.
 */
export function hashEntries(entries: Iterable<readonly [string, unknown]>): number {
    let h = 0;
    let count = 0;
    for (const [key, value] of entries) {
        const pair = hashSequence([key, value]);
        h ^= Math.imul((pair ^ 89869747) ^ (pair << 16), 3644798167);
        count++;
    }
    h ^= Math.imul(count + 1, 1927868237);
    return h >>> 0;
}

/** Folds the named-entries hash into the positional hash. */
export function combineHashes(positional: number, named: number): number {
    return (Math.imul(positional ^ named, HASH_MULTIPLIER) + 97531) >>> 0;
}

/** Answers whether `hashValue(v)` would succeed. */
export function isHashable(v: unknown): boolean {
    try {
        hashValue(v);
        return true;
    } catch (err) {
        if (err instanceof UnhashableValueError) return false;
        throw err;
    }
}

// ============================================================================
// 3. EQUALITY
// ============================================================================

/**
 * Value equality used for every member comparison.
 * Delegates to whichever side is Structural, which keeps record-vs-array and
 * array-vs-record comparisons symmetric.
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
    if (a === b) return true;
    if (typeof a === 'number' && typeof b === 'number') return a !== a && b !== b;

    if (isStructural(a)) return a.equals(b);
    if (isStructural(b)) return b.equals(a);

    if (Array.isArray(a)) return Array.isArray(b) && sequencesEqual(a, b);
    if (isMapping(a)) return isMapping(b) && mappingsEqual(a, b);
    return false;
}

export function notEquals(a: unknown, b: unknown): boolean {
    return !valuesEqual(a, b);
}

export function sequencesEqual(a: ReadonlyArray<unknown>, b: ReadonlyArray<unknown>): boolean {
    const len = a.length;
    if (len !== b.length) return false;
    for (let i = 0; i < len; i++) {
        if (!valuesEqual(a[i], b[i])) return false;
    }
    return true;
}

export function mappingSize(m: Mapping): number {
    return isMap(m) ? m.size : Object.keys(m).length;
}

function mappingEntries(m: Mapping): Iterable<readonly [unknown, unknown]> {
    return isMap(m) ? m.entries() : Object.entries(m);
}

/** Looks a key up without touching the prototype chain. */
export function mappingLookup(m: Mapping, key: unknown): { found: boolean; value: unknown } {
    if (isMap(m)) {
        return m.has(key) ? { found: true, value: m.get(key) } : { found: false, value: undefined };
    }
    if (typeof key !== 'string' || !Object.prototype.hasOwnProperty.call(m, key)) {
        return { found: false, value: undefined };
    }
    return { found: true, value: m[key] };
}

export function mappingsEqual(a: Mapping, b: Mapping): boolean {
    if (mappingSize(a) !== mappingSize(b)) return false;
    for (const [key, value] of mappingEntries(a)) {
        const other = mappingLookup(b, key);
        if (!other.found || !valuesEqual(value, other.value)) return false;
    }
    return true;
}
