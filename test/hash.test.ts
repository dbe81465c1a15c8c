import { describe, expect, it } from 'vitest';
import { UnhashableValueError } from '../src/errors';
import {
    combineHashes,
    hashEntries,
    hashSequence,
    hashValue,
    isHashable,
    isStructural,
    notEquals,
    type Structural,
    valuesEqual,
} from '../src/hash';

/** Minimal user-defined value type. */
class Point implements Structural {
    constructor(readonly x: number, readonly y: number) {}

    get hashCode(): number { return hashSequence([this.x, this.y]); }

    equals(other: unknown): boolean {
        return other instanceof Point && other.x === this.x && other.y === this.y;
    }
}

describe('hashValue', () => {
    it('hashes primitives by value', () => {
        expect(hashValue(1)).toBe(hashValue(1));
        expect(hashValue(0)).toBe(hashValue(-0));
        expect(hashValue(1.5)).toBe(hashValue(1.5));
        expect(hashValue(NaN)).toBe(hashValue(NaN));
        expect(hashValue('abc')).toBe(hashValue('ab' + 'c'));
        expect(hashValue(10n)).toBe(hashValue(10n));
        expect(hashValue(Symbol('s'))).toBe(hashValue(Symbol('s')));
        expect(hashValue(null)).not.toBe(hashValue(undefined));
        expect(hashValue(true)).not.toBe(hashValue(false));
    });

    it('gives every NaN the same hash regardless of payload', () => {
        const words = new Uint32Array([1, 0x7ff80000]);
        const payloadNaN = new Float64Array(words.buffer)[0];
        expect(Number.isNaN(payloadNaN)).toBe(true);
        expect(hashValue(payloadNaN)).toBe(hashValue(NaN));
        expect(hashValue(Object.freeze([payloadNaN]))).toBe(hashValue(Object.freeze([NaN])));
        expect(hashValue(-0.0)).toBe(hashValue(0));
    });

    it('gives distinct integers distinct hashes', () => {
        const seen = new Set<number>();
        for (let i = -50; i < 50; i++) seen.add(hashValue(i));
        expect(seen.size).toBe(100);
    });

    it('returns unsigned 32-bit integers', () => {
        for (const v of [0, -1, 2.5, 'x', Object.freeze([1, 'a']), 99n, true]) {
            const h = hashValue(v);
            expect(Number.isInteger(h)).toBe(true);
            expect(h).toBeGreaterThanOrEqual(0);
            expect(h).toBeLessThan(2 ** 32);
        }
    });

    it('hashes frozen arrays by content and order', () => {
        expect(hashValue(Object.freeze([1, 2]))).toBe(hashValue(Object.freeze([1, 2])));
        expect(hashValue(Object.freeze([1, 2]))).toBe(hashSequence([1, 2]));
        expect(hashValue(Object.freeze([]))).toBe(hashSequence([]));
        expect(hashValue(Object.freeze([Object.freeze([1])]))).toBe(hashSequence([Object.freeze([1])]));
    });

    it('refuses mutable containers', () => {
        expect(() => hashValue([1])).toThrow(UnhashableValueError);
        expect(() => hashValue([1])).toThrow("unhashable type: 'Array'");
        expect(() => hashValue({ a: 1 })).toThrow("unhashable type: 'Object'");
        expect(() => hashValue(Object.create(null))).toThrow("unhashable type: 'Object'");
        expect(() => hashValue(new Map())).toThrow("unhashable type: 'Map'");
        expect(() => hashValue(new Set())).toThrow("unhashable type: 'Set'");
        expect(() => hashValue(Object.freeze([{ a: 1 }]))).toThrow(UnhashableValueError);
    });

    it('carries the offending type name on the error', () => {
        try {
            hashValue(new Map());
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(UnhashableValueError);
            if (err instanceof UnhashableValueError) {
                expect(err.typeName).toBe('Map');
                expect(err.name).toBe('UnhashableValueError');
            }
        }
    });

    it('hashes functions and class instances by identity', () => {
        const f = () => 1;
        const g = () => 1;
        const d = new Date(0);
        expect(hashValue(f)).toBe(hashValue(f));
        expect(hashValue(f)).not.toBe(hashValue(g));
        expect(hashValue(d)).toBe(hashValue(d));
        expect(hashValue(d)).not.toBe(hashValue(new Date(0)));
    });

    it('delegates to Structural values', () => {
        expect(hashValue(new Point(1, 2))).toBe(hashSequence([1, 2]));
        expect(isStructural(new Point(1, 2))).toBe(true);
        expect(isStructural({ equals: 1, hashCode: 2 })).toBe(false);
    });
});

describe('hashEntries', () => {
    it('ignores entry order', () => {
        expect(hashEntries([['a', 1], ['b', 2]])).toBe(hashEntries([['b', 2], ['a', 1]]));
    });

    it('does not cancel out repeated values', () => {
        expect(hashEntries([['a', 1], ['b', 1]])).not.toBe(hashEntries([]));
    });

    it('separates keys from values', () => {
        expect(hashEntries([['a', 'b']])).not.toBe(hashEntries([['b', 'a']]));
    });
});

describe('combineHashes', () => {
    it('stays within 32 unsigned bits', () => {
        const h = combineHashes(0xffffffff, 0x12345678);
        expect(h).toBeGreaterThanOrEqual(0);
        expect(h).toBeLessThan(2 ** 32);
    });
});

describe('isHashable', () => {
    it('answers without throwing', () => {
        expect(isHashable(1)).toBe(true);
        expect(isHashable(Object.freeze(['a']))).toBe(true);
        expect(isHashable(['a'])).toBe(false);
        expect(isHashable({})).toBe(false);
    });

    it('rethrows failures that are not about hashability', () => {
        const broken: Structural = {
            get hashCode(): number { throw new RangeError('broken'); },
            equals: () => false,
        };
        expect(() => isHashable(broken)).toThrow(RangeError);
    });
});

describe('valuesEqual', () => {
    it('uses SameValueZero for primitives', () => {
        expect(valuesEqual(NaN, NaN)).toBe(true);
        expect(valuesEqual(0, -0)).toBe(true);
        expect(valuesEqual(1, '1')).toBe(false);
        expect(valuesEqual(null, undefined)).toBe(false);
        expect(notEquals(1, 2)).toBe(true);
    });

    it('compares arrays element-wise, frozen or not', () => {
        expect(valuesEqual([1, [2, 3]], Object.freeze([1, [2, 3]]))).toBe(true);
        expect(valuesEqual([1, 2], [2, 1])).toBe(false);
        expect(valuesEqual([1], [1, 1])).toBe(false);
    });

    it('compares plain objects and Maps entry-wise', () => {
        expect(valuesEqual({ a: 1, b: [2] }, { b: [2], a: 1 })).toBe(true);
        expect(valuesEqual({ a: 1 }, { a: 1, b: undefined })).toBe(false);
        expect(valuesEqual({ a: undefined }, { b: undefined })).toBe(false);
        expect(valuesEqual(new Map([['a', 1]]), { a: 1 })).toBe(true);
        expect(valuesEqual(new Map([[1, 'x']]), new Map([[1, 'x']]))).toBe(true);
        expect(valuesEqual([1], { 0: 1 })).toBe(false);
    });

    it('compares other objects by identity', () => {
        const d = new Date(0);
        expect(valuesEqual(d, d)).toBe(true);
        expect(valuesEqual(d, new Date(0))).toBe(false);
    });

    it('delegates to whichever side is Structural', () => {
        expect(valuesEqual(new Point(1, 2), new Point(1, 2))).toBe(true);
        expect(valuesEqual([new Point(1, 2)], [new Point(1, 2)])).toBe(true);
        expect(valuesEqual({ x: 1, y: 2 }, new Point(1, 2))).toBe(false);
    });
});
