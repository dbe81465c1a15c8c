/**
 * @module callable-values/errors
 * Error taxonomy. Every failure is raised synchronously and never retried.
 */

/** Base class for every error raised by this library. */
export class ValuesError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** Hashing reached a member that cannot be hashed (mutable array, plain object, Map, Set). */
export class UnhashableValueError extends ValuesError {
    constructor(readonly typeName: string) {
        super(`unhashable type: '${typeName}'`);
    }
}

export class IndexOutOfRangeError extends ValuesError {
    constructor(readonly index: number, readonly length: number) {
        super(`values index ${index} out of range for length ${length}`);
    }
}

export class KeyNotFoundError extends ValuesError {
    constructor(readonly key: string) {
        super(`"${key.replace(/"/g, '\\"')}"`);
    }
}

/** The merged call arguments do not fit the target. */
export class SignatureMismatchError extends ValuesError {}

/** A parameter list handed to `defineTarget` is malformed. */
export class InvalidSignatureError extends ValuesError {}
