/**
 * @module callable-values
 * Immutable positional+named value records that hash, compare and apply
 * themselves to functions.
 *
 * @example
 * const v = values(1, 2, 3, kw({ foo: 4 }));
 * String(v);             // "values(1, 2, 3, foo=4)"
 * v.get(0);              // 1
 * v.get('foo');          // 4
 * v.call(values);        // an equal, distinct record
 */

import { splitArguments } from './arguments';
import { CompactValues } from './compact-values';
import { type BackendName, loadConfig } from './config';
import { logger } from './logger';
import { ValueRecord } from './record';
import { INVOKE, type Invocable } from './signature';
import { PlainValues } from './values';

export type RecordConstructor = new (
    positionals?: ReadonlyArray<unknown>,
    named?: ReadonlyMap<string, unknown>,
) => ValueRecord;

export const BACKENDS: Readonly<Record<BackendName, RecordConstructor>> = {
    compact: CompactValues,
    plain: PlainValues,
};

/** `values(...)`: positionals, then an optional trailing `kw({...})`. Usable as a call target. */
export interface ValuesFactory extends Invocable<ValueRecord> {
    (...args: unknown[]): ValueRecord;
    readonly backend: BackendName;
}

export function createFactory(backend: BackendName): ValuesFactory {
    const Backend = BACKENDS[backend];
    const factory = (...args: unknown[]): ValueRecord => {
        const { positionals, named } = splitArguments(args);
        return new Backend(positionals, named);
    };
    return Object.assign(factory, {
        backend,
        [INVOKE]: (positionals: ReadonlyArray<unknown>, named: ReadonlyMap<string, unknown>): ValueRecord =>
            new Backend(positionals, named),
    });
}

const config = loadConfig();
logger.setLevel(config.logLevel);

/** Factory for the configured backend (`VALUES_BACKEND`, `compact` unless set). */
export const values: ValuesFactory = createFactory(config.backend);
logger.debug('values backend selected', { backend: values.backend });

export { Keywords, kw, splitArguments } from './arguments';
export type { NamedInput } from './arguments';
export { CompactValues } from './compact-values';
export { loadConfig } from './config';
export type { BackendName, ValuesConfig } from './config';
export {
    IndexOutOfRangeError,
    InvalidSignatureError,
    KeyNotFoundError,
    SignatureMismatchError,
    UnhashableValueError,
    ValuesError,
} from './errors';
export { hashValue, isHashable, notEquals, valuesEqual } from './hash';
export type { Mapping, Structural } from './hash';
export { Logger, logger } from './logger';
export type { LogEntry, LogLevel } from './logger';
export { ValueRecord } from './record';
export {
    defineTarget,
    DefinedTarget,
    INVOKE,
    isInvocable,
    keywords,
    optional,
    param,
    rest,
    Signature,
} from './signature';
export type { BoundArguments, Invocable, Parameter } from './signature';
export { ValueMap } from './value-map';
export { PlainValues } from './values';
