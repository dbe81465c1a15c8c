/**
 * Configuration loading from environment variables.
 */

import { isLogLevel, logger as defaultLogger, Logger, type LogLevel } from './logger';

export type BackendName = 'compact' | 'plain';

export interface ValuesConfig {
    backend: BackendName;
    logLevel: LogLevel;
}

export const BACKEND_ENV = 'VALUES_BACKEND';
export const LOG_LEVEL_ENV = 'VALUES_LOG_LEVEL';

export const DEFAULT_BACKEND: BackendName = 'compact';
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

export function isBackendName(value: string): value is BackendName {
    return value === 'compact' || value === 'plain';
}

/**
 * Reads `VALUES_BACKEND` and `VALUES_LOG_LEVEL`. Unset or blank variables take the
 * default silently; unrecognised values take it with a warning.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, log: Logger = defaultLogger): ValuesConfig {
    return {
        backend: readSetting(env, BACKEND_ENV, isBackendName, DEFAULT_BACKEND, log),
        logLevel: readSetting(env, LOG_LEVEL_ENV, isLogLevel, DEFAULT_LOG_LEVEL, log),
    };
}

function readSetting<T extends string>(
    env: NodeJS.ProcessEnv,
    name: string,
    accept: (value: string) => value is T,
    fallback: T,
    log: Logger,
): T {
    const raw = env[name]?.trim().toLowerCase();
    if (!raw) return fallback;
    if (accept(raw)) return raw;

    log.warn(`Ignoring ${name}: unsupported value`, { value: raw, fallback });
    return fallback;
}
