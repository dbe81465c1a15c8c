import { describe, expect, it } from 'vitest';
import { DEFAULT_BACKEND, DEFAULT_LOG_LEVEL, isBackendName, loadConfig } from '../src/config';
import { Logger } from '../src/logger';

function quietLogger(): Logger {
    return new Logger('debug', false);
}

describe('loadConfig', () => {
    it('falls back to defaults when nothing is set', () => {
        const log = quietLogger();
        expect(loadConfig({}, log)).toEqual({ backend: DEFAULT_BACKEND, logLevel: DEFAULT_LOG_LEVEL });
        expect(DEFAULT_BACKEND).toBe('compact');
        expect(DEFAULT_LOG_LEVEL).toBe('warn');
        expect(log.getEntries()).toEqual([]);
    });

    it('reads both settings, ignoring case and surrounding space', () => {
        const config = loadConfig({ VALUES_BACKEND: ' Plain ', VALUES_LOG_LEVEL: 'DEBUG' }, quietLogger());
        expect(config).toEqual({ backend: 'plain', logLevel: 'debug' });
    });

    it('treats blank values as unset', () => {
        const log = quietLogger();
        expect(loadConfig({ VALUES_BACKEND: '   ' }, log).backend).toBe('compact');
        expect(log.getEntries()).toEqual([]);
    });

    it('warns about unsupported values and keeps the default', () => {
        const log = quietLogger();
        const config = loadConfig({ VALUES_BACKEND: 'sparse', VALUES_LOG_LEVEL: 'loud' }, log);
        expect(config).toEqual({ backend: 'compact', logLevel: 'warn' });

        const entries = log.getEntries();
        expect(entries.map(e => [e.level, e.message, e.data])).toEqual([
            ['warn', 'Ignoring VALUES_BACKEND: unsupported value', { value: 'sparse', fallback: 'compact' }],
            ['warn', 'Ignoring VALUES_LOG_LEVEL: unsupported value', { value: 'loud', fallback: 'warn' }],
        ]);
    });
});

describe('isBackendName', () => {
    it('accepts only known backends', () => {
        expect(isBackendName('compact')).toBe(true);
        expect(isBackendName('plain')).toBe(true);
        expect(isBackendName('Plain')).toBe(false);
    });
});
