import { afterEach, describe, expect, it, vi } from 'vitest';
import { isLogLevel, Logger } from '../src/logger';

describe('Logger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('drops entries below its level', () => {
        const log = new Logger('warn', false);
        log.debug('hidden');
        log.info('hidden');
        log.warn('shown');
        log.error('shown too');
        expect(log.getEntries().map(e => e.level)).toEqual(['warn', 'error']);
    });

    it('changes level at run time', () => {
        const log = new Logger('error', false);
        log.setLevel('debug');
        log.debug('now visible');
        expect(log.getLevel()).toBe('debug');
        expect(log.getEntries()).toHaveLength(1);
    });

    it('writes formatted lines to the matching console method', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const log = new Logger('warn');

        log.warn('backend ignored', { value: 'x', nested: { a: 1 } });
        log.error('plain message');

        expect(warn).toHaveBeenCalledWith('[values] backend ignored\n  value: x, nested: {"a":1}');
        expect(error).toHaveBeenCalledWith('[values] plain message');
    });

    it('omits empty data and copies what it keeps', () => {
        const log = new Logger('debug', false);
        const data = { key: 1 };
        log.info('with data', data);
        log.info('empty data', {});
        data.key = 2;

        const [first, second] = log.getEntries();
        expect(first.data).toEqual({ key: 1 });
        expect(second.data).toBeUndefined();
        expect(Number.isNaN(Date.parse(first.timestamp))).toBe(false);
    });

    it('clears recorded entries', () => {
        const log = new Logger('debug', false);
        log.info('one');
        log.clear();
        expect(log.getEntries()).toEqual([]);
    });
});

describe('isLogLevel', () => {
    it('accepts the four levels', () => {
        expect(['debug', 'info', 'warn', 'error'].every(isLogLevel)).toBe(true);
        expect(isLogLevel('trace')).toBe(false);
    });
});
