/**
 * Structured logging.
 * Records are pure and never log; configuration and backend selection do.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: ReadonlyArray<LogLevel> = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
    timestamp: string;
    level: LogLevel;
    message: string;
    data?: Record<string, unknown>;
}

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

export class Logger {
    private entries: LogEntry[] = [];
    private level: LogLevel;
    private shouldLog: boolean;

    constructor(level: LogLevel = 'warn', shouldLog: boolean = true) {
        this.level = level;
        this.shouldLog = shouldLog;
    }

    setLevel(level: LogLevel): void {
        this.level = level;
    }

    getLevel(): LogLevel {
        return this.level;
    }

    debug(message: string, data?: Record<string, unknown>): void {
        this.log('debug', message, data);
    }

    info(message: string, data?: Record<string, unknown>): void {
        this.log('info', message, data);
    }

    warn(message: string, data?: Record<string, unknown>): void {
        this.log('warn', message, data);
    }

    error(message: string, data?: Record<string, unknown>): void {
        this.log('error', message, data);
    }

    private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
        if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.level)) {
            return; // below threshold
        }

        const entry: LogEntry = {
            timestamp: new Date().toISOString(),
            level,
            message,
            data: data && Object.keys(data).length > 0 ? { ...data } : undefined,
        };
        this.entries.push(entry);

        if (this.shouldLog) {
            this.consoleLog(level, this.formatLog(entry));
        }
    }

    private formatLog(entry: LogEntry): string {
        let result = `[values] ${entry.message}`;
        if (entry.data) {
            const parts = Object.entries(entry.data).map(([key, value]) =>
                typeof value === 'object' && value !== null ? `${key}: ${JSON.stringify(value)}` : `${key}: ${String(value)}`,
            );
            result += `\n  ${parts.join(', ')}`;
        }
        return result;
    }

    private consoleLog(level: LogLevel, message: string): void {
        switch (level) {
            case 'debug':
                console.debug(message);
                break;
            case 'info':
                console.info(message);
                break;
            case 'warn':
                console.warn(message);
                break;
            case 'error':
                console.error(message);
                break;
        }
    }

    getEntries(): LogEntry[] {
        return [...this.entries];
    }

    clear(): void {
        this.entries = [];
    }
}

/** Shared instance used by configuration loading. */
export const logger = new Logger();
