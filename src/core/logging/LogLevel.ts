// src/core/logging/LogLevel.ts

export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
}

/**
 * Parses a level name case-insensitively. `WARNING` is accepted as an alias of `WARN`.
 * Returns undefined for anything unrecognized.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
    if (value === undefined) {
        return undefined;
    }

    switch (value.trim().toUpperCase()) {
        case 'DEBUG':
            return LogLevel.DEBUG;
        case 'INFO':
            return LogLevel.INFO;
        case 'WARN':
        case 'WARNING':
            return LogLevel.WARN;
        case 'ERROR':
            return LogLevel.ERROR;
        default:
            return undefined;
    }
}
