// src/config/config.ts

import { ENV } from './env';
import { LogLevel } from '../core/logging/LogLevel';

/**
 * Process-wide error handling settings.
 * Functions that consult them accept an explicit override, mostly for tests.
 */
export interface ErrorSettings {
    MAX_RETRIES: number;
    LOG_ERRORS: boolean;
    LOG_LEVEL: LogLevel;
    BACKTRACE: boolean;
}

interface Config {
    ERRORS: Readonly<ErrorSettings>;
}

/**
 * Centralized configuration for faultline.
 */
export const CONFIG: Config = {
    ERRORS: Object.freeze({
        MAX_RETRIES: ENV.FAULTLINE_MAX_RETRIES,
        LOG_ERRORS: ENV.FAULTLINE_LOG_ERRORS,
        // Verbose outside production unless pinned explicitly
        LOG_LEVEL: ENV.FAULTLINE_LOG_LEVEL ?? (ENV.NODE_ENV === 'production' ? LogLevel.INFO : LogLevel.DEBUG),
        BACKTRACE: ENV.FAULTLINE_BACKTRACE,
    }),
};
