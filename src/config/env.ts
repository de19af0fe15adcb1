// src/config/env.ts

import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';
import { parseLogLevel } from '../core/logging/LogLevel';

// Load environment variables from project root, not process.cwd()
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

const present = (val: string | undefined): string | undefined => {
    const trimmed = val?.trim();
    return trimmed ? trimmed : undefined;
};

/**
 * Environment Variable Schema
 * Every setting has a default; unrecognized values fall back to it instead of
 * failing at import time.
 */
const envSchema = z.object({
    // Server & Environment
    NODE_ENV: z.enum(['development', 'production', 'test']).catch('development'),

    // Upper bound on attempts consulted by AppError.shouldRetry
    FAULTLINE_MAX_RETRIES: z.string().optional()
        .transform(val => Number(present(val) ?? Number.NaN))
        .pipe(z.number().int().nonnegative())
        .catch(3),

    // Anything other than "false" keeps error logging on
    FAULTLINE_LOG_ERRORS: z.string().optional()
        .transform(val => present(val)?.toLowerCase() !== 'false'),

    // Left undefined when unset so the NODE_ENV based default applies
    FAULTLINE_LOG_LEVEL: z.string().optional()
        .transform(val => parseLogLevel(val)),

    FAULTLINE_BACKTRACE: z.string().optional()
        .transform(val => present(val)?.toLowerCase() === 'true'),
});

export type Env = z.infer<typeof envSchema>;

export const ENV: Env = envSchema.parse(process.env);
