// src/core/retry/RetryPolicy.ts

import { z } from 'zod';
import { AppError } from '../errors/AppError';
import { exponentialBackoff, normalizeAttempt } from '../errors/builtinClassifiers';

const retryPolicySchema = z.object({
    maxAttempts: z.number().int().nonnegative(),
    baseDelayMs: z.number().finite().nonnegative(),
    maxDelayMs: z.number().finite().nonnegative(),
    backoffMultiplier: z.number().finite().min(1),
    jitter: z.boolean(),
});

export type RetryPolicyOptions = z.infer<typeof retryPolicySchema>;

/**
 * What a caller's own retry loop should do next. The policy never sleeps or loops itself.
 */
export type RetryDecision =
    | { action: 'retry'; delayMs: number }
    | { action: 'fail'; reason: 'non-retriable' | 'exhausted' };

/** Returns a number in [0, 1). */
export type RandomSource = () => number;

const DEFAULT_OPTIONS: RetryPolicyOptions = {
    maxAttempts: 3,
    baseDelayMs: 100,
    maxDelayMs: 30_000,
    backoffMultiplier: 2,
    jitter: true,
};

// Jitter scales a delay into [0.75, 1.25)
const JITTER_MIN = 0.75;
const JITTER_SPAN = 0.5;

/**
 * RetryPolicy
 * Immutable attempt budget plus backoff schedule, independent of any error category.
 */
export class RetryPolicy {
    private readonly options: Readonly<RetryPolicyOptions>;

    constructor(options: Partial<RetryPolicyOptions> = {}) {
        // An explicit `undefined` keeps the default rather than erasing it
        const given = Object.entries(options).filter(([, value]) => value !== undefined);
        this.options = Object.freeze(retryPolicySchema.parse({ ...DEFAULT_OPTIONS, ...Object.fromEntries(given) }));
    }

    public static standard(): RetryPolicy {
        return new RetryPolicy();
    }

    /** Quick operations. */
    public static fast(): RetryPolicy {
        return new RetryPolicy({ maxAttempts: 3, baseDelayMs: 50, maxDelayMs: 1_000, backoffMultiplier: 1.5 });
    }

    /** Expensive operations. */
    public static slow(): RetryPolicy {
        return new RetryPolicy({ maxAttempts: 5, baseDelayMs: 500, maxDelayMs: 60_000, backoffMultiplier: 2 });
    }

    public static network(): RetryPolicy {
        return new RetryPolicy({ maxAttempts: 4, baseDelayMs: 250, maxDelayMs: 30_000, backoffMultiplier: 2 });
    }

    public static database(): RetryPolicy {
        return new RetryPolicy({ maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 10_000, backoffMultiplier: 2 });
    }

    public get maxAttempts(): number {
        return this.options.maxAttempts;
    }

    public get baseDelayMs(): number {
        return this.options.baseDelayMs;
    }

    public get maxDelayMs(): number {
        return this.options.maxDelayMs;
    }

    public get backoffMultiplier(): number {
        return this.options.backoffMultiplier;
    }

    public get jitter(): boolean {
        return this.options.jitter;
    }

    public withMaxAttempts(maxAttempts: number): RetryPolicy {
        return new RetryPolicy({ ...this.options, maxAttempts });
    }

    public withBaseDelay(baseDelayMs: number): RetryPolicy {
        return new RetryPolicy({ ...this.options, baseDelayMs });
    }

    public withMaxDelay(maxDelayMs: number): RetryPolicy {
        return new RetryPolicy({ ...this.options, maxDelayMs });
    }

    public withBackoffMultiplier(backoffMultiplier: number): RetryPolicy {
        return new RetryPolicy({ ...this.options, backoffMultiplier });
    }

    public withJitter(jitter: boolean): RetryPolicy {
        return new RetryPolicy({ ...this.options, jitter });
    }

    /**
     * Delay before the retry following `attempt` failed attempts (0-indexed).
     * The cap applies before jitter, so a jittered delay can exceed it by up to 25%.
     */
    public calculateDelay(attempt: number, random: RandomSource = Math.random): number {
        const { baseDelayMs, backoffMultiplier, maxDelayMs, jitter } = this.options;
        const delay = exponentialBackoff(attempt, baseDelayMs, backoffMultiplier, maxDelayMs);
        if (!jitter) {
            return delay;
        }

        const sample = random();
        const unit = Number.isFinite(sample) ? Math.min(Math.max(sample, 0), 1) : 0;
        return Math.floor(delay * (JITTER_MIN + unit * JITTER_SPAN));
    }

    public shouldRetry(attempt: number): boolean {
        return normalizeAttempt(attempt) < this.options.maxAttempts;
    }

    /**
     * Combines the error's retriability with this policy's budget and schedule.
     */
    public decide(error: AppError, attempt: number, random?: RandomSource): RetryDecision {
        if (!error.isRetriable()) {
            return { action: 'fail', reason: 'non-retriable' };
        }
        if (!this.shouldRetry(attempt)) {
            return { action: 'fail', reason: 'exhausted' };
        }
        return { action: 'retry', delayMs: this.calculateDelay(attempt, random) };
    }
}
