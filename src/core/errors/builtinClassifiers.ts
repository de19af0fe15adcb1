// src/core/errors/builtinClassifiers.ts

import { z } from 'zod';
import { ErrorClassifier } from './ErrorClassifier';
import { BuiltinErrorKind, ErrorKind } from './ErrorKind';

const backoffOptionsSchema = z.object({
    name: z.string().min(1),
    retriable: z.boolean(),
    baseDelayMs: z.number().finite().nonnegative(),
    factor: z.number().finite().min(1),
    maxDelayMs: z.number().finite().nonnegative(),
});

export type BackoffOptions = z.infer<typeof backoffOptionsSchema>;

/**
 * Attempt counts are 0-indexed. Negative and NaN collapse to 0, fractions round down.
 */
export function normalizeAttempt(attempt: number): number {
    if (Number.isNaN(attempt) || attempt <= 0) {
        return 0;
    }
    return Math.floor(attempt);
}

/**
 * min(base × factor^attempt, cap), in whole milliseconds.
 * Saturates at the cap for any attempt count, Infinity included.
 */
export function exponentialBackoff(attempt: number, baseMs: number, factor: number, capMs: number): number {
    const n = normalizeAttempt(attempt);
    // 1 ** Infinity is NaN in JS
    const growth = factor === 1 ? 1 : Math.pow(factor, n);
    const raw = baseMs * growth;

    if (!Number.isFinite(raw)) {
        return Math.floor(capMs);
    }
    return Math.floor(Math.min(raw, capMs));
}

/**
 * Stateless classifier with exponential backoff. Backs every built-in kind and
 * is available to callers building `Custom` categories.
 */
export class BackoffClassifier implements ErrorClassifier {
    private readonly options: Readonly<BackoffOptions>;

    constructor(options: BackoffOptions) {
        this.options = Object.freeze(backoffOptionsSchema.parse(options));
    }

    public isRetriable(): boolean {
        return this.options.retriable;
    }

    public retryDelay(attempt: number): number {
        if (!this.options.retriable) {
            return 0;
        }
        const { baseDelayMs, factor, maxDelayMs } = this.options;
        return exponentialBackoff(attempt, baseDelayMs, factor, maxDelayMs);
    }

    public categoryName(): string {
        return this.options.name;
    }

    public duplicate(): ErrorClassifier {
        return new BackoffClassifier(this.options);
    }

    /** Upper bound of `retryDelay`. */
    public get maxDelayMs(): number {
        return this.options.retriable ? this.options.maxDelayMs : 0;
    }
}

const permanent = (name: string): BackoffClassifier =>
    new BackoffClassifier({ name, retriable: false, baseDelayMs: 0, factor: 1, maxDelayMs: 0 });

/**
 * Classification of every built-in kind, resolved by the kind tag alone.
 */
export const BUILTIN_CLASSIFIERS: Readonly<Record<BuiltinErrorKind, ErrorClassifier>> = Object.freeze({
    [ErrorKind.Database]: new BackoffClassifier({
        name: 'Database',
        retriable: true,
        baseDelayMs: 50,
        factor: 2,
        maxDelayMs: 5_000,
    }),
    [ErrorKind.Network]: new BackoffClassifier({
        name: 'Network',
        retriable: true,
        baseDelayMs: 100,
        factor: 2,
        maxDelayMs: 10_000,
    }),
    [ErrorKind.Validation]: permanent('Validation'),
    [ErrorKind.NotFound]: permanent('NotFound'),
    [ErrorKind.Internal]: permanent('Internal'),
});

/**
 * Stand-in for a `Custom` classifier lost in serialization.
 * Non-retriable, like `Internal`.
 */
export const DEFAULT_CLASSIFIER: ErrorClassifier = permanent('Unknown');

export function classifierFor(kind: BuiltinErrorKind): ErrorClassifier {
    return BUILTIN_CLASSIFIERS[kind];
}
