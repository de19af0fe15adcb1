// src/core/errors/result.ts

import { AppError } from './AppError';
import { ErrorFactory, WrapOptions } from './errorFactory';

/**
 * Two-outcome container for fallible operations.
 */
export type Result<T, E = AppError> = { ok: true; value: T } | { ok: false; error: E };

export type AppResult<T> = Result<T, AppError>;

export function ok<T>(value: T): Result<T, never> {
    return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
    return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
    return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is { ok: false; error: E } {
    return !result.ok;
}

/**
 * Runs `fn`, capturing anything it throws as an AppError (see ErrorFactory.wrap).
 */
export function tryCatch<T>(fn: () => T, options?: WrapOptions): AppResult<T> {
    try {
        return ok(fn());
    } catch (error) {
        return err(ErrorFactory.wrap(error, options));
    }
}

/**
 * Settles `promise` into a Result. The returned promise never rejects.
 */
export async function fromPromise<T>(promise: PromiseLike<T>, options?: WrapOptions): Promise<AppResult<T>> {
    try {
        return ok(await promise);
    } catch (error) {
        return err(ErrorFactory.wrap(error, options));
    }
}

/**
 * Returns the value or throws the error, for call sites that prefer exceptions.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
    if (result.ok) {
        return result.value;
    }
    throw result.error;
}
