// src/core/errors/errorFactory.ts

import { AppError } from './AppError';
import { ErrorClassifier } from './ErrorClassifier';
import { ErrorContext } from './ErrorContext';
import { BuiltinErrorKind, ErrorKind } from './ErrorKind';

const MESSAGE_PREFIX: Readonly<Record<BuiltinErrorKind, string>> = {
    [ErrorKind.Database]: 'Database error',
    [ErrorKind.Network]: 'Network error',
    [ErrorKind.Validation]: 'Validation error',
    [ErrorKind.NotFound]: 'Not found',
    [ErrorKind.Internal]: 'Internal error',
};

export interface WrapOptions {
    /** Kind given to the wrapped failure. Defaults to `Internal`. */
    kind?: BuiltinErrorKind;
    /** Replaces the foreign error's own message. */
    message?: string;
}

function builtin(kind: BuiltinErrorKind, detail: string, context?: ErrorContext): AppError {
    return new AppError({ kind, message: `${MESSAGE_PREFIX[kind]}: ${detail}`, context });
}

/**
 * Text form of any thrown value. Objects without a usable `toString`
 * (`Object.create(null)`, a throwing override) fall back to the `[object Tag]` form.
 */
function textOf(value: unknown): string {
    if (typeof value === 'string') {
        return value;
    }
    try {
        return String(value);
    } catch {
        return Object.prototype.toString.call(value);
    }
}

function describeForeign(value: unknown): Array<[string, string]> {
    if (value instanceof AppError) {
        return [['name', value.name], ['kind', value.kind], ['message', value.message]];
    }
    if (value instanceof Error) {
        return [['name', textOf(value.name)], ['message', textOf(value.message)]];
    }
    return [['name', value === null ? 'null' : typeof value], ['message', textOf(value)]];
}

/**
 * One context per link of a foreign cause chain, oldest link deepest.
 * Values already visited end the chain, so a cyclic `Error.cause` graph still
 * yields an acyclic context chain. An AppError link contributes its own
 * context as the rest of the chain.
 */
function foreignCauseContext(value: unknown): ErrorContext {
    const links: unknown[] = [];
    const seen = new Set<unknown>();
    let current: unknown = value;
    for (;;) {
        links.push(current);
        seen.add(current);
        if (current instanceof AppError || !(current instanceof Error)) {
            break;
        }
        const next: unknown = current.cause;
        if (next === undefined || seen.has(next)) {
            break;
        }
        current = next;
    }

    let context: ErrorContext | undefined;
    for (let index = links.length - 1; index >= 0; index--) {
        const link = links[index];
        const deeper = link instanceof AppError ? link.context : context;
        context = ErrorContext.create({ cause: deeper, metadata: describeForeign(link) });
    }
    return context ?? ErrorContext.create({ metadata: describeForeign(value) });
}

/**
 * Factory class to create consistent error instances across the application.
 * Each method only builds a value; none has side effects.
 */
export class ErrorFactory {
    static validation(field: string, message: string): AppError {
        return builtin(ErrorKind.Validation, `${field}: ${message}`);
    }

    static database(operation: string, message: string): AppError {
        return new AppError({
            kind: ErrorKind.Database,
            message: `${MESSAGE_PREFIX[ErrorKind.Database]} during ${operation}: ${message}`,
        });
    }

    static network(message: string): AppError {
        return builtin(ErrorKind.Network, message);
    }

    static notFound(resource: string, identifier: string): AppError {
        return new AppError({
            kind: ErrorKind.NotFound,
            message: `${MESSAGE_PREFIX[ErrorKind.NotFound]}: ${resource} with id ${identifier}`,
        });
    }

    static internal(message: string): AppError {
        return builtin(ErrorKind.Internal, message);
    }

    /**
     * Error in a caller-defined category. The error keeps its own duplicate of `classifier`.
     */
    static custom(message: string, classifier: ErrorClassifier): AppError {
        return new AppError({ kind: ErrorKind.Custom, message, classifier });
    }

    // Specialised shorthands over the built-in kinds

    static parsing(message: string): AppError {
        return ErrorFactory.validation('parsing', message);
    }

    static serialization(message: string): AppError {
        return builtin(ErrorKind.Internal, `Serialization error: ${message}`);
    }

    static connection(message: string): AppError {
        return builtin(ErrorKind.Network, `Connection error: ${message}`);
    }

    static initialization(message: string): AppError {
        return builtin(ErrorKind.Internal, `Initialization error: ${message}`);
    }

    /**
     * Maps a foreign failure (thrown value, rejected promise) into an AppError.
     * The original is kept as the cause context, with its `Error.cause` chain
     * behind it. An AppError passes through unchanged.
     */
    static wrap(cause: unknown, options: WrapOptions = {}): AppError {
        if (cause instanceof AppError) {
            return cause;
        }

        const detail = options.message ?? textOf(cause instanceof Error ? cause.message : cause);
        const context = ErrorContext.create({ cause: foreignCauseContext(cause) });
        return builtin(options.kind ?? ErrorKind.Internal, detail, context);
    }
}
