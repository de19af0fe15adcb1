// src/core/errors/AppError.ts

import { CONFIG, ErrorSettings } from '../../config/config';
import { Logger, LogLevel } from '../logging/Logger';
import { BUILTIN_CLASSIFIERS, DEFAULT_CLASSIFIER, normalizeAttempt } from './builtinClassifiers';
import { ErrorClassifier } from './ErrorClassifier';
import { ErrorContext, SerializedErrorContext } from './ErrorContext';
import { BuiltinErrorKind, ErrorKind, isBuiltinKind } from './ErrorKind';

interface AppErrorBaseInit {
    message: string;
    context?: ErrorContext;
}

/**
 * Only `Custom` takes a classifier; every other kind is classified by its tag.
 */
export type AppErrorInit =
    | (AppErrorBaseInit & { kind: BuiltinErrorKind })
    | (AppErrorBaseInit & { kind: ErrorKind.Custom; classifier: ErrorClassifier });

export interface SerializedAppError {
    kind: ErrorKind;
    message: string;
    context?: SerializedErrorContext;
    stack?: string;
}

/**
 * The single error type of faultline: a kind tag, a message and optional
 * diagnostic context. Never mutated after construction; the `with*` methods
 * and `clone` return new values.
 */
export class AppError extends Error {
    public readonly kind: ErrorKind;
    public readonly context?: ErrorContext;
    private readonly classifier?: ErrorClassifier;

    constructor(init: AppErrorInit) {
        super(init.message);
        this.name = 'AppError';
        this.kind = init.kind;
        if (init.context !== undefined) {
            this.context = init.context;
        }
        if (init.kind === ErrorKind.Custom) {
            // Owned copy: later changes to the caller's instance never leak in
            this.classifier = init.classifier.duplicate();
        }

        // Ensure proper stack trace in Node.js
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }

    /**
     * Built-in kinds resolve the shared table entry; `Custom` returns its own classifier.
     */
    public category(): ErrorClassifier {
        const kind = this.kind;
        if (isBuiltinKind(kind)) {
            return BUILTIN_CLASSIFIERS[kind];
        }
        return this.classifier ?? DEFAULT_CLASSIFIER;
    }

    public isRetriable(): boolean {
        return this.category().isRetriable();
    }

    public retryDelay(attempt: number): number {
        return this.category().retryDelay(attempt);
    }

    public withContext(context: ErrorContext): AppError {
        return this.rebuild(context);
    }

    /**
     * Annotates the error's context, creating one first if it has none.
     */
    public withMetadata(key: string, value: string): AppError {
        const context = this.context ?? ErrorContext.create();
        return this.rebuild(context.withMetadata(key, value));
    }

    public clone(): AppError {
        return this.rebuild(this.context);
    }

    /**
     * Fresh context describing this error within `operation`, chained onto the
     * error's existing context when there is one.
     */
    public toContext(operation: string): ErrorContext {
        return ErrorContext.create({
            cause: this.context,
            metadata: [
                ['operation', operation],
                ['category', this.category().categoryName()],
                ['message', this.message],
            ],
        });
    }

    /**
     * Retriable and still under the configured attempt limit.
     */
    public shouldRetry(attempt: number, settings: ErrorSettings = CONFIG.ERRORS): boolean {
        return this.isRetriable() && normalizeAttempt(attempt) < settings.MAX_RETRIES;
    }

    /**
     * Writes the error through the Logger when error logging is on and `level`
     * meets `settings.LOG_LEVEL`. The settings threshold is the only one that
     * applies here. Returns whether it wrote.
     */
    public logIfEnabled(level: LogLevel, settings: ErrorSettings = CONFIG.ERRORS): boolean {
        if (!settings.LOG_ERRORS || level < settings.LOG_LEVEL) {
            return false;
        }
        Logger.write(level, 'AppError', this.toUserFriendly(), this.serialize(settings));
        return true;
    }

    /**
     * Structural form for logs. The classifier is never included; `stack` only
     * when backtraces are enabled.
     */
    public serialize(settings: ErrorSettings = CONFIG.ERRORS): SerializedAppError {
        const serialized: SerializedAppError = {
            kind: this.kind,
            message: this.message,
        };
        if (this.context !== undefined) {
            serialized.context = this.context.toJSON();
        }
        if (settings.BACKTRACE && this.stack !== undefined) {
            serialized.stack = this.stack;
        }
        return serialized;
    }

    /**
     * Converts the error to a plain object for JSON serialization.
     */
    public toJSON(): SerializedAppError {
        return this.serialize();
    }

    public toUserFriendly(): string {
        return `[${this.category().categoryName()}] ${this.message}`;
    }

    /**
     * Detailed string representation for internal logging.
     */
    public toDebugString(): string {
        return JSON.stringify(this.serialize(), null, 2);
    }

    private rebuild(context: ErrorContext | undefined): AppError {
        const kind = this.kind;
        const copy = isBuiltinKind(kind)
            ? new AppError({ kind, message: this.message, context })
            : new AppError({ kind, message: this.message, context, classifier: this.category() });
        copy.stack = this.stack;
        return copy;
    }
}
