// src/index.ts

export { ErrorKind, isBuiltinKind } from './core/errors/ErrorKind';
export type { BuiltinErrorKind } from './core/errors/ErrorKind';
export type { ErrorClassifier } from './core/errors/ErrorClassifier';
export {
    BackoffClassifier,
    BUILTIN_CLASSIFIERS,
    DEFAULT_CLASSIFIER,
    classifierFor,
    exponentialBackoff,
    normalizeAttempt,
} from './core/errors/builtinClassifiers';
export type { BackoffOptions } from './core/errors/builtinClassifiers';
export { ErrorContext } from './core/errors/ErrorContext';
export type {
    ErrorContextOptions,
    ErrorContextParts,
    MetadataInput,
    SerializedErrorContext,
} from './core/errors/ErrorContext';
export { AppError } from './core/errors/AppError';
export type { AppErrorInit, SerializedAppError } from './core/errors/AppError';
export { ErrorFactory } from './core/errors/errorFactory';
export type { WrapOptions } from './core/errors/errorFactory';
export { ok, err, isOk, isErr, tryCatch, fromPromise, unwrap } from './core/errors/result';
export type { Result, AppResult } from './core/errors/result';
export {
    deserializeContext,
    deserializeError,
    parseContext,
    parseError,
    stringifyContext,
    stringifyError,
    serializedContextLinkSchema,
    serializedErrorSchema,
} from './core/errors/serialization';
export { RetryPolicy } from './core/retry/RetryPolicy';
export type { RandomSource, RetryDecision, RetryPolicyOptions } from './core/retry/RetryPolicy';
export { Logger, LogLevel } from './core/logging/Logger';
export { CONFIG } from './config/config';
export type { ErrorSettings } from './config/config';
