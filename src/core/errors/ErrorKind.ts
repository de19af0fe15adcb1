// src/core/errors/ErrorKind.ts

/**
 * Closed set of failure categories. `Custom` is the only extension point:
 * it carries a caller-supplied classifier instead of a table entry.
 */
export enum ErrorKind {
    Database = 'Database',
    Network = 'Network',
    Validation = 'Validation',
    NotFound = 'NotFound',
    Internal = 'Internal',
    Custom = 'Custom',
}

export type BuiltinErrorKind = Exclude<ErrorKind, ErrorKind.Custom>;

export function isBuiltinKind(kind: ErrorKind): kind is BuiltinErrorKind {
    return kind !== ErrorKind.Custom;
}
