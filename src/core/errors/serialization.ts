// src/core/errors/serialization.ts

import { z } from 'zod';
import { AppError, SerializedAppError } from './AppError';
import { DEFAULT_CLASSIFIER } from './builtinClassifiers';
import { ErrorContext } from './ErrorContext';
import { ErrorFactory } from './errorFactory';
import { ErrorKind, isBuiltinKind } from './ErrorKind';
import { AppResult, err, ok } from './result';

/**
 * One link of a serialized context chain. `cause` is checked link by link
 * while walking the chain, so arbitrarily deep chains never recurse.
 */
export const serializedContextLinkSchema = z.object({
    identifier: z.string().min(1),
    timestamp: z.string().datetime({ offset: true }),
    metadata: z.array(z.tuple([z.string(), z.string()])),
    cause: z.unknown().optional(),
});

type SerializedContextLink = z.infer<typeof serializedContextLinkSchema>;

// Unknown keys such as `stack` are stripped
export const serializedErrorSchema = z.object({
    kind: z.nativeEnum(ErrorKind),
    message: z.string(),
    context: z.unknown().optional(),
});

function invalidShape(path: ReadonlyArray<string | number>, error: z.ZodError): AppError {
    const issue = error.issues[0];
    if (issue === undefined) {
        return ErrorFactory.validation(path.join('.'), 'invalid shape');
    }
    const field = [...path, ...issue.path].map(String).join('.');
    return ErrorFactory.validation(field, issue.message);
}

function restoreContext(data: unknown, path: string[]): AppResult<ErrorContext> {
    const links: SerializedContextLink[] = [];
    const seen = new Set<unknown>();
    let current: unknown = data;
    do {
        if (seen.has(current)) {
            return err(ErrorFactory.validation(path.join('.'), 'cyclic cause chain'));
        }
        seen.add(current);

        const parsed = serializedContextLinkSchema.safeParse(current);
        if (!parsed.success) {
            return err(invalidShape(path, parsed.error));
        }
        links.push(parsed.data);
        current = parsed.data.cause;
        path.push('cause');
    } while (current !== undefined);

    let context: ErrorContext | undefined;
    for (let index = links.length - 1; index >= 0; index--) {
        const link = links[index];
        if (link !== undefined) {
            context = ErrorContext.restore({
                identifier: link.identifier,
                timestamp: link.timestamp,
                metadata: link.metadata,
                cause: context,
            });
        }
    }
    return context === undefined ? err(ErrorFactory.validation(path.join('.'), 'empty chain')) : ok(context);
}

function parseJson(text: string): AppResult<unknown> {
    try {
        const data: unknown = JSON.parse(text);
        return ok(data);
    } catch (error) {
        return err(ErrorFactory.parsing(error instanceof Error ? error.message : String(error)));
    }
}

/**
 * Rebuilds a context with its identifier, timestamp, metadata order and cause chain intact.
 */
export function deserializeContext(data: unknown): AppResult<ErrorContext> {
    return restoreContext(data, ['context']);
}

/**
 * Rebuilds an error from its structural form.
 *
 * Built-in kinds get their classification back from the kind tag. A `Custom`
 * error's classifier never leaves the process, so it comes back with
 * DEFAULT_CLASSIFIER (non-retriable). This loss is permanent.
 */
export function deserializeError(data: unknown): AppResult<AppError> {
    const parsed = serializedErrorSchema.safeParse(data);
    if (!parsed.success) {
        return err(invalidShape(['error'], parsed.error));
    }

    const { kind, message } = parsed.data;
    let context: ErrorContext | undefined;
    if (parsed.data.context !== undefined) {
        const restored = restoreContext(parsed.data.context, ['error', 'context']);
        if (!restored.ok) {
            return restored;
        }
        context = restored.value;
    }

    if (isBuiltinKind(kind)) {
        return ok(new AppError({ kind, message, context }));
    }
    return ok(new AppError({ kind, message, context, classifier: DEFAULT_CLASSIFIER }));
}

export function stringifyError(error: AppError): string {
    const serialized: SerializedAppError = error.toJSON();
    return JSON.stringify(serialized);
}

export function stringifyContext(context: ErrorContext): string {
    return JSON.stringify(context.toJSON());
}

export function parseError(text: string): AppResult<AppError> {
    const data = parseJson(text);
    return data.ok ? deserializeError(data.value) : data;
}

export function parseContext(text: string): AppResult<ErrorContext> {
    const data = parseJson(text);
    return data.ok ? deserializeContext(data.value) : data;
}
