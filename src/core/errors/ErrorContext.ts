// src/core/errors/ErrorContext.ts

import { v4 as uuidv4 } from 'uuid';

export type MetadataInput = Iterable<readonly [string, string]> | Readonly<Record<string, string>>;

export interface ErrorContextOptions {
    /** Prior context this one follows from. Fixed for the lifetime of the context. */
    cause?: ErrorContext;
    metadata?: MetadataInput;
}

/**
 * Wire shape of a context. Metadata is a list of pairs so key order survives
 * any JSON round trip.
 */
export interface SerializedErrorContext {
    identifier: string;
    timestamp: string;
    metadata: Array<[string, string]>;
    cause?: SerializedErrorContext;
}

export interface ErrorContextParts {
    identifier: string;
    timestamp: string;
    metadata?: MetadataInput;
    cause?: ErrorContext;
}

function isPairIterable(input: MetadataInput): input is Iterable<readonly [string, string]> {
    return Symbol.iterator in input;
}

function toMetadataMap(input: MetadataInput | undefined): Map<string, string> {
    if (input === undefined) {
        return new Map();
    }
    if (isPairIterable(input)) {
        return new Map(input);
    }
    return new Map(Object.entries(input));
}

/**
 * Diagnostic metadata attached to an error: a random identifier, the wall-clock
 * creation time, ordered string annotations and an optional prior cause.
 *
 * Instances are immutable. `withMetadata` returns a new context, so a reference
 * captured earlier (by a log line, by another error) never changes under it.
 * The cause is only ever set at creation, which keeps the chain acyclic.
 */
export class ErrorContext {
    public readonly identifier: string;
    public readonly timestamp: string;
    public readonly cause?: ErrorContext;
    private readonly entries: Map<string, string>;

    private constructor(identifier: string, timestamp: string, entries: Map<string, string>, cause?: ErrorContext) {
        this.identifier = identifier;
        this.timestamp = timestamp;
        this.entries = entries;
        if (cause !== undefined) {
            this.cause = cause;
        }
        Object.freeze(this);
    }

    /**
     * Fresh context: new UUID v4, current UTC time.
     */
    public static create(options: ErrorContextOptions = {}): ErrorContext {
        return new ErrorContext(uuidv4(), new Date().toISOString(), toMetadataMap(options.metadata), options.cause);
    }

    /**
     * Rebuilds a context with a known identity, e.g. after deserialization.
     */
    public static restore(parts: ErrorContextParts): ErrorContext {
        return new ErrorContext(parts.identifier, parts.timestamp, toMetadataMap(parts.metadata), parts.cause);
    }

    public get occurredAt(): Date {
        return new Date(this.timestamp);
    }

    /** Copy of the annotations in insertion order. */
    public get metadata(): ReadonlyMap<string, string> {
        return new Map(this.entries);
    }

    public get metadataCount(): number {
        return this.entries.size;
    }

    /**
     * Returns a context with `key` set to `value`. An existing key keeps its
     * position; a new key goes last. Identity, timestamp and cause carry over.
     */
    public withMetadata(key: string, value: string): ErrorContext {
        const entries = new Map(this.entries);
        entries.set(key, value);
        return new ErrorContext(this.identifier, this.timestamp, entries, this.cause);
    }

    public getMetadata(key: string): string | undefined {
        return this.entries.get(key);
    }

    public hasMetadata(key: string): boolean {
        return this.entries.has(key);
    }

    public metadataEntries(): Array<[string, string]> {
        return [...this.entries];
    }

    /**
     * This context followed by its causes, newest first.
     */
    public chain(): ErrorContext[] {
        const links: ErrorContext[] = [];
        let current: ErrorContext | undefined = this;
        while (current !== undefined) {
            links.push(current);
            current = current.cause;
        }
        return links;
    }

    /**
     * The chain front-to-back: the original failure first, this context last.
     */
    public history(): ErrorContext[] {
        return this.chain().reverse();
    }

    public rootCause(): ErrorContext {
        const links = this.chain();
        return links[links.length - 1] ?? this;
    }

    /**
     * Nested wire form, built from the root cause outwards so chain depth
     * never turns into call depth.
     */
    public toJSON(): SerializedErrorContext {
        let serialized: SerializedErrorContext | undefined;
        for (const link of this.history()) {
            const current: SerializedErrorContext = {
                identifier: link.identifier,
                timestamp: link.timestamp,
                metadata: link.metadataEntries(),
            };
            if (serialized !== undefined) {
                current.cause = serialized;
            }
            serialized = current;
        }
        return serialized ?? { identifier: this.identifier, timestamp: this.timestamp, metadata: this.metadataEntries() };
    }
}
