// src/core/errors/ErrorClassifier.ts

/**
 * Retry behaviour attached to an error category.
 *
 * Built-in kinds resolve a shared, stateless implementation by table lookup;
 * `Custom` errors own their own instance. Implementations must keep every
 * method free of side effects.
 */
export interface ErrorClassifier {
    /** Whether a failure in this category is worth retrying at all. */
    isRetriable(): boolean;

    /**
     * Suggested wait in milliseconds before the next attempt, where `attempt`
     * is the 0-indexed count of failed attempts so far. Must be deterministic.
     * Callers check `isRetriable()` before acting on it.
     */
    retryDelay(attempt: number): number;

    /** Display identifier. Not guaranteed unique across custom classifiers. */
    categoryName(): string;

    /** Independent copy sharing no mutable state with the receiver. */
    duplicate(): ErrorClassifier;
}
