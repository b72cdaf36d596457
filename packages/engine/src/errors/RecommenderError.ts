/**
 * @fileoverview Typed engine failures
 *
 * Every failure surfaced to the serving facade is a RecommenderError
 * subclass with a stable `code`, so the facade can map it to a status
 * without matching on messages.
 *
 * @module @studyrank/engine/errors/RecommenderError
 */

export type RecommenderErrorCode =
    | "NOT_FOUND"
    | "DATA_INTEGRITY"
    | "LOGGING_FAILURE"
    | "INVALID_REQUEST";

/**
 * Base class for engine failures.
 */
export abstract class RecommenderError extends Error {
    abstract readonly code: RecommenderErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Catalog entity that a request or event referenced.
 */
export type CatalogEntity = "user" | "content";

/**
 * A referenced user or content id is absent from the catalog.
 * Surfaced immediately; no partial work is attempted.
 */
export class NotFoundError extends RecommenderError {
    readonly code = "NOT_FOUND";

    constructor(
        readonly entity: CatalogEntity,
        readonly id: string
    ) {
        super(`${entity === "user" ? "User" : "Content"} not found: ${id}`);
    }
}

/**
 * Stored history references a record that does not exist.
 * Scoring skips the offending row and reports this error instead of throwing it.
 */
export class DataIntegrityError extends RecommenderError {
    readonly code = "DATA_INTEGRITY";

    constructor(
        message: string,
        readonly details: Readonly<Record<string, unknown>> = {}
    ) {
        super(message);
    }
}

/**
 * Persisting the served recommendations failed.
 */
export class LoggingFailureError extends RecommenderError {
    readonly code = "LOGGING_FAILURE";

    constructor(
        readonly userId: string,
        readonly entryCount: number,
        cause: unknown
    ) {
        super(
            `Failed to log ${entryCount} recommendation(s) for user ${userId}: ` +
            (cause instanceof Error ? cause.message : String(cause)),
            { cause }
        );
    }
}

/**
 * Request parameters are outside their accepted domain.
 */
export class InvalidRequestError extends RecommenderError {
    readonly code = "INVALID_REQUEST";

    constructor(
        readonly field: string,
        message: string
    ) {
        super(message);
    }
}

export function isRecommenderError(error: unknown): error is RecommenderError {
    return error instanceof RecommenderError;
}
