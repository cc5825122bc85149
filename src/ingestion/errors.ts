/**
 * Error taxonomy for the ingestion pipeline.
 *
 * Every failure of a single fetch is an IngestionError with a `kind` discriminant.
 * Only Transient and RateLimited are retryable.
 */

export type FetchErrorKind =
    | 'Transient'
    | 'RateLimited'
    | 'ClientError'
    | 'Malformed'
    | 'QuotaExceeded'
    | 'RetriesExhausted'
    | 'Cancelled';

export type IngestionErrorKind = FetchErrorKind | 'StorageFailure';

export abstract class IngestionError extends Error {
    abstract readonly kind: IngestionErrorKind;
    abstract readonly retryable: boolean;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Network timeout, connection reset, 5xx
 */
export class TransientError extends IngestionError {
    readonly kind = 'Transient' as const;
    readonly retryable = true;

    constructor(message: string, readonly statusCode?: number, options?: { cause?: unknown }) {
        super(message, options);
    }
}

/**
 * Provider answered 429. `retryAfterMs` carries the Retry-After hint when one was sent.
 */
export class RateLimitedError extends IngestionError {
    readonly kind = 'RateLimited' as const;
    readonly retryable = true;

    constructor(message: string, readonly retryAfterMs?: number, options?: { cause?: unknown }) {
        super(message, options);
    }
}

/**
 * 4xx other than 429: bad key, malformed request
 */
export class ClientError extends IngestionError {
    readonly kind = 'ClientError' as const;
    readonly retryable = false;

    constructor(message: string, readonly statusCode: number, options?: { cause?: unknown }) {
        super(message, options);
    }
}

/**
 * Response body is not JSON or fails schema validation
 */
export class MalformedPayloadError extends IngestionError {
    readonly kind = 'Malformed' as const;
    readonly retryable = false;

    constructor(message: string, readonly issues: string[] = [], options?: { cause?: unknown }) {
        super(message, options);
    }
}

/**
 * Local quota budget refused the call before it reached the network
 */
export class QuotaExceededError extends IngestionError {
    readonly kind = 'QuotaExceeded' as const;
    readonly retryable = false;

    constructor(message: string, readonly window: 'daily' | 'minute') {
        super(message);
    }
}

export class RetriesExhaustedError extends IngestionError {
    readonly kind = 'RetriesExhausted' as const;
    readonly retryable = false;

    constructor(readonly lastError: IngestionError, readonly attempts: number) {
        super(`Gave up after ${attempts} attempts: ${lastError.message}`, { cause: lastError });
    }
}

/**
 * Shutdown interrupted a retry chain before it could finish
 */
export class FetchCancelledError extends IngestionError {
    readonly kind = 'Cancelled' as const;
    readonly retryable = false;

    constructor(readonly attempts: number, readonly lastError?: IngestionError) {
        super(`Cancelled after ${attempts} attempts`, { cause: lastError });
    }
}

export class StorageFailureError extends IngestionError {
    readonly kind = 'StorageFailure' as const;
    readonly retryable = false;
}

export function isIngestionError(error: unknown): error is IngestionError {
    return error instanceof IngestionError;
}

/**
 * Wrap anything thrown into the taxonomy. Unknown failures are treated as transient.
 */
export function toIngestionError(error: unknown): IngestionError {
    if (isIngestionError(error)) return error;
    return new TransientError(describeError(error), undefined, { cause: error });
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
