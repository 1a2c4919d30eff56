/**
 * Domain exceptions for ingestion queue operations.
 * Translates backing-store and abort errors into an inspectable taxonomy.
 *
 * Every exception carries a stable `code` so callers branch on kind, never on message text.
 */

export type IngestionErrorCode = 'InvalidArgument' | 'StoreUnavailable' | 'StoreCorrupt' | 'Cancelled'

/**
 * Base class for all ingestion queue exceptions.
 */
export abstract class IngestionQueueException extends Error {
    abstract readonly code: IngestionErrorCode

    constructor(
        message: string,
        public readonly retryable: boolean,
        options?: { cause?: unknown }
    ) {
        super(message, options)
        this.name = this.constructor.name
        Error.captureStackTrace(this, this.constructor)
    }
}

/**
 * Malformed input (empty sourceType, nil identifier, non-positive limit).
 * Programmer error - never retried.
 */
export class InvalidArgumentException extends IngestionQueueException {
    readonly code = 'InvalidArgument' as const

    constructor(
        message: string,
        public readonly argument: string
    ) {
        super(message, false)
    }
}

/**
 * Backing store unreachable, timed out, or rejected the command.
 * Retryable by the caller.
 */
export class StoreUnavailableException extends IngestionQueueException {
    readonly code = 'StoreUnavailable' as const

    constructor(message: string, cause?: unknown) {
        super(message, true, { cause })
    }
}

/**
 * A stored member could not be decoded.
 * The queue logs and skips it; it is not thrown to queue callers.
 */
export class StoreCorruptException extends IngestionQueueException {
    readonly code = 'StoreCorrupt' as const

    constructor(
        public readonly tenantId: string,
        public readonly member: string,
        public readonly score: number
    ) {
        super(`Undecodable queue member '${member}' for tenant ${tenantId} (score ${score})`, false)
    }
}

/**
 * The caller's abort signal fired before the operation completed.
 */
export class CancelledException extends IngestionQueueException {
    readonly code = 'Cancelled' as const

    constructor(message = 'Operation cancelled', cause?: unknown) {
        super(message, false, { cause })
    }
}

export function isIngestionQueueException(error: unknown): error is IngestionQueueException {
    return error instanceof IngestionQueueException
}

/**
 * True when the error is worth retrying (StoreUnavailable).
 */
export function isRetryableIngestionError(error: unknown): boolean {
    return isIngestionQueueException(error) && error.retryable
}

function isAbortError(error: unknown): boolean {
    return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')
}

/**
 * Translate a raw backing-store error to a queue exception.
 * Queue exceptions pass through unchanged.
 * @param error - Error thrown by the store client
 * @param context - Operation description prefixed to the message
 */
export function translateStoreError(error: unknown, context?: string): IngestionQueueException {
    if (isIngestionQueueException(error)) {
        return error
    }
    const contextPrefix = context ? `${context}: ` : ''
    if (isAbortError(error)) {
        return new CancelledException(`${contextPrefix}cancelled`, error)
    }
    const message = error instanceof Error ? error.message : String(error)
    return new StoreUnavailableException(`${contextPrefix}${message || 'Unknown store error'}`, error)
}
