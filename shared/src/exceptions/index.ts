/**
 * Domain exceptions for ingestion queue operations.
 */

export {
    CancelledException,
    IngestionQueueException,
    InvalidArgumentException,
    StoreCorruptException,
    StoreUnavailableException,
    isIngestionQueueException,
    isRetryableIngestionError,
    translateStoreError,
    type IngestionErrorCode
} from './ingestionExceptions.js'
