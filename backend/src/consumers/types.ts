import type { QueueItem } from '@story-engine/shared'

/** Outcome classifications for per-source-type ingestion handlers */
export type IngestionHandlerOutcome =
    | 'ingested' // Handler processed the item
    | 'skipped' // Source entity no longer exists; nothing to ingest

export interface IngestionHandlerResult {
    outcome: IngestionHandlerOutcome
    details?: string
}

/** Interface for per-source-type ingestion handlers */
export interface IIngestionHandler {
    readonly sourceType: string
    /** Throw to mark the item failed; the rest of the batch continues. */
    handle(item: QueueItem, signal: AbortSignal): Promise<IngestionHandlerResult>
}
