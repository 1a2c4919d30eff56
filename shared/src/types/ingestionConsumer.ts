/**
 * Downstream consumer contract (dispatcher -> workers).
 *
 * Consumers must tolerate duplicate delivery: an item re-pushed between pop and
 * consume completion is delivered again in a later batch.
 */

import type { QueueItem } from '../ingestion/queueItem.js'

export interface IIngestionConsumer {
    /**
     * Process one popped batch for a tenant.
     * Rejecting does not return the items to the queue.
     * @param signal - Aborts when the consumer timeout elapses or the dispatcher shuts down
     */
    consume(tenantId: string, items: QueueItem[], signal: AbortSignal): Promise<void>
}
