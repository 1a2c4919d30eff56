/**
 * Ingestion Queue Interface
 *
 * Purpose: Debounce "entity changed" signals per (tenant, sourceType, sourceId) and hand
 * stable batches to downstream ingestion workers.
 *
 * Key Design Principles:
 * - One entry per composite key; every push resets the entry's timestamp (debounce)
 * - An item becomes stable once it has gone a quiet period without a push
 * - popStable removes exactly what it returns, atomically with respect to push/remove
 * - Tenants are strict isolation boundaries
 *
 * Every method accepts an optional AbortSignal; an aborted call rejects with CancelledException.
 */

import type { QueueItem } from '../ingestion/queueItem.js'

export interface IIngestionQueue {
    /**
     * Record that an entity changed. Inserts the item or resets its timestamp to now.
     * @throws InvalidArgumentException on malformed identifiers or sourceType
     * @throws StoreUnavailableException when the backing store fails
     */
    push(tenantId: string, sourceType: string, sourceId: string, signal?: AbortSignal): Promise<void>

    /**
     * Atomically remove and return up to `limit` items whose timestamp is at or before `stableAt`,
     * ordered by ascending (timestamp, member). A `stableAt` in the future drains everything.
     * @throws InvalidArgumentException when limit is not a positive integer
     */
    popStable(tenantId: string, stableAt: Date, limit: number, signal?: AbortSignal): Promise<QueueItem[]>

    /**
     * popStable restricted to one source type.
     */
    popStableBySourceType(
        tenantId: string,
        sourceType: string,
        stableAt: Date,
        limit: number,
        signal?: AbortSignal
    ): Promise<QueueItem[]>

    /**
     * Drop a pending item (e.g. the source entity was deleted). Idempotent.
     * @returns Whether an item was present
     */
    remove(tenantId: string, sourceType: string, sourceId: string, signal?: AbortSignal): Promise<boolean>

    /**
     * Snapshot of tenants holding at least one item. No ordering guarantee.
     */
    listTenantsWithItems(signal?: AbortSignal): Promise<string[]>
}
