/**
 * A pending ingestion signal for exactly one source entity.
 */
export interface QueueItem {
    /** Canonical lowercase tenant UUID */
    tenantId: string
    /** Entity kind (opaque to the queue) */
    sourceType: string
    /** Canonical lowercase entity UUID */
    sourceId: string
    /** Time of the most recent push that touched this item (second resolution) */
    timestamp: Date
}

/**
 * Composite identity of an item: tenant + type + id.
 */
export function queueItemIdentity(item: Pick<QueueItem, 'tenantId' | 'sourceType' | 'sourceId'>): string {
    return `${item.tenantId}:${item.sourceType}:${item.sourceId}`
}
