/**
 * Opaque access to the relational domain store for ingestion handlers.
 *
 * The queue never consults it; handlers use it to enrich or skip popped items
 * (e.g. an entity deleted after its change signal was pushed).
 */
export interface IEntityStore {
    exists(tenantId: string, sourceType: string, sourceId: string, signal?: AbortSignal): Promise<boolean>
}
