/**
 * Abstract base class for per-source-type ingestion handlers.
 *
 * Subclasses implement:
 * - ingest(): Process an item whose source entity still exists
 *
 * Base class provides:
 * - Abort check before any work
 * - Skipping items whose source entity was deleted after the change was queued
 *   (only when an entity store is bound)
 */

import type { IEntityStore, QueueItem } from '@story-engine/shared'
import type { Logger } from '../../../logging/logger.js'
import { throwIfAborted } from '../../../utils/abort.js'
import type { IIngestionHandler, IngestionHandlerResult } from '../../types.js'

export abstract class BaseIngestionHandler implements IIngestionHandler {
    abstract readonly sourceType: string

    constructor(
        protected readonly logger: Logger,
        protected readonly entityStore?: IEntityStore
    ) {}

    async handle(item: QueueItem, signal: AbortSignal): Promise<IngestionHandlerResult> {
        throwIfAborted(signal, `Ingest ${item.sourceType}`)

        if (this.entityStore) {
            const exists = await this.entityStore.exists(item.tenantId, item.sourceType, item.sourceId, signal)
            if (!exists) {
                this.logger.debug(
                    { tenantId: item.tenantId, sourceType: item.sourceType, sourceId: item.sourceId },
                    'source entity no longer exists, skipping'
                )
                return { outcome: 'skipped', details: 'source entity not found' }
            }
        }

        await this.ingest(item, signal)
        return { outcome: 'ingested' }
    }

    protected abstract ingest(item: QueueItem, signal: AbortSignal): Promise<void>
}
