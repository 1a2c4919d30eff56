import type { IEntityStore, QueueItem } from '@story-engine/shared'
import type { Logger } from '../../logging/logger.js'
import { BaseIngestionHandler } from './base/BaseIngestionHandler.js'

/**
 * Default handler for a source type: records that the entity is ready for downstream
 * indexing. Deployments replace it with a worker-specific handler per source type.
 */
export class LoggingIngestionHandler extends BaseIngestionHandler {
    constructor(
        readonly sourceType: string,
        logger: Logger,
        entityStore?: IEntityStore
    ) {
        super(logger, entityStore)
    }

    protected async ingest(item: QueueItem): Promise<void> {
        this.logger.info(
            { tenantId: item.tenantId, sourceType: item.sourceType, sourceId: item.sourceId, changedAt: item.timestamp.toISOString() },
            'entity ready for ingestion'
        )
    }
}
