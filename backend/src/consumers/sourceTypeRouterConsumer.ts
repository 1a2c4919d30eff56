/**
 * Source-type router consumer
 *
 * Fans a popped batch out to the handler registered for each item's sourceType.
 * Items run sequentially in batch order; a failing item does not stop the rest.
 * The batch rejects with IngestionBatchError when at least one item failed, so the
 * dispatcher records the batch as failed.
 */

import type { IIngestionConsumer, QueueItem } from '@story-engine/shared'
import { inject, injectable, multiInject } from 'inversify'
import type { Logger } from '../logging/logger.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import { throwIfAborted } from '../utils/abort.js'
import { buildIngestionHandlerRegistry } from './registry.js'
import type { IIngestionHandler } from './types.js'

/**
 * Aggregate failure for one batch: some items were handed to a handler that threw.
 */
export class IngestionBatchError extends Error {
    constructor(
        public readonly tenantId: string,
        public readonly failedCount: number,
        public readonly totalCount: number,
        public readonly failures: unknown[] = []
    ) {
        super(`${failedCount} of ${totalCount} ingestion items failed for tenant ${tenantId}`)
        this.name = 'IngestionBatchError'
        Error.captureStackTrace(this, this.constructor)
    }
}

export interface BatchOutcome {
    ingested: number
    skipped: number
    unsupported: number
    failed: number
}

@injectable()
export class SourceTypeRouterConsumer implements IIngestionConsumer {
    private readonly registry: Map<string, IIngestionHandler>
    private readonly log: Logger

    constructor(
        @multiInject('IIngestionHandler') handlers: IIngestionHandler[],
        @inject('Logger') logger: Logger,
        @inject(TelemetryService) private readonly telemetry: TelemetryService
    ) {
        this.registry = buildIngestionHandlerRegistry(handlers)
        this.log = logger.child({ component: 'ingestion-router' })
    }

    supportedSourceTypes(): string[] {
        return Array.from(this.registry.keys())
    }

    async consume(tenantId: string, items: QueueItem[], signal: AbortSignal): Promise<void> {
        const outcome: BatchOutcome = { ingested: 0, skipped: 0, unsupported: 0, failed: 0 }
        const failures: unknown[] = []

        for (const item of items) {
            throwIfAborted(signal, 'Ingestion batch')

            const handler = this.registry.get(item.sourceType)
            if (!handler) {
                outcome.unsupported++
                this.log.warn({ tenantId, sourceType: item.sourceType, sourceId: item.sourceId }, 'unsupported source type')
                this.telemetry.trackIngestionEvent('Ingestion.Handler.Unsupported', { sourceType: item.sourceType }, { tenantId })
                continue
            }

            try {
                const result = await handler.handle(item, signal)
                if (result.outcome === 'skipped') {
                    outcome.skipped++
                } else {
                    outcome.ingested++
                }
            } catch (err) {
                outcome.failed++
                failures.push(err)
                this.log.error({ tenantId, sourceType: item.sourceType, sourceId: item.sourceId, err }, 'ingestion handler failed')
                this.telemetry.trackIngestionEvent(
                    'Ingestion.Handler.Failed',
                    { sourceType: item.sourceType, sourceId: item.sourceId, error: err instanceof Error ? err.message : String(err) },
                    { tenantId }
                )
            }
        }

        this.log.debug({ tenantId, count: items.length, ...outcome }, 'ingestion batch routed')

        if (outcome.failed > 0) {
            throw new IngestionBatchError(tenantId, outcome.failed, items.length, failures)
        }
    }
}
