import { SOURCE_TYPES, type IEntityStore } from '@story-engine/shared'
import type { Container } from 'inversify'

import { LoggingIngestionHandler } from '../consumers/handlers/LoggingIngestionHandler.js'
import type { IIngestionHandler } from '../consumers/types.js'
import type { Logger } from '../logging/logger.js'
import { TOKENS } from './tokens.js'

/**
 * Registers one ingestion handler per known source type (multi-bound under IIngestionHandler).
 * Handlers consult IEntityStore only when one is bound.
 */
export function registerIngestionHandlers(container: Container, sourceTypes: readonly string[] = SOURCE_TYPES): void {
    for (const sourceType of sourceTypes) {
        container
            .bind<IIngestionHandler>(TOKENS.IngestionHandlers)
            .toDynamicValue((context) => {
                const logger = context.container.get<Logger>(TOKENS.Logger).child({ component: 'ingestion-handler', sourceType })
                const entityStore = context.container.isBound(TOKENS.EntityStore)
                    ? context.container.get<IEntityStore>(TOKENS.EntityStore)
                    : undefined
                return new LoggingIngestionHandler(sourceType, logger, entityStore)
            })
            .inSingletonScope()
    }
}
