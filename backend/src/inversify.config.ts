/**
 * Inversify Container Configuration
 *
 * Binds the store selected by the persistence config (memory or redis), then the shared
 * services: clock, logger, telemetry, queue, router consumer, handlers and dispatcher.
 *
 * Telemetry selection:
 * - Explicit client in options (tests pass MockTelemetryClient)
 * - NODE_ENV=test: NullTelemetryClient (never load Application Insights under test)
 * - APPLICATIONINSIGHTS_CONNECTION_STRING set: Application Insights default client
 * - Otherwise: NullTelemetryClient
 */
import { type IClock, type IEntityStore, SystemClock } from '@story-engine/shared'
import type { Container } from 'inversify'
import type { IngestionDispatcherConfig } from './config/ingestionDispatcherConfig.js'
import { registerIngestionHandlers } from './di/registerIngestionHandlers.js'
import { registerClock, registerIngestionServices, registerLogger, registerTelemetry } from './di/registerServices.js'
import { TOKENS } from './di/tokens.js'
import { bindMemoryStore } from './inversify.memory.config.js'
import { bindRedisStore } from './inversify.redis.config.js'
import { createLogger, type Logger } from './logging/logger.js'
import type { IStoreConfig } from './persistenceConfig.js'
import type { ITelemetryClient } from './telemetry/ITelemetryClient.js'

export interface ContainerOptions {
    storeConfig: IStoreConfig
    dispatcherConfig: IngestionDispatcherConfig
    logger?: Logger
    clock?: IClock
    telemetryClient?: ITelemetryClient
    /** Relational store consulted by handlers; handlers skip the existence check when absent */
    entityStore?: IEntityStore
    /** Source types that get a handler (defaults to the full vocabulary) */
    sourceTypes?: readonly string[]
}

async function resolveTelemetryClient(options: ContainerOptions): Promise<ITelemetryClient | undefined> {
    if (options.telemetryClient) return options.telemetryClient
    if (process.env.NODE_ENV === 'test' || !process.env.APPLICATIONINSIGHTS_CONNECTION_STRING) return undefined

    // Application Insights is set up by the entry point before the container is built
    const appInsightsModule = await import('applicationinsights')
    return appInsightsModule.default.defaultClient
}

export const setupContainer = async (container: Container, options: ContainerOptions): Promise<Container> => {
    const { storeConfig } = options
    container.bind<IStoreConfig>(TOKENS.StoreConfig).toConstantValue(storeConfig)

    if (storeConfig.mode === 'redis') {
        if (!storeConfig.redis) {
            throw new Error('Redis store mode requires redis configuration (REDIS_URL)')
        }
        bindRedisStore(container, storeConfig.redis)
    } else {
        bindMemoryStore(container)
    }

    if (options.entityStore) {
        container.bind<IEntityStore>(TOKENS.EntityStore).toConstantValue(options.entityStore)
    }

    const clock = options.clock
    registerClock(container, () => clock ?? new SystemClock())
    registerLogger(container, options.logger ?? createLogger())
    registerTelemetry(container, await resolveTelemetryClient(options))
    registerIngestionHandlers(container, options.sourceTypes)
    registerIngestionServices(container, options.dispatcherConfig)

    return container
}
