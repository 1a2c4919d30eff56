/**
 * Centralized Inversify tokens (string identifiers).
 *
 * Keeping them in one place reduces drift and typos across container configs
 * and @inject decorators.
 */
export const TOKENS = {
    // Core
    StoreConfig: 'StoreConfig',
    DispatcherConfig: 'DispatcherConfig',
    TelemetryClient: 'ITelemetryClient',
    Clock: 'IClock',
    Logger: 'Logger',

    // Redis
    RedisConfig: 'RedisConfig',
    RedisConnection: 'IRedisConnection',

    // Stores
    SortedSetStore: 'ISortedSetStore',
    EntityStore: 'IEntityStore',

    // Ingestion
    IngestionQueue: 'IIngestionQueue',
    IngestionConsumer: 'IIngestionConsumer',
    IngestionHandlers: 'IIngestionHandler'
} as const

export type TokenName = keyof typeof TOKENS
export type TokenValue = (typeof TOKENS)[TokenName]
