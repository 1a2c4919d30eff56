// Root barrel – grouped re-exports delegate to per-directory barrels to keep exports close to implementation.

export * from './exceptions/index.js'
export * from './ingestion/index.js'
export * from './serviceConstants.js'
export * from './telemetryEvents.js'
export * from './time/IClock.js'
export type { IEntityStore } from './types/entityStore.js'
export type { IIngestionConsumer } from './types/ingestionConsumer.js'
export type { IIngestionQueue } from './types/ingestionQueue.js'
export * from './utils/validation.js'
