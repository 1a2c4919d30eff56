/**
 * Ingestion Test Fixture - container wired for unit tests
 *
 * Features:
 * - Memory sorted-set store (or a supplied subclass such as FlakySortedSetStore)
 * - FakeClock driving queue scores and dispatcher cutoffs
 * - MockTelemetryClient via DI
 * - Silent logger
 * - Optional consumer override (RecordingConsumer)
 */

import { FakeClock, type IEntityStore, type IIngestionConsumer, type IIngestionQueue } from '@story-engine/shared'
import { Container } from 'inversify'
import { resolveDispatcherConfig, type IngestionDispatcherConfigOverrides } from '../../src/config/ingestionDispatcherConfig.js'
import { TOKENS } from '../../src/di/tokens.js'
import { IngestionDispatcher } from '../../src/dispatcher/ingestionDispatcher.js'
import { setupContainer } from '../../src/inversify.config.js'
import { createSilentLogger } from '../../src/logging/logger.js'
import { MemorySortedSetStore } from '../../src/repos/sortedSetStore.memory.js'
import { MockTelemetryClient } from '../mocks/MockTelemetryClient.js'

/** FakeClock default start instant */
const START = new Date('2025-01-01T00:00:00.000Z')

export interface IngestionFixtureOptions {
    dispatcher?: IngestionDispatcherConfigOverrides
    consumer?: IIngestionConsumer
    store?: MemorySortedSetStore
    entityStore?: IEntityStore
    sourceTypes?: readonly string[]
}

export class IngestionTestFixture {
    readonly clock = new FakeClock()
    readonly telemetryClient = new MockTelemetryClient()
    readonly container = new Container()

    async setup(options: IngestionFixtureOptions = {}): Promise<this> {
        await setupContainer(this.container, {
            storeConfig: { mode: 'memory' },
            dispatcherConfig: resolveDispatcherConfig(options.dispatcher),
            logger: createSilentLogger(),
            clock: this.clock,
            telemetryClient: this.telemetryClient,
            entityStore: options.entityStore,
            sourceTypes: options.sourceTypes
        })

        if (options.store) {
            this.container.rebind(MemorySortedSetStore).toConstantValue(options.store)
        }
        if (options.consumer) {
            this.container.rebind<IIngestionConsumer>(TOKENS.IngestionConsumer).toConstantValue(options.consumer)
        }
        return this
    }

    get store(): MemorySortedSetStore {
        return this.container.get(MemorySortedSetStore)
    }

    get queue(): IIngestionQueue {
        return this.container.get<IIngestionQueue>(TOKENS.IngestionQueue)
    }

    get dispatcher(): IngestionDispatcher {
        return this.container.get(IngestionDispatcher)
    }

    /** Instant `offsetSeconds` after the clock's start instant */
    at(offsetSeconds: number): Date {
        return new Date(START.getTime() + offsetSeconds * 1000)
    }

    /** Move the clock to `offsetSeconds` after the start instant */
    setOffset(offsetSeconds: number): void {
        this.clock.setTime(this.at(offsetSeconds))
    }

    teardown(): void {
        this.store.clear()
        this.telemetryClient.clear()
    }
}

/** Fixed tenant and source identifiers for tests */
export const IDS = {
    T1: '11111111-1111-4111-8111-111111111111',
    T2: '22222222-2222-4222-8222-222222222222',
    C1: 'c1c1c1c1-0000-4000-8000-000000000001',
    S1: '5c5c5c5c-0000-4000-8000-000000000002',
    L1: '10c10c10-0000-4000-8000-000000000003',
    F1: 'fafafafa-0000-4000-8000-000000000004',
    A1: 'a1a1a1a1-0000-4000-8000-000000000005'
} as const

/**
 * Deterministic distinct UUID for index `n` (test data only).
 */
export function sourceIdFor(n: number): string {
    return `00000000-0000-4000-8000-${n.toString(16).padStart(12, '0')}`
}
