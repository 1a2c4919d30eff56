import type { IClock, IIngestionConsumer, IIngestionQueue } from '@story-engine/shared'
import type { Container } from 'inversify'

import type { IngestionDispatcherConfig } from '../config/ingestionDispatcherConfig.js'
import { SourceTypeRouterConsumer } from '../consumers/sourceTypeRouterConsumer.js'
import { IngestionDispatcher } from '../dispatcher/ingestionDispatcher.js'
import type { Logger } from '../logging/logger.js'
import { DebounceIngestionQueue } from '../queues/ingestionQueue.js'
import type { ITelemetryClient } from '../telemetry/ITelemetryClient.js'
import { NullTelemetryClient } from '../telemetry/NullTelemetryClient.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import { TOKENS } from './tokens.js'

export function registerClock(container: Container, createClock: () => IClock): void {
    container
        .bind<IClock>(TOKENS.Clock)
        .toDynamicValue(() => createClock())
        .inSingletonScope()
}

export function registerLogger(container: Container, logger: Logger): void {
    container.bind<Logger>(TOKENS.Logger).toConstantValue(logger)
}

/**
 * Bind ITelemetryClient (null client when none supplied) and TelemetryService.
 */
export function registerTelemetry(container: Container, client?: ITelemetryClient): void {
    if (client) {
        container.bind<ITelemetryClient>(TOKENS.TelemetryClient).toConstantValue(client)
    } else {
        container.bind<ITelemetryClient>(TOKENS.TelemetryClient).to(NullTelemetryClient).inSingletonScope()
    }

    // Concrete services use class-based injection only (no string token).
    container.bind<TelemetryService>(TelemetryService).toSelf().inSingletonScope()
}

/**
 * Queue, router consumer and dispatcher. Store bindings come from the persistence config.
 */
export function registerIngestionServices(container: Container, dispatcherConfig: IngestionDispatcherConfig): void {
    container.bind<IngestionDispatcherConfig>(TOKENS.DispatcherConfig).toConstantValue(dispatcherConfig)
    container.bind<IIngestionQueue>(TOKENS.IngestionQueue).to(DebounceIngestionQueue).inSingletonScope()
    container.bind<IIngestionConsumer>(TOKENS.IngestionConsumer).to(SourceTypeRouterConsumer).inSingletonScope()
    container.bind(IngestionDispatcher).toSelf().inSingletonScope()
}
