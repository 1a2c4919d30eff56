// reflect-metadata MUST be imported first for InversifyJS decorator metadata to work
import 'reflect-metadata'
// Import order matters: initialize App Insights before any user code for auto-collection.
import appInsights from 'applicationinsights'
import { SERVICE_INGESTION_DISPATCHER } from '@story-engine/shared'
import { Container } from 'inversify'
import { getDispatcherConfigFromEnv } from './config/ingestionDispatcherConfig.js'
import { TOKENS } from './di/tokens.js'
import { IngestionDispatcher } from './dispatcher/ingestionDispatcher.js'
import { setupContainer } from './inversify.config.js'
import { createLogger } from './logging/logger.js'
import { loadStoreConfig } from './persistenceConfig.js'
import type { IRedisConnection } from './repos/base/redisConnection.js'
import { TelemetryService } from './telemetry/TelemetryService.js'

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']

async function main(): Promise<void> {
    const logger = createLogger({ service: SERVICE_INGESTION_DISPATCHER })

    if (process.env.APPLICATIONINSIGHTS_CONNECTION_STRING) {
        appInsights.setup().start()
    } else {
        logger.info('APPLICATIONINSIGHTS_CONNECTION_STRING not set - telemetry disabled')
    }

    const storeConfig = loadStoreConfig()
    const dispatcherConfig = getDispatcherConfigFromEnv()

    const startTime = Date.now()
    const container = await setupContainer(new Container(), { storeConfig, dispatcherConfig, logger })
    logger.info({ storeMode: storeConfig.mode, durationMs: Date.now() - startTime }, 'container setup completed')

    const connection = storeConfig.mode === 'redis' ? container.get<IRedisConnection>(TOKENS.RedisConnection) : null
    await connection?.connect()

    const dispatcher = container.get(IngestionDispatcher)
    const telemetry = container.get(TelemetryService)

    const shutdown = new AbortController()
    for (const signal of SHUTDOWN_SIGNALS) {
        process.once(signal, () => {
            logger.info({ signal }, 'shutdown requested')
            shutdown.abort(new Error(`Received ${signal}`))
        })
    }

    try {
        await dispatcher.run(shutdown.signal)
        if (dispatcherConfig.drainOnShutdown) {
            await dispatcher.drain()
        }
    } finally {
        telemetry.flush()
        await connection?.close()
        logger.info('ingestion dispatcher exited')
    }
}

main().catch((error: unknown) => {
    console.error('Ingestion dispatcher failed', error)
    process.exitCode = 1
})
