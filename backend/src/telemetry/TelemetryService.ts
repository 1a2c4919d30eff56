/**
 * Telemetry Service - Central service for emitting ingestion telemetry
 *
 * Provides enriched telemetry methods that wrap ITelemetryClient.
 * Queue, dispatcher and consumers inject this service via DI.
 */
import { type IngestionEventName, isIngestionEventName, SERVICE_INGESTION_DISPATCHER } from '@story-engine/shared'
import { inject, injectable } from 'inversify'
import { randomUUID } from 'node:crypto'
import type { ITelemetryClient } from './ITelemetryClient.js'

export interface IngestionTelemetryOptions {
    tenantId?: string | null
    serviceOverride?: string
    correlationId?: string | null
}

@injectable()
export class TelemetryService {
    constructor(@inject('ITelemetryClient') private client: ITelemetryClient) {}

    /**
     * Track an ingestion event with automatic enrichment
     * @param name - Event name from INGESTION_EVENT_NAMES
     * @param opts - Optional enrichment options
     */
    trackIngestionEvent(name: IngestionEventName, properties?: Record<string, unknown>, opts?: IngestionTelemetryOptions): void {
        if (!isIngestionEventName(name)) {
            this.client.trackEvent({ name: 'Telemetry.EventName.Invalid', properties: { requested: name } })
            return
        }

        const finalProps: Record<string, unknown> = { ...properties }

        if (finalProps.service === undefined) {
            finalProps.service = opts?.serviceOverride || this.inferService()
        }

        if (opts?.tenantId && finalProps.tenantId === undefined) {
            finalProps.tenantId = opts.tenantId
        }

        // Always attach correlationId; generate if not supplied
        if (finalProps.correlationId === undefined) {
            finalProps.correlationId = opts?.correlationId || randomUUID()
        }

        this.client.trackEvent({ name, properties: finalProps })
    }

    /**
     * Track a gauge-style metric (e.g. tenants with pending items)
     */
    trackMetric(name: string, value: number, properties?: Record<string, unknown>): void {
        this.client.trackMetric({ name, value, properties })
    }

    /**
     * Track an exception
     */
    trackException(error: Error, properties?: Record<string, unknown>): void {
        this.client.trackException({ exception: error, properties })
    }

    flush(): void {
        this.client.flush()
    }

    private inferService(): string {
        return process.env.INGESTION_SERVICE_NAME || SERVICE_INGESTION_DISPATCHER
    }
}
