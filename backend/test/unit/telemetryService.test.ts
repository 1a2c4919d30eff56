import { SERVICE_INGESTION_DISPATCHER } from '@story-engine/shared'
import assert from 'node:assert'
import { beforeEach, describe, test } from 'node:test'
import { NullTelemetryClient } from '../../src/telemetry/NullTelemetryClient.js'
import { TelemetryService } from '../../src/telemetry/TelemetryService.js'
import { MockTelemetryClient } from '../mocks/MockTelemetryClient.js'

describe('TelemetryService', () => {
    let client: MockTelemetryClient
    let telemetry: TelemetryService

    beforeEach(() => {
        client = new MockTelemetryClient()
        telemetry = new TelemetryService(client)
    })

    test('enriches events with service, tenant and correlation id', () => {
        telemetry.trackIngestionEvent('Ingestion.Queue.Pushed', { sourceType: 'scene' }, { tenantId: 'tenant-a', correlationId: 'corr-1' })

        assert.deepStrictEqual(client.events, [
            {
                name: 'Ingestion.Queue.Pushed',
                properties: { sourceType: 'scene', service: SERVICE_INGESTION_DISPATCHER, tenantId: 'tenant-a', correlationId: 'corr-1' }
            }
        ])
    })

    test('generates a correlation id when none is supplied', () => {
        telemetry.trackIngestionEvent('Ingestion.Dispatch.Started')
        const correlationId = client.events[0].properties?.correlationId
        assert.strictEqual(typeof correlationId, 'string')
        assert.match(String(correlationId), /^[0-9a-f-]{36}$/)
    })

    test('explicit properties win over enrichment', () => {
        telemetry.trackIngestionEvent('Ingestion.Queue.Removed', { service: 'producer', tenantId: 'tenant-b' }, { tenantId: 'tenant-a' })
        assert.strictEqual(client.events[0].properties?.service, 'producer')
        assert.strictEqual(client.events[0].properties?.tenantId, 'tenant-b')
    })

    test('forwards metrics, exceptions and flush', () => {
        const error = new Error('store down')
        telemetry.trackMetric('Ingestion.Dispatch.TenantsPending', 3)
        telemetry.trackException(error, { op: 'pop' })
        telemetry.flush()

        assert.deepStrictEqual(client.metrics, [{ name: 'Ingestion.Dispatch.TenantsPending', value: 3, properties: undefined }])
        assert.strictEqual(client.exceptions[0].exception, error)
        assert.strictEqual(client.flushCount, 1)
    })

    test('NullTelemetryClient accepts every call', () => {
        const service = new TelemetryService(new NullTelemetryClient())
        service.trackIngestionEvent('Ingestion.Dispatch.Stopped')
        service.trackMetric('Ingestion.Dispatch.TenantsPending', 0)
        service.flush()
    })
})
