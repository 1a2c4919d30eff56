import { injectable } from 'inversify'
import type { ITelemetryClient } from './ITelemetryClient.js'

/**
 * Telemetry sink for processes started without APPLICATIONINSIGHTS_CONNECTION_STRING.
 * Every call is dropped.
 */
@injectable()
export class NullTelemetryClient implements ITelemetryClient {
    trackEvent(): void {}

    trackException(): void {}

    trackMetric(): void {}

    flush(): void {}
}
