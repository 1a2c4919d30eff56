import type { TelemetryClient } from 'applicationinsights'

/**
 * The slice of the Application Insights client the ingestion services emit through.
 * Bound in the container so tests can swap in a recording client and local runs a null one.
 */
export type ITelemetryClient = Pick<TelemetryClient, 'trackEvent' | 'trackException' | 'trackMetric' | 'flush'>
