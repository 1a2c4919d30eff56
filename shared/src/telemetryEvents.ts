// Canonical ingestion telemetry event names (Domain.[Subject].Action) with 2-3 PascalCase segments.
//
// NO INLINE LITERALS: all event names must be referenced from this registry.

export const INGESTION_EVENT_NAMES = [
    // Queue operations
    'Ingestion.Queue.Pushed',
    'Ingestion.Queue.Popped',
    'Ingestion.Queue.Removed',
    'Ingestion.Queue.CorruptMember',
    'Ingestion.Queue.CorruptReinsertFailed',
    // Dispatcher loop
    'Ingestion.Dispatch.Started',
    'Ingestion.Dispatch.Stopped',
    'Ingestion.Dispatch.TickCompleted',
    'Ingestion.Dispatch.BatchConsumed',
    'Ingestion.Dispatch.BatchFailed',
    'Ingestion.Dispatch.PopFailed',
    'Ingestion.Dispatch.ListFailed',
    'Ingestion.Dispatch.Drained',
    // Consumer routing
    'Ingestion.Handler.Unsupported',
    'Ingestion.Handler.Failed'
] as const

export type IngestionEventName = (typeof INGESTION_EVENT_NAMES)[number]

/** Metric emitted once per tick: tenants with pending items (primary operational alarm) */
export const INGESTION_METRIC_TENANTS_PENDING = 'Ingestion.Dispatch.TenantsPending'

export function isIngestionEventName(name: string): name is IngestionEventName {
    return (INGESTION_EVENT_NAMES as readonly string[]).includes(name)
}

// Regex used by tests to keep names consistent
export const TELEMETRY_NAME_REGEX = /^[A-Z][A-Za-z]+(\.[A-Z][A-Za-z]+){1,2}$/
