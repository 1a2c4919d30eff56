import type { IIngestionHandler } from './types.js'

/** Build a registry mapping sourceType to handler instance */
export function buildIngestionHandlerRegistry(handlers: readonly IIngestionHandler[]): Map<string, IIngestionHandler> {
    const registry = new Map<string, IIngestionHandler>()
    for (const handler of handlers) {
        if (registry.has(handler.sourceType)) {
            throw new Error(`Duplicate ingestion handler registered for sourceType '${handler.sourceType}'`)
        }
        registry.set(handler.sourceType, handler)
    }
    return registry
}
