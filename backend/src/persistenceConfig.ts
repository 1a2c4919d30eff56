/** Backing store configuration & mode resolution */

export type StoreMode = 'memory' | 'redis'

/**
 * How ListTenantsWithItems enumerates tenants on Redis.
 * - scan: cursor SCAN over ingestion:queue:* (compatible with producers that keep no index)
 * - index: maintained set ingestion:tenants (O(active tenants) per tick)
 */
export type TenantEnumerationStrategy = 'scan' | 'index'

export interface IStoreConfig {
    mode: StoreMode
    redis?: {
        url: string
        tenantEnumeration: TenantEnumerationStrategy
        /** Per-command timeout enforced by the client (ms) */
        commandTimeoutMs: number
        /** SCAN COUNT hint */
        scanCount: number
    }
}

export type RedisStoreConfig = NonNullable<IStoreConfig['redis']>

const DEFAULT_COMMAND_TIMEOUT_MS = 5_000
const DEFAULT_SCAN_COUNT = 100

export function resolveStoreMode(env: NodeJS.ProcessEnv = process.env): StoreMode {
    const m = (env.INGESTION_STORE_MODE || 'memory').toLowerCase()
    return m === 'redis' ? 'redis' : 'memory'
}

export function resolveTenantEnumeration(value: string | undefined): TenantEnumerationStrategy {
    return (value || 'scan').toLowerCase() === 'index' ? 'index' : 'scan'
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
    if (!value) return fallback
    const parsed = Number.parseInt(value, 10)
    return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback
}

/**
 * Load store configuration from environment variables.
 * In redis mode without REDIS_URL, falls back to memory unless INGESTION_STORE_STRICT is set.
 */
export function loadStoreConfig(env: NodeJS.ProcessEnv = process.env): IStoreConfig {
    const mode = resolveStoreMode(env)
    if (mode === 'memory') {
        return { mode: 'memory' }
    }

    const url = env.REDIS_URL?.trim()
    const strict = env.INGESTION_STORE_STRICT === '1' || env.INGESTION_STORE_STRICT === 'true'

    if (!url) {
        if (strict) {
            throw new Error('INGESTION_STORE_STRICT enabled but Redis configuration incomplete. Missing: REDIS_URL')
        }
        console.warn('[persistenceConfig] INGESTION_STORE_MODE=redis but REDIS_URL is not set. Falling back to memory store.')
        return { mode: 'memory' }
    }

    return {
        mode: 'redis',
        redis: {
            url,
            tenantEnumeration: resolveTenantEnumeration(env.INGESTION_TENANT_ENUMERATION),
            commandTimeoutMs: parsePositiveInt(env.REDIS_COMMAND_TIMEOUT_MS, DEFAULT_COMMAND_TIMEOUT_MS),
            scanCount: parsePositiveInt(env.REDIS_SCAN_COUNT, DEFAULT_SCAN_COUNT)
        }
    }
}
