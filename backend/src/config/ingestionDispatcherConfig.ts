/**
 * Ingestion Dispatcher Configuration
 *
 * Controls how long items must stay quiet before they are dispatched, how often the
 * dispatcher wakes, and how much work one tick may take on.
 *
 * Environment variables:
 * - INGESTION_QUIET_PERIOD_SECONDS: inactivity gap before an item is stable (default 30)
 * - INGESTION_TICK_INTERVAL_SECONDS: wake cadence (default floor(quietPeriod / 3), min 1)
 * - INGESTION_BATCH_LIMIT: max items per pop (default 100)
 * - INGESTION_MAX_CONCURRENT_TENANTS: tenants drained in parallel per tick (default 4)
 * - INGESTION_CONSUMER_TIMEOUT_SECONDS: per-batch consumer budget (default 5 x quietPeriod)
 * - INGESTION_RETRY_MAX_ATTEMPTS: attempts for list/pop calls (default 5)
 * - INGESTION_RETRY_BASE_DELAY_MS: first backoff delay (default 200)
 * - INGESTION_DRAIN_ON_SHUTDOWN: run one drain pass after shutdown (default false)
 */

import { InvalidArgumentException } from '@story-engine/shared'

export interface RetryPolicy {
    /** Total attempts including the first call */
    maxAttempts: number
    /** Delay before the first retry; doubles per attempt */
    baseDelayMs: number
    /** Upper bound on a single delay (never above the quiet period) */
    maxDelayMs: number
}

export interface IngestionDispatcherConfig {
    quietPeriodMs: number
    tickIntervalMs: number
    batchLimit: number
    maxConcurrentTenants: number
    consumerTimeoutMs: number
    retry: RetryPolicy
    drainOnShutdown: boolean
}

export type IngestionDispatcherConfigOverrides = Partial<Omit<IngestionDispatcherConfig, 'retry'>> & {
    retry?: Partial<RetryPolicy>
}

export const DEFAULT_QUIET_PERIOD_MS = 30_000
export const MIN_TICK_INTERVAL_MS = 1_000
export const DEFAULT_BATCH_LIMIT = 100
export const DEFAULT_MAX_CONCURRENT_TENANTS = 4
export const CONSUMER_TIMEOUT_QUIET_PERIODS = 5
export const DEFAULT_RETRY_MAX_ATTEMPTS = 5
export const DEFAULT_RETRY_BASE_DELAY_MS = 200

function parseIntWithDefault(value: string | undefined, fallback: number): number {
    if (!value) {
        return fallback
    }
    const parsed = Number.parseInt(value, 10)
    return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback
}

function parseOptionalPositiveInt(value: string | undefined): number | undefined {
    if (!value) return undefined
    const parsed = Number.parseInt(value, 10)
    return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined
}

function parseBoolean(value: string | undefined): boolean {
    if (!value) return false
    const normalized = value.trim().toLowerCase()
    return normalized === '1' || normalized === 'true' || normalized === 'yes'
}

function requirePositiveInt(value: number, name: string): number {
    if (!Number.isInteger(value) || value <= 0) {
        throw new InvalidArgumentException(`${name} must be a positive integer (got ${value})`, name)
    }
    return value
}

/**
 * Fill in defaults and derived values.
 * tickInterval and consumerTimeout derive from the quiet period unless given explicitly.
 */
export function resolveDispatcherConfig(overrides: IngestionDispatcherConfigOverrides = {}): IngestionDispatcherConfig {
    const quietPeriodMs = requirePositiveInt(overrides.quietPeriodMs ?? DEFAULT_QUIET_PERIOD_MS, 'quietPeriodMs')
    const tickIntervalMs = Math.max(
        MIN_TICK_INTERVAL_MS,
        requirePositiveInt(overrides.tickIntervalMs ?? Math.floor(quietPeriodMs / 3), 'tickIntervalMs')
    )
    const maxDelayMs = Math.min(requirePositiveInt(overrides.retry?.maxDelayMs ?? quietPeriodMs, 'retry.maxDelayMs'), quietPeriodMs)

    return {
        quietPeriodMs,
        tickIntervalMs,
        batchLimit: requirePositiveInt(overrides.batchLimit ?? DEFAULT_BATCH_LIMIT, 'batchLimit'),
        maxConcurrentTenants: requirePositiveInt(overrides.maxConcurrentTenants ?? DEFAULT_MAX_CONCURRENT_TENANTS, 'maxConcurrentTenants'),
        consumerTimeoutMs: requirePositiveInt(
            overrides.consumerTimeoutMs ?? quietPeriodMs * CONSUMER_TIMEOUT_QUIET_PERIODS,
            'consumerTimeoutMs'
        ),
        retry: {
            maxAttempts: requirePositiveInt(overrides.retry?.maxAttempts ?? DEFAULT_RETRY_MAX_ATTEMPTS, 'retry.maxAttempts'),
            baseDelayMs: requirePositiveInt(overrides.retry?.baseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS, 'retry.baseDelayMs'),
            maxDelayMs
        },
        drainOnShutdown: overrides.drainOnShutdown ?? false
    }
}

/**
 * Read dispatcher configuration from environment variables.
 * Unparseable or non-positive values fall back to defaults.
 */
export function getDispatcherConfigFromEnv(env: NodeJS.ProcessEnv = process.env): IngestionDispatcherConfig {
    const quietPeriodSeconds = parseIntWithDefault(env.INGESTION_QUIET_PERIOD_SECONDS, DEFAULT_QUIET_PERIOD_MS / 1000)
    const tickIntervalSeconds = parseOptionalPositiveInt(env.INGESTION_TICK_INTERVAL_SECONDS)
    const consumerTimeoutSeconds = parseOptionalPositiveInt(env.INGESTION_CONSUMER_TIMEOUT_SECONDS)

    return resolveDispatcherConfig({
        quietPeriodMs: quietPeriodSeconds * 1000,
        tickIntervalMs: tickIntervalSeconds !== undefined ? tickIntervalSeconds * 1000 : undefined,
        batchLimit: parseIntWithDefault(env.INGESTION_BATCH_LIMIT, DEFAULT_BATCH_LIMIT),
        maxConcurrentTenants: parseIntWithDefault(env.INGESTION_MAX_CONCURRENT_TENANTS, DEFAULT_MAX_CONCURRENT_TENANTS),
        consumerTimeoutMs: consumerTimeoutSeconds !== undefined ? consumerTimeoutSeconds * 1000 : undefined,
        retry: {
            maxAttempts: parseIntWithDefault(env.INGESTION_RETRY_MAX_ATTEMPTS, DEFAULT_RETRY_MAX_ATTEMPTS),
            baseDelayMs: parseIntWithDefault(env.INGESTION_RETRY_BASE_DELAY_MS, DEFAULT_RETRY_BASE_DELAY_MS)
        },
        drainOnShutdown: parseBoolean(env.INGESTION_DRAIN_ON_SHUTDOWN)
    })
}
