import { InvalidArgumentException } from '@story-engine/shared'
import assert from 'node:assert'
import { describe, test } from 'node:test'
import { getDispatcherConfigFromEnv, resolveDispatcherConfig } from '../../src/config/ingestionDispatcherConfig.js'

describe('ingestion dispatcher config', () => {
    test('defaults derive from a 30 second quiet period', () => {
        assert.deepStrictEqual(resolveDispatcherConfig(), {
            quietPeriodMs: 30_000,
            tickIntervalMs: 10_000,
            batchLimit: 100,
            maxConcurrentTenants: 4,
            consumerTimeoutMs: 150_000,
            retry: { maxAttempts: 5, baseDelayMs: 200, maxDelayMs: 30_000 },
            drainOnShutdown: false
        })
    })

    test('tick interval never drops below one second', () => {
        const cfg = resolveDispatcherConfig({ quietPeriodMs: 2_000 })
        assert.strictEqual(cfg.tickIntervalMs, 1_000)
        assert.strictEqual(cfg.consumerTimeoutMs, 10_000)
    })

    test('retry delay is capped at the quiet period', () => {
        const cfg = resolveDispatcherConfig({ quietPeriodMs: 5_000, retry: { maxDelayMs: 60_000 } })
        assert.strictEqual(cfg.retry.maxDelayMs, 5_000)
    })

    test('rejects non-positive overrides', () => {
        assert.throws(() => resolveDispatcherConfig({ batchLimit: 0 }), (err: unknown) => {
            assert.ok(err instanceof InvalidArgumentException)
            assert.strictEqual(err.argument, 'batchLimit')
            return true
        })
        assert.throws(() => resolveDispatcherConfig({ quietPeriodMs: 1.5 }), InvalidArgumentException)
    })

    test('reads overrides from the environment', () => {
        const cfg = getDispatcherConfigFromEnv({
            INGESTION_QUIET_PERIOD_SECONDS: '60',
            INGESTION_TICK_INTERVAL_SECONDS: '5',
            INGESTION_BATCH_LIMIT: '25',
            INGESTION_MAX_CONCURRENT_TENANTS: '8',
            INGESTION_CONSUMER_TIMEOUT_SECONDS: '90',
            INGESTION_RETRY_MAX_ATTEMPTS: '3',
            INGESTION_RETRY_BASE_DELAY_MS: '50',
            INGESTION_DRAIN_ON_SHUTDOWN: 'true'
        })
        assert.deepStrictEqual(cfg, {
            quietPeriodMs: 60_000,
            tickIntervalMs: 5_000,
            batchLimit: 25,
            maxConcurrentTenants: 8,
            consumerTimeoutMs: 90_000,
            retry: { maxAttempts: 3, baseDelayMs: 50, maxDelayMs: 60_000 },
            drainOnShutdown: true
        })
    })

    test('unparseable environment values fall back to defaults', () => {
        const cfg = getDispatcherConfigFromEnv({
            INGESTION_QUIET_PERIOD_SECONDS: 'soon',
            INGESTION_BATCH_LIMIT: '-4',
            INGESTION_DRAIN_ON_SHUTDOWN: 'nope'
        })
        assert.strictEqual(cfg.quietPeriodMs, 30_000)
        assert.strictEqual(cfg.batchLimit, 100)
        assert.strictEqual(cfg.drainOnShutdown, false)
    })
})
