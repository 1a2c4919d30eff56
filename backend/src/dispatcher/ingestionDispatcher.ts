/**
 * Ingestion Dispatcher
 *
 * Periodic driver for the debounce queue: each tick lists tenants with pending items,
 * pops every tenant's stable items (older than now - quietPeriod) and hands non-empty
 * batches to the consumer.
 *
 * Backpressure:
 * - At most maxConcurrentTenants tenants are drained in parallel
 * - One batch per tenant per tick; a full batch marks the tenant for re-drain on the next tick
 * - Each consumer call is bounded by consumerTimeoutMs
 *
 * Store failures on list/pop are retried with jittered backoff; a tenant whose pop still
 * fails is skipped for this tick. Consumer failures are logged and the popped items are
 * not restored (consumers tolerate duplicates, not losses they cause themselves).
 */

import {
    CancelledException,
    type IClock,
    type IIngestionConsumer,
    type IIngestionQueue,
    INGESTION_METRIC_TENANTS_PENDING,
    type QueueItem
} from '@story-engine/shared'
import { inject, injectable } from 'inversify'
import { performance } from 'node:perf_hooks'
import type { IngestionDispatcherConfig } from '../config/ingestionDispatcherConfig.js'
import type { Logger } from '../logging/logger.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import { raceAbort, sleep, throwIfAborted } from '../utils/abort.js'
import { withRetry, type RetryAttemptInfo } from './retry.js'

export interface TickSummary {
    /** Tenants visited this pass */
    tenants: number
    /** Non-empty batches handed to the consumer */
    batches: number
    /** Items popped */
    items: number
    /** Tenants whose pop failed after retries */
    failedTenants: number
    /** Batches whose consumer rejected or timed out */
    consumerErrors: number
    /** Tenants that returned a full batch and will be re-drained */
    moreTenantsPending: boolean
}

/** Latest instant a Date can hold; used as the drain cutoff */
const MAX_DATE = new Date(8.64e15)

function emptySummary(): TickSummary {
    return { tenants: 0, batches: 0, items: 0, failedTenants: 0, consumerErrors: 0, moreTenantsPending: false }
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error)
}

@injectable()
export class IngestionDispatcher {
    private readonly log: Logger
    private readonly morePending = new Set<string>()
    private readonly inFlight = new Set<Promise<void>>()
    private tail: Promise<unknown> = Promise.resolve()

    constructor(
        @inject('IIngestionQueue') private readonly queue: IIngestionQueue,
        @inject('IIngestionConsumer') private readonly consumer: IIngestionConsumer,
        @inject('IClock') private readonly clock: IClock,
        @inject('DispatcherConfig') private readonly config: IngestionDispatcherConfig,
        @inject('Logger') logger: Logger,
        @inject(TelemetryService) private readonly telemetry: TelemetryService
    ) {
        this.log = logger.child({ component: 'ingestion-dispatcher' })
    }

    /**
     * Tick immediately, then once per tickIntervalMs until `signal` aborts.
     * Resolves after in-flight batches finish or consumerTimeoutMs elapses.
     */
    async run(signal: AbortSignal): Promise<void> {
        const { quietPeriodMs, tickIntervalMs, batchLimit, maxConcurrentTenants } = this.config
        this.log.info({ quietPeriodMs, tickIntervalMs, batchLimit, maxConcurrentTenants }, 'ingestion dispatcher started')
        this.telemetry.trackIngestionEvent('Ingestion.Dispatch.Started', { quietPeriodMs, tickIntervalMs, batchLimit })

        try {
            while (!signal.aborted) {
                await this.tick(signal)
                await sleep(tickIntervalMs, signal)
            }
        } catch (err) {
            if (!(err instanceof CancelledException)) {
                throw err
            }
        } finally {
            await this.waitForInFlight(this.config.consumerTimeoutMs)
        }

        this.log.info('ingestion dispatcher stopped')
        this.telemetry.trackIngestionEvent('Ingestion.Dispatch.Stopped')
    }

    /**
     * One dispatcher pass with cutoff now - quietPeriod. Passes never overlap.
     * @throws CancelledException when `signal` aborts
     */
    tick(signal?: AbortSignal): Promise<TickSummary> {
        return this.exclusive(() => this.executePass(() => new Date(this.clock.now().getTime() - this.config.quietPeriodMs), signal))
    }

    /**
     * Pop everything regardless of age until every tenant returns a short batch.
     * Awaits every consumer call.
     */
    drain(signal?: AbortSignal): Promise<TickSummary> {
        return this.exclusive(async () => {
            const total = emptySummary()
            for (;;) {
                const pass = await this.executePass(() => MAX_DATE, signal)
                total.tenants += pass.tenants
                total.batches += pass.batches
                total.items += pass.items
                total.failedTenants += pass.failedTenants
                total.consumerErrors += pass.consumerErrors
                total.moreTenantsPending = pass.moreTenantsPending
                if (!pass.moreTenantsPending || pass.batches === 0) break
            }

            this.log.info({ ...total }, 'ingestion queue drained')
            this.telemetry.trackIngestionEvent('Ingestion.Dispatch.Drained', { ...total })
            return total
        })
    }

    /** Tenants marked for re-drain (test/diagnostic helper) */
    pendingTenants(): string[] {
        return Array.from(this.morePending)
    }

    private exclusive<T>(fn: () => Promise<T>): Promise<T> {
        const next = this.tail.then(fn)
        this.tail = next.then(
            () => undefined,
            () => undefined
        )
        return next
    }

    private async executePass(cutoffFor: () => Date, signal?: AbortSignal): Promise<TickSummary> {
        throwIfAborted(signal, 'Dispatcher tick')
        const started = performance.now()
        const summary = emptySummary()

        const listed = await this.listTenants(signal)
        const tenants = [...this.morePending, ...listed.filter((tenantId) => !this.morePending.has(tenantId))]
        summary.tenants = tenants.length
        this.telemetry.trackMetric(INGESTION_METRIC_TENANTS_PENDING, listed.length)

        let next = 0
        const worker = async (): Promise<void> => {
            while (next < tenants.length && !signal?.aborted) {
                const tenantId = tenants[next++]
                await this.processTenant(tenantId, cutoffFor(), summary, signal)
            }
        }
        const workers = Math.min(this.config.maxConcurrentTenants, tenants.length)
        await Promise.all(Array.from({ length: workers }, () => worker()))

        throwIfAborted(signal, 'Dispatcher tick')

        summary.moreTenantsPending = this.morePending.size > 0
        const durationMs = Math.round(performance.now() - started)
        if (summary.tenants > 0) {
            this.log.info({ ...summary, durationMs }, 'dispatcher tick completed')
        } else {
            this.log.debug({ durationMs }, 'dispatcher tick found no tenants')
        }
        this.telemetry.trackIngestionEvent('Ingestion.Dispatch.TickCompleted', { ...summary, durationMs })
        return summary
    }

    /**
     * List tenants with retry. A persistent failure leaves only the re-drain set for this tick.
     */
    private async listTenants(signal?: AbortSignal): Promise<string[]> {
        try {
            return await withRetry(() => this.queue.listTenantsWithItems(signal), this.config.retry, {
                signal,
                onRetry: (info) => this.logRetry('listTenantsWithItems', info)
            })
        } catch (err) {
            if (err instanceof CancelledException) throw err
            this.log.error({ err }, 'failed to list tenants with items')
            this.telemetry.trackIngestionEvent('Ingestion.Dispatch.ListFailed', { error: errorMessage(err) })
            return []
        }
    }

    private async processTenant(tenantId: string, cutoff: Date, summary: TickSummary, signal?: AbortSignal): Promise<void> {
        const { batchLimit, retry } = this.config
        let items: QueueItem[]
        try {
            items = await withRetry(() => this.queue.popStable(tenantId, cutoff, batchLimit, signal), retry, {
                signal,
                onRetry: (info) => this.logRetry('popStable', info, tenantId)
            })
        } catch (err) {
            if (err instanceof CancelledException) return
            summary.failedTenants++
            this.log.error({ tenantId, err }, 'failed to pop stable items')
            this.telemetry.trackIngestionEvent('Ingestion.Dispatch.PopFailed', { error: errorMessage(err) }, { tenantId })
            return
        }

        if (items.length >= batchLimit) {
            this.morePending.add(tenantId)
        } else {
            this.morePending.delete(tenantId)
        }

        if (items.length === 0) return

        summary.batches++
        summary.items += items.length
        await this.consumeBatch(tenantId, items, summary)
    }

    private async consumeBatch(tenantId: string, items: QueueItem[], summary: TickSummary): Promise<void> {
        // Only the timeout cancels a consumer; shutdown lets the batch finish within consumerTimeoutMs
        const consumerSignal = AbortSignal.timeout(this.config.consumerTimeoutMs)
        const started = performance.now()
        const task = this.consumer.consume(tenantId, items, consumerSignal)
        this.trackInFlight(task)

        try {
            await raceAbort(task, consumerSignal, 'Consumer')
            const durationMs = Math.round(performance.now() - started)
            this.log.info({ tenantId, count: items.length, durationMs }, 'ingestion batch consumed')
            this.telemetry.trackIngestionEvent('Ingestion.Dispatch.BatchConsumed', { count: items.length, durationMs }, { tenantId })
        } catch (err) {
            summary.consumerErrors++
            this.log.error({ tenantId, count: items.length, err }, 'ingestion batch failed')
            this.telemetry.trackException(err instanceof Error ? err : new Error(String(err)), { tenantId, count: items.length })
            this.telemetry.trackIngestionEvent(
                'Ingestion.Dispatch.BatchFailed',
                { count: items.length, error: errorMessage(err), timedOut: consumerSignal.aborted },
                { tenantId }
            )
        }
    }

    private trackInFlight(task: Promise<void>): void {
        const settled: Promise<void> = task.then(
            () => {
                this.inFlight.delete(settled)
            },
            () => {
                this.inFlight.delete(settled)
            }
        )
        this.inFlight.add(settled)
    }

    private async waitForInFlight(timeoutMs: number): Promise<void> {
        if (this.inFlight.size === 0) return

        const timer = new AbortController()
        try {
            const finished = await Promise.race([
                Promise.all(this.inFlight).then(() => true),
                sleep(timeoutMs, timer.signal).then(() => false)
            ])
            if (!finished) {
                this.log.warn({ inFlight: this.inFlight.size, timeoutMs }, 'shutdown wait elapsed with batches still in flight')
            }
        } finally {
            timer.abort()
        }
    }

    private logRetry(operation: string, info: RetryAttemptInfo, tenantId?: string): void {
        this.log.warn({ operation, tenantId, attempt: info.attempt + 1, delayMs: info.delayMs, err: info.error }, 'retrying store call')
    }
}
