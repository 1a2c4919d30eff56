/**
 * Debounce Ingestion Queue
 *
 * Accumulates "entity changed" signals per tenant, collapses repeated signals for the
 * same (sourceType, sourceId) into one entry and releases entries once they have been
 * quiet until the caller's cutoff.
 *
 * Scores are whole epoch seconds from the injected clock. The queue keeps no in-process
 * state; atomicity comes from the backing store's popByScore.
 */

import {
    decodeMember,
    encodeMember,
    fromEpochSeconds,
    type IClock,
    type IIngestionQueue,
    InvalidArgumentException,
    memberPrefix,
    type QueueItem,
    StoreCorruptException,
    toEpochSeconds,
    validateIdentifier,
    validateInstant,
    validateLimit,
    validateSourceType,
    type ValidationResult
} from '@story-engine/shared'
import { inject, injectable } from 'inversify'
import type { Logger } from '../logging/logger.js'
import type { ISortedSetStore } from '../repos/sortedSetStore.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'

function unwrap<T>(result: ValidationResult<T>, argument: string): T {
    if (!result.success || result.value === undefined) {
        throw new InvalidArgumentException(result.error?.message ?? `${argument} is invalid`, argument)
    }
    return result.value
}

@injectable()
export class DebounceIngestionQueue implements IIngestionQueue {
    private readonly log: Logger

    constructor(
        @inject('ISortedSetStore') private readonly store: ISortedSetStore,
        @inject('IClock') private readonly clock: IClock,
        @inject('Logger') logger: Logger,
        @inject(TelemetryService) private readonly telemetry: TelemetryService
    ) {
        this.log = logger.child({ component: 'ingestion-queue' })
    }

    async push(tenantId: string, sourceType: string, sourceId: string, signal?: AbortSignal): Promise<void> {
        const tenant = unwrap(validateIdentifier(tenantId, 'tenantId'), 'tenantId')
        const type = unwrap(validateSourceType(sourceType), 'sourceType')
        const id = unwrap(validateIdentifier(sourceId, 'sourceId'), 'sourceId')

        const score = this.clock.nowEpochSeconds()
        await this.store.addOrUpdate(tenant, encodeMember(type, id), score, signal)

        this.log.debug({ tenantId: tenant, sourceType: type, sourceId: id, score }, 'ingestion item pushed')
        this.telemetry.trackIngestionEvent('Ingestion.Queue.Pushed', { sourceType: type }, { tenantId: tenant })
    }

    async popStable(tenantId: string, stableAt: Date, limit: number, signal?: AbortSignal): Promise<QueueItem[]> {
        const tenant = unwrap(validateIdentifier(tenantId, 'tenantId'), 'tenantId')
        const cutoff = unwrap(validateInstant(stableAt, 'stableAt'), 'stableAt')
        const max = unwrap(validateLimit(limit), 'limit')

        return this.popValid(tenant, toEpochSeconds(cutoff), max, signal)
    }

    async popStableBySourceType(
        tenantId: string,
        sourceType: string,
        stableAt: Date,
        limit: number,
        signal?: AbortSignal
    ): Promise<QueueItem[]> {
        const tenant = unwrap(validateIdentifier(tenantId, 'tenantId'), 'tenantId')
        const type = unwrap(validateSourceType(sourceType), 'sourceType')
        const cutoff = unwrap(validateInstant(stableAt, 'stableAt'), 'stableAt')
        const max = unwrap(validateLimit(limit), 'limit')

        return this.popValid(tenant, toEpochSeconds(cutoff), max, signal, memberPrefix(type))
    }

    async remove(tenantId: string, sourceType: string, sourceId: string, signal?: AbortSignal): Promise<boolean> {
        const tenant = unwrap(validateIdentifier(tenantId, 'tenantId'), 'tenantId')
        const type = unwrap(validateSourceType(sourceType), 'sourceType')
        const id = unwrap(validateIdentifier(sourceId, 'sourceId'), 'sourceId')

        const removed = await this.store.removeMember(tenant, encodeMember(type, id), signal)

        this.log.debug({ tenantId: tenant, sourceType: type, sourceId: id, removed }, 'ingestion item removed')
        this.telemetry.trackIngestionEvent('Ingestion.Queue.Removed', { sourceType: type, removed }, { tenantId: tenant })
        return removed
    }

    async listTenantsWithItems(signal?: AbortSignal): Promise<string[]> {
        const tenants = await this.store.listTenants(signal)
        return Array.from(new Set(tenants))
    }

    /**
     * Pop until `limit` decodable items are collected or the store runs out below the cutoff.
     *
     * Corrupt members are pulled out of the way while topping up, then re-inserted with their
     * original score so they stay visible for manual repair. Once the first pop has removed
     * members, nothing here throws: a failed top-up ends the batch early and a failed
     * re-insert is logged.
     */
    private async popValid(
        tenantId: string,
        maxScore: number,
        limit: number,
        signal?: AbortSignal,
        prefix?: string
    ): Promise<QueueItem[]> {
        const items: QueueItem[] = []
        const corrupt: StoreCorruptException[] = []

        let requested = limit
        let popped = await this.store.popByScore(tenantId, maxScore, requested, signal, prefix)
        for (;;) {
            for (const { member, score } of popped) {
                const decoded = decodeMember(member)
                if (!decoded) {
                    corrupt.push(new StoreCorruptException(tenantId, member, score))
                    continue
                }
                items.push({ tenantId, sourceType: decoded.sourceType, sourceId: decoded.sourceId, timestamp: fromEpochSeconds(score) })
            }

            if (popped.length < requested || items.length >= limit || signal?.aborted) break

            requested = limit - items.length
            try {
                popped = await this.store.popByScore(tenantId, maxScore, requested, signal, prefix)
            } catch (err) {
                this.log.warn({ tenantId, err, collected: items.length }, 'top-up pop failed, returning partial batch')
                break
            }
        }

        for (const error of corrupt) {
            await this.reinsertCorrupt(error)
        }

        if (items.length > 0 || corrupt.length > 0) {
            this.telemetry.trackIngestionEvent('Ingestion.Queue.Popped', { count: items.length, corrupt: corrupt.length, limit }, { tenantId })
        }
        return items
    }

    private async reinsertCorrupt(error: StoreCorruptException): Promise<void> {
        this.log.error({ tenantId: error.tenantId, member: error.member, score: error.score, err: error }, 'corrupt queue member skipped')
        this.telemetry.trackIngestionEvent('Ingestion.Queue.CorruptMember', { member: error.member, score: error.score }, { tenantId: error.tenantId })

        // Not bound to the caller's signal: the member is already out of the store
        try {
            await this.store.addOrUpdate(error.tenantId, error.member, error.score)
        } catch (err) {
            this.log.error({ tenantId: error.tenantId, member: error.member, err }, 'failed to re-insert corrupt queue member')
            this.telemetry.trackIngestionEvent(
                'Ingestion.Queue.CorruptReinsertFailed',
                { member: error.member, score: error.score, error: err instanceof Error ? err.message : String(err) },
                { tenantId: error.tenantId }
            )
            this.telemetry.trackException(err instanceof Error ? err : new Error(String(err)), { tenantId: error.tenantId, member: error.member })
        }
    }
}
