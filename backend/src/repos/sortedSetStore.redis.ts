/**
 * Redis implementation of the Sorted Set Store
 *
 * Key layout (wire-level, shared with existing producers):
 * - ingestion:queue:<tenantId>  sorted set, member "<sourceType>:<sourceId>", score = epoch seconds
 * - ingestion:tenants           set of active tenants (only under the 'index' enumeration strategy)
 *
 * popByScore and (under 'index') removeMember run as Lua scripts so range-then-remove is atomic.
 * The 'index' strategy touches two keys per script and therefore needs a single-node deployment
 * or a hash-tagged key layout on Redis Cluster.
 */

import {
    buildQueueKey,
    INGESTION_QUEUE_KEY_PREFIX,
    INGESTION_TENANT_INDEX_KEY,
    isValidUuid,
    parseQueueKey,
    translateStoreError
} from '@story-engine/shared'
import { inject, injectable } from 'inversify'
import type { RedisStoreConfig, TenantEnumerationStrategy } from '../persistenceConfig.js'
import { raceAbort, throwIfAborted } from '../utils/abort.js'
import type { IRedisConnection } from './base/redisConnection.js'
import { POP_BY_SCORE_SCRIPT, REMOVE_MEMBER_SCRIPT } from './sortedSetScripts.js'
import type { ISortedSetStore, ScoredMember } from './sortedSetStore.js'

/**
 * Score bound argument; Redis spells infinity '+inf'.
 */
export function toScoreBound(maxScore: number): string {
    if (maxScore === Number.POSITIVE_INFINITY) return '+inf'
    if (maxScore === Number.NEGATIVE_INFINITY) return '-inf'
    return String(maxScore)
}

/**
 * Parse a flat [member, score, ...] reply (ZRANGEBYSCORE WITHSCORES or the pop script).
 * Entries with a non-string member or non-numeric score are dropped.
 */
export function toScoredMembers(reply: unknown): ScoredMember[] {
    if (!Array.isArray(reply)) {
        return []
    }

    const out: ScoredMember[] = []
    for (let i = 0; i + 1 < reply.length; i += 2) {
        const member: unknown = reply[i]
        const rawScore: unknown = reply[i + 1]
        if (typeof member !== 'string') continue
        const score = typeof rawScore === 'number' ? rawScore : Number(rawScore)
        if (!Number.isFinite(score)) continue
        out.push({ member, score })
    }
    return out
}

@injectable()
export class RedisSortedSetStore implements ISortedSetStore {
    private readonly enumeration: TenantEnumerationStrategy
    private readonly scanCount: number

    constructor(
        @inject('IRedisConnection') private readonly connection: IRedisConnection,
        @inject('RedisConfig') config: RedisStoreConfig
    ) {
        this.enumeration = config.tenantEnumeration
        this.scanCount = config.scanCount
    }

    async addOrUpdate(tenantId: string, member: string, score: number, signal?: AbortSignal): Promise<void> {
        await this.execute('addOrUpdate', signal, async () => {
            const key = buildQueueKey(tenantId)
            if (this.enumeration === 'index') {
                const results = await this.client.multi().zadd(key, score, member).sadd(INGESTION_TENANT_INDEX_KEY, tenantId).exec()
                const failed = results?.find(([error]) => error !== null)
                if (failed?.[0]) {
                    throw failed[0]
                }
                return
            }
            await this.client.zadd(key, score, member)
        })
    }

    async rangeByScore(tenantId: string, maxScore: number, limit: number, signal?: AbortSignal): Promise<ScoredMember[]> {
        if (limit <= 0) return []
        return this.execute('rangeByScore', signal, async () => {
            const reply = await this.client.zrangebyscore(
                buildQueueKey(tenantId),
                '-inf',
                toScoreBound(maxScore),
                'WITHSCORES',
                'LIMIT',
                0,
                limit
            )
            return toScoredMembers(reply)
        })
    }

    async popByScore(
        tenantId: string,
        maxScore: number,
        limit: number,
        signal?: AbortSignal,
        memberPrefix?: string
    ): Promise<ScoredMember[]> {
        if (limit <= 0) return []
        // Once sent, the script has removed its members: the reply is awaited even after an abort
        return this.execute(
            'popByScore',
            signal,
            async () => {
                const maintainIndex = this.enumeration === 'index'
                const keys = maintainIndex ? [buildQueueKey(tenantId), INGESTION_TENANT_INDEX_KEY] : [buildQueueKey(tenantId)]
                const reply = await this.client.eval(
                    POP_BY_SCORE_SCRIPT,
                    keys.length,
                    ...keys,
                    toScoreBound(maxScore),
                    limit,
                    memberPrefix ?? '',
                    tenantId,
                    maintainIndex ? '1' : '0'
                )
                return toScoredMembers(reply)
            },
            { raceSignal: false }
        )
    }

    async removeMember(tenantId: string, member: string, signal?: AbortSignal): Promise<boolean> {
        return this.execute('removeMember', signal, async () => {
            if (this.enumeration === 'index') {
                const reply = await this.client.eval(
                    REMOVE_MEMBER_SCRIPT,
                    2,
                    buildQueueKey(tenantId),
                    INGESTION_TENANT_INDEX_KEY,
                    member,
                    tenantId
                )
                return Number(reply) > 0
            }
            const removed = await this.client.zrem(buildQueueKey(tenantId), member)
            return removed > 0
        })
    }

    async listTenants(signal?: AbortSignal): Promise<string[]> {
        return this.execute('listTenants', signal, async () => {
            if (this.enumeration === 'index') {
                const members = await this.client.smembers(INGESTION_TENANT_INDEX_KEY)
                return members.filter((tenantId) => isValidUuid(tenantId)).map((tenantId) => tenantId.toLowerCase())
            }
            return this.scanTenants(signal)
        })
    }

    private get client() {
        return this.connection.client
    }

    /**
     * Cursor SCAN over ingestion:queue:*; SCAN may repeat keys, so results are deduplicated.
     */
    private async scanTenants(signal?: AbortSignal): Promise<string[]> {
        const tenants = new Set<string>()
        const pattern = `${INGESTION_QUEUE_KEY_PREFIX}:*`
        let cursor = '0'
        do {
            throwIfAborted(signal, 'listTenants')
            const [next, keys] = await this.client.scan(cursor, 'MATCH', pattern, 'COUNT', this.scanCount)
            for (const key of keys) {
                const tenantId = parseQueueKey(key)
                if (tenantId) tenants.add(tenantId)
            }
            cursor = next
        } while (cursor !== '0')
        return Array.from(tenants)
    }

    /**
     * Run a command, translating failures to StoreUnavailableException. An aborted signal
     * rejects before sending; with `raceSignal` (the default) it also abandons the pending reply.
     */
    private async execute<T>(
        operation: string,
        signal: AbortSignal | undefined,
        fn: () => Promise<T>,
        { raceSignal = true }: { raceSignal?: boolean } = {}
    ): Promise<T> {
        try {
            throwIfAborted(signal, operation)
            return raceSignal ? await raceAbort(fn(), signal, operation) : await fn()
        } catch (error) {
            throw translateStoreError(error, `Redis ${operation}`)
        }
    }
}
