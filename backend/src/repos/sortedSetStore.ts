/**
 * Sorted Set Store Interface
 *
 * Tenant-scoped ordered-set primitives backing the ingestion queue. No debounce policy
 * lives here: members and scores are opaque.
 *
 * Implementations:
 * - MemorySortedSetStore: in-process maps for dev/test
 * - RedisSortedSetStore: one sorted set per tenant (ingestion:queue:<tenantId>)
 *
 * Failure semantics: transport errors reject with StoreUnavailableException, aborted
 * signals with CancelledException. No retries.
 */

export interface ScoredMember {
    member: string
    score: number
}

export interface ISortedSetStore {
    /** Upsert member -> score. Idempotent by member. */
    addOrUpdate(tenantId: string, member: string, score: number, signal?: AbortSignal): Promise<void>

    /** At most `limit` entries with score <= maxScore, ascending by (score, member). */
    rangeByScore(tenantId: string, maxScore: number, limit: number, signal?: AbortSignal): Promise<ScoredMember[]>

    /**
     * Atomic rangeByScore followed by removal of exactly the returned members.
     * @param memberPrefix - Only consider members starting with this prefix
     */
    popByScore(tenantId: string, maxScore: number, limit: number, signal?: AbortSignal, memberPrefix?: string): Promise<ScoredMember[]>

    /** @returns Whether the member existed */
    removeMember(tenantId: string, member: string, signal?: AbortSignal): Promise<boolean>

    /** Tenants that currently hold at least one member. */
    listTenants(signal?: AbortSignal): Promise<string[]>
}

/**
 * Ascending (score, member) comparator matching Redis sorted-set ordering.
 * Members compare by UTF-16 code unit, which equals byte order for the ASCII members the queue writes.
 */
export function compareScoredMembers(a: ScoredMember, b: ScoredMember): number {
    if (a.score !== b.score) return a.score - b.score
    if (a.member < b.member) return -1
    if (a.member > b.member) return 1
    return 0
}
