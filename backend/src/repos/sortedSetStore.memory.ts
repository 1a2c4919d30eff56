/**
 * In-memory implementation of the Sorted Set Store
 *
 * For local development and testing.
 * Each operation runs to completion synchronously inside one call, so it is atomic
 * with respect to every other caller on the event loop. Tenants whose set empties are
 * deleted, keeping listTenants exact.
 */

import { injectable } from 'inversify'
import { throwIfAborted } from '../utils/abort.js'
import { BaseMemoryRepository } from './base/BaseMemoryRepository.js'
import { compareScoredMembers, type ISortedSetStore, type ScoredMember } from './sortedSetStore.js'

@injectable()
export class MemorySortedSetStore extends BaseMemoryRepository<string, Map<string, number>> implements ISortedSetStore {
    async addOrUpdate(tenantId: string, member: string, score: number, signal?: AbortSignal): Promise<void> {
        throwIfAborted(signal, 'addOrUpdate')
        this.getOrCreate(tenantId, () => new Map()).set(member, score)
    }

    async rangeByScore(tenantId: string, maxScore: number, limit: number, signal?: AbortSignal): Promise<ScoredMember[]> {
        throwIfAborted(signal, 'rangeByScore')
        return this.selectByScore(tenantId, maxScore, limit)
    }

    async popByScore(
        tenantId: string,
        maxScore: number,
        limit: number,
        signal?: AbortSignal,
        memberPrefix?: string
    ): Promise<ScoredMember[]> {
        throwIfAborted(signal, 'popByScore')
        const selected = this.selectByScore(tenantId, maxScore, limit, memberPrefix)
        const set = this.records.get(tenantId)
        if (set) {
            for (const { member } of selected) {
                set.delete(member)
            }
            if (set.size === 0) {
                this.records.delete(tenantId)
            }
        }
        return selected
    }

    async removeMember(tenantId: string, member: string, signal?: AbortSignal): Promise<boolean> {
        throwIfAborted(signal, 'removeMember')
        const set = this.records.get(tenantId)
        if (!set) return false
        const existed = set.delete(member)
        if (set.size === 0) {
            this.records.delete(tenantId)
        }
        return existed
    }

    async listTenants(signal?: AbortSignal): Promise<string[]> {
        throwIfAborted(signal, 'listTenants')
        return Array.from(this.records.keys())
    }

    /**
     * Score of one member, or undefined (test helper).
     */
    scoreOf(tenantId: string, member: string): number | undefined {
        return this.records.get(tenantId)?.get(member)
    }

    /**
     * Number of members held for a tenant (test helper).
     */
    countFor(tenantId: string): number {
        return this.records.get(tenantId)?.size ?? 0
    }

    private selectByScore(tenantId: string, maxScore: number, limit: number, memberPrefix?: string): ScoredMember[] {
        const set = this.records.get(tenantId)
        if (!set || limit <= 0) return []

        const matches: ScoredMember[] = []
        for (const [member, score] of set) {
            if (score > maxScore) continue
            if (memberPrefix && !member.startsWith(memberPrefix)) continue
            matches.push({ member, score })
        }
        matches.sort(compareScoredMembers)
        return matches.slice(0, limit)
    }
}
