import { StoreUnavailableException } from '@story-engine/shared'
import { MemorySortedSetStore } from '../../src/repos/sortedSetStore.memory.js'
import type { ScoredMember } from '../../src/repos/sortedSetStore.js'

type FailingOperation = 'listTenants' | 'popByScore' | 'addOrUpdate'

/**
 * Memory store that fails the next N calls of an operation with StoreUnavailableException
 * (or a supplied error), then behaves normally. `after` lets that many calls through first.
 */
export class FlakySortedSetStore extends MemorySortedSetStore {
    readonly calls: Record<FailingOperation, number> = { listTenants: 0, popByScore: 0, addOrUpdate: 0 }
    private readonly failures = new Map<FailingOperation, { skip: number; remaining: number; error: () => Error }>()

    failNext(
        operation: FailingOperation,
        count: number,
        error: () => Error = () => new StoreUnavailableException('simulated outage'),
        after = 0
    ): void {
        this.failures.set(operation, { skip: after, remaining: count, error })
    }

    async addOrUpdate(tenantId: string, member: string, score: number, signal?: AbortSignal): Promise<void> {
        this.calls.addOrUpdate++
        this.maybeFail('addOrUpdate')
        return super.addOrUpdate(tenantId, member, score, signal)
    }

    async listTenants(signal?: AbortSignal): Promise<string[]> {
        this.calls.listTenants++
        this.maybeFail('listTenants')
        return super.listTenants(signal)
    }

    async popByScore(
        tenantId: string,
        maxScore: number,
        limit: number,
        signal?: AbortSignal,
        memberPrefix?: string
    ): Promise<ScoredMember[]> {
        this.calls.popByScore++
        this.maybeFail('popByScore')
        return super.popByScore(tenantId, maxScore, limit, signal, memberPrefix)
    }

    private maybeFail(operation: FailingOperation): void {
        const failure = this.failures.get(operation)
        if (failure && failure.skip > 0) {
            failure.skip--
            return
        }
        if (failure && failure.remaining > 0) {
            failure.remaining--
            throw failure.error()
        }
    }
}
