/**
 * In-memory implementation of IEntityStore
 * For local development and handler tests; seeded through add().
 */

import type { IEntityStore } from '@story-engine/shared'
import { injectable } from 'inversify'
import { throwIfAborted } from '../utils/abort.js'
import { BaseMemoryRepository } from './base/BaseMemoryRepository.js'

function entityKey(tenantId: string, sourceType: string, sourceId: string): string {
    return `${tenantId.toLowerCase()}:${sourceType}:${sourceId.toLowerCase()}`
}

@injectable()
export class MemoryEntityStore extends BaseMemoryRepository<string, true> implements IEntityStore {
    add(tenantId: string, sourceType: string, sourceId: string): void {
        this.records.set(entityKey(tenantId, sourceType, sourceId), true)
    }

    delete(tenantId: string, sourceType: string, sourceId: string): boolean {
        return this.records.delete(entityKey(tenantId, sourceType, sourceId))
    }

    async exists(tenantId: string, sourceType: string, sourceId: string, signal?: AbortSignal): Promise<boolean> {
        throwIfAborted(signal, 'exists')
        return this.records.has(entityKey(tenantId, sourceType, sourceId))
    }
}
