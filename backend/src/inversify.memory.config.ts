import type { Container } from 'inversify'
import { TOKENS } from './di/tokens.js'
import type { ISortedSetStore } from './repos/sortedSetStore.js'
import { MemorySortedSetStore } from './repos/sortedSetStore.memory.js'

/**
 * In-memory store bindings for local dev and tests.
 *
 * The concrete store is bound to itself as well so tests can reach its helpers.
 */
export function bindMemoryStore(container: Container): void {
    container.bind(MemorySortedSetStore).toSelf().inSingletonScope()
    container.bind<ISortedSetStore>(TOKENS.SortedSetStore).toService(MemorySortedSetStore)
}
