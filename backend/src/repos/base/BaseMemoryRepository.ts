/**
 * Base for the in-memory stores: one keyed record map per store instance.
 *
 * Memory stores inherit:
 * - getOrCreate() for lazily materialized records (a tenant's sorted set)
 * - Test helpers: clear(), size()
 */
export abstract class BaseMemoryRepository<TKey extends string, TValue> {
    protected readonly records = new Map<TKey, TValue>()

    /** Record stored under `key`, created with `create` on first use */
    protected getOrCreate(key: TKey, create: () => TValue): TValue {
        let record = this.records.get(key)
        if (record === undefined) {
            record = create()
            this.records.set(key, record)
        }
        return record
    }

    /** Drop every record (test teardown) */
    clear(): void {
        this.records.clear()
    }

    /** Keys currently held: tenants for the queue store, entities for the entity store */
    size(): number {
        return this.records.size
    }
}
