/**
 * Redis connection handle.
 *
 * One process-wide handle, created by the container and owned by the process entry point:
 * connect() before the dispatcher starts, close() after it stops. Stores receive the handle
 * by injection and never create clients themselves.
 */

import { inject, injectable } from 'inversify'
import { Redis } from 'ioredis'
import type { RedisStoreConfig } from '../../persistenceConfig.js'

export interface IRedisConnection {
    readonly client: Redis
    connect(): Promise<void>
    close(): Promise<void>
}

@injectable()
export class RedisConnection implements IRedisConnection {
    readonly client: Redis

    constructor(@inject('RedisConfig') config: RedisStoreConfig) {
        this.client = new Redis(config.url, {
            lazyConnect: true,
            commandTimeout: config.commandTimeoutMs,
            // Fail fast; retry policy belongs to the dispatcher
            maxRetriesPerRequest: 1
        })
    }

    async connect(): Promise<void> {
        if (this.client.status === 'wait') {
            await this.client.connect()
        }
    }

    async close(): Promise<void> {
        if (this.client.status === 'end') return
        if (this.client.status === 'wait') {
            // Never connected: nothing to QUIT
            this.client.disconnect()
            return
        }
        await this.client.quit()
    }
}
