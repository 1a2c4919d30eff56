import type { Container } from 'inversify'
import { TOKENS } from './di/tokens.js'
import type { RedisStoreConfig } from './persistenceConfig.js'
import { RedisConnection, type IRedisConnection } from './repos/base/redisConnection.js'
import type { ISortedSetStore } from './repos/sortedSetStore.js'
import { RedisSortedSetStore } from './repos/sortedSetStore.redis.js'

/**
 * Redis store bindings. The connection handle is a singleton; the entry point
 * connects it before the dispatcher starts and closes it on shutdown.
 */
export function bindRedisStore(container: Container, config: RedisStoreConfig): void {
    container.bind<RedisStoreConfig>(TOKENS.RedisConfig).toConstantValue(config)
    container.bind<IRedisConnection>(TOKENS.RedisConnection).to(RedisConnection).inSingletonScope()
    container.bind<ISortedSetStore>(TOKENS.SortedSetStore).to(RedisSortedSetStore).inSingletonScope()
}
