export { Cache } from './cache/facade.js';
export type { CacheOptions } from './cache/facade.js';
export { MemoryStore } from './cache/memory.js';
export { FileStore } from './cache/file.js';
export {
	RedisStore,
	connectRedis,
	connectRedisCluster,
	createRedisClient,
	createRedisClusterClient,
} from './cache/redis.js';
export type { RemoteKeyValueClient } from './cache/redis.js';
export {
	createCache,
	createMemoryCache,
	createFileCache,
	createRedisCache,
	createRedisClusterCache,
} from './cache/factory.js';

export * from '@tiercache/protocol';
