import {
	validateFileCacheOptions,
	validateMemoryCacheOptions,
	validateRedisCacheOptions,
	validateRedisClusterCacheOptions,
	type CacheConfig,
	type FileCacheOptions,
	type MemoryCacheOptions,
	type RedisCacheOptions,
	type RedisClusterCacheOptions,
} from '@tiercache/protocol';
import { ExpirationPolicy, log } from '@tiercache/runtime';
import { Cache } from './facade.js';
import { FileStore } from './file.js';
import { MemoryStore } from './memory.js';
import {
	RedisStore,
	connectRedis,
	connectRedisCluster,
	type RemoteKeyValueClient,
} from './redis.js';

export function createMemoryCache(options: MemoryCacheOptions): Cache {
	validateMemoryCacheOptions(options);
	const policy = new ExpirationPolicy({ ttl: options.ttl, now: options.now });
	return new Cache(new MemoryStore(), policy, { codec: options.codec });
}

export async function createFileCache(options: FileCacheOptions): Promise<Cache> {
	validateFileCacheOptions(options);
	const policy = new ExpirationPolicy({ ttl: options.ttl, now: options.now });
	const store = new FileStore(options.directory, policy);
	await store.initialize();
	return new Cache(store, policy, { codec: options.codec });
}

export async function createRedisCache(
	options: RedisCacheOptions,
	client?: RemoteKeyValueClient
): Promise<Cache> {
	validateRedisCacheOptions(options);
	const logger = log.child({ cache: 'redis' });
	const policy = new ExpirationPolicy({ ttl: options.ttl });
	const remote = client ?? (await connectRedis(options, logger));
	const store = await RedisStore.open('redis', remote, policy, logger);
	return new Cache(store, policy, { codec: options.codec, logger });
}

export async function createRedisClusterCache(
	options: RedisClusterCacheOptions,
	client?: RemoteKeyValueClient
): Promise<Cache> {
	validateRedisClusterCacheOptions(options);
	const logger = log.child({ cache: 'redis-cluster' });
	const policy = new ExpirationPolicy({ ttl: options.ttl });
	const remote = client ?? (await connectRedisCluster(options, logger));
	const store = await RedisStore.open('redis-cluster', remote, policy, logger);
	return new Cache(store, policy, { codec: options.codec, logger });
}

/**
 * Creates a cache for the tier named by `config.type`
 */
export async function createCache(config: CacheConfig): Promise<Cache> {
	switch (config.type) {
		case 'memory':
			return createMemoryCache(config);
		case 'file':
			return createFileCache(config);
		case 'redis':
			return createRedisCache(config);
		case 'redis-cluster':
			return createRedisClusterCache(config);
	}
}
