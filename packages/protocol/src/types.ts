import type { ValueCodec } from './codec.js';

export interface BaseCacheOptions {
	/** Time to live in seconds. 0 (or less) means entries never expire */
	ttl: number;
	/** Defaults to the JSON codec */
	codec?: ValueCodec;
}

/**
 * Options shared by the in-process tiers, whose expiry is judged locally
 */
export interface LocalCacheOptions extends BaseCacheOptions {
	/** Clock used for expiry arithmetic, in epoch milliseconds (defaults to Date.now) */
	now?: () => number;
}

export type MemoryCacheOptions = LocalCacheOptions;

export interface FileCacheOptions extends LocalCacheOptions {
	/** Directory holding one file per key. Created if missing */
	directory: string;
}

export interface RedisCacheOptions extends BaseCacheOptions {
	/** `host:port` of the Redis server */
	endpoint: string;
	password?: string;
	db?: number;
	/** Milliseconds to wait for the initial connection (defaults to 5000) */
	connectTimeout?: number;
}

export interface RedisClusterCacheOptions extends BaseCacheOptions {
	/** `host:port` of one or more cluster nodes used to discover the rest */
	nodes: string[];
	password?: string;
	connectTimeout?: number;
}

export type CacheConfig =
	| ({ type: 'memory' } & MemoryCacheOptions)
	| ({ type: 'file' } & FileCacheOptions)
	| ({ type: 'redis' } & RedisCacheOptions)
	| ({ type: 'redis-cluster' } & RedisClusterCacheOptions);

export interface Endpoint {
	host: string;
	port: number;
}
