import { Redis, Cluster } from 'ioredis';
import {
	ConnectionError,
	parseEndpoint,
	type CacheStore,
	type StoredEntry,
	type StoredEntryInfo,
} from '@tiercache/protocol';
import type { RedisCacheOptions, RedisClusterCacheOptions } from '@tiercache/protocol';
import type { ExpirationPolicy, Logger } from '@tiercache/runtime';

const DEFAULT_CONNECT_TIMEOUT = 5000;

/**
 * The four logical operations the cache issues against a remote key-value
 * store, plus the reachability probe and teardown
 */
export interface RemoteKeyValueClient {
	/** Human-readable address, for logs and errors */
	readonly endpoint: string;
	ping(): Promise<void>;
	exists(key: string): Promise<boolean>;
	get(key: string): Promise<Buffer | null>;
	/** ttlMs of 0 stores the key without expiry */
	set(key: string, payload: Buffer, ttlMs: number): Promise<void>;
	del(key: string): Promise<void>;
	flushAll(): Promise<void>;
	/** Graceful close, waiting for pending replies */
	quit(): Promise<void>;
	/** Immediate close */
	disconnect(): void;
}

type IoRedisClient = Redis | Cluster;

function retryStrategy(times: number): number | null {
	if (times > 3) {
		return null;
	}
	return Math.min(times * 100, 2000);
}

function wrapIoRedis(
	client: IoRedisClient,
	endpoint: string,
	flushAll: () => Promise<void>
): RemoteKeyValueClient {
	return {
		endpoint,
		async ping() {
			await client.ping();
		},
		async exists(key) {
			return (await client.exists(key)) === 1;
		},
		get(key) {
			return client.getBuffer(key);
		},
		async set(key, payload, ttlMs) {
			if (ttlMs > 0) {
				await client.set(key, payload, 'PX', ttlMs);
			} else {
				await client.set(key, payload);
			}
		},
		async del(key) {
			await client.del(key);
		},
		flushAll,
		async quit() {
			await client.quit();
		},
		disconnect() {
			client.disconnect();
		},
	};
}

function connectionError(endpoint: string, error: unknown): ConnectionError {
	return new ConnectionError(
		`Cannot connect to redis at ${endpoint}: ${error instanceof Error ? error.message : error}`,
		endpoint,
		{ cause: error }
	);
}

/**
 * Routes connection errors raised after construction to the cache's logger
 */
function watchErrors(client: IoRedisClient, endpoint: string, logger?: Logger): void {
	client.on('error', (error: unknown) => {
		logger?.warn('Remote store connection error', {
			endpoint,
			error: error instanceof Error ? error.message : error,
		});
	});
}

async function connect(client: IoRedisClient, endpoint: string): Promise<void> {
	try {
		await client.connect();
	} catch (error) {
		client.disconnect();
		throw connectionError(endpoint, error);
	}
}

/**
 * Creates a single-node client without connecting it
 */
export function createRedisClient(options: RedisCacheOptions, logger?: Logger): Redis {
	const { host, port } = parseEndpoint(options.endpoint);
	const redis = new Redis({
		host,
		port,
		password: options.password,
		db: options.db ?? 0,
		connectTimeout: options.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT,
		retryStrategy,
		lazyConnect: true,
	});
	watchErrors(redis, options.endpoint, logger);
	return redis;
}

/**
 * Creates a cluster client over the given seed nodes without connecting it
 */
export function createRedisClusterClient(
	options: RedisClusterCacheOptions,
	logger?: Logger
): Cluster {
	const cluster = new Cluster(
		options.nodes.map((node) => parseEndpoint(node)),
		{
			lazyConnect: true,
			clusterRetryStrategy: retryStrategy,
			redisOptions: {
				password: options.password,
				connectTimeout: options.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT,
			},
		}
	);
	watchErrors(cluster, options.nodes.join(','), logger);
	return cluster;
}

/**
 * Connects to a single Redis node. Fails fast with ConnectionError when the
 * connection cannot be established; later connection errors go to `logger`
 */
export async function connectRedis(
	options: RedisCacheOptions,
	logger?: Logger
): Promise<RemoteKeyValueClient> {
	const redis = createRedisClient(options, logger);
	await connect(redis, options.endpoint);
	return wrapIoRedis(redis, options.endpoint, async () => {
		await redis.flushall();
	});
}

/**
 * Connects to a Redis Cluster. FLUSHALL is sent to every master, since a
 * cluster-level FLUSHALL only reaches one node
 */
export async function connectRedisCluster(
	options: RedisClusterCacheOptions,
	logger?: Logger
): Promise<RemoteKeyValueClient> {
	const cluster = createRedisClusterClient(options, logger);
	const endpoint = options.nodes.join(',');
	await connect(cluster, endpoint);
	return wrapIoRedis(cluster, endpoint, async () => {
		await Promise.all(cluster.nodes('master').map((node) => node.flushall()));
	});
}

/**
 * Redis-backed store. Expiry is native: entries are written with a PX TTL and
 * the store reports them as never expiring locally
 */
export class RedisStore implements CacheStore {
	readonly sweepMode = 'none' as const;

	constructor(
		readonly kind: 'redis' | 'redis-cluster',
		private readonly client: RemoteKeyValueClient,
		private readonly policy: ExpirationPolicy,
		private readonly logger?: Logger
	) {}

	/**
	 * Runs the reachability probe (PING) and fails fast with ConnectionError
	 */
	static async open(
		kind: 'redis' | 'redis-cluster',
		client: RemoteKeyValueClient,
		policy: ExpirationPolicy,
		logger?: Logger
	): Promise<RedisStore> {
		try {
			await client.ping();
		} catch (error) {
			client.disconnect();
			throw connectionError(client.endpoint, error);
		}
		logger?.info('Connected to remote store', { endpoint: client.endpoint });
		return new RedisStore(kind, client, policy, logger);
	}

	async stat(key: string): Promise<StoredEntryInfo | null> {
		return (await this.client.exists(key)) ? { expiresAt: 0 } : null;
	}

	async read(key: string): Promise<StoredEntry | null> {
		const payload = await this.client.get(key);
		return payload ? { payload, expiresAt: 0 } : null;
	}

	async write(key: string, payload: Buffer, _expiresAt: number): Promise<void> {
		await this.client.set(key, payload, Math.ceil(this.policy.ttlMs));
	}

	async remove(key: string): Promise<void> {
		await this.client.del(key);
	}

	async clear(): Promise<void> {
		await this.client.flushAll();
	}

	/** Remote entries are never swept */
	keys(): string[] {
		return [];
	}

	async close(): Promise<void> {
		try {
			await this.client.quit();
		} catch (error) {
			this.logger?.warn('Failed to disconnect from remote store', {
				endpoint: this.client.endpoint,
				error: error instanceof Error ? error.message : error,
			});
		}
	}
}
