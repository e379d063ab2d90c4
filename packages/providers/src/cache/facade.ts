import {
	CacheAlreadyExistsError,
	CacheExpiredError,
	CacheNotFoundError,
	defaultCodec,
	type CacheKind,
	type CacheProvider,
	type CacheStore,
	type ValueCodec,
} from '@tiercache/protocol';
import {
	ExpirationPolicy,
	ExpirySweeper,
	ReadWriteLock,
	log,
	type Logger,
} from '@tiercache/runtime';

export interface CacheOptions {
	codec?: ValueCodec;
	logger?: Logger;
	/** Start the expiry sweeper when the store needs one (defaults to true) */
	sweep?: boolean;
}

/**
 * Cache facade: one contract over every store.
 *
 * Mutations (add, set, delete, flush) hold the exclusive lock for their whole
 * duration, store I/O included. Reads (get, pull, has) share the lock, even
 * though they may evict a stale entry; two readers evicting the same key is
 * harmless since removing a missing key is a no-op.
 */
export class Cache implements CacheProvider {
	readonly name: CacheKind;
	private readonly lock = new ReadWriteLock();
	private readonly codec: ValueCodec;
	private readonly logger: Logger;
	private readonly sweeper?: ExpirySweeper;

	constructor(
		private readonly store: CacheStore,
		private readonly policy: ExpirationPolicy,
		options: CacheOptions = {}
	) {
		this.name = store.kind;
		this.codec = options.codec ?? defaultCodec;
		this.logger = options.logger ?? log.child({ cache: store.kind });

		if (options.sweep !== false && policy.enabled && store.sweepMode !== 'none') {
			this.sweeper = new ExpirySweeper({
				intervalMs: policy.ttlMs,
				mode: store.sweepMode,
				keys: () => store.keys(),
				check: (key) => this.has(key),
				logger: this.logger,
			});
			this.sweeper.start();
		}
	}

	async add(key: string, value: unknown): Promise<void> {
		return this.lock.withWrite(async () => {
			if (await this.isLive(key)) {
				throw new CacheAlreadyExistsError(key);
			}
			await this.write(key, value);
		});
	}

	async set(key: string, value: unknown): Promise<void> {
		return this.lock.withWrite(() => this.write(key, value));
	}

	async get(key: string): Promise<Buffer> {
		return this.lock.withRead(() => this.read(key, false));
	}

	async pull(key: string): Promise<Buffer> {
		return this.lock.withRead(() => this.read(key, true));
	}

	/**
	 * Never rejects: a store failure is logged and reported as a miss
	 */
	async has(key: string): Promise<boolean> {
		return this.lock.withRead(async () => {
			try {
				return await this.isLive(key);
			} catch (error) {
				this.logger.warn('Existence check failed', {
					key,
					error: error instanceof Error ? error.message : error,
				});
				return false;
			}
		});
	}

	async delete(key: string): Promise<void> {
		return this.lock.withWrite(() => this.store.remove(key));
	}

	async flush(): Promise<void> {
		return this.lock.withWrite(() => this.store.clear());
	}

	async disconnect(): Promise<void> {
		this.sweeper?.stop();
		await this.lock.withWrite(() => this.store.close());
	}

	/** The sweeper, when this cache runs one */
	getSweeper(): ExpirySweeper | undefined {
		return this.sweeper;
	}

	private async write(key: string, value: unknown): Promise<void> {
		const payload = this.codec.encode(value);
		await this.store.write(key, payload, this.policy.expiryFromNow());
	}

	private async read(key: string, remove: boolean): Promise<Buffer> {
		const entry = await this.store.read(key);
		if (!entry) {
			throw new CacheNotFoundError(key);
		}
		if (this.policy.isStale(entry.expiresAt)) {
			await this.evict(key);
			throw new CacheExpiredError(key);
		}
		if (remove) {
			await this.store.remove(key);
		}
		return entry.payload;
	}

	/**
	 * Present and fresh; a stale entry found here is evicted on the spot
	 */
	private async isLive(key: string): Promise<boolean> {
		const info = await this.store.stat(key);
		if (!info) {
			return false;
		}
		if (this.policy.isStale(info.expiresAt)) {
			await this.evict(key);
			return false;
		}
		return true;
	}

	private async evict(key: string): Promise<void> {
		await this.store.remove(key);
		this.logger.debug('Evicted stale entry', { key });
	}
}
