/**
 * Provider interfaces for the cache facade and the stores behind it.
 * Callers program against CacheProvider; each storage tier implements CacheStore.
 */

/**
 * Storage tier backing a cache instance
 */
export type CacheKind = 'memory' | 'file' | 'redis' | 'redis-cluster';

/**
 * How the expiry sweeper visits a store's keys.
 * `none` means the store expires entries natively and is never swept.
 */
export type SweepMode = 'sequential' | 'concurrent' | 'none';

/**
 * Cache provider interface
 * The single entry point callers use, whatever the storage tier
 */
export interface CacheProvider {
	/** Provider name for identification */
	readonly name: CacheKind;

	/** Store a value unless a live entry already exists for the key */
	add(key: string, value: unknown): Promise<void>;

	/** Store a value, overwriting any prior entry */
	set(key: string, value: unknown): Promise<void>;

	/** Get the encoded payload of a live entry */
	get(key: string): Promise<Buffer>;

	/** Get the encoded payload of a live entry and remove it */
	pull(key: string): Promise<Buffer>;

	/** Check whether a live entry exists */
	has(key: string): Promise<boolean>;

	/** Delete an entry, if any */
	delete(key: string): Promise<void>;

	/** Delete every entry */
	flush(): Promise<void>;

	/** Stop background work and release the store */
	disconnect(): Promise<void>;
}

/**
 * Expiry metadata of a stored entry.
 * `expiresAt` is epoch milliseconds, or 0 when the entry never expires locally.
 */
export interface StoredEntryInfo {
	expiresAt: number;
}

export interface StoredEntry extends StoredEntryInfo {
	payload: Buffer;
}

/**
 * Backend capability the facade dispatches to.
 * Stores do not judge staleness; they report `expiresAt` and the facade applies the policy.
 */
export interface CacheStore {
	readonly kind: CacheKind;
	readonly sweepMode: SweepMode;

	/** Existence check, without reading the payload */
	stat(key: string): Promise<StoredEntryInfo | null>;

	read(key: string): Promise<StoredEntry | null>;

	/** Create or overwrite an entry */
	write(key: string, payload: Buffer, expiresAt: number): Promise<void>;

	/** Remove an entry; removing a missing key is a no-op */
	remove(key: string): Promise<void>;

	/** Remove every entry this store is responsible for */
	clear(): Promise<void>;

	/** Keys the expiry sweeper should visit */
	keys(): string[];

	close(): Promise<void>;
}
