import type { CacheStore, StoredEntry, StoredEntryInfo } from '@tiercache/protocol';

/**
 * In-process store backed by a Map owned by a single cache instance.
 * Good for development and single-process deployments
 */
export class MemoryStore implements CacheStore {
	readonly kind = 'memory' as const;
	readonly sweepMode = 'sequential' as const;
	private entries = new Map<string, StoredEntry>();

	async stat(key: string): Promise<StoredEntryInfo | null> {
		const entry = this.entries.get(key);
		return entry ? { expiresAt: entry.expiresAt } : null;
	}

	async read(key: string): Promise<StoredEntry | null> {
		const entry = this.entries.get(key);
		if (!entry) {
			return null;
		}
		// copy out; the stored buffer never leaves the store
		return { payload: Buffer.from(entry.payload), expiresAt: entry.expiresAt };
	}

	async write(key: string, payload: Buffer, expiresAt: number): Promise<void> {
		this.entries.set(key, { payload, expiresAt });
	}

	async remove(key: string): Promise<void> {
		this.entries.delete(key);
	}

	async clear(): Promise<void> {
		this.entries = new Map();
	}

	keys(): string[] {
		return Array.from(this.entries.keys());
	}

	async close(): Promise<void> {
		this.entries.clear();
	}

	/** Get store statistics */
	getStats() {
		return {
			keys: this.entries.size,
			bytes: Array.from(this.entries.values()).reduce(
				(total, entry) => total + entry.payload.length,
				0
			),
		};
	}
}
