import type { RemoteKeyValueClient } from '@tiercache/providers';

interface FakeEntry {
	payload: Buffer;
	/** 0 means no expiry */
	expiresAt: number;
}

/**
 * In-process stand-in for a Redis server. Honors PX expiry against its own
 * clock, which tests move forward by hand
 */
export class FakeRemoteClient implements RemoteKeyValueClient {
	readonly endpoint = 'fake:6379';
	now = 0;
	reachable = true;
	failing = false;
	quitCalls = 0;
	disconnected = false;
	readonly setCalls: Array<{ key: string; ttlMs: number }> = [];
	private readonly entries = new Map<string, FakeEntry>();

	async ping(): Promise<void> {
		if (!this.reachable) {
			throw new Error('connect ECONNREFUSED');
		}
	}

	async exists(key: string): Promise<boolean> {
		this.assertHealthy();
		return this.live(key) !== undefined;
	}

	async get(key: string): Promise<Buffer | null> {
		this.assertHealthy();
		const entry = this.live(key);
		return entry ? Buffer.from(entry.payload) : null;
	}

	async set(key: string, payload: Buffer, ttlMs: number): Promise<void> {
		this.assertHealthy();
		this.setCalls.push({ key, ttlMs });
		this.entries.set(key, {
			payload: Buffer.from(payload),
			expiresAt: ttlMs > 0 ? this.now + ttlMs : 0,
		});
	}

	async del(key: string): Promise<void> {
		this.assertHealthy();
		this.entries.delete(key);
	}

	async flushAll(): Promise<void> {
		this.assertHealthy();
		this.entries.clear();
	}

	async quit(): Promise<void> {
		this.quitCalls++;
	}

	disconnect(): void {
		this.disconnected = true;
	}

	size(): number {
		return this.entries.size;
	}

	private live(key: string): FakeEntry | undefined {
		const entry = this.entries.get(key);
		if (entry && entry.expiresAt > 0 && this.now >= entry.expiresAt) {
			this.entries.delete(key);
			return undefined;
		}
		return entry;
	}

	private assertHealthy(): void {
		if (this.failing) {
			throw new Error('connection reset');
		}
	}
}
