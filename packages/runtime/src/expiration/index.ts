export interface ExpirationPolicyOptions {
	/** Time to live in seconds; 0, negative or non-finite values mean never expire */
	ttl: number;
	now?: () => number;
}

/**
 * TTL arithmetic shared by every store whose expiry is judged locally.
 * Timestamps are epoch milliseconds and 0 stands for "never expires".
 */
export class ExpirationPolicy {
	readonly ttlMs: number;
	private readonly clock: () => number;

	constructor(options: ExpirationPolicyOptions) {
		this.ttlMs = Number.isFinite(options.ttl) && options.ttl > 0 ? options.ttl * 1000 : 0;
		this.clock = options.now ?? Date.now;
	}

	/** Whether entries written under this policy can expire at all */
	get enabled(): boolean {
		return this.ttlMs > 0;
	}

	now(): number {
		return this.clock();
	}

	expiresAt(writtenAt: number): number {
		return this.enabled ? writtenAt + this.ttlMs : 0;
	}

	expiryFromNow(): number {
		return this.expiresAt(this.now());
	}

	/**
	 * Strictly past the expiry: an entry checked exactly at its expiry instant is still fresh
	 */
	isStale(expiresAt: number, at: number = this.now()): boolean {
		return expiresAt > 0 && at > expiresAt;
	}
}
