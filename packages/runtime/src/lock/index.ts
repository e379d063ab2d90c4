export type LockMode = 'read' | 'write';

interface Waiter {
	mode: LockMode;
	grant: () => void;
}

/**
 * Async read/write lock.
 * Any number of readers share it; a writer holds it alone. Waiters are served
 * in arrival order, so a queued writer is not starved by later readers.
 */
export class ReadWriteLock {
	private readers = 0;
	private writing = false;
	private queue: Waiter[] = [];

	/**
	 * Runs fn while holding the shared lock
	 */
	async withRead<T>(fn: () => Promise<T>): Promise<T> {
		await this.acquire('read');
		try {
			return await fn();
		} finally {
			this.release('read');
		}
	}

	/**
	 * Runs fn while holding the exclusive lock
	 */
	async withWrite<T>(fn: () => Promise<T>): Promise<T> {
		await this.acquire('write');
		try {
			return await fn();
		} finally {
			this.release('write');
		}
	}

	/** Snapshot for diagnostics and tests */
	getStats() {
		return {
			readers: this.readers,
			writing: this.writing,
			waiting: this.queue.length,
		};
	}

	private acquire(mode: LockMode): Promise<void> {
		if (this.queue.length === 0 && this.canGrant(mode)) {
			this.take(mode);
			return Promise.resolve();
		}

		return new Promise((resolve) => {
			this.queue.push({
				mode,
				grant: () => {
					this.take(mode);
					resolve();
				},
			});
		});
	}

	private release(mode: LockMode): void {
		if (mode === 'read') {
			this.readers--;
		} else {
			this.writing = false;
		}
		this.drain();
	}

	private drain(): void {
		let next = this.queue[0];
		while (next && this.canGrant(next.mode)) {
			this.queue.shift();
			next.grant();
			next = this.queue[0];
		}
	}

	private canGrant(mode: LockMode): boolean {
		if (this.writing) {
			return false;
		}
		return mode === 'read' || this.readers === 0;
	}

	private take(mode: LockMode): void {
		if (mode === 'read') {
			this.readers++;
		} else {
			this.writing = true;
		}
	}
}
