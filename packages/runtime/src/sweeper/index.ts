import { log as rootLog, type Logger } from '../log/index.js';

const MAX_TIMER_DELAY = 2 ** 31 - 1;

export type SweeperState = 'idle' | 'armed' | 'sweeping' | 'terminated';

export interface ExpirySweeperOptions {
	/** Delay between the end of one pass and the start of the next */
	intervalMs: number;
	/** sequential awaits each check in turn; concurrent dispatches them all without waiting */
	mode: 'sequential' | 'concurrent';
	/** Keys to visit on each pass */
	keys: () => string[];
	/** Existence check whose side effect evicts stale entries */
	check: (key: string) => Promise<boolean>;
	logger?: Logger;
}

/**
 * Periodically revisits every known key so entries that are written once and
 * never read again still get evicted.
 */
export class ExpirySweeper {
	private state: SweeperState = 'idle';
	private timer?: NodeJS.Timeout;
	private readonly logger: Logger;

	constructor(private readonly options: ExpirySweeperOptions) {
		this.logger = options.logger ?? rootLog.child({ component: 'expiry-sweeper' });
	}

	get status(): SweeperState {
		return this.state;
	}

	start(): void {
		if (this.state !== 'idle') {
			return;
		}
		this.arm();
	}

	/**
	 * Halts the sweeper permanently. A pass already in flight finishes but does not re-arm
	 */
	stop(): void {
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = undefined;
		}
		this.state = 'terminated';
	}

	/**
	 * Runs one pass now
	 */
	async sweep(): Promise<void> {
		if (this.state === 'terminated') {
			return;
		}

		const previous = this.state;
		this.state = 'sweeping';
		const keys = this.options.keys();

		try {
			if (this.options.mode === 'sequential') {
				for (const key of keys) {
					if (this.status === 'terminated') {
						break;
					}
					try {
						await this.options.check(key);
					} catch (error) {
						this.reportFailure(key, error);
					}
				}
			} else {
				for (const key of keys) {
					this.options.check(key).catch((error: unknown) => this.reportFailure(key, error));
				}
			}
			this.logger.debug('Expiry sweep pass', { keys: keys.length, mode: this.options.mode });
		} finally {
			if (this.status === 'sweeping') {
				this.state = previous === 'sweeping' ? 'armed' : previous;
			}
		}
	}

	private arm(): void {
		this.state = 'armed';
		this.schedule(Date.now() + this.options.intervalMs);
	}

	/**
	 * Node fires timers longer than MAX_TIMER_DELAY after 1ms, so long intervals
	 * are waited out in several hops
	 */
	private schedule(dueAt: number): void {
		const delay = Math.min(Math.max(dueAt - Date.now(), 0), MAX_TIMER_DELAY);
		this.timer = setTimeout(() => {
			this.timer = undefined;
			if (Date.now() < dueAt) {
				this.schedule(dueAt);
				return;
			}
			this.run().catch((error: unknown) => {
				this.logger.warn('Expiry sweep failed', {
					error: error instanceof Error ? error.message : error,
				});
			});
		}, delay);

		// Don't prevent process exit
		this.timer.unref();
	}

	private async run(): Promise<void> {
		try {
			await this.sweep();
		} finally {
			if (this.status !== 'terminated') {
				this.arm();
			}
		}
	}

	private reportFailure(key: string, error: unknown): void {
		this.logger.warn('Expiry check failed', {
			key,
			error: error instanceof Error ? error.message : error,
		});
	}
}
