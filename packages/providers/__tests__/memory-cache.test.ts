import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import {
	Cache,
	CacheAlreadyExistsError,
	CacheExpiredError,
	CacheNotFoundError,
	EncodingError,
	MemoryStore,
	createMemoryCache,
	decodeValue,
	encodeValue,
} from '@tiercache/providers';
import { ExpirationPolicy, type Logger } from '@tiercache/runtime';
import { createTestLogger } from '../../runtime/__tests__/helpers/logger.js';

interface TestItem {
	key: string;
	value: string;
}

describe('Memory cache', () => {
	let now: number;
	let store: MemoryStore;
	let logger: Logger;
	let cache: Cache;

	beforeEach(() => {
		now = 1_000_000;
		store = new MemoryStore();
		logger = createTestLogger();
		cache = new Cache(store, new ExpirationPolicy({ ttl: 5, now: () => now }), {
			logger,
			sweep: false,
		});
	});

	afterEach(async () => {
		await cache.disconnect();
	});

	describe('set and get', () => {
		it('should round-trip a string', async () => {
			await cache.set('cache_key', 'value');

			expect(await cache.has('cache_key')).toBe(true);
			const payload = await cache.get('cache_key');
			expect(payload.equals(encodeValue('value'))).toBe(true);
			expect(decodeValue(payload)).toBe('value');
		});

		it('should round-trip numbers, booleans and records', async () => {
			const item: TestItem = { key: 'first', value: 'second' };

			await cache.set('int', 1);
			await cache.set('bool', true);
			await cache.set('item', item);

			expect(decodeValue(await cache.get('int'))).toBe(1);
			expect(decodeValue(await cache.get('bool'))).toBe(true);
			expect(decodeValue(await cache.get('item'))).toEqual(item);
		});

		it('should overwrite an existing entry', async () => {
			await cache.set('k', 'old');
			await cache.set('k', 'new');

			expect(decodeValue(await cache.get('k'))).toBe('new');
		});

		it('should not remove an entry on get', async () => {
			await cache.set('k', 'v');
			await cache.get('k');

			expect(await cache.has('k')).toBe(true);
		});

		it('should fail with CacheNotFoundError for a missing key', async () => {
			await expect(cache.get('missing')).rejects.toBeInstanceOf(CacheNotFoundError);
		});

		it('should propagate EncodingError and write nothing', async () => {
			await expect(cache.set('fn', () => 'not serializable')).rejects.toBeInstanceOf(
				EncodingError
			);
			expect(store.keys()).toEqual([]);
		});

		it('should hand out copies of the stored payload', async () => {
			await cache.set('k', 'abc');
			const first = await cache.get('k');
			first.fill(0);

			expect(decodeValue(await cache.get('k'))).toBe('abc');
		});
	});

	describe('add', () => {
		it('should store a value when the key is free', async () => {
			await cache.add('cache_key1', 'value');

			expect(decodeValue(await cache.get('cache_key1'))).toBe('value');
		});

		it('should refuse a second add on a live key and keep the first value', async () => {
			await cache.add('k', 'v1');

			await expect(cache.add('k', 'v2')).rejects.toBeInstanceOf(CacheAlreadyExistsError);
			expect(decodeValue(await cache.get('k'))).toBe('v1');
		});

		it('should replace an entry that has gone stale', async () => {
			await cache.add('k', 'v1');
			now += 5_001;

			await cache.add('k', 'v2');
			expect(decodeValue(await cache.get('k'))).toBe('v2');
		});

		it('should let exactly one of two concurrent adds win', async () => {
			const results = await Promise.allSettled([cache.add('race', 1), cache.add('race', 2)]);

			expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected']);
			const rejected = results[1];
			expect(rejected?.status === 'rejected' && rejected.reason).toBeInstanceOf(
				CacheAlreadyExistsError
			);
			expect(decodeValue(await cache.get('race'))).toBe(1);
		});
	});

	describe('expiry', () => {
		it('should stay fresh up to and including the ttl', async () => {
			await cache.set('k', 'v');

			now += 5_000;
			expect(await cache.has('k')).toBe(true);
			expect(decodeValue(await cache.get('k'))).toBe('v');
		});

		it('should fail with CacheExpiredError once past the ttl and evict the entry', async () => {
			await cache.set('k', 'v');
			now += 5_001;

			await expect(cache.get('k')).rejects.toBeInstanceOf(CacheExpiredError);
			expect(store.keys()).toEqual([]);
			await expect(cache.get('k')).rejects.toBeInstanceOf(CacheNotFoundError);
		});

		it('should evict stale entries found by has', async () => {
			await cache.set('k', 'v');
			now += 5_001;

			expect(await cache.has('k')).toBe(false);
			expect(store.keys()).toEqual([]);
		});

		it('should fail a pull on an expired entry', async () => {
			await cache.set('cache_key', 'value');
			expect(await cache.has('cache_key')).toBe(true);

			now += 5_001;
			await expect(cache.pull('cache_key')).rejects.toBeInstanceOf(CacheExpiredError);
		});

		it('should let concurrent readers evict the same stale entry', async () => {
			await cache.set('k', 'v');
			now += 5_001;

			expect(await Promise.all([cache.has('k'), cache.has('k')])).toEqual([false, false]);
			expect(store.keys()).toEqual([]);
		});

		it('should fail both concurrent pulls of a stale entry as expired', async () => {
			await cache.set('k', 'v');
			now += 5_001;

			const results = await Promise.allSettled([cache.pull('k'), cache.get('k')]);

			for (const result of results) {
				expect(result.status === 'rejected' && result.reason).toBeInstanceOf(CacheExpiredError);
			}
			expect(store.keys()).toEqual([]);
		});

		it('should never expire entries with a zero ttl', async () => {
			const forever = createMemoryCache({ ttl: 0, now: () => now });
			await forever.set('k', 1);

			now += 365 * 24 * 60 * 60 * 1000;
			expect(decodeValue(await forever.get('k'))).toBe(1);
			expect(forever.getSweeper()).toBeUndefined();
			await forever.disconnect();
		});
	});

	describe('pull', () => {
		it('should return the value and remove it', async () => {
			const item: TestItem = { key: 'first', value: 'second' };
			await cache.set('k', item);

			expect(decodeValue(await cache.pull('k'))).toEqual(item);
			expect(await cache.has('k')).toBe(false);
			await expect(cache.pull('k')).rejects.toBeInstanceOf(CacheNotFoundError);
		});
	});

	describe('delete and flush', () => {
		it('should ignore deletes of missing keys', async () => {
			await expect(cache.delete('missing')).resolves.toBeUndefined();
		});

		it('should delete a single key', async () => {
			await cache.set('a', 1);
			await cache.set('b', 2);

			await cache.delete('a');

			expect(await cache.has('a')).toBe(false);
			expect(await cache.has('b')).toBe(true);
		});

		it('should flush every key', async () => {
			await cache.set('a', 1);
			await cache.set('b', 2);

			await cache.flush();
			await cache.flush();

			expect(await cache.has('a')).toBe(false);
			expect(await cache.has('b')).toBe(false);
			expect(store.getStats()).toEqual({ keys: 0, bytes: 0 });
		});
	});

	describe('has', () => {
		it('should report store failures as a miss', async () => {
			const failing = new MemoryStore();
			failing.stat = async () => {
				throw new Error('store offline');
			};
			const broken = new Cache(failing, new ExpirationPolicy({ ttl: 0 }), { logger });

			expect(await broken.has('k')).toBe(false);
			expect(logger.warn).toHaveBeenCalledWith('Existence check failed', {
				key: 'k',
				error: 'store offline',
			});
		});
	});
});

describe('Memory cache sweeper', () => {
	beforeEach(() => {
		jest.useFakeTimers();
	});

	afterEach(() => {
		jest.useRealTimers();
	});

	it('should evict keys that are never read again', async () => {
		const store = new MemoryStore();
		const cache = new Cache(store, new ExpirationPolicy({ ttl: 1 }), {
			logger: createTestLogger(),
		});
		await cache.set('written-once', 'v');

		expect(cache.getSweeper()?.status).toBe('armed');

		// first pass lands exactly on the expiry instant, which is still fresh
		await jest.advanceTimersByTimeAsync(1_000);
		expect(store.keys()).toEqual(['written-once']);

		await jest.advanceTimersByTimeAsync(1_000);
		expect(store.keys()).toEqual([]);

		await cache.disconnect();
		expect(cache.getSweeper()?.status).toBe('terminated');
	});

	it('should not sweep when disabled', () => {
		const cache = new Cache(new MemoryStore(), new ExpirationPolicy({ ttl: 1 }), {
			logger: createTestLogger(),
			sweep: false,
		});

		expect(cache.getSweeper()).toBeUndefined();
	});
});
