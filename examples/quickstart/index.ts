/**
 * Quickstart: the same calls against the memory and file tiers.
 * Set REDIS_ENDPOINT (host:port) to run them against a Redis server too.
 */

import os from 'os';
import path from 'path';
import { z } from 'zod';
import {
	createCache,
	decodeValue,
	isCacheError,
	type CacheConfig,
	type CacheProvider,
} from '@tiercache/providers';
import { initializeLogger, log } from '@tiercache/runtime';

const sessionSchema = z.object({
	user: z.string(),
	visits: z.number(),
});

async function demo(cache: CacheProvider): Promise<void> {
	await cache.set('session', { user: 'ada', visits: 1 });

	const session = decodeValue(await cache.get('session'), sessionSchema);
	log.info('Read session', { cache: cache.name, session });

	try {
		await cache.add('session', { user: 'grace', visits: 1 });
	} catch (error) {
		if (!isCacheError(error, 'ALREADY_EXISTS')) {
			throw error;
		}
		log.info('Add refused a live key', { cache: cache.name });
	}

	const pulled = decodeValue(await cache.pull('session'), sessionSchema);
	log.info('Pulled session', { cache: cache.name, visits: pulled.visits });
	log.info('Still cached after pull?', { cache: cache.name, has: await cache.has('session') });

	await cache.flush();
	await cache.disconnect();
}

async function main() {
	initializeLogger({ level: 'info', pretty: true });

	const configs: CacheConfig[] = [
		{ type: 'memory', ttl: 60 },
		{ type: 'file', ttl: 60, directory: path.join(os.tmpdir(), 'tiercache-quickstart') },
	];
	if (process.env.REDIS_ENDPOINT) {
		configs.push({ type: 'redis', ttl: 60, endpoint: process.env.REDIS_ENDPOINT });
	}

	for (const config of configs) {
		await demo(await createCache(config));
	}
}

main().catch((error) => {
	log.error('Quickstart failed', { error: error instanceof Error ? error.message : error });
	process.exitCode = 1;
});
