/**
 * Input validation for cache construction options
 */

import { z } from 'zod';
import type { ValueCodec } from './codec.js';
import type {
	Endpoint,
	FileCacheOptions,
	MemoryCacheOptions,
	RedisCacheOptions,
	RedisClusterCacheOptions,
} from './types.js';

export class ConfigValidationError extends Error {
	constructor(
		message: string,
		public readonly field: string,
		public readonly value: unknown
	) {
		super(message);
		this.name = 'ConfigValidationError';
	}
}

const ENDPOINT_PATTERN = /^([^\s:]+):(\d{1,5})$/;

const ttlSchema = z.number({
	required_error: 'ttl is required',
	invalid_type_error: 'ttl must be a number of seconds',
});

const codecSchema = z
	.custom<ValueCodec>(
		(val) =>
			typeof val === 'object' &&
			val !== null &&
			'encode' in val &&
			typeof val.encode === 'function' &&
			'decode' in val &&
			typeof val.decode === 'function',
		{ message: 'codec must implement encode and decode' }
	)
	.optional();

const endpointSchema = z
	.string({ invalid_type_error: 'endpoint must be a string' })
	.regex(ENDPOINT_PATTERN, 'endpoint must look like host:port')
	.refine(
		(val) => {
			const match = ENDPOINT_PATTERN.exec(val);
			// malformed endpoints are already reported by the regex
			if (!match) {
				return true;
			}
			const port = Number(match[2]);
			return port > 0 && port <= 65535;
		},
		{ message: 'endpoint port must be between 1 and 65535' }
	);

const connectTimeoutSchema = z
	.number({ invalid_type_error: 'connectTimeout must be a number' })
	.int('connectTimeout must be an integer')
	.positive('connectTimeout must be positive')
	.optional();

export const memoryCacheOptionsSchema = z.object({
	ttl: ttlSchema,
	codec: codecSchema,
	now: z.function().optional(),
});

export const fileCacheOptionsSchema = memoryCacheOptionsSchema.extend({
	directory: z
		.string({
			required_error: 'directory is required',
			invalid_type_error: 'directory must be a string',
		})
		.refine((val) => val.trim().length > 0, { message: 'directory cannot be empty' }),
});

export const redisCacheOptionsSchema = z.object({
	ttl: ttlSchema,
	codec: codecSchema,
	endpoint: endpointSchema,
	password: z.string({ invalid_type_error: 'password must be a string' }).optional(),
	db: z
		.number({ invalid_type_error: 'db must be a number' })
		.int('db must be an integer')
		.nonnegative('db cannot be negative')
		.optional(),
	connectTimeout: connectTimeoutSchema,
});

export const redisClusterCacheOptionsSchema = z.object({
	ttl: ttlSchema,
	codec: codecSchema,
	nodes: z.array(endpointSchema).min(1, 'nodes must list at least one host:port'),
	password: z.string({ invalid_type_error: 'password must be a string' }).optional(),
	connectTimeout: connectTimeoutSchema,
});

function validate(schema: z.ZodTypeAny, name: string, options: unknown): void {
	const result = schema.safeParse(options);
	if (!result.success) {
		const errors = result.error.errors.map((err) =>
			err.path.length > 0 ? `${err.path.join('.')}: ${err.message}` : err.message
		);
		const field = result.error.errors[0]?.path.join('.') || name;
		throw new ConfigValidationError(`Invalid ${name}: ${errors.join(', ')}`, field, options);
	}
}

export function validateMemoryCacheOptions(options: MemoryCacheOptions): void {
	validate(memoryCacheOptionsSchema, 'MemoryCacheOptions', options);
}

export function validateFileCacheOptions(options: FileCacheOptions): void {
	validate(fileCacheOptionsSchema, 'FileCacheOptions', options);
}

export function validateRedisCacheOptions(options: RedisCacheOptions): void {
	validate(redisCacheOptionsSchema, 'RedisCacheOptions', options);
}

export function validateRedisClusterCacheOptions(options: RedisClusterCacheOptions): void {
	validate(redisClusterCacheOptionsSchema, 'RedisClusterCacheOptions', options);
}

/**
 * Splits a validated `host:port` endpoint
 */
export function parseEndpoint(endpoint: string): Endpoint {
	const match = ENDPOINT_PATTERN.exec(endpoint);
	if (!match) {
		throw new ConfigValidationError('endpoint must look like host:port', 'endpoint', endpoint);
	}
	const [, host, port] = match;
	return { host: host ?? '', port: Number(port) };
}
