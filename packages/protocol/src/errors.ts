export type CacheErrorCode =
	| 'NOT_FOUND'
	| 'EXPIRED'
	| 'ALREADY_EXISTS'
	| 'ENCODING'
	| 'DECODING'
	| 'CONNECTION'
	| 'IO'
	| 'INVALID_KEY';

/**
 * Base class for every error the cache raises
 */
export class CacheError extends Error {
	constructor(
		message: string,
		public readonly code: CacheErrorCode,
		public readonly key?: string,
		options?: { cause?: unknown }
	) {
		super(message, options);
		this.name = 'CacheError';
	}
}

export class CacheNotFoundError extends CacheError {
	constructor(key: string) {
		super(`Cache entry not found: ${key}`, 'NOT_FOUND', key);
		this.name = 'CacheNotFoundError';
	}
}

/**
 * Raised when the key is present but past its expiry, so callers can tell
 * "never cached" from "aged out"
 */
export class CacheExpiredError extends CacheError {
	constructor(key: string) {
		super(`Cache entry expired: ${key}`, 'EXPIRED', key);
		this.name = 'CacheExpiredError';
	}
}

export class CacheAlreadyExistsError extends CacheError {
	constructor(key: string) {
		super(`Cache entry already exists: ${key}`, 'ALREADY_EXISTS', key);
		this.name = 'CacheAlreadyExistsError';
	}
}

export class EncodingError extends CacheError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, 'ENCODING', undefined, options);
		this.name = 'EncodingError';
	}
}

export class DecodingError extends CacheError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, 'DECODING', undefined, options);
		this.name = 'DecodingError';
	}
}

export class ConnectionError extends CacheError {
	constructor(
		message: string,
		public readonly endpoint: string,
		options?: { cause?: unknown }
	) {
		super(message, 'CONNECTION', undefined, options);
		this.name = 'ConnectionError';
	}
}

export class CacheIOError extends CacheError {
	constructor(
		message: string,
		public readonly path: string,
		key?: string,
		options?: { cause?: unknown }
	) {
		super(message, 'IO', key, options);
		this.name = 'CacheIOError';
	}
}

export class InvalidKeyError extends CacheError {
	constructor(key: string, reason: string) {
		super(`Invalid cache key "${key}": ${reason}`, 'INVALID_KEY', key);
		this.name = 'InvalidKeyError';
	}
}

/**
 * Narrows an unknown error to a CacheError, optionally of a given code
 */
export function isCacheError(error: unknown, code?: CacheErrorCode): error is CacheError {
	return error instanceof CacheError && (code === undefined || error.code === code);
}
