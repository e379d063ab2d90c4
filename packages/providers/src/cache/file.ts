import { promises as fs } from 'fs';
import path from 'path';
import { CacheIOError, InvalidKeyError } from '@tiercache/protocol';
import type { CacheStore, StoredEntry, StoredEntryInfo } from '@tiercache/protocol';
import type { ExpirationPolicy } from '@tiercache/runtime';

const FILE_MODE = 0o644;

function errorCode(error: unknown): string | undefined {
	if (
		typeof error === 'object' &&
		error !== null &&
		'code' in error &&
		typeof error.code === 'string'
	) {
		return error.code;
	}
	return undefined;
}

function isMissing(error: unknown): boolean {
	const code = errorCode(error);
	return code === 'ENOENT' || code === 'ENOTDIR';
}

/**
 * File-based store: one file per key, named exactly as the key, directly under
 * the cache directory. File content is the raw payload.
 *
 * There is no metadata sidecar, so write time is read back from the file's
 * mtime. Touching a cache file from outside changes how fresh it looks.
 */
export class FileStore implements CacheStore {
	readonly kind = 'file' as const;
	readonly sweepMode = 'concurrent' as const;
	private readonly knownKeys = new Set<string>();

	constructor(
		readonly directory: string,
		private readonly policy: ExpirationPolicy
	) {}

	/**
	 * Creates the cache directory if it is missing
	 */
	async initialize(): Promise<void> {
		try {
			await fs.mkdir(this.directory, { recursive: true });
		} catch (error) {
			throw new CacheIOError(
				`Cannot create cache directory ${this.directory}: ${error instanceof Error ? error.message : error}`,
				this.directory,
				undefined,
				{ cause: error }
			);
		}
	}

	getFilePath(key: string): string {
		if (key.length === 0) {
			throw new InvalidKeyError(key, 'key cannot be empty');
		}
		if (key === '.' || key === '..') {
			throw new InvalidKeyError(key, 'key cannot be a directory reference');
		}
		if (/[/\\\0]/.test(key)) {
			throw new InvalidKeyError(key, 'key cannot contain path separators or NUL');
		}
		return path.join(this.directory, key);
	}

	async stat(key: string): Promise<StoredEntryInfo | null> {
		const filePath = this.getFilePath(key);
		try {
			const stats = await fs.stat(filePath);
			return { expiresAt: this.policy.expiresAt(stats.mtimeMs) };
		} catch (error) {
			if (isMissing(error)) {
				return null;
			}
			throw this.ioError('stat', filePath, key, error);
		}
	}

	async read(key: string): Promise<StoredEntry | null> {
		const info = await this.stat(key);
		if (!info) {
			return null;
		}

		const filePath = this.getFilePath(key);
		try {
			const payload = await fs.readFile(filePath);
			return { payload, expiresAt: info.expiresAt };
		} catch (error) {
			// removed between stat and read
			if (isMissing(error)) {
				return null;
			}
			throw this.ioError('read', filePath, key, error);
		}
	}

	/**
	 * Creates or truncates the key's file. The expiry is implied by the new mtime
	 */
	async write(key: string, payload: Buffer, _expiresAt: number): Promise<void> {
		const filePath = this.getFilePath(key);
		try {
			await fs.writeFile(filePath, payload, { mode: FILE_MODE });
		} catch (error) {
			throw this.ioError('create', filePath, key, error);
		}
		this.knownKeys.add(key);
	}

	async remove(key: string): Promise<void> {
		const filePath = this.getFilePath(key);
		try {
			await fs.unlink(filePath);
		} catch (error) {
			if (!isMissing(error)) {
				throw this.ioError('remove', filePath, key, error);
			}
		}
		this.knownKeys.delete(key);
	}

	/**
	 * Removes every file this store has written. Other files in the directory are left alone
	 */
	async clear(): Promise<void> {
		const keys = this.keys();
		await Promise.all(keys.map((key) => this.remove(key)));
	}

	keys(): string[] {
		return Array.from(this.knownKeys);
	}

	async close(): Promise<void> {
		// Don't delete cache files on close - they should persist
	}

	private ioError(action: string, filePath: string, key: string, error: unknown): CacheIOError {
		return new CacheIOError(
			`Cannot ${action} cache file ${filePath}: ${error instanceof Error ? error.message : error}`,
			filePath,
			key,
			{ cause: error }
		);
	}
}
