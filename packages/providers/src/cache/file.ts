import {
	CacheInitError,
	Err,
	Ok,
	toCacheError,
	type CacheBackend,
	type CacheBackendName,
	type CacheResult,
	type CacheValue,
	type FileConfig,
} from '@epss/protocol';
import { expandHome, log } from '@epss/runtime';
import { constants, promises as fs, type Dirent } from 'fs';
import path from 'path';
import { promisify } from 'node:util';
import v8 from 'node:v8';
import zlib from 'node:zlib';

const gzip = promisify(zlib.gzip);
const gunzip = promisify(zlib.gunzip);

const logger = log.child({ component: 'file-cache' });

const CACHE_FILE_SUFFIXES = ['.json', '.json.gz', '.bin', '.bin.gz'];

export interface FileCacheOptions {
	/**
	 * Freshness window in seconds, measured from each file's modification
	 * time. 0 keeps entries until they are evicted.
	 */
	ttl?: number;
}

interface CacheFileEntry {
	filePath: string;
	size: number;
	mtimeMs: number;
}

function isNotFound(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function isCacheValue(value: unknown): value is CacheValue {
	return value !== null && value !== undefined;
}

/**
 * File-based cache backend: one file per key in a single directory.
 *
 * Expiry is derived from the file's mtime plus the configured TTL; no expiry
 * timestamp is stored, so a per-call TTL passed to `set` has no effect. A
 * stale file is reported as a miss but left on disk until the size sweep,
 * which runs after every write, removes it (oldest first).
 */
export class FileCacheBackend implements CacheBackend {
	readonly name: CacheBackendName = 'file';
	private readonly cacheDir: string;
	private readonly maxSizeBytes: number;
	private readonly extension: string;
	private readonly ttl: number;

	constructor(
		private readonly config: FileConfig,
		options: FileCacheOptions = {}
	) {
		this.cacheDir = path.resolve(expandHome(config.directory));
		this.maxSizeBytes = config.maxSizeMb > 0 ? Math.floor(config.maxSizeMb * 1024 * 1024) : 0;
		this.extension = `${config.format === 'json' ? '.json' : '.bin'}${config.compression ? '.gz' : ''}`;
		this.ttl = options.ttl ?? 0;
	}

	/**
	 * Creates the cache directory and trims it to the size budget
	 *
	 * @throws CacheInitError when the directory cannot be created or written
	 */
	static async open(config: FileConfig, options: FileCacheOptions = {}): Promise<FileCacheBackend> {
		const backend = new FileCacheBackend(config, options);
		try {
			await fs.mkdir(backend.cacheDir, { recursive: true });
			await fs.access(backend.cacheDir, constants.W_OK);
		} catch (error) {
			throw new CacheInitError(
				`Cache directory ${backend.cacheDir} is not usable: ${error instanceof Error ? error.message : String(error)}`,
				'file',
				error
			);
		}
		await backend.enforceMaxSize();
		return backend;
	}

	get directory(): string {
		return this.cacheDir;
	}

	/**
	 * Path of the file that stores `key`. Path separators and colons are
	 * replaced so that every key maps to a single file in the directory.
	 */
	getFilePath(key: string): string {
		const safeKey = key.replace(/[/\\:]/g, '_');
		return path.join(this.cacheDir, `${safeKey}${this.extension}`);
	}

	private isExpired(mtimeMs: number): boolean {
		return this.ttl > 0 && Date.now() - mtimeMs > this.ttl * 1000;
	}

	private async serialize(value: CacheValue): Promise<Buffer> {
		const data =
			this.config.format === 'json' ? Buffer.from(JSON.stringify(value), 'utf-8') : v8.serialize(value);
		return this.config.compression ? gzip(data) : data;
	}

	private async deserialize(raw: Buffer): Promise<CacheValue> {
		const data = this.config.compression ? await gunzip(raw) : raw;
		const value: unknown =
			this.config.format === 'json' ? JSON.parse(data.toString('utf-8')) : v8.deserialize(data);
		if (!isCacheValue(value)) {
			throw new Error('Stored payload is empty');
		}
		return value;
	}

	async get(key: string): Promise<CacheResult<CacheValue | null>> {
		const filePath = this.getFilePath(key);
		let raw: Buffer;
		try {
			const stats = await fs.stat(filePath);
			if (this.isExpired(stats.mtimeMs)) {
				logger.debug('Stale cache file', { key });
				return Ok(null);
			}
			raw = await fs.readFile(filePath);
		} catch (error) {
			if (isNotFound(error)) {
				return Ok(null);
			}
			return Err(toCacheError('io', error));
		}

		try {
			return Ok(await this.deserialize(raw));
		} catch (error) {
			logger.warn('Removing corrupted cache file', {
				key,
				error: error instanceof Error ? error.message : error,
			});
			await fs.unlink(filePath).catch((unlinkError: unknown) => {
				logger.debug('Failed to remove corrupted cache file', {
					key,
					error: unlinkError instanceof Error ? unlinkError.message : unlinkError,
				});
			});
			return Err(toCacheError('corrupted', error));
		}
	}

	async set(key: string, value: CacheValue): Promise<CacheResult<boolean>> {
		let data: Buffer;
		try {
			data = await this.serialize(value);
		} catch (error) {
			return Err(toCacheError('serialization', error));
		}

		try {
			await fs.writeFile(this.getFilePath(key), data);
		} catch (error) {
			return Err(toCacheError('io', error));
		}

		await this.enforceMaxSize();
		return Ok(true);
	}

	async delete(key: string): Promise<CacheResult<boolean>> {
		try {
			await fs.unlink(this.getFilePath(key));
			return Ok(true);
		} catch (error) {
			if (isNotFound(error)) {
				return Ok(false);
			}
			return Err(toCacheError('io', error));
		}
	}

	async exists(key: string): Promise<CacheResult<boolean>> {
		try {
			const stats = await fs.stat(this.getFilePath(key));
			return Ok(!this.isExpired(stats.mtimeMs));
		} catch (error) {
			if (isNotFound(error)) {
				return Ok(false);
			}
			return Err(toCacheError('io', error));
		}
	}

	async clear(): Promise<CacheResult<boolean>> {
		let entries: CacheFileEntry[];
		try {
			entries = await this.listEntries();
		} catch (error) {
			return Err(toCacheError('io', error));
		}

		const failures: unknown[] = [];
		for (const entry of entries) {
			try {
				await fs.unlink(entry.filePath);
			} catch (error) {
				if (!isNotFound(error)) {
					failures.push(error);
				}
			}
		}

		if (failures.length > 0) {
			return Err(toCacheError('io', failures[0]));
		}
		return Ok(true);
	}

	async close(): Promise<void> {
		// Files are opened per operation; nothing is held between calls.
	}

	/** Total size in bytes of the cache files currently on disk */
	async getSize(): Promise<number> {
		const entries = await this.listEntries();
		return entries.reduce((sum, entry) => sum + entry.size, 0);
	}

	private async listEntries(): Promise<CacheFileEntry[]> {
		const dirents: Dirent[] = await fs.readdir(this.cacheDir, { withFileTypes: true });
		const candidates = dirents.filter(
			(dirent) => dirent.isFile() && CACHE_FILE_SUFFIXES.some((suffix) => dirent.name.endsWith(suffix))
		);

		const entries = await Promise.all(
			candidates.map(async (dirent): Promise<CacheFileEntry | null> => {
				const filePath = path.join(this.cacheDir, dirent.name);
				try {
					const stats = await fs.stat(filePath);
					return { filePath, size: stats.size, mtimeMs: stats.mtimeMs };
				} catch {
					// Removed between readdir and stat
					return null;
				}
			})
		);

		return entries.filter((entry): entry is CacheFileEntry => entry !== null);
	}

	/**
	 * Deletes the oldest cache files until the directory fits the size budget.
	 * Files that cannot be removed are skipped.
	 */
	private async enforceMaxSize(): Promise<void> {
		if (this.maxSizeBytes <= 0) {
			return;
		}

		let entries: CacheFileEntry[];
		try {
			entries = await this.listEntries();
		} catch (error) {
			logger.warn('Failed to scan cache directory', {
				directory: this.cacheDir,
				error: error instanceof Error ? error.message : error,
			});
			return;
		}

		let totalSize = entries.reduce((sum, entry) => sum + entry.size, 0);
		if (totalSize <= this.maxSizeBytes) {
			return;
		}

		entries.sort((a, b) => a.mtimeMs - b.mtimeMs);

		for (const entry of entries) {
			if (totalSize <= this.maxSizeBytes) {
				break;
			}
			try {
				await fs.unlink(entry.filePath);
				totalSize -= entry.size;
			} catch (error) {
				logger.debug('Skipping cache file during eviction', {
					file: entry.filePath,
					error: error instanceof Error ? error.message : error,
				});
			}
		}
	}
}
