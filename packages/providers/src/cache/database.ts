import {
	CacheInitError,
	Err,
	Ok,
	toCacheError,
	type CacheBackend,
	type CacheBackendName,
	type CacheResult,
	type CacheValue,
	type DatabaseConfig,
} from '@epss/protocol';
import { expandHome, log } from '@epss/runtime';
import { mkdirSync } from 'fs';
import path from 'path';
import { PostgresCacheTable } from './sql/postgres.js';
import { SqliteCacheTable } from './sql/sqlite.js';
import type { CacheTable } from './sql/types.js';

const logger = log.child({ component: 'database-cache' });

export type DatabaseTarget =
	| { dialect: 'sqlite'; filename: string }
	| { dialect: 'postgres'; url: string };

/**
 * Interprets a connection URL.
 *
 * `sqlite:///relative.db`, `sqlite:////abs/path.db`, `sqlite:///~/cache.db`,
 * `sqlite://` and `sqlite:///:memory:` select SQLite; `postgres://` and
 * `postgresql://` select PostgreSQL.
 */
export function resolveDatabaseTarget(url: string): DatabaseTarget {
	if (url.startsWith('sqlite://')) {
		const rest = url.slice('sqlite://'.length);
		if (rest === '' || rest === '/' || rest === '/:memory:' || rest === ':memory:') {
			return { dialect: 'sqlite', filename: ':memory:' };
		}
		if (!rest.startsWith('/')) {
			throw new CacheInitError(`Unsupported SQLite URL: ${url}`, 'database');
		}
		return { dialect: 'sqlite', filename: expandHome(rest.slice(1)) };
	}
	if (url.startsWith('postgres://') || url.startsWith('postgresql://')) {
		return { dialect: 'postgres', url };
	}
	throw new CacheInitError(`Unsupported database URL scheme: ${url.split(':')[0] ?? url}`, 'database');
}

function openTable(config: DatabaseConfig): CacheTable {
	const target = resolveDatabaseTarget(config.url);
	if (target.dialect === 'sqlite') {
		if (target.filename !== ':memory:') {
			mkdirSync(path.dirname(path.resolve(target.filename)), { recursive: true });
		}
		return new SqliteCacheTable(target.filename, config.tableName, {
			busyTimeoutMs: config.poolTimeout * 1000,
		});
	}
	return new PostgresCacheTable(target.url, config.tableName, {
		maxConnections: config.poolSize + config.maxOverflow,
		connectTimeout: config.poolTimeout,
	});
}

function toInitError(error: unknown): CacheInitError {
	if (error instanceof CacheInitError) {
		return error;
	}
	return new CacheInitError(
		`Cannot open cache database: ${error instanceof Error ? error.message : String(error)}`,
		'database',
		error
	);
}

export interface DatabaseCacheOptions {
	/** Clock used for expiry; defaults to the system clock */
	now?: () => Date;
}

/**
 * Relational cache backend: one row per key with an optional expiry
 * timestamp. Expired rows are deleted when they are read.
 */
export class DatabaseCacheBackend implements CacheBackend {
	readonly name: CacheBackendName = 'database';
	private readonly now: () => Date;
	private closed = false;

	constructor(
		private readonly table: CacheTable,
		options: DatabaseCacheOptions = {}
	) {
		this.now = options.now ?? (() => new Date());
	}

	/**
	 * Opens the connection named by `config.url` and creates the cache table
	 *
	 * @throws CacheInitError when the URL is unsupported or the database is unreachable
	 */
	static async open(config: DatabaseConfig, options: DatabaseCacheOptions = {}): Promise<DatabaseCacheBackend> {
		let table: CacheTable;
		try {
			table = openTable(config);
		} catch (error) {
			throw toInitError(error);
		}

		try {
			await table.ensureTable();
		} catch (error) {
			await table.close().catch((closeError: unknown) => {
				logger.debug('Failed to close database after init error', {
					error: closeError instanceof Error ? closeError.message : closeError,
				});
			});
			throw toInitError(error);
		}

		logger.info('Cache table ready', { dialect: table.dialect, table: config.tableName });
		return new DatabaseCacheBackend(table, options);
	}

	async get(key: string): Promise<CacheResult<CacheValue | null>> {
		let data: string;
		try {
			const row = await this.table.readLive(key, this.now());
			if (!row) {
				return Ok(null);
			}
			data = row.data;
		} catch (error) {
			return Err(toCacheError('query', error));
		}

		try {
			const value: CacheValue | null = JSON.parse(data);
			return Ok(value);
		} catch (error) {
			return Err(toCacheError('corrupted', error));
		}
	}

	async set(key: string, value: CacheValue, ttl?: number | null): Promise<CacheResult<boolean>> {
		let data: string;
		try {
			data = JSON.stringify(value);
		} catch (error) {
			return Err(toCacheError('serialization', error));
		}

		const createdAt = this.now();
		const expiresAt = ttl && ttl > 0 ? new Date(createdAt.getTime() + ttl * 1000) : null;
		try {
			await this.table.upsert({ cacheKey: key, data, createdAt, expiresAt });
			return Ok(true);
		} catch (error) {
			return Err(toCacheError('query', error));
		}
	}

	async delete(key: string): Promise<CacheResult<boolean>> {
		try {
			return Ok((await this.table.remove(key)) > 0);
		} catch (error) {
			return Err(toCacheError('query', error));
		}
	}

	async exists(key: string): Promise<CacheResult<boolean>> {
		try {
			return Ok(await this.table.hasLive(key, this.now()));
		} catch (error) {
			return Err(toCacheError('query', error));
		}
	}

	async clear(): Promise<CacheResult<boolean>> {
		try {
			await this.table.removeAll();
			return Ok(true);
		} catch (error) {
			return Err(toCacheError('query', error));
		}
	}

	async close(): Promise<void> {
		if (this.closed) {
			return;
		}
		this.closed = true;
		try {
			await this.table.close();
		} catch (error) {
			logger.error('Failed to close cache database', {
				error: error instanceof Error ? error.message : error,
			});
		}
	}
}
