import Database from 'better-sqlite3';
import { isExpired, type CacheRow, type CacheTable, type SqlDialect } from './types.js';

interface SqliteRow {
	cache_key: string;
	data: string;
	created_at: string;
	expires_at: string | null;
}

function toCacheRow(row: SqliteRow): CacheRow {
	return {
		cacheKey: row.cache_key,
		data: row.data,
		createdAt: new Date(row.created_at),
		expiresAt: row.expires_at === null ? null : new Date(row.expires_at),
	};
}

/**
 * SQLite cache table (better-sqlite3). Timestamps are stored as ISO-8601
 * text. Statements run synchronously, so each call completes before the
 * returned promise settles.
 */
export class SqliteCacheTable implements CacheTable {
	readonly dialect: SqlDialect = 'sqlite';
	private readonly db: Database.Database;
	private readonly table: string;
	private closed = false;

	constructor(filename: string, tableName: string, options: { busyTimeoutMs?: number } = {}) {
		this.db = new Database(filename, { timeout: options.busyTimeoutMs });
		this.table = `"${tableName}"`;
	}

	async ensureTable(): Promise<void> {
		this.db.exec(
			`CREATE TABLE IF NOT EXISTS ${this.table} (
				cache_key VARCHAR(255) PRIMARY KEY,
				data TEXT NOT NULL,
				created_at TIMESTAMP NOT NULL,
				expires_at TIMESTAMP NULL
			)`
		);
	}

	async readLive(key: string, now: Date): Promise<CacheRow | null> {
		const select = this.db.prepare<[string], SqliteRow>(
			`SELECT cache_key, data, created_at, expires_at FROM ${this.table} WHERE cache_key = ?`
		);
		const remove = this.db.prepare<[string]>(`DELETE FROM ${this.table} WHERE cache_key = ?`);

		const read = this.db.transaction((cacheKey: string): CacheRow | null => {
			const found = select.get(cacheKey);
			if (!found) {
				return null;
			}
			const row = toCacheRow(found);
			if (isExpired(row.expiresAt, now)) {
				remove.run(cacheKey);
				return null;
			}
			return row;
		});

		return read.immediate(key);
	}

	async hasLive(key: string, now: Date): Promise<boolean> {
		const found = this.db
			.prepare<[string], Pick<SqliteRow, 'expires_at'>>(
				`SELECT expires_at FROM ${this.table} WHERE cache_key = ?`
			)
			.get(key);
		if (!found) {
			return false;
		}
		return !isExpired(found.expires_at === null ? null : new Date(found.expires_at), now);
	}

	async upsert(row: CacheRow): Promise<void> {
		this.db
			.prepare<[string, string, string, string | null]>(
				`INSERT INTO ${this.table} (cache_key, data, created_at, expires_at)
				VALUES (?, ?, ?, ?)
				ON CONFLICT (cache_key) DO UPDATE SET
					data = excluded.data,
					created_at = excluded.created_at,
					expires_at = excluded.expires_at`
			)
			.run(
				row.cacheKey,
				row.data,
				row.createdAt.toISOString(),
				row.expiresAt === null ? null : row.expiresAt.toISOString()
			);
	}

	async remove(key: string): Promise<number> {
		const result = this.db.prepare<[string]>(`DELETE FROM ${this.table} WHERE cache_key = ?`).run(key);
		return result.changes;
	}

	async removeAll(): Promise<void> {
		this.db.prepare(`DELETE FROM ${this.table}`).run();
	}

	async close(): Promise<void> {
		if (this.closed) {
			return;
		}
		this.closed = true;
		this.db.close();
	}
}
