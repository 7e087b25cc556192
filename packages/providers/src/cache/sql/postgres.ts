import postgres from 'postgres';
import { isExpired, type CacheRow, type CacheTable, type SqlDialect } from './types.js';

interface PostgresRow {
	cache_key: string;
	data: string;
	created_at: Date;
	expires_at: Date | null;
}

export interface PostgresTableOptions {
	/** Maximum number of pooled connections */
	maxConnections: number;
	/** Connect timeout in seconds */
	connectTimeout: number;
}

function toCacheRow(row: PostgresRow): CacheRow {
	return {
		cacheKey: row.cache_key,
		data: row.data,
		createdAt: row.created_at,
		expiresAt: row.expires_at,
	};
}

/**
 * PostgreSQL cache table (postgres.js connection pool)
 */
export class PostgresCacheTable implements CacheTable {
	readonly dialect: SqlDialect = 'postgres';
	private readonly sql: postgres.Sql;
	private closed = false;

	constructor(
		url: string,
		private readonly tableName: string,
		options: PostgresTableOptions
	) {
		this.sql = postgres(url, {
			max: options.maxConnections,
			connect_timeout: options.connectTimeout,
			onnotice: () => undefined,
		});
	}

	async ensureTable(): Promise<void> {
		await this.sql`
			CREATE TABLE IF NOT EXISTS ${this.sql(this.tableName)} (
				cache_key VARCHAR(255) PRIMARY KEY,
				data TEXT NOT NULL,
				created_at TIMESTAMPTZ NOT NULL,
				expires_at TIMESTAMPTZ NULL
			)
		`;
	}

	async readLive(key: string, now: Date): Promise<CacheRow | null> {
		return this.sql.begin(async (tx) => {
			const rows = await tx<PostgresRow[]>`
				SELECT cache_key, data, created_at, expires_at
				FROM ${tx(this.tableName)}
				WHERE cache_key = ${key}
				FOR UPDATE
			`;
			const found = rows[0];
			if (!found) {
				return null;
			}
			if (isExpired(found.expires_at, now)) {
				await tx`DELETE FROM ${tx(this.tableName)} WHERE cache_key = ${key}`;
				return null;
			}
			return toCacheRow(found);
		});
	}

	async hasLive(key: string, now: Date): Promise<boolean> {
		const rows = await this.sql<Pick<PostgresRow, 'expires_at'>[]>`
			SELECT expires_at FROM ${this.sql(this.tableName)} WHERE cache_key = ${key}
		`;
		const found = rows[0];
		return found !== undefined && !isExpired(found.expires_at, now);
	}

	async upsert(row: CacheRow): Promise<void> {
		await this.sql`
			INSERT INTO ${this.sql(this.tableName)} (cache_key, data, created_at, expires_at)
			VALUES (${row.cacheKey}, ${row.data}, ${row.createdAt}, ${row.expiresAt})
			ON CONFLICT (cache_key) DO UPDATE SET
				data = EXCLUDED.data,
				created_at = EXCLUDED.created_at,
				expires_at = EXCLUDED.expires_at
		`;
	}

	async remove(key: string): Promise<number> {
		const result = await this.sql`DELETE FROM ${this.sql(this.tableName)} WHERE cache_key = ${key}`;
		return result.count;
	}

	async removeAll(): Promise<void> {
		await this.sql`DELETE FROM ${this.sql(this.tableName)}`;
	}

	async close(): Promise<void> {
		if (this.closed) {
			return;
		}
		this.closed = true;
		await this.sql.end({ timeout: 5 });
	}
}
