/**
 * Storage driver contract for the relational cache backend
 */

export type SqlDialect = 'sqlite' | 'postgres';

export interface CacheRow {
	cacheKey: string;
	data: string;
	createdAt: Date;
	expiresAt: Date | null;
}

export interface CacheTable {
	readonly dialect: SqlDialect;

	/** Creates the cache table when it does not exist yet */
	ensureTable(): Promise<void>;

	/**
	 * Reads the row for `key`. An expired row is deleted inside the same
	 * transaction and reported as absent.
	 */
	readLive(key: string, now: Date): Promise<CacheRow | null>;

	/** Whether a non-expired row exists */
	hasLive(key: string, now: Date): Promise<boolean>;

	/** Insert-or-replace keyed by `cacheKey`, in one statement */
	upsert(row: CacheRow): Promise<void>;

	/** Deletes one row, returning the number of rows removed */
	remove(key: string): Promise<number>;

	removeAll(): Promise<void>;

	close(): Promise<void>;
}

export function isExpired(expiresAt: Date | null, now: Date): boolean {
	return expiresAt !== null && now.getTime() > expiresAt.getTime();
}
