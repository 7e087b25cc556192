/**
 * Cache backend contract
 *
 * Every storage medium (no-op, file, Redis, SQL table) implements this
 * interface. Operations never throw: failures come back as `Err` values and
 * the cache manager maps them to a miss or `false`.
 */
import type { CacheValue } from './json.js';
import type { Result } from './result.js';

export type CacheErrorKind = 'io' | 'serialization' | 'corrupted' | 'connection' | 'query';

export interface CacheError {
	kind: CacheErrorKind;
	message: string;
	cause?: unknown;
}

export type CacheResult<T> = Result<T, CacheError>;

export type CacheBackendName = 'noop' | 'file' | 'redis' | 'database';

export interface CacheBackend {
	/** Backend name for identification */
	readonly name: CacheBackendName;

	/** Get a value, `null` when absent or expired */
	get(key: string): Promise<CacheResult<CacheValue | null>>;

	/** Store a value; `ttl` in seconds, omitted or `null` for no expiry */
	set(key: string, value: CacheValue, ttl?: number | null): Promise<CacheResult<boolean>>;

	/** Delete a value, `true` when something was removed */
	delete(key: string): Promise<CacheResult<boolean>>;

	/** Remove every entry owned by this backend */
	clear(): Promise<CacheResult<boolean>>;

	/** Check whether a live entry exists */
	exists(key: string): Promise<CacheResult<boolean>>;

	/** Release held resources. Safe to call more than once. */
	close(): Promise<void>;
}

/**
 * Builds a `CacheError` from a caught value
 */
export function toCacheError(kind: CacheErrorKind, error: unknown): CacheError {
	return {
		kind,
		message: error instanceof Error ? error.message : String(error),
		cause: error,
	};
}
