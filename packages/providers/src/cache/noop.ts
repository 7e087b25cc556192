import { Ok, type CacheBackend, type CacheBackendName, type CacheResult, type CacheValue } from '@epss/protocol';

/**
 * Inert backend used when caching is disabled or a real backend could not be
 * constructed. Stores nothing and reports every lookup as a miss.
 */
export class NoOpCacheBackend implements CacheBackend {
	readonly name: CacheBackendName = 'noop';

	async get(_key: string): Promise<CacheResult<CacheValue | null>> {
		return Ok(null);
	}

	async set(_key: string, _value: CacheValue): Promise<CacheResult<boolean>> {
		return Ok(true);
	}

	async delete(_key: string): Promise<CacheResult<boolean>> {
		return Ok(true);
	}

	async clear(): Promise<CacheResult<boolean>> {
		return Ok(true);
	}

	async exists(_key: string): Promise<CacheResult<boolean>> {
		return Ok(false);
	}

	async close(): Promise<void> {}
}
