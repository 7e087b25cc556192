import {
	DEFAULT_CACHE_CONFIG,
	resolveCacheConfig,
	type CacheBackend,
	type CacheConfig,
	type CacheConfigInput,
	type CacheParams,
	type CacheResult,
	type CacheValue,
	type ConfiguredBackend,
} from '@epss/protocol';
import { DatabaseCacheBackend, FileCacheBackend, NoOpCacheBackend, RedisCacheBackend } from '@epss/providers';
import { log } from '@epss/runtime';
import { CacheKeyGenerator } from './key-generator.js';
import { loadCacheConfig } from './config-loader.js';
import { CacheStats, type CacheStatsSnapshot } from './stats.js';

const logger = log.child({ component: 'cache-manager' });

export type BackendFactory = (config: CacheConfig) => Promise<CacheBackend>;

export interface CacheManagerOptions {
	/** Builds the configured backend; replaces the built-in factory */
	backendFactory?: BackendFactory;
}

export interface CacheManagerStats extends CacheStatsSnapshot {
	enabled: boolean;
	backend: ConfiguredBackend;
	ttl: number;
}

/**
 * Built-in backend construction. Throws when the backend cannot be set up.
 */
export async function createBackend(config: CacheConfig): Promise<CacheBackend> {
	switch (config.backend) {
		case 'file':
			return FileCacheBackend.open(config.file, { ttl: config.ttl });
		case 'redis':
			return RedisCacheBackend.connect(config.redis, { namespace: config.keyPrefix });
		case 'database':
			return DatabaseCacheBackend.open(config.database);
		default: {
			const unknown: never = config.backend;
			throw new Error(`Unknown cache backend: ${String(unknown)}`);
		}
	}
}

function describeError(error: unknown): unknown {
	return error instanceof Error ? error.message : error;
}

/**
 * Front door of the cache: derives keys, delegates to exactly one backend,
 * keeps statistics and turns every backend failure into a miss or `false`.
 *
 * A manager is either active (a configured backend was constructed) or
 * disabled (caching switched off, or construction failed and the no-op
 * backend stands in). The state is fixed at creation.
 */
export class CacheManager {
	readonly keyGenerator: CacheKeyGenerator;
	private stats: CacheStats;
	private closed = false;

	private constructor(
		readonly config: CacheConfig,
		private readonly backend: CacheBackend,
		private readonly active: boolean,
		stats: CacheStats
	) {
		this.keyGenerator = new CacheKeyGenerator(config.keyPrefix);
		this.stats = stats;
	}

	/**
	 * Builds a manager. Never rejects: an invalid configuration or a backend
	 * that cannot be constructed yields a disabled manager with one recorded
	 * error.
	 */
	static async create(
		config: CacheConfig | CacheConfigInput = {},
		options: CacheManagerOptions = {}
	): Promise<CacheManager> {
		const stats = new CacheStats();

		let resolved: CacheConfig;
		try {
			resolved = resolveCacheConfig(config);
		} catch (error) {
			logger.error('Invalid cache configuration, caching disabled', { error: describeError(error) });
			stats.recordError();
			return new CacheManager(DEFAULT_CACHE_CONFIG, new NoOpCacheBackend(), false, stats);
		}

		if (!resolved.enabled) {
			logger.info('Cache is disabled');
			return new CacheManager(resolved, new NoOpCacheBackend(), false, stats);
		}

		const factory = options.backendFactory ?? createBackend;
		try {
			const backend = await factory(resolved);
			logger.info('Cache backend initialized', { backend: resolved.backend, ttl: resolved.ttl });
			return new CacheManager(resolved, backend, true, stats);
		} catch (error) {
			logger.error('Failed to initialize cache backend, falling back to no-op', {
				backend: resolved.backend,
				error: describeError(error),
			});
			stats.recordError();
			return new CacheManager(resolved, new NoOpCacheBackend(), false, stats);
		}
	}

	/** Whether a configured backend is serving requests */
	isEnabled(): boolean {
		return this.active;
	}

	getCacheKey(operation: string, params: CacheParams = {}): string {
		return this.keyGenerator.generateKey(operation, params);
	}

	/**
	 * Runs a backend call, mapping `Err` results and throws to `null`
	 */
	private async call<T>(
		action: string,
		key: string,
		run: (backend: CacheBackend) => Promise<CacheResult<T>>
	): Promise<T | null> {
		try {
			const result = await run(this.backend);
			if (result.ok) {
				return result.value;
			}
			logger.warn(`Cache ${action} failed`, { key, kind: result.error.kind, error: result.error.message });
		} catch (error) {
			logger.error(`Cache ${action} failed`, { key, error: describeError(error) });
		}
		this.stats.recordError();
		return null;
	}

	async get(operation: string, params: CacheParams = {}): Promise<CacheValue | null> {
		if (!this.active) {
			return null;
		}
		const key = this.getCacheKey(operation, params);
		const result = await this.call('get', key, (backend) => backend.get(key));
		if (result === null) {
			this.stats.recordMiss();
			logger.debug('Cache miss', { key });
			return null;
		}
		this.stats.recordHit();
		logger.debug('Cache hit', { key });
		return result;
	}

	/**
	 * Stores `value`. `ttl` overrides the configured default for this call;
	 * 0 stores without expiry. A TTL that is not a whole number of seconds
	 * (or is negative) is refused and counted as an error.
	 */
	async set(operation: string, value: CacheValue, params: CacheParams = {}, ttl?: number): Promise<boolean> {
		if (!this.active) {
			return true;
		}
		const key = this.getCacheKey(operation, params);
		const effectiveTtl = ttl ?? this.config.ttl;
		if (!Number.isInteger(effectiveTtl) || effectiveTtl < 0) {
			logger.warn('Refusing to cache with an invalid TTL', { key, ttl: effectiveTtl });
			this.stats.recordError();
			return false;
		}
		const stored = await this.call('set', key, (backend) => backend.set(key, value, effectiveTtl));
		if (stored === true) {
			this.stats.recordSet();
			logger.debug('Cached response', { key, ttl: effectiveTtl });
			return true;
		}
		return false;
	}

	async delete(operation: string, params: CacheParams = {}): Promise<boolean> {
		if (!this.active) {
			return true;
		}
		const key = this.getCacheKey(operation, params);
		const removed = await this.call('delete', key, (backend) => backend.delete(key));
		if (removed === true) {
			this.stats.recordDelete();
			return true;
		}
		return false;
	}

	async exists(operation: string, params: CacheParams = {}): Promise<boolean> {
		if (!this.active) {
			return false;
		}
		const key = this.getCacheKey(operation, params);
		return (await this.call('exists', key, (backend) => backend.exists(key))) === true;
	}

	/**
	 * Removes every entry of the backend. On success the statistics start over.
	 */
	async clear(): Promise<boolean> {
		if (!this.active) {
			return true;
		}
		const cleared = await this.call('clear', '*', (backend) => backend.clear());
		if (cleared === true) {
			this.stats = new CacheStats();
			logger.info('Cache cleared', { backend: this.backend.name });
			return true;
		}
		return false;
	}

	getStats(): CacheManagerStats {
		return {
			...this.stats.snapshot(),
			enabled: this.active,
			backend: this.config.backend,
			ttl: this.config.ttl,
		};
	}

	/**
	 * Releases the backend. Further calls are no-ops; statistics stay readable.
	 */
	async close(): Promise<void> {
		if (this.closed) {
			return;
		}
		this.closed = true;
		try {
			await this.backend.close();
			logger.debug('Cache manager closed');
		} catch (error) {
			logger.error('Error closing cache backend', { error: describeError(error) });
		}
	}
}

/**
 * Runs `fn` with a manager that is closed on every exit path
 */
export async function withCacheManager<T>(
	config: CacheConfig | CacheConfigInput,
	fn: (manager: CacheManager) => Promise<T>,
	options: CacheManagerOptions = {}
): Promise<T> {
	const manager = await CacheManager.create(config, options);
	try {
		return await fn(manager);
	} finally {
		await manager.close();
	}
}

/**
 * Loads configuration from `configFile` (or the default locations and
 * environment) and builds a manager. A configuration that cannot be loaded
 * yields a manager on the default, disabled configuration.
 */
export async function createCacheManager(
	configFile?: string,
	options: CacheManagerOptions = {}
): Promise<CacheManager> {
	let config: CacheConfig;
	try {
		config = loadCacheConfig(configFile);
	} catch (error) {
		logger.error('Failed to load cache configuration, using defaults', { error: describeError(error) });
		config = DEFAULT_CACHE_CONFIG;
	}
	return CacheManager.create(config, options);
}
