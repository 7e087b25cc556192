import {
	CacheInitError,
	Err,
	Ok,
	toCacheError,
	type CacheBackend,
	type CacheBackendName,
	type CacheResult,
	type CacheValue,
	type RedisConfig,
} from '@epss/protocol';
import { log } from '@epss/runtime';
import Redis from 'ioredis';

const logger = log.child({ component: 'redis-cache' });

const SCAN_COUNT = 250;

/** Escapes Redis glob metacharacters so a namespace matches only itself */
export function escapeGlob(text: string): string {
	return text.replace(/[*?[\]\\]/g, '\\$&');
}

/**
 * The subset of Redis commands the backend relies on
 */
export interface RedisCommandClient {
	get(key: string): Promise<string | null>;
	set(key: string, value: string): Promise<unknown>;
	setex(key: string, seconds: number, value: string): Promise<unknown>;
	del(key: string): Promise<number>;
	exists(key: string): Promise<number>;
	scan(cursor: string, pattern: string, count: number): Promise<[string, string[]]>;
	quit(): Promise<unknown>;
}

export interface RedisCacheOptions {
	client: RedisCommandClient;
	/** Key namespace cleared by `clear()`, usually the cache key prefix */
	namespace: string;
}

function adaptClient(redis: Redis): RedisCommandClient {
	return {
		get: (key) => redis.get(key),
		set: (key, value) => redis.set(key, value),
		setex: (key, seconds, value) => redis.setex(key, seconds, value),
		del: (key) => redis.del(key),
		exists: (key) => redis.exists(key),
		scan: (cursor, pattern, count) => redis.scan(cursor, 'MATCH', pattern, 'COUNT', count),
		quit: () => redis.quit(),
	};
}

/**
 * Redis-backed cache. Expiry is delegated to Redis (`SETEX`); values are
 * stored as JSON text.
 */
export class RedisCacheBackend implements CacheBackend {
	readonly name: CacheBackendName = 'redis';
	private readonly client: RedisCommandClient;
	private readonly namespace: string;
	private closed = false;

	constructor(options: RedisCacheOptions) {
		this.client = options.client;
		this.namespace = options.namespace;
	}

	/**
	 * Connects to Redis and verifies the connection with `PING`
	 *
	 * @throws CacheInitError when the server cannot be reached
	 */
	static async connect(config: RedisConfig, options: { namespace: string }): Promise<RedisCacheBackend> {
		const redis = new Redis({
			host: config.host,
			port: config.port,
			db: config.db,
			password: config.password,
			connectTimeout: config.socketConnectTimeout * 1000,
			commandTimeout: config.socketTimeout * 1000,
			lazyConnect: true,
			maxRetriesPerRequest: 1,
			retryStrategy: (times: number) => {
				if (times > 3) {
					return null;
				}
				return Math.min(times * 100, 2000);
			},
		});

		redis.on('error', (error: Error) => {
			logger.warn('Redis connection error', { error: error.message });
		});

		try {
			await redis.connect();
			await redis.ping();
		} catch (error) {
			redis.disconnect();
			throw new CacheInitError(
				`Cannot connect to Redis at ${config.host}:${config.port}: ${error instanceof Error ? error.message : String(error)}`,
				'redis',
				error
			);
		}

		logger.info('Connected to Redis', { host: config.host, port: config.port, db: config.db });
		return new RedisCacheBackend({ client: adaptClient(redis), namespace: options.namespace });
	}

	async get(key: string): Promise<CacheResult<CacheValue | null>> {
		let raw: string | null;
		try {
			raw = await this.client.get(key);
		} catch (error) {
			return Err(toCacheError('connection', error));
		}

		if (raw === null) {
			return Ok(null);
		}

		try {
			const value: CacheValue | null = JSON.parse(raw);
			return Ok(value);
		} catch (error) {
			return Err(toCacheError('corrupted', error));
		}
	}

	async set(key: string, value: CacheValue, ttl?: number | null): Promise<CacheResult<boolean>> {
		let serialized: string;
		try {
			serialized = JSON.stringify(value);
		} catch (error) {
			return Err(toCacheError('serialization', error));
		}

		try {
			if (ttl && ttl > 0) {
				await this.client.setex(key, ttl, serialized);
			} else {
				await this.client.set(key, serialized);
			}
			return Ok(true);
		} catch (error) {
			return Err(toCacheError('connection', error));
		}
	}

	async delete(key: string): Promise<CacheResult<boolean>> {
		try {
			const removed = await this.client.del(key);
			return Ok(removed > 0);
		} catch (error) {
			return Err(toCacheError('connection', error));
		}
	}

	async exists(key: string): Promise<CacheResult<boolean>> {
		try {
			const count = await this.client.exists(key);
			return Ok(count > 0);
		} catch (error) {
			return Err(toCacheError('connection', error));
		}
	}

	/**
	 * Removes the keys under this backend's namespace. Other keys in the same
	 * Redis database are left alone.
	 */
	async clear(): Promise<CacheResult<boolean>> {
		const pattern = `${escapeGlob(this.namespace)}:*`;
		try {
			let cursor = '0';
			do {
				const [next, keys] = await this.client.scan(cursor, pattern, SCAN_COUNT);
				await Promise.all(keys.map((key) => this.client.del(key)));
				cursor = next;
			} while (cursor !== '0');
			return Ok(true);
		} catch (error) {
			return Err(toCacheError('connection', error));
		}
	}

	async close(): Promise<void> {
		if (this.closed) {
			return;
		}
		this.closed = true;
		try {
			await this.client.quit();
		} catch (error) {
			logger.error('Failed to disconnect', {
				error: error instanceof Error ? error.message : error,
			});
		}
	}
}
