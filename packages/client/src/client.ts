import { CacheManager } from '@epss/cache';
import { isJsonObject, type CacheConfig, type CacheConfigInput, type EpssResponse } from '@epss/protocol';
import { log } from '@epss/runtime';
import { EpssApiError, EpssResponseError } from './errors.js';
import { prepareParams, toSearchParams, type QueryOptions } from './params.js';
import type { CacheManagerStats } from '@epss/cache';

const logger = log.child({ component: 'epss-client' });

export const DEFAULT_BASE_URL = 'https://api.first.org/data/v1/epss';
export const DEFAULT_USER_AGENT = 'epss-cache/0.1.0';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface EpssClientOptions {
	baseUrl?: string;
	/** Request timeout in milliseconds */
	timeoutMs?: number;
	userAgent?: string;
	fetch?: FetchFn;
	/** A shared manager, or a configuration for one owned by the client */
	cache?: CacheManager | CacheConfig | CacheConfigInput;
}

export interface LookupOptions extends QueryOptions {
	/** Consult and populate the cache (default true) */
	useCache?: boolean;
	/** TTL in seconds for the stored response, overriding the cache default */
	cacheTtl?: number;
}

export type Operation = 'query' | 'get' | 'batch' | 'top';

/**
 * Client for the FIRST EPSS API. Successful lookups are cached per operation
 * and parameter set when a cache is configured.
 */
export class EpssClient {
	private readonly baseUrl: string;
	private readonly timeoutMs: number;
	private readonly userAgent: string;
	private readonly fetchFn: FetchFn;
	private cache: CacheManager | null;
	private readonly ownsCache: boolean;

	private constructor(options: EpssClientOptions, cache: CacheManager | null, ownsCache: boolean) {
		this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
		this.timeoutMs = options.timeoutMs ?? 30000;
		this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
		this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
		this.cache = cache;
		this.ownsCache = ownsCache;
	}

	static async create(options: EpssClientOptions = {}): Promise<EpssClient> {
		if (options.cache === undefined) {
			return new EpssClient(options, null, false);
		}
		if (options.cache instanceof CacheManager) {
			return new EpssClient(options, options.cache, false);
		}
		return new EpssClient(options, await CacheManager.create(options.cache), true);
	}

	get cacheManager(): CacheManager | null {
		return this.cache;
	}

	async query(options: LookupOptions = {}): Promise<EpssResponse> {
		return this.lookup('query', options);
	}

	async get(cve: string, options: Omit<LookupOptions, 'cves'> = {}): Promise<EpssResponse> {
		return this.lookup('get', { ...options, cves: [cve] });
	}

	async batch(cves: Iterable<string>, options: Omit<LookupOptions, 'cves'> = {}): Promise<EpssResponse> {
		return this.lookup('batch', { ...options, cves: [...cves] });
	}

	async top(options: LookupOptions = {}): Promise<EpssResponse> {
		return this.lookup('top', { ...options, limit: options.limit ?? 100, order: options.order ?? '!epss' });
	}

	private async lookup(operation: Operation, options: LookupOptions): Promise<EpssResponse> {
		const { useCache = true, cacheTtl, ...query } = options;
		const params = prepareParams(query);
		const cache = useCache ? this.cache : null;

		if (cache) {
			const cached = await cache.get(operation, params);
			if (isJsonObject(cached)) {
				return cached;
			}
		}

		const response = await this.request(params);

		if (cache) {
			await cache.set(operation, response, params, cacheTtl);
		}
		return response;
	}

	private async request(params: Record<string, string | number | boolean>): Promise<EpssResponse> {
		const query = toSearchParams(params).toString();
		const url = query ? `${this.baseUrl}?${query}` : this.baseUrl;

		logger.debug('EPSS request', { url });
		const response = await this.fetchFn(url, {
			headers: { Accept: 'application/json', 'User-Agent': this.userAgent },
			signal: AbortSignal.timeout(this.timeoutMs),
		});

		if (!response.ok) {
			throw new EpssApiError(
				`EPSS API request failed: ${response.status} ${response.statusText}`,
				response.status,
				url
			);
		}

		let body: unknown;
		try {
			body = await response.json();
		} catch (error) {
			throw new EpssResponseError('EPSS API returned invalid JSON', error);
		}
		if (!isJsonObject(body)) {
			throw new EpssResponseError('EPSS API returned an unexpected payload');
		}
		return body;
	}

	getCacheStats(): CacheManagerStats | null {
		return this.cache ? this.cache.getStats() : null;
	}

	async clearCache(): Promise<boolean> {
		return this.cache ? this.cache.clear() : false;
	}

	/**
	 * Closes the cache when the client created it
	 */
	async close(): Promise<void> {
		if (this.cache && this.ownsCache) {
			await this.cache.close();
		}
		this.cache = null;
	}
}

/**
 * Runs `fn` with a client that is closed on every exit path
 */
export async function withEpssClient<T>(
	options: EpssClientOptions,
	fn: (client: EpssClient) => Promise<T>
): Promise<T> {
	const client = await EpssClient.create(options);
	try {
		return await fn(client);
	} finally {
		await client.close();
	}
}
