/**
 * Cache configuration schemas
 *
 * `CacheConfigSchema` is the normalized (camelCase) shape the cache manager
 * consumes. `CacheDocumentSchema` describes the snake_case `cache` section of
 * a YAML or TOML configuration file.
 */
import { z } from 'zod';
import { ConfigValidationError } from './validation.js';

export const CACHE_BACKENDS = ['file', 'redis', 'database'] as const;
export const FILE_FORMATS = ['json', 'binary'] as const;

export type ConfiguredBackend = (typeof CACHE_BACKENDS)[number];
export type FileFormat = (typeof FILE_FORMATS)[number];

const SQL_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const RedisConfigSchema = z.object({
	host: z.string().min(1).default('localhost'),
	port: z.number().int().min(1).max(65535).default(6379),
	db: z.number().int().min(0).default(0),
	password: z.string().optional(),
	/** Command timeout in seconds */
	socketTimeout: z.number().positive().default(5),
	/** Connect timeout in seconds */
	socketConnectTimeout: z.number().positive().default(5),
});

export const DatabaseConfigSchema = z.object({
	url: z.string().min(1).default('sqlite:///~/.cache/epss/cache.db'),
	tableName: z
		.string()
		.regex(SQL_IDENTIFIER, 'table name must be a plain SQL identifier')
		.default('epss_cache'),
	poolSize: z.number().int().min(1).default(5),
	maxOverflow: z.number().int().min(0).default(10),
	/** Seconds to wait for a connection */
	poolTimeout: z.number().int().positive().default(30),
});

export const FileConfigSchema = z.object({
	directory: z.string().min(1).default('~/.cache/epss'),
	/** Directory size budget; zero or less disables eviction */
	maxSizeMb: z.number().default(100),
	compression: z.boolean().default(true),
	format: z.enum(FILE_FORMATS).default('json'),
});

export const CacheConfigSchema = z.object({
	enabled: z.boolean().default(false),
	backend: z.enum(CACHE_BACKENDS).default('file'),
	/** Default TTL in seconds; 0 stores without expiry */
	ttl: z.number().int().min(0).default(3600),
	keyPrefix: z.string().min(1).default('epss'),
	redis: RedisConfigSchema.default({}),
	database: DatabaseConfigSchema.default({}),
	file: FileConfigSchema.default({}),
});

export type RedisConfig = z.infer<typeof RedisConfigSchema>;
export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;
export type FileConfig = z.infer<typeof FileConfigSchema>;
export type CacheConfig = Readonly<z.infer<typeof CacheConfigSchema>>;

/** Partial config accepted from code, environment or files */
export type CacheConfigInput = z.input<typeof CacheConfigSchema>;

const CacheSectionDocumentSchema = z.object({
	enabled: z.boolean().optional(),
	backend: z.string().optional(),
	ttl: z.number().optional(),
	key_prefix: z.string().optional(),
	redis: z
		.object({
			host: z.string().optional(),
			port: z.number().optional(),
			db: z.number().optional(),
			password: z.string().optional(),
			socket_timeout: z.number().optional(),
			socket_connect_timeout: z.number().optional(),
		})
		.optional(),
	database: z
		.object({
			url: z.string().optional(),
			table_name: z.string().optional(),
			pool_size: z.number().optional(),
			max_overflow: z.number().optional(),
			pool_timeout: z.number().optional(),
		})
		.optional(),
	file: z
		.object({
			directory: z.string().optional(),
			max_size_mb: z.number().optional(),
			compression: z.boolean().optional(),
			format: z.string().optional(),
		})
		.optional(),
});

export const CacheDocumentSchema = z.object({
	cache: CacheSectionDocumentSchema.default({}),
});

export type CacheDocument = z.infer<typeof CacheDocumentSchema>;

/**
 * Drops keys whose value is undefined so that partial inputs merge cleanly
 */
function compact(input: Record<string, unknown>): Record<string, unknown> {
	const out: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(input)) {
		if (value !== undefined) {
			out[key] = value;
		}
	}
	return out;
}

/**
 * Maps a parsed configuration document onto a partial `CacheConfigInput`.
 * Enum-like fields are passed through unvalidated; `resolveCacheConfig`
 * validates the merged result.
 */
export function documentToConfigInput(document: CacheDocument): Record<string, unknown> {
	const section = document.cache;
	const result: Record<string, unknown> = compact({
		enabled: section.enabled,
		backend: section.backend,
		ttl: section.ttl,
		keyPrefix: section.key_prefix,
	});

	if (section.redis) {
		result.redis = compact({
			host: section.redis.host,
			port: section.redis.port,
			db: section.redis.db,
			password: section.redis.password,
			socketTimeout: section.redis.socket_timeout,
			socketConnectTimeout: section.redis.socket_connect_timeout,
		});
	}

	if (section.database) {
		result.database = compact({
			url: section.database.url,
			tableName: section.database.table_name,
			poolSize: section.database.pool_size,
			maxOverflow: section.database.max_overflow,
			poolTimeout: section.database.pool_timeout,
		});
	}

	if (section.file) {
		result.file = compact({
			directory: section.file.directory,
			maxSizeMb: section.file.max_size_mb,
			compression: section.file.compression,
			format: section.file.format,
		});
	}

	return result;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
	for (const child of Object.values(value)) {
		if (typeof child === 'object' && child !== null) {
			deepFreeze(child);
		}
	}
	return Object.freeze(value);
}

/**
 * Validates a (possibly partial) configuration and fills in defaults.
 * The returned object is frozen.
 *
 * @throws ConfigValidationError when a field is invalid
 */
export function resolveCacheConfig(input: unknown = {}): CacheConfig {
	const parsed = CacheConfigSchema.safeParse(input);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const field = issue ? issue.path.join('.') : '';
		throw new ConfigValidationError(
			`Invalid cache configuration${field ? ` at "${field}"` : ''}: ${issue?.message ?? 'unknown error'}`,
			field,
			input
		);
	}
	return deepFreeze(parsed.data);
}

/**
 * Default configuration: caching disabled, file backend selected
 */
export const DEFAULT_CACHE_CONFIG: CacheConfig = resolveCacheConfig({});
