export { NoOpCacheBackend } from './cache/noop.js';
export { FileCacheBackend } from './cache/file.js';
export type { FileCacheOptions } from './cache/file.js';
export { RedisCacheBackend } from './cache/redis.js';
export type { RedisCacheOptions, RedisCommandClient } from './cache/redis.js';
export { DatabaseCacheBackend, resolveDatabaseTarget } from './cache/database.js';
export type { DatabaseCacheOptions, DatabaseTarget } from './cache/database.js';

export { SqliteCacheTable } from './cache/sql/sqlite.js';
export { PostgresCacheTable } from './cache/sql/postgres.js';
export type { PostgresTableOptions } from './cache/sql/postgres.js';
export { isExpired } from './cache/sql/types.js';
export type { CacheRow, CacheTable, SqlDialect } from './cache/sql/types.js';

export type { CacheBackend, CacheBackendName, CacheResult } from '@epss/protocol';
