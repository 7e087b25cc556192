export { CacheKeyGenerator } from './key-generator.js';
export { CacheStats } from './stats.js';
export type { CacheStatsSnapshot } from './stats.js';
export { CacheManager, createBackend, createCacheManager, withCacheManager } from './manager.js';
export type { BackendFactory, CacheManagerOptions, CacheManagerStats } from './manager.js';
export {
	deepMerge,
	defaultConfigLocations,
	loadCacheConfig,
	loadConfigFromFile,
	parseCacheConfigDocument,
	parseEnvConfig,
} from './config-loader.js';
export type { ConfigSearchOptions } from './config-loader.js';
