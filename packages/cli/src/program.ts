import {
	deepMerge,
	loadCacheConfig,
	loadConfigFromFile,
	parseEnvConfig,
	type ConfigSearchOptions,
} from '@epss/cache';
import { withEpssClient, type EpssClient, type EpssClientOptions, type LookupOptions } from '@epss/client';
import {
	CACHE_BACKENDS,
	ConfigValidationError,
	DEFAULT_CACHE_CONFIG,
	resolveCacheConfig,
	type CacheConfig,
	type JsonObject,
	type JsonValue,
} from '@epss/protocol';
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { formatOutput, OUTPUT_FORMATS, type OutputFormat } from './output.js';

export interface CliDependencies {
	stdout: (text: string) => void;
	stderr: (text: string) => void;
	/** Extra client settings (base URL, fetch implementation) */
	client?: Omit<EpssClientOptions, 'cache'>;
	/** Where configuration files and environment variables are looked up */
	configSearch?: ConfigSearchOptions;
}

interface CacheFlags {
	cacheConfig?: string;
	cacheBackend?: string;
	cacheTtl?: number;
	/** `false` when `--no-cache` is given */
	cache: boolean;
	format: OutputFormat;
}

interface LookupFlags extends CacheFlags {
	date?: string;
	scope?: string;
	order?: string;
	epssGt?: number;
	percentileGt?: number;
	limit?: number;
	offset?: number;
	envelope?: boolean;
	pretty?: boolean;
}

function parseIntOption(value: string): number {
	if (!/^-?\d+$/.test(value.trim())) {
		throw new InvalidArgumentError(`Invalid integer: ${value}`);
	}
	return Number.parseInt(value, 10);
}

function parseFloatOption(value: string): number {
	const parsed = Number(value);
	if (value.trim() === '' || Number.isNaN(parsed)) {
		throw new InvalidArgumentError(`Invalid number: ${value}`);
	}
	return parsed;
}

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

function addCacheOptions(command: Command): Command {
	return command
		.option('--cache-config <file>', 'path to a cache configuration file (YAML or TOML)')
		.addOption(new Option('--cache-backend <backend>', 'cache backend to use').choices(CACHE_BACKENDS))
		.option('--cache-ttl <seconds>', 'cache TTL in seconds', parseIntOption)
		.option('--no-cache', 'disable caching for this run');
}

function addFormatOption(command: Command): Command {
	return command.addOption(
		new Option('--format <format>', 'output format').choices(OUTPUT_FORMATS).default('json')
	);
}

function addLookupOptions(command: Command): Command {
	command
		.option('--date <date>', 'scores as of YYYY-MM-DD')
		.addOption(new Option('--scope <scope>', 'use the time-series scope').choices(['time-series']))
		.option('--order <order>', 'sorting order, e.g. !epss')
		.option('--epss-gt <value>', 'only scores greater than value', parseFloatOption)
		.option('--percentile-gt <value>', 'only percentiles greater than value', parseFloatOption)
		.option('--limit <n>', 'maximum number of rows', parseIntOption)
		.option('--offset <n>', 'rows to skip', parseIntOption)
		.option('--envelope', 'include the response envelope')
		.option('--pretty', 'ask the API for pretty-printed JSON');
	addFormatOption(command);
	return addCacheOptions(command);
}

function toLookupOptions(flags: LookupFlags): LookupOptions {
	return {
		date: flags.date,
		scope: flags.scope === 'time-series' ? 'time-series' : undefined,
		order: flags.order,
		epssGt: flags.epssGt,
		percentileGt: flags.percentileGt,
		limit: flags.limit,
		offset: flags.offset,
		envelope: flags.envelope,
		pretty: flags.pretty,
		useCache: flags.cache,
		cacheTtl: flags.cacheTtl,
	};
}

function maskUrlCredentials(url: string): string {
	return url.replace(/\/\/([^:/@]+):([^@]*)@/, '//$1:****@');
}

/**
 * Configuration view printed by `epss cache config`. Secrets are left out.
 */
export function describeCacheConfig(config: CacheConfig): JsonObject {
	const view: JsonObject = {
		enabled: config.enabled,
		backend: config.backend,
		ttl: config.ttl,
		key_prefix: config.keyPrefix,
	};
	if (config.backend === 'redis') {
		view.redis = { host: config.redis.host, port: config.redis.port, db: config.redis.db };
	} else if (config.backend === 'database') {
		view.database = { url: maskUrlCredentials(config.database.url), table_name: config.database.tableName };
	} else {
		view.file = {
			directory: config.file.directory,
			max_size_mb: config.file.maxSizeMb,
			compression: config.file.compression,
			format: config.file.format,
		};
	}
	return view;
}

export function createProgram(deps: CliDependencies): { program: Command; exitCode: () => number } {
	let exitCode = 0;
	const search = deps.configSearch ?? {};

	const print = (value: JsonValue, format: OutputFormat): void => {
		deps.stdout(formatOutput(value, format));
	};

	/**
	 * Effective cache configuration for one run: the `--cache-config` file (or
	 * the standard lookup), then `--cache-backend` / `--cache-ttl` overrides,
	 * which also switch caching on. An invalid result runs without a cache.
	 */
	const resolveConfig = (flags: CacheFlags): CacheConfig => {
		try {
			return buildConfig(flags);
		} catch (error) {
			if (!(error instanceof ConfigValidationError)) {
				throw error;
			}
			deps.stderr(`Warning: Invalid cache configuration, caching disabled: ${error.message}\n`);
			return DEFAULT_CACHE_CONFIG;
		}
	};

	const buildConfig = (flags: CacheFlags): CacheConfig => {
		let base: CacheConfig;
		if (flags.cacheConfig) {
			const envLayer = parseEnvConfig(search.env ?? process.env);
			let fileLayer: Record<string, unknown> = {};
			try {
				fileLayer = loadConfigFromFile(flags.cacheConfig);
			} catch (error) {
				deps.stderr(`Warning: Failed to load cache config: ${errorMessage(error)}\n`);
			}
			base = resolveCacheConfig(deepMerge(envLayer, fileLayer));
		} else {
			base = loadCacheConfig(undefined, search);
		}

		const backend = CACHE_BACKENDS.find((name) => name === flags.cacheBackend);
		const overrides: Record<string, unknown> = {};
		if (backend) {
			overrides.enabled = true;
			overrides.backend = backend;
		}
		if (flags.cacheTtl !== undefined) {
			overrides.enabled = true;
			overrides.ttl = flags.cacheTtl;
		}
		return Object.keys(overrides).length > 0 ? resolveCacheConfig(deepMerge({ ...base }, overrides)) : base;
	};

	const withClient = async <T>(flags: CacheFlags, fn: (client: EpssClient) => Promise<T>): Promise<T> => {
		const config = flags.cache ? resolveConfig(flags) : null;
		const options: EpssClientOptions = { ...deps.client };
		if (config?.enabled) {
			options.cache = config;
		}
		return withEpssClient(options, fn);
	};

	const program = new Command('epss')
		.description('Query the FIRST EPSS API with response caching')
		.exitOverride()
		.configureOutput({
			writeOut: (text) => deps.stdout(text),
			writeErr: (text) => deps.stderr(text),
		});

	addLookupOptions(program.command('query').description('generic query')).action(
		async (flags: LookupFlags) => {
			const response = await withClient(flags, (client) => client.query(toLookupOptions(flags)));
			print(response, flags.format);
		}
	);

	addLookupOptions(program.command('get').description('score of a single CVE').argument('<cve>')).action(
		async (cve: string, flags: LookupFlags) => {
			const response = await withClient(flags, (client) => client.get(cve, toLookupOptions(flags)));
			print(response, flags.format);
		}
	);

	addLookupOptions(program.command('batch').description('scores of several CVEs').argument('<cves...>')).action(
		async (cves: string[], flags: LookupFlags) => {
			const response = await withClient(flags, (client) => client.batch(cves, toLookupOptions(flags)));
			print(response, flags.format);
		}
	);

	const top = program
		.command('top')
		.description('top CVEs by EPSS score')
		.option('--limit <n>', 'number of rows', parseIntOption, 100)
		.option('--order <order>', 'sorting order', '!epss')
		.option('--envelope', 'include the response envelope')
		.option('--pretty', 'ask the API for pretty-printed JSON');
	addCacheOptions(addFormatOption(top)).action(async (flags: LookupFlags) => {
		const response = await withClient(flags, (client) => client.top(toLookupOptions(flags)));
		print(response, flags.format);
	});

	const cache = program.command('cache').description('cache management');

	addCacheOptions(addFormatOption(cache.command('stats').description('show cache statistics'))).action(
		async (flags: CacheFlags) => {
			const stats = await withClient(flags, async (client) => client.getCacheStats());
			if (!stats) {
				deps.stderr('Cache is disabled or not configured\n');
				exitCode = 1;
				return;
			}
			print(
				{
					hits: stats.hits,
					misses: stats.misses,
					sets: stats.sets,
					deletes: stats.deletes,
					errors: stats.errors,
					hit_rate: stats.hitRate,
					uptime: stats.uptime,
					enabled: stats.enabled,
					backend: stats.backend,
					ttl: stats.ttl,
				},
				flags.format
			);
		}
	);

	addCacheOptions(cache.command('clear').description('remove every cached response')).action(
		async (flags: CacheFlags) => {
			const cleared = await withClient(flags, (client) => client.clearCache());
			if (cleared) {
				deps.stdout('Cache cleared successfully\n');
			} else {
				deps.stderr('Failed to clear cache\n');
				exitCode = 1;
			}
		}
	);

	addCacheOptions(addFormatOption(cache.command('config').description('show the effective cache configuration'))).action(
		async (flags: CacheFlags) => {
			print(describeCacheConfig(resolveConfig(flags)), flags.format);
		}
	);

	return { program, exitCode: () => exitCode };
}

const defaultDependencies: CliDependencies = {
	stdout: (text) => {
		process.stdout.write(text);
	},
	stderr: (text) => {
		process.stderr.write(text);
	},
};

/**
 * Parses `argv` (without the node and script entries), runs the command and
 * resolves to the process exit code.
 */
export async function run(argv: string[], deps: CliDependencies = defaultDependencies): Promise<number> {
	const { program, exitCode } = createProgram(deps);
	try {
		await program.parseAsync(argv, { from: 'user' });
		return exitCode();
	} catch (error) {
		if (error instanceof CommanderError) {
			return error.exitCode;
		}
		deps.stderr(`Error: ${errorMessage(error)}\n`);
		return 1;
	}
}
