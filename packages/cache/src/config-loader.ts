import * as TOML from '@iarna/toml';
import {
	CacheDocumentSchema,
	ConfigLoadError,
	ConfigValidationError,
	documentToConfigInput,
	resolveCacheConfig,
	type CacheConfig,
} from '@epss/protocol';
import { expandHome, log } from '@epss/runtime';
import yaml from 'js-yaml';
import { existsSync, readFileSync } from 'fs';
import os from 'os';
import path from 'path';

const logger = log.child({ component: 'cache-config' });

type EnvKind = 'string' | 'int' | 'number' | 'boolean';

const ENV_MAPPINGS: Record<string, { path: string[]; kind: EnvKind }> = {
	EPSS_CACHE_ENABLED: { path: ['enabled'], kind: 'boolean' },
	EPSS_CACHE_BACKEND: { path: ['backend'], kind: 'string' },
	EPSS_CACHE_TTL: { path: ['ttl'], kind: 'int' },
	EPSS_CACHE_KEY_PREFIX: { path: ['keyPrefix'], kind: 'string' },
	EPSS_CACHE_REDIS_HOST: { path: ['redis', 'host'], kind: 'string' },
	EPSS_CACHE_REDIS_PORT: { path: ['redis', 'port'], kind: 'int' },
	EPSS_CACHE_REDIS_DB: { path: ['redis', 'db'], kind: 'int' },
	EPSS_CACHE_REDIS_PASSWORD: { path: ['redis', 'password'], kind: 'string' },
	EPSS_CACHE_DATABASE_URL: { path: ['database', 'url'], kind: 'string' },
	EPSS_CACHE_DATABASE_TABLE: { path: ['database', 'tableName'], kind: 'string' },
	EPSS_CACHE_FILE_DIRECTORY: { path: ['file', 'directory'], kind: 'string' },
	EPSS_CACHE_FILE_MAX_SIZE_MB: { path: ['file', 'maxSizeMb'], kind: 'number' },
	EPSS_CACHE_FILE_COMPRESSION: { path: ['file', 'compression'], kind: 'boolean' },
	EPSS_CACHE_FILE_FORMAT: { path: ['file', 'format'], kind: 'string' },
};

export interface ConfigSearchOptions {
	/** Environment to read `EPSS_CACHE_*` variables from (default: `process.env`) */
	env?: NodeJS.ProcessEnv;
	/** Directory searched for `epss.yaml` / `epss.yml` / `epss.toml` (default: `process.cwd()`) */
	cwd?: string;
	/** Home directory searched for `.epss/config.yaml` (default: `os.homedir()`) */
	homeDir?: string;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return (
		typeof value === 'object' &&
		value !== null &&
		!Array.isArray(value) &&
		Object.prototype.toString.call(value) === '[object Object]'
	);
}

/**
 * Deep merge of plain objects. Later sources win; arrays and scalars are
 * replaced and `undefined` never overwrites.
 */
export function deepMerge(...sources: Array<Record<string, unknown>>): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const source of sources) {
		for (const [key, value] of Object.entries(source)) {
			if (value === undefined) continue;
			const current = result[key];
			result[key] = isPlainObject(value) && isPlainObject(current) ? deepMerge(current, value) : value;
		}
	}
	return result;
}

function setNestedValue(target: Record<string, unknown>, keys: string[], value: unknown): void {
	const [head, ...rest] = keys;
	if (head === undefined) return;
	if (rest.length === 0) {
		target[head] = value;
		return;
	}
	const existing = target[head];
	const child: Record<string, unknown> = isPlainObject(existing) ? existing : {};
	target[head] = child;
	setNestedValue(child, rest, value);
}

function coerceValue(raw: string, kind: EnvKind): string | number | boolean | undefined {
	const value = raw.trim();
	switch (kind) {
		case 'boolean':
			return ['true', '1'].includes(value.toLowerCase());
		case 'int':
			return /^-?\d+$/.test(value) ? Number.parseInt(value, 10) : undefined;
		case 'number': {
			const parsed = Number(value);
			return value !== '' && Number.isFinite(parsed) ? parsed : undefined;
		}
		default:
			return raw;
	}
}

/**
 * Reads `EPSS_CACHE_*` variables into a partial config. Empty and malformed
 * numeric values are skipped.
 */
export function parseEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [name, mapping] of Object.entries(ENV_MAPPINGS)) {
		const raw = env[name];
		if (raw === undefined || raw === '') continue;
		const value = coerceValue(raw, mapping.kind);
		if (value === undefined) {
			logger.warn('Ignoring malformed environment variable', { name });
			continue;
		}
		setNestedValue(result, mapping.path, value);
	}
	return result;
}

/**
 * Normalizes a parsed YAML/TOML document (snake_case `cache` section) into a
 * partial camelCase config.
 *
 * @throws ConfigValidationError when the document does not have the expected shape
 */
export function parseCacheConfigDocument(document: unknown): Record<string, unknown> {
	const parsed = CacheDocumentSchema.safeParse(document ?? {});
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const field = issue ? issue.path.join('.') : '';
		throw new ConfigValidationError(
			`Invalid configuration document${field ? ` at "${field}"` : ''}: ${issue?.message ?? 'unknown error'}`,
			field,
			document
		);
	}
	return documentToConfigInput(parsed.data);
}

function parseFileContent(filePath: string, content: string): unknown {
	const extension = path.extname(filePath).toLowerCase();
	try {
		if (extension === '.yaml' || extension === '.yml') {
			return yaml.load(content);
		}
		return TOML.parse(content);
	} catch (error) {
		throw new ConfigLoadError(
			`Failed to parse ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
			'PARSE_ERROR',
			filePath,
			error
		);
	}
}

/**
 * Loads the `cache` section of a YAML or TOML file as a partial config.
 * The values are validated against the defaults before they are returned.
 *
 * @throws ConfigLoadError when the file is missing, unsupported, unparseable or invalid
 */
export function loadConfigFromFile(file: string): Record<string, unknown> {
	const filePath = path.resolve(expandHome(file));
	const extension = path.extname(filePath).toLowerCase();
	if (!['.yaml', '.yml', '.toml'].includes(extension)) {
		throw new ConfigLoadError(
			`Unsupported configuration format "${extension || '(none)'}"; use .yaml, .yml or .toml`,
			'UNSUPPORTED_FORMAT',
			filePath
		);
	}

	let content: string;
	try {
		content = readFileSync(filePath, 'utf-8');
	} catch (error) {
		throw new ConfigLoadError(`Configuration file not found: ${filePath}`, 'FILE_NOT_FOUND', filePath, error);
	}

	try {
		const input = parseCacheConfigDocument(parseFileContent(filePath, content));
		resolveCacheConfig(input);
		return input;
	} catch (error) {
		if (error instanceof ConfigLoadError) {
			throw error;
		}
		throw new ConfigLoadError(
			error instanceof Error ? error.message : String(error),
			'VALIDATION_ERROR',
			filePath,
			error
		);
	}
}

/**
 * Default configuration file locations, in lookup order
 */
export function defaultConfigLocations(options: ConfigSearchOptions = {}): string[] {
	const home = options.homeDir ?? os.homedir();
	const cwd = options.cwd ?? process.cwd();
	return [
		path.join(home, '.epss', 'config.yaml'),
		path.join(home, '.epss', 'config.yml'),
		path.join(cwd, 'epss.yaml'),
		path.join(cwd, 'epss.yml'),
		path.join(cwd, 'epss.toml'),
	];
}

function loadFileLayer(configFile: string | undefined, options: ConfigSearchOptions): Record<string, unknown> {
	if (configFile) {
		try {
			return loadConfigFromFile(configFile);
		} catch (error) {
			logger.warn('Ignoring cache configuration file', {
				file: configFile,
				error: error instanceof Error ? error.message : error,
			});
			return {};
		}
	}

	for (const location of defaultConfigLocations(options)) {
		if (!existsSync(location)) continue;
		try {
			const input = loadConfigFromFile(location);
			logger.debug('Loaded cache configuration', { file: location });
			return input;
		} catch (error) {
			logger.warn('Skipping cache configuration file', {
				file: location,
				error: error instanceof Error ? error.message : error,
			});
		}
	}
	return {};
}

/**
 * Builds the effective configuration: defaults, overridden by environment
 * variables, overridden by the configuration file (`configFile`, or the first
 * default location that loads).
 *
 * @throws ConfigValidationError when the merged values are invalid
 */
export function loadCacheConfig(configFile?: string, options: ConfigSearchOptions = {}): CacheConfig {
	const envLayer = parseEnvConfig(options.env ?? process.env);
	const fileLayer = loadFileLayer(configFile, options);
	return resolveCacheConfig(deepMerge(envLayer, fileLayer));
}
