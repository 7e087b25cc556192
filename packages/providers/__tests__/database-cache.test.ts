import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { CacheInitError, type DatabaseConfig } from '@epss/protocol';
import { existsSync, promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { DatabaseCacheBackend, resolveDatabaseTarget } from '../src/cache/database.js';
import { SqliteCacheTable } from '../src/cache/sql/sqlite.js';

const KEY = 'epss:get:abc:current';
const RESPONSE = { status: 'OK', data: [{ cve: 'CVE-2024-0001', epss: '0.25' }] };

describe('resolveDatabaseTarget', () => {
	it.each([
		['sqlite:///:memory:', { dialect: 'sqlite', filename: ':memory:' }],
		['sqlite://', { dialect: 'sqlite', filename: ':memory:' }],
		['sqlite:///cache.db', { dialect: 'sqlite', filename: 'cache.db' }],
		['sqlite:////var/cache/epss.db', { dialect: 'sqlite', filename: '/var/cache/epss.db' }],
		['sqlite:///~/epss.db', { dialect: 'sqlite', filename: path.join(os.homedir(), 'epss.db') }],
		['postgres://cache@db:5432/epss', { dialect: 'postgres', url: 'postgres://cache@db:5432/epss' }],
		['postgresql://cache@db/epss', { dialect: 'postgres', url: 'postgresql://cache@db/epss' }],
	])('resolves %s', (url, expected) => {
		expect(resolveDatabaseTarget(url)).toEqual(expected);
	});

	it('rejects other schemes', () => {
		expect(() => resolveDatabaseTarget('mysql://db/epss')).toThrow(CacheInitError);
	});
});

describe('DatabaseCacheBackend (SQLite)', () => {
	let now: Date;
	let table: SqliteCacheTable;
	let backend: DatabaseCacheBackend;

	const advance = (seconds: number) => {
		now = new Date(now.getTime() + seconds * 1000);
	};

	beforeEach(async () => {
		now = new Date('2024-03-01T12:00:00.000Z');
		table = new SqliteCacheTable(':memory:', 'epss_cache');
		await table.ensureTable();
		backend = new DatabaseCacheBackend(table, { now: () => now });
	});

	afterEach(async () => {
		await backend.close();
	});

	it('round-trips values', async () => {
		expect(await backend.set(KEY, RESPONSE, 60)).toEqual({ ok: true, value: true });
		expect(await backend.get(KEY)).toEqual({ ok: true, value: RESPONSE });
		expect(await backend.exists(KEY)).toEqual({ ok: true, value: true });
	});

	it('stores the expiry next to the creation time', async () => {
		await backend.set(KEY, RESPONSE, 60);

		const row = await table.readLive(KEY, now);
		expect(row).toEqual({
			cacheKey: KEY,
			data: JSON.stringify(RESPONSE),
			createdAt: new Date('2024-03-01T12:00:00.000Z'),
			expiresAt: new Date('2024-03-01T12:01:00.000Z'),
		});
	});

	it('deletes an expired row when it is read', async () => {
		await backend.set(KEY, RESPONSE, 60);

		advance(30);
		expect(await backend.get(KEY)).toEqual({ ok: true, value: RESPONSE });

		advance(31);
		expect(await backend.exists(KEY)).toEqual({ ok: true, value: false });
		expect(await backend.get(KEY)).toEqual({ ok: true, value: null });
		expect(await table.remove(KEY)).toBe(0);
	});

	it('keeps rows without a TTL', async () => {
		await backend.set(KEY, RESPONSE);
		advance(10 * 365 * 24 * 3600);
		expect(await backend.get(KEY)).toEqual({ ok: true, value: RESPONSE });
	});

	it('replaces an existing row', async () => {
		await backend.set(KEY, RESPONSE, 60);
		advance(120);
		await backend.set(KEY, { status: 'OK', data: [] }, 60);

		expect(await backend.get(KEY)).toEqual({ ok: true, value: { status: 'OK', data: [] } });
	});

	it('deletes and clears', async () => {
		await backend.set(KEY, RESPONSE);
		await backend.set('epss:top:def:current', RESPONSE);

		expect(await backend.delete(KEY)).toEqual({ ok: true, value: true });
		expect(await backend.delete(KEY)).toEqual({ ok: true, value: false });
		expect(await backend.clear()).toEqual({ ok: true, value: true });
		expect(await backend.get('epss:top:def:current')).toEqual({ ok: true, value: null });
	});

	it('reports unreadable data as corrupted', async () => {
		await table.upsert({ cacheKey: KEY, data: '{"status"', createdAt: now, expiresAt: null });

		const result = await backend.get(KEY);
		expect(result).toMatchObject({ ok: false, error: { kind: 'corrupted' } });
	});

	it('returns query errors after the connection is closed', async () => {
		await table.close();

		expect(await backend.get(KEY)).toMatchObject({ ok: false, error: { kind: 'query' } });
		expect(await backend.set(KEY, RESPONSE)).toMatchObject({ ok: false, error: { kind: 'query' } });
	});
});

describe('DatabaseCacheBackend.open', () => {
	let directory: string;

	const databaseConfig = (url: string): DatabaseConfig => ({
		url,
		tableName: 'epss_cache',
		poolSize: 5,
		maxOverflow: 10,
		poolTimeout: 30,
	});

	beforeEach(async () => {
		directory = await fs.mkdtemp(path.join(os.tmpdir(), 'epss-db-cache-'));
	});

	afterEach(async () => {
		await fs.rm(directory, { recursive: true, force: true });
	});

	it('creates the database file, its directory and the table', async () => {
		const file = path.join(directory, 'nested', 'cache.db');
		const backend = await DatabaseCacheBackend.open(databaseConfig(`sqlite:///${file}`));

		expect(existsSync(file)).toBe(true);
		await backend.set(KEY, RESPONSE);
		await backend.close();

		const reopened = await DatabaseCacheBackend.open(databaseConfig(`sqlite:///${file}`));
		expect(await reopened.get(KEY)).toEqual({ ok: true, value: RESPONSE });
		await reopened.close();
	});

	it('rejects an unsupported URL', async () => {
		await expect(DatabaseCacheBackend.open(databaseConfig('mysql://db/epss'))).rejects.toBeInstanceOf(
			CacheInitError
		);
	});
});
