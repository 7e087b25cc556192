/**
 * End-to-end: configuration file -> manager -> client, across backends that
 * run in process.
 */

import { describe, it, expect, beforeAll, afterAll, jest } from '@jest/globals';
import { CacheManager, createCacheManager, withCacheManager } from '@epss/cache';
import { EpssClient, type FetchFn } from '@epss/client';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';

describe('EPSS cache lifecycle', () => {
	let root: string;

	beforeAll(async () => {
		root = await fs.mkdtemp(path.join(os.tmpdir(), 'epss-e2e-'));
	});

	afterAll(async () => {
		await fs.rm(root, { recursive: true, force: true });
	});

	it('caches a query on the file backend', async () => {
		await withCacheManager(
			{ enabled: true, backend: 'file', ttl: 300, file: { directory: path.join(root, 'files') } },
			async (manager) => {
				await manager.set('query', { status: 'OK', data: [] }, { limit: 100 });

				expect(await manager.get('query', { limit: 100 })).toEqual({ status: 'OK', data: [] });
				expect(manager.getStats()).toMatchObject({ hits: 1, misses: 0, sets: 1 });
			}
		);
	});

	it('builds a manager from a TOML file with the SQLite backend', async () => {
		const file = path.join(root, 'epss.toml');
		const database = path.join(root, 'db', 'cache.db');
		await fs.writeFile(
			file,
			`[cache]\nenabled = true\nbackend = "database"\nttl = 60\n\n[cache.database]\nurl = "sqlite:///${database}"\n`
		);

		const manager = await createCacheManager(file);
		try {
			expect(manager.getStats()).toMatchObject({ enabled: true, backend: 'database', ttl: 60, errors: 0 });

			const fetchMock = jest.fn<FetchFn>(
				async () => new Response(JSON.stringify({ status: 'OK', data: [{ cve: 'CVE-2024-0001' }] }))
			);
			const client = await EpssClient.create({ baseUrl: 'https://epss.example.test', fetch: fetchMock, cache: manager });

			await client.batch(['CVE-2024-0001']);
			await client.batch(['CVE-2024-0001']);

			expect(fetchMock).toHaveBeenCalledTimes(1);
			expect(manager.getStats()).toMatchObject({ hits: 1, misses: 1, sets: 1 });
			await client.close();
		} finally {
			await manager.close();
		}
	});

	it('keeps running when the configured backend is unreachable', async () => {
		const manager = await CacheManager.create({
			enabled: true,
			backend: 'database',
			database: { url: 'mysql://db.invalid/epss' },
		});

		expect(await manager.get('get', { cve: 'CVE-2024-0001' })).toBeNull();
		expect(await manager.set('get', { status: 'OK' }, { cve: 'CVE-2024-0001' })).toBe(true);
		expect(manager.getStats()).toMatchObject({ enabled: false, errors: 1 });
		await manager.close();
	});
});
