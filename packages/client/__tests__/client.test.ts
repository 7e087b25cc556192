import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { CacheManager } from '@epss/cache';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { EpssClient, withEpssClient, type FetchFn } from '../src/client.js';
import { EpssApiError, EpssResponseError } from '../src/errors.js';

const BASE_URL = 'https://epss.example.test/v1';

const ENVELOPE = {
	status: 'OK',
	'status-code': 200,
	total: 1,
	data: [{ cve: 'CVE-2024-0001', epss: '0.00043', percentile: '0.0812', date: '2024-03-01' }],
};

function jsonResponse(body: unknown, status = 200): Response {
	return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function fakeFetch(respond: () => Response = () => jsonResponse(ENVELOPE)) {
	return jest.fn<FetchFn>(async () => respond());
}

function requestedUrl(fetchMock: ReturnType<typeof fakeFetch>, call = 0): string {
	const args = fetchMock.mock.calls[call];
	return args ? args[0] : '';
}

describe('EpssClient', () => {
	describe('requests', () => {
		it('maps query options onto API parameters', async () => {
			const fetchMock = fakeFetch();
			const client = await EpssClient.create({ baseUrl: BASE_URL, fetch: fetchMock });

			await client.query({ cves: ['CVE-1', 'CVE-2'], epssGt: 0.5, limit: 10, envelope: true });

			expect(requestedUrl(fetchMock)).toBe(`${BASE_URL}?cve=CVE-1%2CCVE-2&epss-gt=0.5&limit=10&envelope=true`);
		});

		it('sends the user agent and accepts JSON', async () => {
			const fetchMock = fakeFetch();
			const client = await EpssClient.create({ baseUrl: BASE_URL, fetch: fetchMock, userAgent: 'tests/1.0' });

			await client.get('CVE-2024-0001');

			const init = fetchMock.mock.calls[0]?.[1];
			expect(init?.headers).toEqual({ Accept: 'application/json', 'User-Agent': 'tests/1.0' });
			expect(requestedUrl(fetchMock)).toBe(`${BASE_URL}?cve=CVE-2024-0001`);
		});

		it('defaults top to the 100 highest scores', async () => {
			const fetchMock = fakeFetch();
			const client = await EpssClient.create({ baseUrl: BASE_URL, fetch: fetchMock });

			await client.top();

			expect(requestedUrl(fetchMock)).toBe(`${BASE_URL}?order=%21epss&limit=100`);
		});

		it('joins batch CVEs and keeps the date and scope', async () => {
			const fetchMock = fakeFetch();
			const client = await EpssClient.create({ baseUrl: BASE_URL, fetch: fetchMock });

			await client.batch(['CVE-1', 'CVE-2'], { date: '2024-01-15', scope: 'time-series' });

			expect(requestedUrl(fetchMock)).toBe(`${BASE_URL}?cve=CVE-1%2CCVE-2&date=2024-01-15&scope=time-series`);
		});

		it('raises EpssApiError on a non-2xx status', async () => {
			const client = await EpssClient.create({
				baseUrl: BASE_URL,
				fetch: fakeFetch(() => new Response('busy', { status: 503, statusText: 'Service Unavailable' })),
			});

			const failure = client.get('CVE-2024-0001');
			await expect(failure).rejects.toBeInstanceOf(EpssApiError);
			await expect(failure).rejects.toMatchObject({ status: 503, url: `${BASE_URL}?cve=CVE-2024-0001` });
		});

		it('raises EpssResponseError on invalid JSON or a non-object body', async () => {
			const invalid = await EpssClient.create({
				baseUrl: BASE_URL,
				fetch: fakeFetch(() => new Response('<html>', { status: 200 })),
			});
			await expect(invalid.query()).rejects.toBeInstanceOf(EpssResponseError);

			const list = await EpssClient.create({ baseUrl: BASE_URL, fetch: fakeFetch(() => jsonResponse([1, 2])) });
			await expect(list.query()).rejects.toThrow('EPSS API returned an unexpected payload');
		});

		it('has no cache unless one is configured', async () => {
			const client = await EpssClient.create({ baseUrl: BASE_URL, fetch: fakeFetch() });

			expect(client.getCacheStats()).toBeNull();
			expect(await client.clearCache()).toBe(false);
		});
	});

	describe('caching', () => {
		let directory: string;

		beforeEach(async () => {
			directory = await fs.mkdtemp(path.join(os.tmpdir(), 'epss-client-'));
		});

		afterEach(async () => {
			await fs.rm(directory, { recursive: true, force: true });
		});

		const cacheConfig = () => ({ enabled: true, backend: 'file' as const, file: { directory } });

		it('answers a repeated lookup from the cache', async () => {
			const fetchMock = fakeFetch();

			await withEpssClient({ baseUrl: BASE_URL, fetch: fetchMock, cache: cacheConfig() }, async (client) => {
				const first = await client.get('CVE-2024-0001');
				const second = await client.get('CVE-2024-0001');

				expect(second).toEqual(first);
				expect(fetchMock).toHaveBeenCalledTimes(1);
				expect(client.getCacheStats()).toMatchObject({ hits: 1, misses: 1, sets: 1, enabled: true });
			});
		});

		it('keys entries by operation', async () => {
			const fetchMock = fakeFetch();

			await withEpssClient({ baseUrl: BASE_URL, fetch: fetchMock, cache: cacheConfig() }, async (client) => {
				await client.get('CVE-2024-0001');
				await client.query({ cves: ['CVE-2024-0001'] });

				expect(fetchMock).toHaveBeenCalledTimes(2);
			});
		});

		it('bypasses the cache when asked to', async () => {
			const fetchMock = fakeFetch();

			await withEpssClient({ baseUrl: BASE_URL, fetch: fetchMock, cache: cacheConfig() }, async (client) => {
				await client.get('CVE-2024-0001', { useCache: false });
				await client.get('CVE-2024-0001', { useCache: false });

				expect(fetchMock).toHaveBeenCalledTimes(2);
				expect(client.getCacheStats()).toMatchObject({ hits: 0, misses: 0, sets: 0 });
			});
		});

		it('does not cache failed lookups', async () => {
			let status = 500;
			const fetchMock = fakeFetch(() => jsonResponse(ENVELOPE, status));

			await withEpssClient({ baseUrl: BASE_URL, fetch: fetchMock, cache: cacheConfig() }, async (client) => {
				await expect(client.get('CVE-2024-0001')).rejects.toBeInstanceOf(EpssApiError);
				expect(client.getCacheStats()).toMatchObject({ sets: 0 });

				status = 200;
				expect(await client.get('CVE-2024-0001')).toEqual(ENVELOPE);
				expect(fetchMock).toHaveBeenCalledTimes(2);
			});
		});

		it('clears its cache', async () => {
			const fetchMock = fakeFetch();

			await withEpssClient({ baseUrl: BASE_URL, fetch: fetchMock, cache: cacheConfig() }, async (client) => {
				await client.get('CVE-2024-0001');
				expect(await client.clearCache()).toBe(true);
				await client.get('CVE-2024-0001');

				expect(fetchMock).toHaveBeenCalledTimes(2);
			});
		});

		it('leaves a shared manager open on close', async () => {
			const manager = await CacheManager.create(cacheConfig());
			const client = await EpssClient.create({ baseUrl: BASE_URL, fetch: fakeFetch(), cache: manager });

			await client.get('CVE-2024-0001');
			await client.close();

			expect(client.getCacheStats()).toBeNull();
			expect(await manager.exists('get', { cve: 'CVE-2024-0001' })).toBe(true);
			await manager.close();
		});
	});
});
