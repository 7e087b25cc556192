import { describe, it, expect } from '@jest/globals';
import { createHash } from 'node:crypto';
import { CacheKeyGenerator } from '../src/key-generator.js';

const md5 = (text: string) => createHash('md5').update(text).digest('hex');

describe('CacheKeyGenerator', () => {
	const generator = new CacheKeyGenerator('epss');

	it('builds prefix:operation:hash:current', () => {
		const key = generator.generateKey('get', { cve: 'CVE-2024-0001', limit: 10 });
		expect(key).toBe(`epss:get:${md5('{"cve":"CVE-2024-0001","limit":10}')}:current`);
	});

	it('uses the date parameter as the last segment', () => {
		const key = generator.generateKey('get', { cve: 'CVE-2024-0001', date: '2024-01-15' });
		expect(key).toBe(`epss:get:${md5('{"cve":"CVE-2024-0001","date":"2024-01-15"}')}:2024-01-15`);
	});

	it('is independent of parameter order', () => {
		expect(generator.generateKey('query', { limit: 5, order: '!epss', offset: 10 })).toBe(
			generator.generateKey('query', { offset: 10, order: '!epss', limit: 5 })
		);
	});

	it('ignores null and undefined parameters', () => {
		expect(generator.generateKey('get', { cve: 'CVE-1', date: null, scope: undefined })).toBe(
			generator.generateKey('get', { cve: 'CVE-1' })
		);
	});

	it('sorts integer-like parameter names as text', () => {
		const key = generator.generateKey('query', { b: 1, '10': 2, a: true });
		expect(key).toBe(`epss:query:${md5('{"10":2,"a":true,"b":1}')}:current`);
	});

	it('hashes an empty parameter set', () => {
		expect(generator.generateKey('top')).toBe(`epss:top:${md5('{}')}:current`);
	});

	it('separates operations and prefixes', () => {
		const params = { cve: 'CVE-1' };
		expect(generator.generateKey('get', params)).not.toBe(generator.generateKey('batch', params));
		expect(new CacheKeyGenerator('other').generateKey('get', params)).toBe(
			`other:get:${md5('{"cve":"CVE-1"}')}:current`
		);
	});

	it('changes when a single parameter value changes', () => {
		expect(generator.generateKey('query', { limit: 100 })).not.toBe(generator.generateKey('query', { limit: 101 }));
		expect(generator.generateKey('get', { cve: 'CVE-1' })).not.toBe(generator.generateKey('get', { cve: 'CVE-2' }));
		expect(generator.generateKey('query', { limit: 5, order: 'epss' })).not.toBe(
			generator.generateKey('query', { limit: 5, order: '!epss' })
		);
	});

	it('keeps dated lookups apart from current ones', () => {
		const current = generator.generateKey('get', { cve: 'CVE-1' });
		const dated = generator.generateKey('get', { cve: 'CVE-1', date: '2024-01-15' });

		expect(dated).not.toBe(current);
		expect(current.endsWith(':current')).toBe(true);
		expect(dated.endsWith(':2024-01-15')).toBe(true);
	});
});
