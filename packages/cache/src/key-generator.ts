import { createHash } from 'node:crypto';
import type { CacheParams, ParamValue } from '@epss/protocol';

/**
 * Derives deterministic cache keys of the form
 * `<prefix>:<operation>:<md5 of canonical params>:<date|current>`.
 */
export class CacheKeyGenerator {
	constructor(readonly prefix: string = 'epss') {}

	generateKey(operation: string, params: CacheParams = {}): string {
		const present = Object.entries(params).filter(
			(entry): entry is [string, ParamValue] => entry[1] !== null && entry[1] !== undefined
		);
		const hash = createHash('md5').update(canonicalize(present)).digest('hex');
		const date = params.date;
		const dateSegment = date === null || date === undefined ? 'current' : String(date);
		return `${this.prefix}:${operation}:${hash}:${dateSegment}`;
	}
}

/**
 * Compact JSON object text with keys in lexicographic order. Built by hand
 * because object property order puts integer-like keys first.
 */
function canonicalize(entries: Array<[string, ParamValue]>): string {
	const sorted = [...entries].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
	return `{${sorted.map(([key, value]) => `${JSON.stringify(key)}:${JSON.stringify(value)}`).join(',')}}`;
}
