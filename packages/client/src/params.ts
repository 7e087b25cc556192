import type { ParamValue, Scope } from '@epss/protocol';

/**
 * Filters understood by the EPSS API
 */
export interface QueryOptions {
	cves?: Iterable<string>;
	/** Historic scores, `YYYY-MM-DD` */
	date?: string;
	scope?: Scope;
	/** Sort order, e.g. `!epss` for descending score */
	order?: string;
	epssGt?: number;
	percentileGt?: number;
	limit?: number;
	offset?: number;
	envelope?: boolean;
	pretty?: boolean;
	/** Additional query-string parameters; `null`/`undefined` entries are dropped */
	extra?: Record<string, ParamValue | null | undefined>;
}

export type QueryParams = Record<string, ParamValue>;

/**
 * Maps query options onto API parameter names. The result is both the query
 * string and the cache key input.
 */
export function prepareParams(options: QueryOptions = {}): QueryParams {
	const params: QueryParams = {};
	const cves = options.cves ? [...options.cves] : [];

	if (cves.length > 0) {
		params.cve = cves.join(',');
	}
	if (options.date) {
		params.date = options.date;
	}
	if (options.scope) {
		params.scope = options.scope;
	}
	if (options.order) {
		params.order = options.order;
	}
	if (options.epssGt !== undefined) {
		params['epss-gt'] = options.epssGt;
	}
	if (options.percentileGt !== undefined) {
		params['percentile-gt'] = options.percentileGt;
	}
	if (options.limit !== undefined) {
		params.limit = options.limit;
	}
	if (options.offset !== undefined) {
		params.offset = options.offset;
	}
	if (options.envelope) {
		params.envelope = 'true';
	}
	if (options.pretty) {
		params.pretty = 'true';
	}
	for (const [key, value] of Object.entries(options.extra ?? {})) {
		if (value !== null && value !== undefined) {
			params[key] = value;
		}
	}
	return params;
}

export function toSearchParams(params: QueryParams): URLSearchParams {
	const search = new URLSearchParams();
	for (const [key, value] of Object.entries(params)) {
		search.set(key, String(value));
	}
	return search;
}
