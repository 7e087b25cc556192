import type { JsonObject } from './json.js';

/**
 * A single EPSS score row. The API returns scores as strings.
 */
export interface EpssRecord {
	cve: string;
	epss: string;
	percentile: string;
	date: string;
}

/**
 * Response envelope returned by the EPSS API (status, paging metadata, rows)
 */
export interface EpssEnvelope {
	status?: string;
	status_code?: number;
	version?: string;
	access?: string;
	total?: number;
	offset?: number;
	limit?: number;
	data?: EpssRecord[];
}

/**
 * Raw decoded response. Opaque to the cache layer.
 */
export type EpssResponse = JsonObject;

export type Scope = 'time-series';

/** Scalar request parameter value as sent on the query string */
export type ParamValue = string | number | boolean;

/**
 * Parameter set that identifies a lookup. `null`/`undefined` entries are
 * ignored when deriving cache keys.
 */
export type CacheParams = Record<string, ParamValue | null | undefined>;
