export { EpssClient, withEpssClient, DEFAULT_BASE_URL, DEFAULT_USER_AGENT } from './client.js';
export type { EpssClientOptions, LookupOptions, Operation, FetchFn } from './client.js';
export { prepareParams, toSearchParams } from './params.js';
export type { QueryOptions, QueryParams } from './params.js';
export { EpssApiError, EpssResponseError } from './errors.js';
