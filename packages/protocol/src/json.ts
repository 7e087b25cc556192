/**
 * JSON value types shared by the cache layer and the EPSS client
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Anything a backend can store. `null` is reserved for "absent".
 */
export type CacheValue = Exclude<JsonValue, null>;

export function isJsonObject(value: unknown): value is JsonObject {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}
