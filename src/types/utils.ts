/**
 * Core type utilities for sqlgate.
 * These types replace 'any' usage for everything that ends up on the wire.
 */

/**
 * Primitive JSON values.
 */
export type JsonPrimitive = string | number | boolean | null;

/**
 * Recursive JSON value type.
 */
export type JsonValue = JsonPrimitive | JsonObject | JsonArray;

/**
 * JSON object type - strictly typed alternative to Record<string, any>
 */
export interface JsonObject {
	[key: string]: JsonValue;
}

/**
 * JSON array type
 */
export interface JsonArray extends Array<JsonValue> {}

/**
 * Open key/value side-channel carried alongside a pipeline run.
 * Keys are snake_case to match the response envelope.
 */
export type Metadata = JsonObject;

/**
 * Plain object check: rejects arrays, class instances, Buffers and Dates.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
	if (typeof value !== 'object' || value === null) {
		return false;
	}
	const proto: unknown = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}
