/**
 * Value codec: turns driver-native column values into JSON-safe values.
 *
 * Drivers hand back arbitrary-precision decimals as strings (pg),
 * 64-bit integers as strings or bigints, and temporal columns as Date
 * objects. None of those survive JSON.stringify the way a client expects.
 */

import type { JsonObject, JsonValue } from '../types/utils.js';
import { isPlainObject } from '../types/utils.js';

/**
 * Type hint for a result column, derived from driver field metadata.
 */
export type ColumnKind = 'decimal' | 'bigint' | 'date' | 'timestamp' | 'timestamptz' | 'other';

/**
 * PostgreSQL type OIDs we care about.
 */
const PG_TYPE_KINDS: ReadonlyMap<number, ColumnKind> = new Map([
  [1700, 'decimal'], // numeric
  [20, 'bigint'], // int8
  [1082, 'date'], // date
  [1114, 'timestamp'], // timestamp
  [1184, 'timestamptz'], // timestamptz
]);

/**
 * Map a PostgreSQL field's dataTypeID to a column kind.
 */
export function columnKindForPgType(oid: number): ColumnKind {
  return PG_TYPE_KINDS.get(oid) ?? 'other';
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Calendar date as YYYY-MM-DD.
 *
 * pg parses DATE columns into local midnight, so local components are the
 * ones that round-trip.
 */
function formatDate(value: Date): string {
  return `${pad(value.getFullYear(), 4)}-${pad(value.getMonth() + 1)}-${pad(value.getDate())}`;
}

/**
 * Wall-clock timestamp without a zone designator, for timestamp columns that
 * carry none. pg parses them as local time, so local components round-trip.
 */
function formatLocalTimestamp(value: Date): string {
  const time = `${pad(value.getHours())}:${pad(value.getMinutes())}:${pad(value.getSeconds())}`;
  return `${formatDate(value)}T${time}.${pad(value.getMilliseconds(), 3)}`;
}

function encodeBigInt(value: bigint): number | string {
  const asNumber = Number(value);
  return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
}

/**
 * Encode a single column value.
 *
 * - decimal → IEEE double
 * - Date → ISO-8601 text (YYYY-MM-DD for date columns, no zone for
 *   timestamp columns, UTC otherwise)
 * - bigint → number when it fits, otherwise decimal text
 * - Buffer → base64 text
 * - arrays and plain objects (json/jsonb columns) → encoded element-wise
 * - any other scalar → unchanged
 */
export function encodeValue(value: unknown, kind: ColumnKind = 'other'): JsonValue {
  if (value === null || value === undefined) {
    return null;
  }

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      return null;
    }
    if (kind === 'date') {
      return formatDate(value);
    }
    return kind === 'timestamp' ? formatLocalTimestamp(value) : value.toISOString();
  }

  if (typeof value === 'bigint') {
    return encodeBigInt(value);
  }

  if (kind === 'decimal' && (typeof value === 'string' || typeof value === 'number')) {
    const asNumber = Number(value);
    return Number.isFinite(asNumber) ? asNumber : String(value);
  }

  if (kind === 'bigint' && typeof value === 'string' && /^-?\d+$/.test(value)) {
    return encodeBigInt(BigInt(value));
  }

  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'number') {
    // JSON has no NaN/Infinity; keep the information as text
    return Number.isFinite(value) ? value : String(value);
  }

  if (Buffer.isBuffer(value)) {
    return value.toString('base64');
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown) => encodeValue(item));
  }

  if (isPlainObject(value)) {
    const encoded: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      encoded[key] = encodeValue(item);
    }
    return encoded;
  }

  return String(value);
}

/**
 * Encode one result row into an ordered column → value mapping.
 */
export function encodeRow(
  row: Record<string, unknown>,
  columns: readonly string[],
  kinds: ReadonlyMap<string, ColumnKind> = new Map()
): JsonObject {
  const encoded: JsonObject = {};
  for (const column of columns) {
    encoded[column] = encodeValue(row[column], kinds.get(column));
  }
  return encoded;
}
