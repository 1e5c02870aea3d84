/**
 * Decoded JSON values and source records
 */

// ============================================================================
// JSON VALUES
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * A decoded JSON value tagged with its kind. Integers and floating point
 * numbers are told apart here, and booleans are never treated as numbers.
 */
export type TaggedValue =
  | { kind: 'null' }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'integer'; value: number }
  | { kind: 'number'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'array'; value: JsonValue[] }
  | { kind: 'object'; value: JsonObject };

export type ValueKind = TaggedValue['kind'];

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Tag a decoded value. `undefined` (an absent field) is tagged as null.
 */
export function tagValue(value: JsonValue | undefined): TaggedValue {
  if (value === null || value === undefined) {
    return { kind: 'null' };
  }
  if (typeof value === 'boolean') {
    return { kind: 'boolean', value };
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) ? { kind: 'integer', value } : { kind: 'number', value };
  }
  if (typeof value === 'string') {
    return { kind: 'string', value };
  }
  if (Array.isArray(value)) {
    return { kind: 'array', value };
  }
  return { kind: 'object', value };
}

// ============================================================================
// RECORDS
// ============================================================================

/** Identifier used for cursor pagination */
export type RecordId = string | number;

/**
 * One record as returned by the source. `_id` is expected on every record;
 * `updatedAt` drives incremental sync when present.
 */
export type SourceRecord = JsonObject;

export const ID_FIELD = '_id';
export const CURSOR_FIELD = 'updatedAt';

/**
 * Read a record's identifier, if it has a usable one
 */
export function getRecordId(record: SourceRecord): RecordId | undefined {
  const id = record[ID_FIELD];
  if (typeof id === 'string' && id.length > 0) {
    return id;
  }
  if (typeof id === 'number' && Number.isFinite(id)) {
    return id;
  }
  return undefined;
}

/**
 * Read a record's `updatedAt`, if it is a non-empty string
 */
export function getCursorValue(record: SourceRecord): string | undefined {
  const value = record[CURSOR_FIELD];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}
