import type { RawRecord } from '../types/telemetry.js';

/**
 * Pulls one candidate value out of a raw record; `undefined` means "not here".
 */
export type FieldExtractor = (row: RawRecord) => unknown;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Top-level key of the record.
 */
export function scalar(key: string): FieldExtractor {
  return row => row[key];
}

/**
 * First element of a `fields.<key>` collection, as search responses return
 * requested fields. Accepts both the flattened `"fields.<key>"` key and a
 * nested `fields` object.
 */
export function fieldsFirst(key: string): FieldExtractor {
  return row => {
    const flattened = row[`fields.${key}`];
    const fields = row.fields;
    const collection = flattened !== undefined ? flattened : isPlainObject(fields) ? fields[key] : undefined;
    if (Array.isArray(collection)) {
      return collection.length > 0 ? collection[0] : undefined;
    }
    return collection;
  };
}

/**
 * Value inside a nested map, e.g. a percentile keyed by `"95.0"`.
 */
export function nested(parent: string, key: string): FieldExtractor {
  return row => {
    const container = row[parent];
    return isPlainObject(container) ? container[key] : undefined;
  };
}

/**
 * The usual strategy chain for a field: the scalar key, then its `fields` collection.
 */
export function standard(key: string, ...fallbacks: FieldExtractor[]): FieldExtractor[] {
  return [scalar(key), fieldsFirst(key), ...fallbacks];
}

/**
 * Try each strategy in order; the first non-null value wins.
 */
export function extract(row: RawRecord, strategies: readonly FieldExtractor[]): unknown {
  for (const strategy of strategies) {
    const value = strategy(row);
    if (value !== undefined && value !== null) {
      return value;
    }
  }
  return undefined;
}
