/**
 * Plain JSON value accepted by the orchestrator.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Normalize a result for the orchestrator boundary: Dates become ISO-8601
 * strings, non-finite numbers and undefined become null, Maps and Sets become
 * objects and arrays. Object keys whose value is undefined are kept as null so
 * the result shape stays stable.
 */
export function toJsonSafe(value: unknown): JsonValue {
  if (value === null || value === undefined) {
    return null;
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }

  switch (typeof value) {
    case 'number':
      return Number.isFinite(value) ? value : null;
    case 'string':
    case 'boolean':
      return value;
    case 'bigint':
      return Number(value);
    case 'function':
    case 'symbol':
      return null;
  }

  if (Array.isArray(value)) {
    return value.map(item => toJsonSafe(item));
  }

  if (value instanceof Set) {
    return Array.from(value, item => toJsonSafe(item));
  }

  if (value instanceof Map) {
    const result: { [key: string]: JsonValue } = {};
    for (const [key, item] of value) {
      result[String(key)] = toJsonSafe(item);
    }
    return result;
  }

  if (typeof value === 'object') {
    const result: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = toJsonSafe(item);
    }
    return result;
  }

  return null;
}
