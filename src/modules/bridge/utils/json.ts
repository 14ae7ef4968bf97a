/**
 * JSON value helpers
 */

import type { JsonValue } from '../types';

export function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Assign as an own property, so a `__proto__` key stays a plain key
 */
export function setOwnValue(
  target: { [key: string]: JsonValue },
  key: string,
  value: JsonValue
): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

/**
 * Narrow an unknown value (typically JSON.parse output) to JsonValue.
 * Values JSON cannot carry (undefined, functions, symbols, non-finite numbers) become null.
 */
export function toJsonValue(value: unknown): JsonValue {
  if (value === null) return null;

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : null;
    case 'bigint':
      return value.toString();
    case 'object': {
      if (Array.isArray(value)) {
        return value.map((item: unknown) => toJsonValue(item));
      }
      const result: { [key: string]: JsonValue } = {};
      for (const [key, entry] of Object.entries(value)) {
        setOwnValue(result, key, toJsonValue(entry));
      }
      return result;
    }
    default:
      return null;
  }
}

export type JsonParseResult = { ok: true; value: JsonValue } | { ok: false; error: string };

/**
 * JSON.parse without throwing
 */
export function parseJson(text: string): JsonParseResult {
  try {
    const parsed: unknown = JSON.parse(text);
    return { ok: true, value: toJsonValue(parsed) };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}
