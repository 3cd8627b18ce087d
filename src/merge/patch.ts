import { isObject } from '../core/json';
import { JsonObject, JsonValue } from '../types';

function isJsonObjectValue(value: JsonValue): value is JsonObject {
  return isObject(value);
}

/**
 * Apply an RFC 7396 JSON merge patch. Returns a new value; neither input
 * is modified.
 */
export function applyMergePatch(target: JsonValue, patch: JsonValue): JsonValue {
  if (!isJsonObjectValue(patch)) {
    return structuredClone(patch);
  }
  const result: JsonObject = isJsonObjectValue(target) ? structuredClone(target) : {};
  for (const [key, value] of Object.entries(patch)) {
    if (value === null) {
      delete result[key];
    } else {
      const current = Object.prototype.hasOwnProperty.call(result, key) ? (result[key] ?? null) : null;
      Object.defineProperty(result, key, {
        value: applyMergePatch(current, value),
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
  }
  return result;
}
