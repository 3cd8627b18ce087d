import { CustomKey, CustomProps, JsonObject, JsonValue } from '../types';

const CUSTOM_KEY = /^[xX]_./;

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isCustomKey(key: string): key is CustomKey {
  return CUSTOM_KEY.test(key);
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return isObject(value) && Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  return isObject(value) && isJsonValue(value);
}

/**
 * Collect the custom (`x_`/`X_`) keys of an object
 */
export function customProps(source: object): CustomProps {
  const props: CustomProps = {};
  for (const [key, value] of Object.entries(source)) {
    if (isCustomKey(key) && isJsonValue(value)) {
      props[key] = structuredClone(value);
    }
  }
  return props;
}

/**
 * Build a JSON pointer from path segments
 */
export function pointer(...segments: Array<string | number>): string {
  return segments
    .map((s) => '/' + String(s).replace(/~/g, '~0').replace(/\//g, '~1'))
    .join('');
}

/**
 * Recursively freeze a value so typed models stay immutable
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
