import type { JsonObject, JsonValue } from "../schema/SchemaNode.js";

/**
 * Return as array if not array.
 *
 * @param data
 * @returns array
 */
export function asArray<T>(data: T | readonly T[]): readonly T[] {
  if (isArray(data)) return data;

  return [data];
}

function isArray<T>(data: T | readonly T[]): data is readonly T[] {
  return Array.isArray(data);
}

/**
 * True for plain objects (not arrays, not null).
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Sets an own enumerable property, so a key such as `__proto__` stays data.
 */
export function defineOwn<T>(target: { [key: string]: T }, key: string, value: T): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * Structural equality for JSON values. Key order is ignored.
 */
export function jsonEquals(a: JsonValue, b: JsonValue): boolean {
  if (a === b) return true;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) {
      return false;
    }
    for (let i = 0; i < a.length; i++) {
      if (!jsonEquals(a[i], b[i])) return false;
    }
    return true;
  }

  if (isJsonObject(a) && isJsonObject(b)) {
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    for (const key of keys) {
      if (!Object.hasOwn(b, key) || !jsonEquals(a[key], b[key])) return false;
    }
    return true;
  }

  return false;
}

/**
 * Freeze an object graph in place.
 *
 * @param value
 * @returns the same value
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) {
    return value;
  }

  for (const child of Object.values(value)) {
    deepFreeze(child);
  }

  Object.freeze(value);
  return value;
}
