export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

const CAMEL_KEY = /^[a-z][a-zA-Z0-9]*$/;
const SNAKE_KEY = /^[a-z][a-z0-9_]*$/;

export function toSnakeCase(key: string): string {
  if (!CAMEL_KEY.test(key)) return key;
  return key.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

export function toCamelCase(key: string): string {
  if (!SNAKE_KEY.test(key)) return key;
  return key.replace(/_([a-z0-9])/g, (_match, letter: string) => letter.toUpperCase());
}

/**
 * Domain value -> JSON body. Field names become snake_case; data keys
 * (age groups, categories, platforms) pass through unchanged.
 */
export function toWire(value: unknown): JsonValue {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (Array.isArray(value)) return value.map(toWire);
  if (value instanceof Set) return Array.from(value, toWire);
  if (value instanceof Map) {
    const result: { [key: string]: JsonValue } = {};
    for (const [key, entry] of value) result[String(key)] = toWire(entry);
    return result;
  }
  if (typeof value === "object") {
    const result: { [key: string]: JsonValue } = {};
    for (const [key, entry] of Object.entries(value)) {
      if (entry === undefined) continue;
      result[toSnakeCase(key)] = toWire(entry);
    }
    return result;
  }
  return null;
}

/** Request body keys from snake_case to the camelCase the use cases take. */
export function camelizeKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(camelizeKeys);
  if (value !== null && typeof value === "object" && !(value instanceof Date)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [toCamelCase(key), camelizeKeys(entry)])
    );
  }
  return value;
}
