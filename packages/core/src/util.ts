import type {
  JsonObject,
  JsonType,
  JsonValue,
  SchemaNode,
} from "./type";

export function matchSchemaType(value: JsonValue, type: string): boolean {
  const actual = detectSchemaType(value);
  switch (type) {
    case "integer":
      return actual === "integer";
    case "number":
      return actual === "integer" || actual === "number";
    case "object":
    case "array":
    case "string":
    case "boolean":
    case "null":
      return actual === type;
    default:
      return false;
  }
}

export function detectSchemaType(value: JsonValue): JsonType {
  if (value === null) {
    return "null";
  }
  if (Array.isArray(value)) {
    return "array";
  }
  switch (typeof value) {
    case "boolean":
      return "boolean";
    case "number":
      return Number.isInteger(value) ? "integer" : "number";
    case "string":
      return "string";
    default:
      return "object";
  }
}

export function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isSchemaNode(value: unknown): value is SchemaNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isSchemaArray(value: unknown): value is SchemaNode[] {
  return Array.isArray(value) && value.every(isSchemaNode);
}

export function isStringArray(value: unknown): value is string[] {
  return (
    Array.isArray(value) && value.every((item) => typeof item === "string")
  );
}

/**
 * Structural equality of two decoded JSON values. Object key order is
 * irrelevant; `1` and `true` are different values.
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b)) return false;
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (!deepEqual(a[i], b[i])) return false;
    }
    return true;
  }

  if (!isSchemaNode(a) || !isSchemaNode(b)) {
    return false;
  }

  const keysA = Object.keys(a);
  const keysB = Object.keys(b);
  if (keysA.length !== keysB.length) return false;

  for (const key of keysA) {
    if (!Object.hasOwn(b, key)) return false;
    if (!deepEqual(a[key], b[key])) return false;
  }

  return true;
}

/**
 * Equality used by `uniqueItems`: like `deepEqual`, except that the number
 * `1` equals `true` and `0` equals `false`, at any depth.
 */
export function uniqueItemsEqual(a: JsonValue, b: JsonValue): boolean {
  if (typeof a === "boolean" && typeof b === "number") {
    return b === (a ? 1 : 0);
  }
  if (typeof a === "number" && typeof b === "boolean") {
    return a === (b ? 1 : 0);
  }

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b)) return false;
    if (a.length !== b.length) return false;
    return a.every((item, index) => uniqueItemsEqual(item, b[index]));
  }

  if (isJsonObject(a) && isJsonObject(b)) {
    const keysA = Object.keys(a);
    if (keysA.length !== Object.keys(b).length) return false;
    return keysA.every(
      (key) => Object.hasOwn(b, key) && uniqueItemsEqual(a[key], b[key]),
    );
  }

  return a === b;
}

export function jsonPointerUnescape(str: string): string {
  return str.replace(/~1/g, "/").replace(/~0/g, "~");
}

/**
 * Number of characters in a string, counting astral symbols once.
 */
export function characterLength(value: string): number {
  return [...value].length;
}

/**
 * Maximum size for the regex cache to prevent memory leaks.
 */
const MAX_REGEX_CACHE_SIZE = 1000;

/**
 * Cache for compiled RegExp objects.
 * null value indicates an invalid pattern.
 */
const regexCache = new Map<string, RegExp | null>();

/**
 * Compile a schema pattern, returning null when it is not a valid regular
 * expression. Patterns are searched for anywhere in the input, never
 * anchored implicitly.
 */
export function compilePattern(pattern: string): RegExp | null {
  const cached = regexCache.get(pattern);
  if (cached !== undefined) {
    return cached;
  }

  let regex: RegExp | null;
  try {
    regex = new RegExp(pattern);
  } catch {
    regex = null;
  }

  // Evict oldest entry if cache is full (Map maintains insertion order)
  if (regexCache.size >= MAX_REGEX_CACHE_SIZE) {
    const firstKey = regexCache.keys().next().value;
    if (firstKey !== undefined) {
      regexCache.delete(firstKey);
    }
  }
  regexCache.set(pattern, regex);
  return regex;
}
