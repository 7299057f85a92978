import { MaxDepthExceededError } from "./errors.js";
import { encodePrimitive, isJsonPrimitive } from "./primitives.js";
import type { JsonObject, JsonValue } from "./toon-types.js";

export const DEFAULT_MAX_DEPTH = 1000;

// --- Type guards ---

export function isJsonArray(value: unknown): value is JsonValue[] {
  return Array.isArray(value);
}

/** Only meaningful on normalized values, where every object is a Map. */
export function isJsonObject(value: unknown): value is JsonObject {
  return value instanceof Map;
}

export function isEmptyObject(value: JsonObject): boolean {
  return value.size === 0;
}

/** Objects that supply their own serializable form, as `Date` and `URL` do. */
export interface JsonSerializable {
  toJSON(): unknown;
}

function hasToJSON(value: object): value is JsonSerializable {
  return "toJSON" in value && typeof value.toJSON === "function";
}

function isIterable(value: object): value is Iterable<unknown> {
  return Symbol.iterator in value && typeof value[Symbol.iterator] === "function";
}

// --- Normalization (unknown → JsonValue) ---

/**
 * Convert an arbitrary value into the JSON data model. Throws
 * MaxDepthExceededError when nesting goes past `maxDepth`.
 */
export function normalizeValue(value: unknown, maxDepth = DEFAULT_MAX_DEPTH): JsonValue {
  return normalizeAt(value, 0, maxDepth);
}

/** Like normalizeValue, for a value that already sits `depth` levels below the root. */
export function normalizeAt(value: unknown, depth: number, maxDepth = DEFAULT_MAX_DEPTH): JsonValue {
  if (depth > maxDepth) throw new MaxDepthExceededError(depth, maxDepth);

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (value instanceof Number || value instanceof String || value instanceof Boolean) {
    return normalizeAt(value.valueOf(), depth, maxDepth);
  }
  if (value !== null && typeof value === "object" && hasToJSON(value)) {
    const serialized = value.toJSON();
    // The hook result counts as one level deeper
    if (serialized !== value) return normalizeAt(serialized, depth + 1, maxDepth);
  }

  if (value === null || value === undefined) return null;
  if (typeof value === "boolean" || typeof value === "string") return value;
  if (typeof value === "number") {
    if (Object.is(value, -0)) return 0;
    if (!Number.isFinite(value)) return null;
    return value;
  }
  if (typeof value === "symbol") return value.description ?? "";
  if (typeof value === "bigint") {
    if (value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)) {
      return Number(value);
    }
    return value.toString();
  }
  if (typeof value !== "object") return null;

  if (value instanceof Set) {
    return sortForDeterminism(Array.from(value, (item) => normalizeAt(item, depth + 1, maxDepth)));
  }
  if (value instanceof Map) {
    const result: JsonObject = new Map();
    for (const [k, v] of value) {
      result.set(mapKeyToString(normalizeAt(k, depth + 1, maxDepth)), normalizeAt(v, depth + 1, maxDepth));
    }
    return result;
  }
  // Array.from visits holes, which map() would skip
  if (Array.isArray(value)) {
    return Array.from(value, (item) => normalizeAt(item, depth + 1, maxDepth));
  }
  if (isIterable(value)) {
    return Array.from(value, (item) => normalizeAt(item, depth + 1, maxDepth));
  }

  const result: JsonObject = new Map();
  for (const [key, item] of Object.entries(value)) {
    result.set(key, normalizeAt(item, depth + 1, maxDepth));
  }
  return result;
}

function mapKeyToString(key: JsonValue): string {
  if (typeof key === "string") return key;
  if (isJsonPrimitive(key)) return encodePrimitive(key);
  return toJsonText(key);
}

/** Minified JSON text of a normalized value, keys in insertion order. */
export function toJsonText(value: JsonValue): string {
  if (isJsonArray(value)) return `[${value.map((item) => toJsonText(item)).join(",")}]`;
  if (isJsonObject(value)) {
    const fields = Array.from(value, ([key, item]) => `${JSON.stringify(key)}:${toJsonText(item)}`);
    return `{${fields.join(",")}}`;
  }
  return JSON.stringify(value);
}

// --- Set ordering ---

function kindRank(value: JsonValue): number {
  if (value === null) return 0;
  if (typeof value === "boolean") return 1;
  if (typeof value === "number") return 2;
  if (typeof value === "string") return 3;
  if (isJsonArray(value)) return 4;
  return 5;
}

export function compareValues(a: JsonValue, b: JsonValue): number {
  const rankDiff = kindRank(a) - kindRank(b);
  if (rankDiff !== 0) return rankDiff;
  if (typeof a === "boolean" && typeof b === "boolean") return Number(a) - Number(b);
  if (typeof a === "number" && typeof b === "number") return a - b;
  const left = typeof a === "string" ? a : toJsonText(a);
  const right = typeof b === "string" ? b : toJsonText(b);
  if (left < right) return -1;
  return left > right ? 1 : 0;
}

function sortForDeterminism(values: JsonValue[]): JsonValue[] {
  return values.sort(compareValues);
}
