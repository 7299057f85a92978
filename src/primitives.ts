/**
 * Quoting, header and list-item rules adapted from the TOON reference encoder,
 * @toon-format/toon (https://github.com/toon-format/toon), MIT License,
 * Johann Schopplich.
 */

import { NotEncodableError } from "./errors.js";
import type { Delimiter, JsonPrimitive } from "./toon-types.js";

// --- Constants ---

export const COMMA = ",";
export const DOT = ".";
export const LIST_ITEM_PREFIX = "- ";
export const LIST_ITEM_MARKER = "-";
const NULL_LITERAL = "null";
const TRUE_LITERAL = "true";
const FALSE_LITERAL = "false";

// --- String utilities ---

function escapeString(value: string): string {
  return value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r")
    .replace(/\t/g, "\\t");
}

function isBooleanOrNullLiteral(token: string): boolean {
  return token === TRUE_LITERAL || token === FALSE_LITERAL || token === NULL_LITERAL;
}

function isNumericLike(token: string): boolean {
  return /^-?\d+(?:\.\d+)?(?:e[+-]?\d+)?$/i.test(token) || /^0\d+$/.test(token);
}

export function isValidUnquotedKey(key: string): boolean {
  return /^[A-Z_][\w.]*$/i.test(key);
}

/** A key segment that may take part in a dotted (collapsed) key. */
export function isIdentifierSegment(segment: string): boolean {
  return /^[A-Z_]\w*$/i.test(segment);
}

export function isSafeUnquoted(value: string, delimiter: Delimiter = COMMA): boolean {
  if (!value || value !== value.trim()) return false;
  if (isBooleanOrNullLiteral(value) || isNumericLike(value)) return false;
  if (value.includes(":") || value.includes('"') || value.includes("\\")) return false;
  if (/[[\]{}]/.test(value) || /[\n\r\t]/.test(value)) return false;
  if (value.includes(delimiter)) return false;
  if (value.startsWith(LIST_ITEM_MARKER)) return false;
  return true;
}

export function quoteValue(value: string, delimiter: Delimiter = COMMA): string {
  return isSafeUnquoted(value, delimiter) ? value : `"${escapeString(value)}"`;
}

export function quoteKey(key: string): string {
  return isValidUnquotedKey(key) ? key : `"${escapeString(key)}"`;
}

// --- Numbers ---

/**
 * Plain decimal form of a finite number. `String()` already gives the shortest
 * round-tripping digits; only exponent notation needs expanding.
 */
export function formatNumber(value: number): string {
  const text = String(value);
  const match = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) return text;

  const [, sign, intPart, fracPart = "", exp] = match;
  const digits = intPart + fracPart;
  const point = intPart.length + Number(exp);

  if (point <= 0) return `${sign}0.${"0".repeat(-point)}${digits}`;
  if (point >= digits.length) return sign + digits + "0".repeat(point - digits.length);
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

// --- Primitive encoding ---

export function isJsonPrimitive(value: unknown): value is JsonPrimitive {
  return value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

export function encodePrimitive(value: unknown, delimiter: Delimiter = COMMA): string {
  if (value === null) return NULL_LITERAL;
  if (typeof value === "boolean") return value ? TRUE_LITERAL : FALSE_LITERAL;
  if (typeof value === "number" && Number.isFinite(value)) return formatNumber(Object.is(value, -0) ? 0 : value);
  if (typeof value === "string") return quoteValue(value, delimiter);
  throw new NotEncodableError(value);
}

export function joinPrimitives(values: readonly JsonPrimitive[], delimiter: Delimiter): string {
  return values.map((v) => encodePrimitive(v, delimiter)).join(delimiter);
}
