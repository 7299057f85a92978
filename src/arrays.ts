/**
 * Quoting, header and list-item rules adapted from the TOON reference encoder,
 * @toon-format/toon (https://github.com/toon-format/toon), MIT License,
 * Johann Schopplich.
 */

import { isEmptyObject, isJsonArray, isJsonObject } from "./normalize.js";
import { detachedScope, encodeKeyValuePair, encodeObject } from "./objects.js";
import {
  COMMA,
  LIST_ITEM_MARKER,
  LIST_ITEM_PREFIX,
  encodePrimitive,
  isJsonPrimitive,
  joinPrimitives,
  quoteKey,
} from "./primitives.js";
import type { LineWriter } from "./line-writer.js";
import type { Delimiter, JsonObject, JsonPrimitive, JsonValue, ResolvedEncodeOptions } from "./toon-types.js";

const EMPTY_ELEMENT = "[]";

// --- Type guards ---

function isArrayOfPrimitives(value: readonly JsonValue[]): value is JsonPrimitive[] {
  return value.every((item) => isJsonPrimitive(item));
}

function isArrayOfPrimitiveArrays(value: readonly JsonValue[]): value is JsonPrimitive[][] {
  return value.every((item) => isJsonArray(item) && isArrayOfPrimitives(item));
}

function isArrayOfObjects(value: readonly JsonValue[]): value is JsonObject[] {
  return value.every((item) => isJsonObject(item));
}

// --- Headers ---

/** `[N]`, with the delimiter inside the brackets when it is not a comma. */
export function arrayHeader(length: number, delimiter: Delimiter = COMMA): string {
  return `[${length}${delimiter === COMMA ? "" : delimiter}]`;
}

export interface HeaderOptions {
  key?: string;
  fields?: readonly string[];
  delimiter?: Delimiter;
}

export function formatHeader(length: number, opts: HeaderOptions = {}): string {
  let h = "";
  if (opts.key !== undefined) h += quoteKey(opts.key);
  h += arrayHeader(length, opts.delimiter);
  if (opts.fields) h += `{${opts.fields.map((f) => quoteKey(f)).join(COMMA)}}`;
  h += ":";
  return h;
}

function emptyArrayHeader(key: string | undefined): string {
  return `${key !== undefined ? quoteKey(key) : ""}[0]`;
}

function inlineArray(values: readonly JsonPrimitive[], delimiter: Delimiter, key?: string): string {
  const header = formatHeader(values.length, { key, delimiter });
  return `${header} ${joinPrimitives(values, delimiter)}`;
}

// --- Tabular detection ---

/**
 * Keys present in every row, in the first row's order. The running set is
 * narrowed row by row, so the cost stays linear in rows times keys.
 */
export function commonKeys(rows: readonly JsonObject[]): string[] {
  if (rows.length === 0) return [];
  const firstKeys = Array.from(rows[0].keys());
  const shared = new Set(firstKeys);
  for (let i = 1; i < rows.length && shared.size > 0; i++) {
    for (const key of shared) {
      if (!rows[i].has(key)) shared.delete(key);
    }
  }
  return firstKeys.filter((key) => shared.has(key));
}

/** Column list for a tabular block, or undefined when the rows don't qualify. */
export function tabularFields(rows: readonly JsonObject[]): string[] | undefined {
  const fields = commonKeys(rows);
  if (fields.length === 0) return undefined;
  const primitiveCells = rows.every((row) => fields.every((field) => isJsonPrimitive(row.get(field))));
  return primitiveCells ? fields : undefined;
}

function writeRows(
  rows: readonly JsonObject[],
  fields: readonly string[],
  depth: number,
  writer: LineWriter,
  delimiter: Delimiter,
): void {
  for (const row of rows) {
    writer.push(depth, fields.map((field) => encodePrimitive(row.get(field), delimiter)).join(delimiter));
  }
}

// --- Array encoding ---

/**
 * Write an array either at a key position (`key` given) or at the root.
 */
export function encodeArray(
  key: string | undefined,
  value: readonly JsonValue[],
  depth: number,
  writer: LineWriter,
  options: ResolvedEncodeOptions,
): void {
  const { delimiter } = options;

  if (value.length === 0) {
    writer.push(depth, emptyArrayHeader(key));
    return;
  }

  if (isArrayOfPrimitives(value)) {
    writer.push(depth, inlineArray(value, delimiter, key));
    return;
  }

  if (isArrayOfObjects(value)) {
    const fields = tabularFields(value);
    if (fields) {
      writer.push(depth, formatHeader(value.length, { key, fields, delimiter }));
      writeRows(value, fields, depth + 1, writer, delimiter);
      return;
    }
  }

  writer.push(depth, formatHeader(value.length, { key, delimiter }));

  // Arrays of primitive arrays
  if (isArrayOfPrimitiveArrays(value)) {
    for (const arr of value) {
      writer.push(depth + 1, LIST_ITEM_PREFIX + elementArray(arr, delimiter));
    }
    return;
  }

  // Mixed list
  for (const item of value) {
    encodeListItem(item, depth + 1, writer, options);
  }
}

/** A primitive array written in element position, after a list marker. */
function elementArray(values: readonly JsonPrimitive[], delimiter: Delimiter): string {
  return values.length === 0 ? EMPTY_ELEMENT : inlineArray(values, delimiter);
}

export function encodeListItem(
  value: JsonValue,
  depth: number,
  writer: LineWriter,
  options: ResolvedEncodeOptions,
): void {
  const { delimiter } = options;

  if (isJsonPrimitive(value)) {
    writer.push(depth, LIST_ITEM_PREFIX + encodePrimitive(value, delimiter));
  } else if (isJsonArray(value)) {
    if (isArrayOfPrimitives(value)) {
      writer.push(depth, LIST_ITEM_PREFIX + elementArray(value, delimiter));
    } else {
      // Nested non-primitive arrays get their own list one level deeper
      writer.push(depth, LIST_ITEM_PREFIX + formatHeader(value.length, { delimiter }));
      for (const item of value) {
        encodeListItem(item, depth + 1, writer, options);
      }
    }
  } else {
    encodeObjectAsListItem(value, depth, writer, options);
  }
}

/**
 * The list marker takes the place of the first field's indentation, so the
 * first field is written on the marker line and the rest one level deeper.
 */
export function encodeObjectAsListItem(
  obj: JsonObject,
  depth: number,
  writer: LineWriter,
  options: ResolvedEncodeOptions,
): void {
  const entries = Array.from(obj);
  if (entries.length === 0) {
    writer.push(depth, LIST_ITEM_MARKER);
    return;
  }

  const { delimiter } = options;
  const keys = entries.map(([key]) => key);
  const [[firstKey, firstValue], ...rest] = entries;
  const ek = quoteKey(firstKey);

  if (isJsonPrimitive(firstValue)) {
    writer.push(depth, `${LIST_ITEM_PREFIX}${ek}: ${encodePrimitive(firstValue, delimiter)}`);
  } else if (isJsonArray(firstValue)) {
    const rows = isArrayOfObjects(firstValue) ? firstValue : undefined;
    const fields = rows && tabularFields(rows);
    if (rows && fields) {
      writer.push(depth, LIST_ITEM_PREFIX + formatHeader(rows.length, { key: firstKey, fields, delimiter }));
      writeRows(rows, fields, depth + 2, writer, delimiter);
    } else if (firstValue.length === 0) {
      writer.push(depth, LIST_ITEM_PREFIX + emptyArrayHeader(firstKey));
    } else if (isArrayOfPrimitives(firstValue)) {
      writer.push(depth, LIST_ITEM_PREFIX + inlineArray(firstValue, delimiter, firstKey));
    } else {
      writer.push(depth, LIST_ITEM_PREFIX + formatHeader(firstValue.length, { key: firstKey, delimiter }));
      for (const item of firstValue) {
        encodeListItem(item, depth + 2, writer, options);
      }
    }
  } else {
    writer.push(depth, `${LIST_ITEM_PREFIX}${ek}:`);
    if (!isEmptyObject(firstValue)) encodeObject(firstValue, depth + 2, writer, options);
  }

  const scope = detachedScope(options);
  for (const [key, value] of rest) {
    encodeKeyValuePair(key, value, depth + 1, writer, options, keys, scope);
  }
}
