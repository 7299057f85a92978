import { encodeArray } from "./arrays.js";
import { InvalidOptionsError } from "./errors.js";
import { LineWriter } from "./line-writer.js";
import { DEFAULT_MAX_DEPTH, isJsonArray, isJsonObject, normalizeValue } from "./normalize.js";
import { encodeObject, rootScope } from "./objects.js";
import { COMMA, encodePrimitive } from "./primitives.js";
import { applyReplacer } from "./replacer.js";
import type { Delimiter, EncodeOptions, JsonValue, KeyCollapsing, ResolvedEncodeOptions } from "./toon-types.js";

export { ToonError, MaxDepthExceededError, NotEncodableError, InvalidOptionsError } from "./errors.js";
export { normalizeValue } from "./normalize.js";
export { applyReplacer } from "./replacer.js";
export { encodePrimitive, quoteKey, quoteValue, isIdentifierSegment } from "./primitives.js";
export { arrayHeader } from "./arrays.js";
export type {
  Delimiter,
  EncodeOptions,
  JsonArray,
  JsonObject,
  JsonPrimitive,
  JsonValue,
  KeyCollapsing,
  Replacer,
  ReplacerPath,
  ResolvedEncodeOptions,
} from "./toon-types.js";

export const DELIMITERS = {
  comma: ",",
  pipe: "|",
  tab: "\t",
} as const satisfies Record<string, Delimiter>;

const DEFAULT_INDENT = 2;
const VALID_DELIMITERS: readonly string[] = Object.values(DELIMITERS);
const VALID_COLLAPSING: readonly KeyCollapsing[] = ["off", "safe"];

function isDelimiter(value: string): value is Delimiter {
  return VALID_DELIMITERS.includes(value);
}

// --- Options ---

export function resolveOptions(options: EncodeOptions = {}): ResolvedEncodeOptions {
  const delimiter = options.delimiter ?? COMMA;
  if (!isDelimiter(delimiter)) {
    throw new InvalidOptionsError(`Invalid delimiter ${JSON.stringify(delimiter)}; expected one of ",", "|", "\\t"`);
  }

  const keyCollapsing = options.keyCollapsing ?? "off";
  if (!VALID_COLLAPSING.includes(keyCollapsing)) {
    throw new InvalidOptionsError(`Invalid keyCollapsing "${keyCollapsing}"; expected "off" or "safe"`);
  }

  const flattenDepth = options.flattenDepth ?? Infinity;
  if (flattenDepth !== Infinity && !(Number.isInteger(flattenDepth) && flattenDepth > 0)) {
    throw new InvalidOptionsError(`flattenDepth must be a positive integer, got ${flattenDepth}`);
  }

  const indent = options.indent ?? DEFAULT_INDENT;
  if (!Number.isInteger(indent) || indent < 0) {
    throw new InvalidOptionsError(`indent must be a non-negative integer, got ${indent}`);
  }

  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  if (!Number.isInteger(maxDepth) || maxDepth < 1) {
    throw new InvalidOptionsError(`maxDepth must be a positive integer, got ${maxDepth}`);
  }

  return { delimiter, keyCollapsing, flattenDepth, indent, maxDepth, replacer: options.replacer };
}

// --- Encoding ---

function encodeValue(value: JsonValue, writer: LineWriter, options: ResolvedEncodeOptions): void {
  if (isJsonArray(value)) {
    encodeArray(undefined, value, 0, writer, options);
  } else if (isJsonObject(value)) {
    encodeObject(value, 0, writer, options, rootScope(value, options));
  } else {
    writer.push(0, encodePrimitive(value, options.delimiter));
  }
}

function encodeToWriter(value: unknown, options?: EncodeOptions): LineWriter {
  const resolved = resolveOptions(options);
  const normalized = normalizeValue(value, resolved.maxDepth);
  const prepared = resolved.replacer ? applyReplacer(normalized, resolved.replacer, resolved.maxDepth) : normalized;

  const writer = new LineWriter(" ".repeat(resolved.indent));
  encodeValue(prepared, writer, resolved);
  return writer;
}

/** Encode `value` and return the output lines without joining them. */
export function encodeLines(value: unknown, options?: EncodeOptions): string[] {
  return [...encodeToWriter(value, options).lines];
}

export function encode(value: unknown, options?: EncodeOptions): string {
  return encodeToWriter(value, options).render();
}
