import { encodeArray } from "./arrays.js";
import { joinPath, tryCollapse } from "./key-collapse.js";
import { isEmptyObject, isJsonArray } from "./normalize.js";
import { DOT, encodePrimitive, isJsonPrimitive, quoteKey } from "./primitives.js";
import type { LineWriter } from "./line-writer.js";
import type { CollapseResult, CollapseScope, JsonObject, JsonValue, ResolvedEncodeOptions } from "./toon-types.js";

// --- Collapse scopes ---

/** Scope for the document root: remembers which root keys already contain a dot. */
export function rootScope(value: JsonObject, options: ResolvedEncodeOptions): CollapseScope {
  return {
    rootLiteralKeys: new Set(Array.from(value.keys()).filter((key) => key.includes(DOT))),
    pathPrefix: undefined,
    remainingDepth: options.flattenDepth,
  };
}

/** Scope for objects reached through an array, where no root path is tracked. */
export function detachedScope(options: ResolvedEncodeOptions): CollapseScope {
  return { rootLiteralKeys: undefined, pathPrefix: undefined, remainingDepth: options.flattenDepth };
}

// --- Object encoding ---

export function encodeObject(
  value: JsonObject,
  depth: number,
  writer: LineWriter,
  options: ResolvedEncodeOptions,
  scope: CollapseScope = detachedScope(options),
): void {
  const keys = Array.from(value.keys());
  for (const [key, item] of value) {
    encodeKeyValuePair(key, item, depth, writer, options, keys, scope);
  }
}

export function encodeKeyValuePair(
  key: string,
  value: JsonValue,
  depth: number,
  writer: LineWriter,
  options: ResolvedEncodeOptions,
  siblings: readonly string[],
  scope: CollapseScope,
): void {
  const collapsed = tryCollapse(key, value, siblings, options, scope);
  if (collapsed) {
    encodeCollapsed(collapsed, depth, writer, options, scope);
    return;
  }

  const encodedKey = quoteKey(key);
  if (isJsonPrimitive(value)) {
    writer.push(depth, `${encodedKey}: ${encodePrimitive(value, options.delimiter)}`);
  } else if (isJsonArray(value)) {
    encodeArray(key, value, depth, writer, options);
  } else {
    writer.push(depth, `${encodedKey}:`);
    if (!isEmptyObject(value)) {
      encodeObject(value, depth + 1, writer, options, {
        ...scope,
        pathPrefix: joinPath(scope.pathPrefix, key),
      });
    }
  }
}

function encodeCollapsed(
  { collapsedKey, remainder, leafValue, segmentCount }: CollapseResult,
  depth: number,
  writer: LineWriter,
  options: ResolvedEncodeOptions,
  scope: CollapseScope,
): void {
  const encodedKey = quoteKey(collapsedKey);

  if (remainder === undefined) {
    if (isJsonPrimitive(leafValue)) {
      writer.push(depth, `${encodedKey}: ${encodePrimitive(leafValue, options.delimiter)}`);
    } else if (isJsonArray(leafValue)) {
      encodeArray(collapsedKey, leafValue, depth, writer, options);
    } else {
      // Chain ended in an empty object
      writer.push(depth, `${encodedKey}:`);
    }
    return;
  }

  writer.push(depth, `${encodedKey}:`);
  encodeObject(remainder, depth + 1, writer, options, {
    rootLiteralKeys: scope.rootLiteralKeys,
    pathPrefix: joinPath(scope.pathPrefix, collapsedKey),
    remainingDepth: scope.remainingDepth - segmentCount,
  });
}
