import { DEFAULT_MAX_DEPTH, isJsonArray, isJsonObject, normalizeAt } from "./normalize.js";
import type { JsonObject, JsonValue, Replacer, ReplacerPath } from "./toon-types.js";

/**
 * Run `replacer` over every node, parents before children. Replacements are
 * normalized again at their own depth and their children visited in turn.
 */
export function applyReplacer(root: JsonValue, replacer: Replacer, maxDepth = DEFAULT_MAX_DEPTH): JsonValue {
  const replaced = replacer("", root, []);
  // The root cannot be omitted
  const start = replaced === undefined ? root : normalizeAt(replaced, 0, maxDepth);
  return transformChildren(start, replacer, [], 0, maxDepth);
}

function transformElement(
  key: string,
  value: JsonValue,
  replacer: Replacer,
  path: ReplacerPath,
  depth: number,
  maxDepth: number,
): JsonValue | undefined {
  const replaced = replacer(key, value, path);
  if (replaced === undefined) return undefined;
  return transformChildren(normalizeAt(replaced, depth, maxDepth), replacer, path, depth, maxDepth);
}

function transformChildren(
  value: JsonValue,
  replacer: Replacer,
  path: ReplacerPath,
  depth: number,
  maxDepth: number,
): JsonValue {
  if (isJsonArray(value)) {
    const result: JsonValue[] = [];
    value.forEach((item, index) => {
      const replaced = transformElement(String(index), item, replacer, [...path, index], depth + 1, maxDepth);
      if (replaced !== undefined) result.push(replaced);
    });
    return result;
  }

  if (isJsonObject(value)) {
    const result: JsonObject = new Map();
    for (const [key, item] of value) {
      const replaced = transformElement(key, item, replacer, [...path, key], depth + 1, maxDepth);
      if (replaced !== undefined) result.set(key, replaced);
    }
    return result;
  }

  return value;
}
