import { DOT, isIdentifierSegment } from "./primitives.js";
import { isEmptyObject, isJsonObject } from "./normalize.js";
import type { CollapseResult, CollapseScope, JsonObject, JsonValue, ResolvedEncodeOptions } from "./toon-types.js";

interface KeyChain {
  segments: string[];
  tail: JsonObject | undefined;
  leafValue: JsonValue;
}

/**
 * Follow single-key objects down from `startValue`, collecting at most
 * `maxSegments` keys (the start key included).
 */
function collectSingleKeyChain(startKey: string, startValue: JsonValue, maxSegments: number): KeyChain {
  const segments = [startKey];
  let current = startValue;

  while (segments.length < maxSegments) {
    if (!isJsonObject(current)) break;
    if (current.size !== 1) break;
    const [[nextKey, nextValue]] = current;
    segments.push(nextKey);
    current = nextValue;
  }

  if (!isJsonObject(current) || isEmptyObject(current)) {
    return { segments, tail: undefined, leafValue: current };
  }
  return { segments, tail: current, leafValue: current };
}

export function joinPath(prefix: string | undefined, key: string): string {
  return prefix ? `${prefix}${DOT}${key}` : key;
}

/**
 * Decide whether `key: value` can be written as one dotted key. Returns
 * undefined when collapsing is off, pointless, or would be ambiguous.
 */
export function tryCollapse(
  key: string,
  value: JsonValue,
  siblings: readonly string[],
  options: ResolvedEncodeOptions,
  scope: CollapseScope,
): CollapseResult | undefined {
  if (options.keyCollapsing !== "safe") return undefined;
  if (!isJsonObject(value)) return undefined;

  const { segments, tail, leafValue } = collectSingleKeyChain(key, value, scope.remainingDepth);
  if (segments.length < 2) return undefined;
  if (!segments.every((segment) => isIdentifierSegment(segment))) return undefined;

  const collapsedKey = segments.join(DOT);
  if (siblings.includes(collapsedKey)) return undefined;
  if (scope.rootLiteralKeys?.has(joinPath(scope.pathPrefix, collapsedKey))) return undefined;

  return { collapsedKey, remainder: tail, leafValue, segmentCount: segments.length };
}
