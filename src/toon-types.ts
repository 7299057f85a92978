// Shared types for the TOON encoder modules.

export type JsonPrimitive = string | number | boolean | null;
// Interfaces allow recursive references (type aliases don't)
export interface JsonArray extends Array<JsonValue> {}
// Maps keep insertion order for every key; plain objects list integer-like keys first
export interface JsonObject extends Map<string, JsonValue> {}
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

export type Delimiter = "," | "|" | "\t";
export type KeyCollapsing = "off" | "safe";

/** Path of keys and array indices from the root to the current node. */
export type ReplacerPath = ReadonlyArray<string | number>;

/**
 * Called for every node after normalization. Returning `undefined` omits the
 * node (the root is kept as is instead).
 */
export type Replacer = (key: string, value: JsonValue, path: ReplacerPath) => unknown;

export interface EncodeOptions {
  delimiter?: Delimiter;
  keyCollapsing?: KeyCollapsing;
  /** Maximum number of segments folded into one dotted key. */
  flattenDepth?: number;
  /** Spaces per indentation level. */
  indent?: number;
  /** Normalization depth bound; deeper input throws MaxDepthExceededError. */
  maxDepth?: number;
  replacer?: Replacer;
}

export interface ResolvedEncodeOptions {
  readonly delimiter: Delimiter;
  readonly keyCollapsing: KeyCollapsing;
  readonly flattenDepth: number;
  readonly indent: number;
  readonly maxDepth: number;
  readonly replacer: Replacer | undefined;
}

export interface CollapseResult {
  collapsedKey: string;
  /** Object left at the end of the chain, if it still has keys. */
  remainder: JsonObject | undefined;
  leafValue: JsonValue;
  segmentCount: number;
}

/** Collision bookkeeping threaded through nested object encoding. */
export interface CollapseScope {
  /** Root keys that contain a dot. Undefined inside arrays. */
  rootLiteralKeys: ReadonlySet<string> | undefined;
  /** Dotted path from the root to the object being encoded. */
  pathPrefix: string | undefined;
  remainingDepth: number;
}
