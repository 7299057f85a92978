import jsonc from "jsonc-parser";
import type { Node, ParseError } from "jsonc-parser";
import { InvalidJsonError } from "./errors.js";
import { isJsonPrimitive } from "./primitives.js";
import type { JsonObject, JsonValue } from "./toon-types.js";

// CommonJS package: named imports are not visible to Node's ESM loader
const { parseTree, printParseErrorCode } = jsonc;

/**
 * Parse strict JSON text into the encoder's value model. Unlike `JSON.parse`,
 * object keys keep their source order even when they look like integers.
 */
export function parseJsonText(text: string): JsonValue {
  const errors: ParseError[] = [];
  const root = parseTree(text, errors, { disallowComments: true, allowTrailingComma: false, allowEmptyContent: false });
  if (errors.length > 0) {
    const [first] = errors;
    throw new InvalidJsonError(`${printParseErrorCode(first.error)} at offset ${first.offset}`);
  }
  if (root === undefined) throw new InvalidJsonError("Empty input");
  return fromNode(root);
}

function fromNode(node: Node): JsonValue {
  switch (node.type) {
    case "object": {
      const result: JsonObject = new Map();
      for (const property of node.children ?? []) {
        const [keyNode, valueNode] = property.children ?? [];
        if (keyNode !== undefined && valueNode !== undefined) {
          result.set(String(keyNode.value), fromNode(valueNode));
        }
      }
      return result;
    }
    case "array":
      return (node.children ?? []).map((child) => fromNode(child));
    default: {
      const value: unknown = node.value;
      return isJsonPrimitive(value) ? value : null;
    }
  }
}
