import { z } from "zod";
import { toEncodeOptions, type EncoderConfig } from "./config.js";
import { parseJsonText } from "./json-text.js";
import { toJsonText } from "./normalize.js";
import { DELIMITERS, encode } from "./toon.js";
import type { EncodeOptions, JsonValue } from "./toon.js";

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

/**
 * Safely extract a message string from an unknown error value.
 */
export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (typeof e === "string") return e;
  return String(e);
}

// --- toon_encode tool ---

export const ENCODE_TOOL_KEYS = ["json", "delimiter", "key_collapsing", "flatten_depth", "indent"];

export const encodeToolSchema = z.object({
  json: z.string().describe("JSON text to convert to TOON"),
  delimiter: z.enum(["comma", "pipe", "tab"]).optional().describe("Field delimiter for inline and tabular arrays"),
  key_collapsing: z.enum(["off", "safe"]).optional().describe("Fold single-key wrapper chains into dotted keys"),
  flatten_depth: z.number().int().min(1).optional().describe("Maximum number of segments in a folded key"),
  indent: z.number().int().min(0).max(8).optional().describe("Spaces per indentation level (default 2)"),
}).passthrough();

export type EncodeToolArgs = z.infer<typeof encodeToolSchema>;

function errorResult(text: string): ToolResult {
  return { content: [{ type: "text", text: `Error: ${text}` }], isError: true };
}

/**
 * Format TOON output, with an optional size comparison against the
 * minified JSON it replaces.
 */
export function formatResult(toon: string, json: string, stats?: boolean): string {
  if (!stats) return toon;
  const saved = json.length === 0 ? 0 : Math.round((1 - toon.length / json.length) * 100);
  const summary = encode({ json_chars: json.length, toon_chars: toon.length, saved: `${saved}%` });
  return `${toon}\n\n${summary}`;
}

function toolOverrides(args: EncodeToolArgs): EncodeOptions {
  return {
    delimiter: args.delimiter ? DELIMITERS[args.delimiter] : undefined,
    keyCollapsing: args.key_collapsing,
    flattenDepth: args.flatten_depth,
    indent: args.indent,
  };
}

export function runEncodeTool(args: Record<string, unknown>, config: EncoderConfig): ToolResult {
  const unknownKeys = Object.keys(args).filter((k) => !ENCODE_TOOL_KEYS.includes(k));
  if (unknownKeys.length > 0) {
    const hints = unknownKeys
      .map((k) => {
        const hint = getParameterHint(k, ENCODE_TOOL_KEYS);
        return hint ? `Unknown parameter '${k}': ${hint}` : `Unknown parameter '${k}'.`;
      })
      .join("\n");
    return errorResult(`${hints}\n\nValid parameters for toon_encode: ${ENCODE_TOOL_KEYS.join(", ")}`);
  }

  const parsedArgs = encodeToolSchema.safeParse(args);
  if (!parsedArgs.success) {
    return errorResult(parsedArgs.error.issues.map((i) => `${i.path.join(".") || "input"}: ${i.message}`).join("; "));
  }

  let input: JsonValue;
  try {
    input = parseJsonText(parsedArgs.data.json);
  } catch (e: unknown) {
    return errorResult(`Invalid JSON input: ${errorMessage(e)}`);
  }

  try {
    const toon = encode(input, toEncodeOptions(config, toolOverrides(parsedArgs.data)));
    return { content: [{ type: "text", text: formatResult(toon, toJsonText(input), config.stats) }] };
  } catch (e: unknown) {
    return errorResult(errorMessage(e));
  }
}

// --- Self-describing error hints ---

const PARAMETER_HINTS: Record<string, string> = {
  data: "Pass the value as JSON text in 'json'.",
  input: "Pass the value as JSON text in 'json'.",
  value: "Pass the value as JSON text in 'json'.",
  keyCollapsing: "Use 'key_collapsing' (snake_case).",
  key_folding: "Use 'key_collapsing'.",
  flattenDepth: "Use 'flatten_depth' (snake_case).",
};

function levenshtein(a: string, b: string): number {
  const m = a.length, n = b.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));
  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;
  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      dp[i][j] = a[i - 1] === b[j - 1]
        ? dp[i - 1][j - 1]
        : 1 + Math.min(dp[i - 1][j], dp[i][j - 1], dp[i - 1][j - 1]);
    }
  }
  return dp[m][n];
}

function closestMatch(input: string, candidates: string[], maxDistance = 3): string | null {
  let best: string | null = null;
  let bestDist = maxDistance + 1;
  for (const candidate of candidates) {
    const dist = levenshtein(input.toLowerCase(), candidate.toLowerCase());
    if (dist < bestDist) {
      bestDist = dist;
      best = candidate;
    }
  }
  return best;
}

export function getParameterHint(unknownKey: string, validKeys?: string[]): string | null {
  // Check hardcoded hints first (e.g., camelCase option names)
  if (Object.hasOwn(PARAMETER_HINTS, unknownKey)) return PARAMETER_HINTS[unknownKey];

  // Fall back to Levenshtein distance suggestion
  if (validKeys && validKeys.length > 0) {
    const suggestion = closestMatch(unknownKey, validKeys);
    if (suggestion) return `Did you mean '${suggestion}'?`;
  }

  return null;
}
