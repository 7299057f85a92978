import { DELIMITERS } from "./toon.js";
import type { Delimiter, EncodeOptions, KeyCollapsing } from "./toon.js";

// --- Encoder configuration ---

export type DelimiterName = keyof typeof DELIMITERS;

export interface EncoderConfig {
  delimiter: Delimiter;
  keyCollapsing: KeyCollapsing;
  flattenDepth: number | undefined;
  indent: number;
  maxDepth: number;
  /** Append a size comparison line to tool output. */
  stats: boolean;
}

export function loadEncoderConfig(env: NodeJS.ProcessEnv = process.env): EncoderConfig {
  return {
    delimiter: parseDelimiter(env.TOON_MCP_DELIMITER),
    keyCollapsing: env.TOON_MCP_KEY_COLLAPSING === "safe" ? "safe" : "off",
    flattenDepth: parseOptionalLimit(env.TOON_MCP_FLATTEN_DEPTH),
    indent: parseLimit(env.TOON_MCP_INDENT, 2, 0),
    maxDepth: parseLimit(env.TOON_MCP_MAX_DEPTH, 1000),
    stats: env.TOON_MCP_STATS === "true", // default false
  };
}

export function isDelimiterName(value: string): value is DelimiterName {
  return Object.hasOwn(DELIMITERS, value);
}

function parseDelimiter(value: string | undefined): Delimiter {
  if (value === undefined || value === "") return DELIMITERS.comma;
  const name = value.trim().toLowerCase();
  return isDelimiterName(name) ? DELIMITERS[name] : DELIMITERS.comma;
}

function parseLimit(value: string | undefined, defaultValue: number, min = 1): number {
  if (value === undefined || value === "") return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed < min ? defaultValue : parsed;
}

function parseOptionalLimit(value: string | undefined): number | undefined {
  const parsed = parseLimit(value, 0);
  return parsed > 0 ? parsed : undefined;
}

/** Config defaults, overridden field by field by per-call options. */
export function toEncodeOptions(config: EncoderConfig, overrides: EncodeOptions = {}): EncodeOptions {
  return {
    delimiter: overrides.delimiter ?? config.delimiter,
    keyCollapsing: overrides.keyCollapsing ?? config.keyCollapsing,
    flattenDepth: overrides.flattenDepth ?? config.flattenDepth,
    indent: overrides.indent ?? config.indent,
    maxDepth: overrides.maxDepth ?? config.maxDepth,
  };
}
