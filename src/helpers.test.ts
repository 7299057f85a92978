import { describe, it, expect } from "vitest";
import { loadEncoderConfig } from "./config.js";
import { errorMessage, formatResult, getParameterHint, runEncodeTool, ENCODE_TOOL_KEYS } from "./helpers.js";

const defaults = loadEncoderConfig({});

function textOf(result: ReturnType<typeof runEncodeTool>): string {
  return result.content[0].text;
}

describe("errorMessage", () => {
  it("extracts message from Error", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
  });

  it("returns string errors as-is", () => {
    expect(errorMessage("something broke")).toBe("something broke");
  });

  it("stringifies anything else", () => {
    expect(errorMessage(42)).toBe("42");
  });
});

describe("getParameterHint", () => {
  it("returns hardcoded hints first", () => {
    expect(getParameterHint("data", ENCODE_TOOL_KEYS)).toBe("Pass the value as JSON text in 'json'.");
  });

  it("suggests the closest valid key", () => {
    expect(getParameterHint("delimeter", ENCODE_TOOL_KEYS)).toBe("Did you mean 'delimiter'?");
  });

  it("returns null when nothing is close", () => {
    expect(getParameterHint("zzzzzzzzz", ENCODE_TOOL_KEYS)).toBeNull();
    expect(getParameterHint("constructor", [])).toBeNull();
  });
});

describe("formatResult", () => {
  it("returns TOON unchanged without stats", () => {
    expect(formatResult("a: 1", '{"a":1}')).toBe("a: 1");
  });

  it("appends a size comparison", () => {
    expect(formatResult("a: 1", '{"a":1}', true)).toBe("a: 1\n\njson_chars: 7\ntoon_chars: 4\nsaved: 43%");
  });
});

describe("runEncodeTool", () => {
  it("encodes JSON text", () => {
    const result = runEncodeTool({ json: '{"a":1,"list":[1,2]}' }, defaults);
    expect(result.isError).toBeUndefined();
    expect(textOf(result)).toBe("a: 1\nlist[2]: 1,2");
  });

  it("keeps the key order of the JSON text", () => {
    expect(textOf(runEncodeTool({ json: '{"b":1,"1":2}' }, defaults))).toBe('b: 1\n"1": 2');
  });

  it("maps tool options onto encoder options", () => {
    const result = runEncodeTool(
      { json: '{"a":{"b":[1,2]}}', delimiter: "pipe", key_collapsing: "safe" },
      defaults,
    );
    expect(textOf(result)).toBe("a.b[2|]: 1|2");
  });

  it("uses config defaults when the call sets nothing", () => {
    const config = loadEncoderConfig({ TOON_MCP_INDENT: "4" });
    expect(textOf(runEncodeTool({ json: '{"a":{"b":1}}' }, config))).toBe("a:\n    b: 1");
  });

  it("rejects unknown parameters with a hint", () => {
    const result = runEncodeTool({ json: "{}", delimeter: "pipe" }, defaults);
    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe(
      "Error: Unknown parameter 'delimeter': Did you mean 'delimiter'?\n\n" +
        "Valid parameters for toon_encode: json, delimiter, key_collapsing, flatten_depth, indent",
    );
  });

  it("reports invalid JSON", () => {
    const result = runEncodeTool({ json: "{bad" }, defaults);
    expect(result.isError).toBe(true);
    expect(textOf(result).startsWith("Error: Invalid JSON input: ")).toBe(true);
  });

  it("reports schema violations", () => {
    const result = runEncodeTool({ json: 5 }, defaults);
    expect(result.isError).toBe(true);
    expect(textOf(result).startsWith("Error: json: ")).toBe(true);
  });

  it("reports encoder errors", () => {
    const config = loadEncoderConfig({ TOON_MCP_MAX_DEPTH: "2" });
    const result = runEncodeTool({ json: "[[[[1]]]]" }, config);
    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe("Error: Maximum nesting depth exceeded: depth 3 > limit 2");
  });
});
