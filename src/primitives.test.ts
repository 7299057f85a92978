import { describe, it, expect } from "vitest";
import { NotEncodableError } from "./errors.js";
import {
  encodePrimitive,
  formatNumber,
  isIdentifierSegment,
  isSafeUnquoted,
  quoteKey,
  quoteValue,
} from "./primitives.js";

describe("formatNumber", () => {
  it("leaves plain decimals alone", () => {
    expect(formatNumber(123.456)).toBe("123.456");
    expect(formatNumber(-7)).toBe("-7");
    expect(formatNumber(1.0)).toBe("1");
  });

  it("expands positive exponents", () => {
    expect(formatNumber(1e21)).toBe("1000000000000000000000");
    expect(formatNumber(1.234e25)).toBe("12340000000000000000000000");
  });

  it("expands negative exponents", () => {
    expect(formatNumber(1e-7)).toBe("0.0000001");
    expect(formatNumber(1.5e-7)).toBe("0.00000015");
    expect(formatNumber(-2.5e-8)).toBe("-0.000000025");
  });
});

describe("encodePrimitive", () => {
  it("encodes literals", () => {
    expect(encodePrimitive(null)).toBe("null");
    expect(encodePrimitive(true)).toBe("true");
    expect(encodePrimitive(false)).toBe("false");
    expect(encodePrimitive(-0)).toBe("0");
  });

  it("passes the delimiter on to string quoting", () => {
    expect(encodePrimitive("a|b", "|")).toBe('"a|b"');
    expect(encodePrimitive("a|b", ",")).toBe("a|b");
  });

  it("throws NotEncodableError for non-primitives", () => {
    expect(() => encodePrimitive({})).toThrow(NotEncodableError);
    expect(() => encodePrimitive([1])).toThrow("Value is not an encodable primitive: array");
    expect(() => encodePrimitive(NaN)).toThrow(NotEncodableError);
  });
});

describe("quoteValue", () => {
  it("leaves safe strings unquoted", () => {
    expect(quoteValue("hello world")).toBe("hello world");
    expect(quoteValue("a-b")).toBe("a-b");
  });

  it("quotes ambiguous strings", () => {
    expect(quoteValue("-")).toBe('"-"');
    expect(quoteValue(" padded")).toBe('" padded"');
    expect(quoteValue("05")).toBe('"05"');
    expect(quoteValue("1e5")).toBe('"1e5"');
    expect(quoteValue("[x]")).toBe('"[x]"');
    expect(quoteValue("{x}")).toBe('"{x}"');
  });

  it("escapes control characters", () => {
    expect(quoteValue("a\tb")).toBe('"a\\tb"');
    expect(quoteValue("a\r\nb")).toBe('"a\\r\\nb"');
  });

  it("always quotes tabs, even with a tab delimiter", () => {
    expect(isSafeUnquoted("a\tb", "\t")).toBe(false);
    expect(isSafeUnquoted("a,b", "\t")).toBe(true);
  });
});

describe("quoteKey", () => {
  it("leaves identifiers and dotted keys bare", () => {
    expect(quoteKey("name")).toBe("name");
    expect(quoteKey("a.b")).toBe("a.b");
    expect(quoteKey("_private1")).toBe("_private1");
  });

  it("quotes everything else", () => {
    expect(quoteKey("1a")).toBe('"1a"');
    expect(quoteKey("with space")).toBe('"with space"');
    expect(quoteKey("")).toBe('""');
  });
});

describe("isIdentifierSegment", () => {
  it("accepts identifiers only", () => {
    expect(isIdentifierSegment("_x1")).toBe(true);
    expect(isIdentifierSegment("a.b")).toBe(false);
    expect(isIdentifierSegment("9a")).toBe(false);
    expect(isIdentifierSegment("b-c")).toBe(false);
  });
});
