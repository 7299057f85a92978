import { describe, it, expect } from "vitest";
import { LineWriter } from "./line-writer.js";

describe("LineWriter", () => {
  it("indents by depth and trims trailing whitespace", () => {
    const writer = new LineWriter();
    writer.push(0, "a:");
    writer.push(2, "b: 1   ");
    expect(writer.lines).toEqual(["a:", "    b: 1"]);
  });

  it("joins lines without a trailing newline", () => {
    const writer = new LineWriter();
    writer.push(0, "x");
    writer.push(1, "y");
    expect(writer.render()).toBe("x\n  y");
  });

  it("renders nothing when empty", () => {
    expect(new LineWriter().render()).toBe("");
  });

  it("uses a custom indent unit", () => {
    const writer = new LineWriter("\t");
    writer.push(3, "deep");
    writer.push(1, "shallow");
    writer.push(3, "deep again");
    expect(writer.render()).toBe("\t\t\tdeep\n\tshallow\n\t\t\tdeep again");
  });
});
