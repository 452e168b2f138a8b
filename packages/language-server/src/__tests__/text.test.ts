import { describe, expect, it } from "vitest";
import { LineIndex, partitionPoint } from "../project/text.js";

describe("line index", () => {
  const lineIndex = new LineIndex("ab\ncd\n\nef");

  it("records one line start per newline", () => {
    expect(lineIndex.lineCount).toBe(4);
    expect([0, 1, 2, 3].map((line) => lineIndex.lineStart(line))).toEqual([0, 3, 6, 7]);
  });

  it("maps offsets to the greatest line start not after them", () => {
    expect(lineIndex.positionAt(0)).toEqual({ line: 0, character: 0 });
    expect(lineIndex.positionAt(2)).toEqual({ line: 0, character: 2 });
    expect(lineIndex.positionAt(4)).toEqual({ line: 1, character: 1 });
    expect(lineIndex.positionAt(6)).toEqual({ line: 2, character: 0 });
    expect(lineIndex.positionAt(8)).toEqual({ line: 3, character: 1 });
  });

  it("clamps offsets past the end of the text", () => {
    expect(lineIndex.positionAt(100)).toEqual({ line: 3, character: 2 });
  });

  it("resolves both ends of a span against the start line", () => {
    expect(lineIndex.spanRange(7, 9)).toEqual({
      start: { line: 3, character: 0 },
      end: { line: 3, character: 2 },
    });
  });

  it("counts UTF-16 code units", () => {
    const text = "/* é\u{1F600} */ x";
    const offset = text.indexOf("x");
    expect(offset).toBe(10);
    expect(new LineIndex(text).positionAt(offset)).toEqual({ line: 0, character: 10 });
  });
});

describe("partitionPoint", () => {
  it("counts the leading items matching the predicate", () => {
    expect(partitionPoint([1, 2, 2, 5], (value) => value <= 2)).toBe(3);
    expect(partitionPoint([1, 2, 2, 5], (value) => value <= 0)).toBe(0);
    expect(partitionPoint([1, 2, 2, 5], (value) => value <= 9)).toBe(4);
    expect(partitionPoint([], () => true)).toBe(0);
  });
});
