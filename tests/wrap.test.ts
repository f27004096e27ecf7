import { describe, it, expect } from "vitest";
import { fillParagraph, isBlankLine, splitWords, trimAscii } from "../src/format/wrap.js";

describe("fillParagraph", () => {
  it("fills greedily up to the width", () => {
    expect(fillParagraph("aa bb cc dd", 5)).toBe("aa bb\ncc dd");
    expect(fillParagraph("aa bb cc dd", 8)).toBe("aa bb cc\ndd");
  });

  it("gives an over-long word a line of its own", () => {
    expect(fillParagraph("a verylongword b", 4)).toBe("a\nverylongword\nb");
  });

  it("collapses whitespace runs", () => {
    expect(fillParagraph("  a \t b\n c  ", 80)).toBe("a b c");
  });

  it("counts code points, not UTF-16 units", () => {
    expect(fillParagraph("\u{1d400}\u{1d400} ab", 5)).toBe("\u{1d400}\u{1d400} ab");
  });

  it("returns an empty string for blank input", () => {
    expect(fillParagraph("   ", 10)).toBe("");
  });
});

describe("splitWords", () => {
  it("splits only at ASCII whitespace", () => {
    expect(splitWords("a\u00a0b c")).toEqual(["a\u00a0b", "c"]);
  });
});

describe("trimAscii", () => {
  it("trims ASCII whitespace and keeps a non-breaking space", () => {
    expect(trimAscii(" \t\u00a0x\u00a0 \r")).toBe("\u00a0x\u00a0");
  });
});

describe("isBlankLine", () => {
  it("is true only for lines of ASCII whitespace", () => {
    expect(isBlankLine(" \t ")).toBe(true);
    expect(isBlankLine("")).toBe(true);
    expect(isBlankLine(" \u00a0 ")).toBe(false);
  });
});
