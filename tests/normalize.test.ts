// ============================================
// Text Normalization Tests
// ============================================

import { describe, it, expect } from "vitest";
import { normalizeText, splitParagraphs, wrapParagraph, toLines } from "../src/indexer/normalize.js";

describe("normalizeText", () => {
  it("rejoins words hyphenated across a line break", () => {
    expect(normalizeText("cardio-\nlogy")).toBe("cardiology");
  });

  it("unwraps soft line breaks into spaces", () => {
    expect(normalizeText("The clinic is\nopen daily")).toBe("The clinic is open daily");
  });

  it("keeps line breaks after sentence punctuation", () => {
    expect(normalizeText("Open daily.\nClosed Sunday")).toBe("Open daily.\nClosed Sunday");
    expect(normalizeText("Hours:\n8am to 5pm")).toBe("Hours:\n8am to 5pm");
  });

  it("keeps paragraph breaks and collapses longer runs", () => {
    expect(normalizeText("First part\n\nSecond part")).toBe("First part\n\nSecond part");
    expect(normalizeText("First.\n\n\n\nSecond.")).toBe("First.\n\nSecond.");
  });

  it("collapses spaces and tabs, trims the ends", () => {
    expect(normalizeText("  a \t  b  ")).toBe("a b");
  });

  it("normalizes Windows line endings", () => {
    expect(normalizeText("one\r\ntwo")).toBe("one two");
  });
});

describe("splitParagraphs", () => {
  it("drops empty paragraphs", () => {
    expect(splitParagraphs("a\n\n \n\nb")).toEqual(["a", "b"]);
  });
});

describe("wrapParagraph", () => {
  it("wraps greedily at the width", () => {
    expect(wrapParagraph("aaa bbb ccc ddd", 7)).toEqual(["aaa bbb", "ccc ddd"]);
  });

  it("never splits a long word, even on a hyphen", () => {
    expect(wrapParagraph("go to anti-inflammatory now", 10)).toEqual(["go to", "anti-inflammatory", "now"]);
  });

  it("keeps every line within the width when words fit", () => {
    const lines = wrapParagraph("word ".repeat(100), 120);
    for (const line of lines) {
      expect(line.length).toBeLessThanOrEqual(120);
    }
    expect(lines.join(" ")).toBe("word ".repeat(100).trim());
  });
});

describe("toLines", () => {
  it("puts one blank line between paragraphs and none at the end", () => {
    expect(toLines("First paragraph.\n\nSecond\nparagraph.\n\n")).toEqual(["First paragraph.", "", "Second paragraph."]);
  });

  it("returns no lines for blank text", () => {
    expect(toLines(" \n\n ")).toEqual([]);
  });
});
