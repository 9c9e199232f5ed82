// ============================================
// Tokenizer Tests
// ============================================

import { describe, it, expect } from "vitest";
import { tokenize, normalizeTerm } from "../src/nlp/tokenize.js";

describe("tokenize", () => {
  it("lowercases words and numbers them by position", () => {
    const tokens = Array.from(tokenize("Book a Visit"));
    expect(tokens.map((t) => t.text)).toEqual(["book", "a", "visit"]);
    expect(tokens.map((t) => t.position)).toEqual([0, 1, 2]);
  });

  it("keeps a single internal apostrophe inside the word", () => {
    expect(Array.from(tokenize("I'm sure it's fine"), (t) => t.text)).toEqual(["i'm", "sure", "it's", "fine"]);
  });

  it("splits on punctuation and hyphens, keeps digit runs", () => {
    expect(Array.from(tokenize("follow-up at 10:30, room 4B!"), (t) => t.text)).toEqual([
      "follow",
      "up",
      "at",
      "10",
      "30",
      "room",
      "4",
      "b",
    ]);
  });

  it("yields nothing for empty or symbol-only text", () => {
    expect(Array.from(tokenize(""))).toEqual([]);
    expect(Array.from(tokenize("?! ... --"))).toEqual([]);
  });

  it("can be iterated more than once", () => {
    const tokens = tokenize("chest pain");
    expect(Array.from(tokens)).toHaveLength(2);
    expect(Array.from(tokens)).toHaveLength(2);
  });

  it("maps inflected forms to a shared stem", () => {
    const [appointments] = Array.from(tokenize("appointments"));
    const [appointment] = Array.from(tokenize("appointment"));
    expect(appointments?.stem).toBe(appointment?.stem);
  });
});

describe("normalizeTerm", () => {
  it("returns one stem per word of a phrase", () => {
    expect(normalizeTerm("side effects")).toHaveLength(2);
    expect(normalizeTerm("side effects")).toEqual(normalizeTerm("Side Effect"));
  });

  it("normalizes plural and singular forms identically", () => {
    expect(normalizeTerm("hours")).toEqual(normalizeTerm("hour"));
    expect(normalizeTerm("hurts")).toEqual(normalizeTerm("hurt"));
  });
});
