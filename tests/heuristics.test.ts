// ============================================
// Keyword Voting Tests
// ============================================

import { describe, it, expect } from "vitest";
import { classifyWithKeywords, decideIntent, keywordConfidence } from "../src/router/heuristics.js";
import { compileVocabulary } from "../src/router/vocabulary.js";

const vocabulary = compileVocabulary({
  scheduling: ["appointment", "book", "doctor", "see a doctor", "chest pain", "pain", "visit"],
  qna: ["hours", "cost", "side effects", "what", "visit"],
});

// ============================================
// decideIntent() / keywordConfidence()
// ============================================

describe("decideIntent", () => {
  it("picks the category with more votes", () => {
    expect(decideIntent(2, 1)).toBe("scheduling");
    expect(decideIntent(0, 3)).toBe("qna");
  });

  it("leaves ties, including no votes, to the user", () => {
    expect(decideIntent(1, 1)).toBe("user_decision");
    expect(decideIntent(0, 0)).toBe("user_decision");
  });
});

describe("keywordConfidence", () => {
  it("is 0.5 on a tie and 1.0 when one side takes every vote", () => {
    expect(keywordConfidence(0, 0)).toBe(0.5);
    expect(keywordConfidence(2, 2)).toBe(0.5);
    expect(keywordConfidence(1, 0)).toBe(1);
    expect(keywordConfidence(0, 4)).toBe(1);
  });

  it("scales with the vote margin", () => {
    expect(keywordConfidence(2, 1)).toBeCloseTo(0.5 + 0.5 / 3);
    expect(keywordConfidence(3, 1)).toBe(0.75);
  });

  it("stays within [0.5, 1]", () => {
    for (let s = 0; s < 6; s++) {
      for (let q = 0; q < 6; q++) {
        const c = keywordConfidence(s, q);
        expect(c).toBeGreaterThanOrEqual(0.5);
        expect(c).toBeLessThanOrEqual(1);
      }
    }
  });
});

// ============================================
// classifyWithKeywords()
// ============================================

describe("classifyWithKeywords", () => {
  it("records one evidence entry per vote", () => {
    const result = classifyWithKeywords("Book a doctor appointment", vocabulary);

    expect(result.counts).toEqual({ scheduling: 3, qna: 0 });
    expect(result.evidence).toHaveLength(result.counts.scheduling + result.counts.qna);
    expect(result.evidence[0]).toEqual({ kind: "keyword", position: 0, token: "book", category: "scheduling" });
    expect(result.intent).toBe("scheduling");
    expect(result.confidence).toBe(1);
    expect(result.source).toBe("rule");
    expect(result.rationale).toBe("keyword votes favor scheduling");
  });

  it("matches inflected forms through stemming", () => {
    const result = classifyWithKeywords("Booking appointments", vocabulary);
    expect(result.counts.scheduling).toBe(2);
  });

  it("counts a multi-word term as a single vote", () => {
    const result = classifyWithKeywords("I need to see a doctor", vocabulary);

    expect(result.counts).toEqual({ scheduling: 1, qna: 0 });
    expect(result.evidence).toEqual([{ kind: "keyword", position: 3, token: "see a doctor", category: "scheduling" }]);
  });

  it("prefers the longer phrase over its single-word tail", () => {
    const result = classifyWithKeywords("sharp chest pain", vocabulary);
    expect(result.evidence).toEqual([{ kind: "keyword", position: 1, token: "chest pain", category: "scheduling" }]);
  });

  it("counts a term listed in both categories for scheduling", () => {
    const result = classifyWithKeywords("visit", vocabulary);
    expect(result.counts).toEqual({ scheduling: 1, qna: 0 });
  });

  it("returns a neutral user_decision when nothing matches", () => {
    const result = classifyWithKeywords("hello there", vocabulary);

    expect(result.intent).toBe("user_decision");
    expect(result.confidence).toBe(0.5);
    expect(result.counts).toEqual({ scheduling: 0, qna: 0 });
    expect(result.evidence).toEqual([]);
    expect(result.rationale).toBe("keyword votes equal or unclear");
  });

  it("echoes the input text", () => {
    const input = "What are the side effects?";
    const result = classifyWithKeywords(input, vocabulary);

    expect(result.rawText).toBe(input);
    expect(result.counts).toEqual({ scheduling: 0, qna: 2 });
    expect(result.intent).toBe("qna");
  });

  it("is deterministic", () => {
    const a = classifyWithKeywords("cost of a visit for chest pain", vocabulary);
    const b = classifyWithKeywords("cost of a visit for chest pain", vocabulary);
    expect(a).toEqual(b);
  });
});
