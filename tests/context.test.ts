// ============================================
// Context Assembly Tests
// ============================================

import { describe, it, expect } from "vitest";
import { assembleContext, getContextString, KNOWLEDGE_DELIMITER } from "../src/retrieval/context.js";
import { createRetrievalClient } from "../src/retrieval/retrieve.js";
import { fakeEmbeddings, fakeVectorIndex } from "./fakes.js";

const unwrap = (text: string) => text.slice(KNOWLEDGE_DELIMITER.length, text.length - KNOWLEDGE_DELIMITER.length);

describe("assembleContext", () => {
  it("wraps passages in the delimiter, separated by blank lines", () => {
    const context = assembleContext(["alpha", "beta"]);

    expect(context.text).toBe("########alpha\n\nbeta########");
    expect(context.included).toBe(2);
    expect(context.dropped).toBe(0);
  });

  it("stops at the first passage that would exceed the budget", () => {
    // "aaaaa" (5) + "\n\n" + "bbbbb" = 12; adding "\n\nc" would be 15
    const context = assembleContext(["aaaaa", "bbbbb", "c"], { charLimit: 12 });

    expect(context.text).toBe("########aaaaa\n\nbbbbb########");
    expect(context.included).toBe(2);
    expect(context.dropped).toBe(1);
  });

  it("stops at an oversized passage even when a later one would fit", () => {
    const context = assembleContext(["short", "x".repeat(50), "tiny"], { charLimit: 20 });

    expect(unwrap(context.text)).toBe("short");
    expect(context.dropped).toBe(2);
  });

  it("returns an empty string when nothing fits", () => {
    expect(assembleContext(["x".repeat(30)], { charLimit: 10 })).toEqual({ text: "", included: 0, dropped: 1 });
  });

  it("returns an empty string for no passages", () => {
    expect(assembleContext([]).text).toBe("");
  });

  it("keeps unwrapped content within the budget", () => {
    const passages = Array.from({ length: 12 }, (_, i) => "p".repeat(5 + i * 7));
    for (const charLimit of [0, 1, 10, 40, 100, 400]) {
      const { text } = assembleContext(passages, { charLimit });
      if (text) {
        expect(text.startsWith(KNOWLEDGE_DELIMITER)).toBe(true);
        expect(text.endsWith(KNOWLEDGE_DELIMITER)).toBe(true);
        expect(unwrap(text).length).toBeLessThanOrEqual(charLimit);
      } else {
        expect(text).toBe("");
      }
    }
  });

  it("accepts a custom delimiter", () => {
    expect(assembleContext(["alpha"], { delimiter: "---" }).text).toBe("---alpha---");
  });
});

describe("getContextString", () => {
  it("wraps retrieved chunk text in rank order", async () => {
    const { index } = fakeVectorIndex([
      { id: "a", score: 0.9, metadata: { text: "Flu shots are available in October." } },
      { id: "b", score: 0.8, metadata: { text: "Walk-ins are welcome." } },
    ]);
    const retrieval = createRetrievalClient({ embeddings: fakeEmbeddings(), index, namespace: "clinic" });

    const context = await getContextString(retrieval, "flu shot", 3);
    expect(context).toBe("########Flu shots are available in October.\n\nWalk-ins are welcome.########");
  });

  it("returns an empty string when retrieval finds nothing", async () => {
    const { index } = fakeVectorIndex([]);
    const retrieval = createRetrievalClient({ embeddings: fakeEmbeddings(), index, namespace: "clinic" });

    expect(await getContextString(retrieval, "flu shot", 3)).toBe("");
  });
});
