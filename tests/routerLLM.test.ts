// ============================================
// LLM Intent Classifier Tests — verdict parsing and degradation
// ============================================

import { describe, it, expect } from "vitest";
import { classifyWithLLM, normalizeIntentLabel, LlmVerdictSchema } from "../src/llm/routerLLM.js";
import { fakeGeneration, text } from "./fakes.js";

describe("normalizeIntentLabel", () => {
  it.each([
    ["Q&A", "qna"],
    ["q & a", "qna"],
    ["QnA", "qna"],
    ["Scheduling", "scheduling"],
    ["User Decision", "user_decision"],
    ["user_decision", "user_decision"],
  ])("%s → %s", (input, expected) => {
    expect(normalizeIntentLabel(input)).toBe(expected);
  });
});

describe("LlmVerdictSchema", () => {
  it("requires only the intent", () => {
    const parsed = LlmVerdictSchema.parse({ intent: "scheduling" });
    expect(parsed).toEqual({
      intent: "scheduling",
      confidence: 0.5,
      rationale: "",
      counts: { scheduling: 0, qna: 0 },
      evidence: [],
    });
  });

  it("clamps confidence into [0, 1]", () => {
    expect(LlmVerdictSchema.parse({ intent: "qna", confidence: 1.7 }).confidence).toBe(1);
    expect(LlmVerdictSchema.parse({ intent: "qna", confidence: -2 }).confidence).toBe(0);
    expect(LlmVerdictSchema.parse({ intent: "qna", confidence: "0.8" }).confidence).toBe(0.8);
  });

  it("treats a null or empty confidence as missing", () => {
    expect(LlmVerdictSchema.parse({ intent: "qna", confidence: null }).confidence).toBe(0.5);
    expect(LlmVerdictSchema.parse({ intent: "qna", confidence: "" }).confidence).toBe(0.5);
    expect(LlmVerdictSchema.parse({ intent: "qna", confidence: "high" }).confidence).toBe(0.5);
  });

  it("rejects an unknown intent", () => {
    expect(LlmVerdictSchema.safeParse({ intent: "billing" }).success).toBe(false);
  });
});

describe("classifyWithLLM", () => {
  it("maps a verdict to an llm routing result", async () => {
    const { service, requests } = fakeGeneration(
      text(
        '```json\n{"schema_version": "1.0", "intent": "Scheduling", "confidence": 0.85, "rationale": "symptom", "counts": {"scheduling": 1, "qna": 0}, "evidence": ["sore throat"]}\n```'
      )
    );

    const result = await classifyWithLLM("my throat is sore", service, { model: "router-model" });

    expect(requests[0]?.model).toBe("router-model");
    expect(requests[0]?.messages[1]).toEqual({ role: "user", content: "message: my throat is sore" });
    expect(result).toEqual({
      intent: "scheduling",
      confidence: 0.85,
      rationale: "symptom",
      counts: { scheduling: 1, qna: 0 },
      evidence: [{ kind: "phrase", text: "sore throat" }],
      source: "llm",
      rawText: "my throat is sore",
    });
  });

  it("uses the input text even when the model echoes something else", async () => {
    const { service } = fakeGeneration(text('{"intent": "qna", "raw_text": "different"}'));
    const result = await classifyWithLLM("clinic hours?", service);
    expect(result.rawText).toBe("clinic hours?");
  });

  it.each([
    ["not json at all", "invalid llm json"],
    ['{"confidence": 0.9}', "invalid llm json"],
    ['{"intent": "billing"}', "invalid llm json"],
  ])("degrades %j to a fallback result", async (content, rationale) => {
    const { service } = fakeGeneration(text(content));
    const result = await classifyWithLLM("hello", service);

    expect(result).toMatchObject({ intent: "user_decision", confidence: 0.5, source: "fallback", rationale });
    expect(result.counts).toEqual({ scheduling: 0, qna: 0 });
  });
});
