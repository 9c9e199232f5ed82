// ============================================
// LLM-based Router Classification
// Only used when keyword votes are inconclusive
// ============================================

import { z } from "zod";
import { logger } from "../lib/logger.js";
import { parseJsonResponse, type GenerationService } from "./client.js";
import { NEUTRAL_CONFIDENCE, type Intent, type RoutingResult } from "../router/types.js";

export const ROUTER_SYSTEM_PROMPT = `You are an intent router for healthcare queries.
Classify the user's message into EXACTLY ONE of:
- Scheduling
- Q&A
(Use "User_Decision" if it is perfectly balanced and cannot be decided, or if neither fits clearly.)

Return ONLY a strict JSON object. All keys must be lowercase.
No extra text before or after the JSON.

Schema (exact keys and types):
{
  "schema_version": "1.0",
  "intent": "scheduling|q&a|user_decision",
  "confidence": 0.0,
  "rationale": "short reason, at most 20 words",
  "counts": {"scheduling": 0, "qna": 0},
  "evidence": ["short phrase, at most 3 words"],
  "source": "llm",
  "raw_text": "echo of the user message"
}

Rules:
- Be deterministic and concise. Temperature is 0.
- If the message clearly asks to book/change/cancel an appointment, or describes symptoms that need a doctor: intent = "scheduling".
- If the message asks for general info/policy/medication/hours: intent = "q&a".
- If votes tie or unclear: intent = "user_decision".`;

/**
 * Normalize an intent label: lowercase, "q&a" / "q & a" → "qna", stray "&" dropped.
 */
export function normalizeIntentLabel(label: string): string {
  return label
    .trim()
    .toLowerCase()
    .replace(/q\s*&\s*a/g, "qna")
    .replace(/&/g, "")
    .replace(/\s+/g, "_");
}

const IntentSchema = z
  .string()
  .transform(normalizeIntentLabel)
  .pipe(z.enum(["scheduling", "qna", "user_decision"]));

const CountSchema = z.coerce.number().int().nonnegative().catch(0);

/**
 * Verdict the model must return. Only `intent` is required;
 * missing numbers and lists are defaulted rather than rejected.
 */
export const LlmVerdictSchema = z.object({
  schema_version: z.string().optional(),
  intent: IntentSchema,
  // null and "" would coerce to 0; treat them as missing
  confidence: z
    .preprocess((value) => (value === null || value === "" ? undefined : value), z.coerce.number())
    .catch(NEUTRAL_CONFIDENCE)
    .transform((c) => (Number.isFinite(c) ? Math.min(1, Math.max(0, c)) : NEUTRAL_CONFIDENCE)),
  rationale: z.string().catch("").default(""),
  counts: z
    .object({ scheduling: CountSchema.default(0), qna: CountSchema.default(0) })
    .catch({ scheduling: 0, qna: 0 })
    .default({ scheduling: 0, qna: 0 }),
  evidence: z.array(z.string()).catch([]).default([]),
});

export type LlmVerdict = z.infer<typeof LlmVerdictSchema>;

/**
 * Classify a message with the language model.
 * Never throws: any failure degrades to a neutral user_decision result.
 */
export async function classifyWithLLM(
  text: string,
  generation: GenerationService | undefined,
  options: { model?: string } = {}
): Promise<RoutingResult> {
  if (!generation) {
    return fallbackResult(text, "llm unavailable");
  }

  let content: string;
  try {
    const result = await generation.generate({
      model: options.model,
      messages: [
        { role: "system", content: ROUTER_SYSTEM_PROMPT },
        { role: "user", content: `message: ${text}` },
      ],
      temperature: 0,
      maxTokens: 300,
      jsonMode: true,
    });
    content = result.text;
  } catch (err) {
    logger.warn("LLM classification call failed", {
      stage: "router",
      error: err,
    });
    return fallbackResult(text, "llm call failed");
  }

  const parsed = LlmVerdictSchema.safeParse(parseJsonResponse(content));
  if (!parsed.success) {
    logger.warn("Failed to parse LLM classification response", {
      stage: "router",
      content: content.slice(0, 200),
      issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
    return fallbackResult(text, "invalid llm json");
  }

  const verdict = parsed.data;
  return Object.freeze({
    intent: verdict.intent,
    confidence: verdict.confidence,
    rationale: verdict.rationale,
    counts: Object.freeze({ ...verdict.counts }),
    evidence: Object.freeze(verdict.evidence.map((phrase) => ({ kind: "phrase" as const, text: phrase }))),
    source: "llm",
    rawText: text,
  });
}

function fallbackResult(text: string, rationale: string): RoutingResult {
  const intent: Intent = "user_decision";
  return Object.freeze({
    intent,
    confidence: NEUTRAL_CONFIDENCE,
    rationale,
    counts: Object.freeze({ scheduling: 0, qna: 0 }),
    evidence: Object.freeze([]),
    source: "fallback",
    rawText: text,
  });
}
