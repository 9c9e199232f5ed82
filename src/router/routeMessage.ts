// ============================================
// Router — Hybrid keyword + LLM intent routing
// Decides where a message goes; never answers it
// ============================================

import { classifyWithKeywords } from "./heuristics.js";
import { compileVocabulary, loadVocabulary, type CompiledVocabulary, type Vocabulary } from "./vocabulary.js";
import { classifyWithLLM } from "../llm/routerLLM.js";
import { logger } from "../lib/logger.js";
import type { GenerationService } from "../llm/client.js";
import {
  DEFAULT_DISPATCH_CONFIDENCE,
  DEFAULT_MIN_RULE_CONFIDENCE,
  NEUTRAL_CONFIDENCE,
  ROUTER_SCHEMA_VERSION,
  type RoutingDecision,
  type RoutingRecord,
  type RoutingResult,
} from "./types.js";

export type IntentRouterOptions = {
  vocabulary: Vocabulary;
  /** Fallback classifier; without it low-confidence messages degrade to user_decision */
  generation?: GenerationService;
  /** Model passed to the fallback classifier */
  model?: string;
  /** Keyword confidence under which the LLM is consulted */
  minRuleConfidence?: number;
  /** Confidence a decision needs before it is dispatched */
  dispatchConfidence?: number;
  language?: string;
};

export interface IntentRouter {
  /** Classify a message: keyword votes first, LLM only when they are inconclusive */
  classify(text: string): Promise<RoutingResult>;
  /** Classify and map the result to a dispatch target */
  route(text: string): Promise<RoutingDecision>;
}

/**
 * Build a router over a fixed vocabulary.
 * The router holds only read-only state and is safe to share across requests.
 */
export function createIntentRouter(options: IntentRouterOptions): IntentRouter {
  const vocabulary: CompiledVocabulary = compileVocabulary(options.vocabulary);
  const minRuleConfidence = options.minRuleConfidence ?? DEFAULT_MIN_RULE_CONFIDENCE;
  const dispatchConfidence = options.dispatchConfidence ?? DEFAULT_DISPATCH_CONFIDENCE;
  const language = options.language ?? "English";

  async function classify(text: string): Promise<RoutingResult> {
    if (!text || !text.trim()) {
      return guardResult();
    }

    const ruleResult = classifyWithKeywords(text, vocabulary);

    if (ruleResult.confidence >= minRuleConfidence) {
      logger.info("Keyword classification succeeded", {
        stage: "router",
        intent: ruleResult.intent,
        confidence: ruleResult.confidence.toFixed(2),
        counts: ruleResult.counts,
      });
      return ruleResult;
    }

    logger.info("Keyword votes inconclusive, consulting LLM", {
      stage: "router",
      confidence: ruleResult.confidence.toFixed(2),
      counts: ruleResult.counts,
    });

    const llmResult = await classifyWithLLM(text, options.generation, { model: options.model });

    logger.info("LLM classification result", {
      stage: "router",
      intent: llmResult.intent,
      confidence: llmResult.confidence,
      source: llmResult.source,
    });

    return llmResult;
  }

  async function route(text: string): Promise<RoutingDecision> {
    const result = await classify(text);
    const { intent, confidence } = result;

    let nextService: RoutingDecision["nextService"] = "frontend";
    let action: RoutingDecision["action"] = "ask_user_decision";

    if (confidence >= dispatchConfidence && intent === "scheduling") {
      nextService = "appointment_service";
      action = "book_appointment";
    } else if (confidence >= dispatchConfidence && intent === "qna") {
      nextService = "qna_service";
      action = "answer_question";
    }

    logger.info("Routing decision", {
      stage: "router",
      intent,
      confidence,
      nextService,
      source: result.source,
    });

    return {
      intent,
      confidence,
      nextService,
      action,
      payload: { text, language },
      rawResult: result,
    };
  }

  return { classify, route };
}

/**
 * Router over the configured vocabulary file.
 */
export function createIntentRouterFromFile(
  vocabularyPath: string,
  options: Omit<IntentRouterOptions, "vocabulary"> = {}
): IntentRouter {
  return createIntentRouter({ ...options, vocabulary: loadVocabulary(vocabularyPath) });
}

function guardResult(): RoutingResult {
  return Object.freeze({
    intent: "user_decision",
    confidence: NEUTRAL_CONFIDENCE,
    rationale: "empty or missing text",
    counts: Object.freeze({ scheduling: 0, qna: 0 }),
    evidence: Object.freeze([]),
    source: "guard",
    rawText: "",
  });
}

/**
 * Render a routing result in its snake_case record form.
 */
export function serializeRoutingResult(result: RoutingResult): RoutingRecord {
  return {
    schema_version: ROUTER_SCHEMA_VERSION,
    intent: result.intent,
    confidence: result.confidence,
    rationale: result.rationale,
    counts: { ...result.counts },
    evidence: result.evidence.map((e) =>
      e.kind === "keyword" ? { index: e.position, keyword: e.token, category: e.category } : e.text
    ),
    source: result.source,
    raw_text: result.rawText,
  };
}
