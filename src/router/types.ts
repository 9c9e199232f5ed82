// ============================================
// Router Types — Intent classification contracts
// ============================================

/**
 * Current router schema version.
 * Bump when the serialized routing record changes.
 */
export const ROUTER_SCHEMA_VERSION = "1.0";

/**
 * Classified purpose of a message.
 * user_decision means the router could not decide and the user should pick.
 */
export type Intent = "scheduling" | "qna" | "user_decision";

export const INTENTS: readonly Intent[] = ["scheduling", "qna", "user_decision"];

/** Category a single keyword vote counts towards. */
export type VoteCategory = "scheduling" | "qna";

/**
 * Which stage produced a result.
 * - rule: keyword voting
 * - llm: language-model verdict
 * - fallback: LLM stage failed and was degraded
 * - guard: empty input short-circuit
 */
export type RoutingSource = "rule" | "llm" | "fallback" | "guard";

export type VoteCounts = {
  scheduling: number;
  qna: number;
};

/**
 * One piece of evidence behind a classification.
 * Keyword matches come from the rule stage; phrases are quoted by the LLM.
 */
export type Evidence =
  | {
      kind: "keyword";
      /** Token position where the match starts */
      position: number;
      /** Matched surface text (space-joined for multi-word terms) */
      token: string;
      category: VoteCategory;
    }
  | {
      kind: "phrase";
      text: string;
    };

/**
 * Immutable classification record.
 * For rule results, counts.scheduling + counts.qna === evidence.length.
 */
export type RoutingResult = Readonly<{
  intent: Intent;
  /** In [0, 1] */
  confidence: number;
  rationale: string;
  counts: Readonly<VoteCounts>;
  evidence: readonly Evidence[];
  source: RoutingSource;
  rawText: string;
}>;

/** Handler a decision is dispatched to. */
export type NextService = "appointment_service" | "qna_service" | "frontend";

export type RouteAction = "book_appointment" | "answer_question" | "ask_user_decision";

/**
 * Dispatch decision handed to the rest of the application.
 */
export type RoutingDecision = {
  intent: Intent;
  confidence: number;
  nextService: NextService;
  action: RouteAction;
  payload: {
    text: string;
    language: string;
  };
  rawResult: RoutingResult;
};

/**
 * Snake-case routing record, as logged and returned to clients.
 */
export type RoutingRecord = {
  schema_version: string;
  intent: Intent;
  confidence: number;
  rationale: string;
  counts: VoteCounts;
  evidence: Array<{ index: number; keyword: string; category: VoteCategory } | string>;
  source: RoutingSource;
  raw_text: string;
};

// ============================================
// Constants
// ============================================

/**
 * Keyword confidence under which the LLM classifier is consulted.
 */
export const DEFAULT_MIN_RULE_CONFIDENCE = 0.6;

/**
 * Confidence a decision needs before it is dispatched to a handler.
 */
export const DEFAULT_DISPATCH_CONFIDENCE = 0.6;

export const NEUTRAL_CONFIDENCE = 0.5;
