// ============================================
// Router Heuristics — Deterministic keyword voting
// ============================================

import { tokenize, type Token } from "../nlp/tokenize.js";
import { CATEGORY_ORDER, type CompiledVocabulary } from "./vocabulary.js";
import type { Evidence, Intent, RoutingResult, VoteCategory } from "./types.js";

type KeywordMatch = {
  category: VoteCategory;
  /** Number of tokens consumed by the match */
  length: number;
};

/**
 * Classify a message by counting scheduling vs qna keyword votes.
 * Pure function of the text and the vocabulary.
 */
export function classifyWithKeywords(text: string, vocabulary: CompiledVocabulary): RoutingResult {
  const tokens = Array.from(tokenize(text));
  const evidence: Evidence[] = [];

  let i = 0;
  while (i < tokens.length) {
    const match = matchAt(tokens, i, vocabulary);
    if (!match) {
      i += 1;
      continue;
    }

    evidence.push({
      kind: "keyword",
      position: tokens[i]!.position,
      token: tokens
        .slice(i, i + match.length)
        .map((t) => t.text)
        .join(" "),
      category: match.category,
    });
    i += match.length;
  }

  const schedulingHits = evidence.filter((e) => e.kind === "keyword" && e.category === "scheduling").length;
  const qnaHits = evidence.length - schedulingHits;
  const intent = decideIntent(schedulingHits, qnaHits);

  return Object.freeze({
    intent,
    confidence: keywordConfidence(schedulingHits, qnaHits),
    rationale: RATIONALES[intent],
    counts: Object.freeze({ scheduling: schedulingHits, qna: qnaHits }),
    evidence: Object.freeze(evidence),
    source: "rule",
    rawText: text,
  });
}

const RATIONALES: Record<Intent, string> = {
  scheduling: "keyword votes favor scheduling",
  qna: "keyword votes favor qna",
  user_decision: "keyword votes equal or unclear",
};

/**
 * Majority vote; ties (including 0-0) leave the decision to the user.
 */
export function decideIntent(schedulingHits: number, qnaHits: number): Intent {
  if (schedulingHits > qnaHits) return "scheduling";
  if (schedulingHits < qnaHits) return "qna";
  return "user_decision";
}

/**
 * 0.5 on a tie, rising to 1.0 as one side takes every vote.
 * A single one-sided vote (1-0) is already fully confident.
 */
export function keywordConfidence(schedulingHits: number, qnaHits: number): number {
  const total = Math.max(1, schedulingHits + qnaHits);
  const margin = Math.abs(schedulingHits - qnaHits);
  return 0.5 + 0.5 * (margin / total);
}

/**
 * Find the vocabulary term starting at token `index`.
 * Multi-word terms win over single words; scheduling wins ties between categories.
 */
function matchAt(tokens: Token[], index: number, vocabulary: CompiledVocabulary): KeywordMatch | null {
  let best: KeywordMatch | null = null;

  for (const category of CATEGORY_ORDER) {
    for (const phrase of vocabulary[category].phrases) {
      if (best && best.length >= phrase.length) break;
      if (phraseMatches(tokens, index, phrase)) {
        best = { category, length: phrase.length };
        break;
      }
    }
  }
  if (best) return best;

  const stem = tokens[index]!.stem;
  for (const category of CATEGORY_ORDER) {
    if (vocabulary[category].singles.has(stem)) {
      return { category, length: 1 };
    }
  }

  return null;
}

function phraseMatches(tokens: Token[], start: number, phrase: readonly string[]): boolean {
  if (start + phrase.length > tokens.length) return false;
  return phrase.every((stem, offset) => tokens[start + offset]!.stem === stem);
}
