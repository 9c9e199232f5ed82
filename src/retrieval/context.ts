// ============================================
// Context Assembly — bounded knowledge block for prompts
// ============================================

import { logger } from "../lib/logger.js";
import type { RetrievalClient, RetrievedChunk } from "./retrieve.js";

/**
 * Marker placed on both sides of injected knowledge.
 * Prompts refer to it so the model can locate the block.
 */
export const KNOWLEDGE_DELIMITER = "########";

export const DEFAULT_CONTEXT_CHAR_LIMIT = 8000;

const PASSAGE_SEPARATOR = "\n\n";

export type ContextOptions = {
  /** Maximum length of the text between the delimiters */
  charLimit?: number;
  delimiter?: string;
};

export type AssembledContext = {
  /** Delimiter-wrapped block, or "" when nothing fit */
  text: string;
  /** Passages included, in rank order */
  included: number;
  /** Passages dropped at the budget cutoff */
  dropped: number;
};

/**
 * Concatenate whole passages in rank order until the next one would
 * exceed the budget. Passages are never cut.
 */
export function assembleContext(
  passages: ReadonlyArray<string | RetrievedChunk>,
  options: ContextOptions = {}
): AssembledContext {
  const { charLimit = DEFAULT_CONTEXT_CHAR_LIMIT, delimiter = KNOWLEDGE_DELIMITER } = options;

  let body = "";
  let included = 0;

  for (const passage of passages) {
    const text = typeof passage === "string" ? passage : passage.text;
    const next = included === 0 ? text : body + PASSAGE_SEPARATOR + text;
    if (next.length > charLimit) break;
    body = next;
    included += 1;
  }

  if (included === 0 || !body) {
    return { text: "", included: 0, dropped: passages.length };
  }

  return {
    text: delimiter + body + delimiter,
    included,
    dropped: passages.length - included,
  };
}

/**
 * Retrieve passages for a query and return the wrapped knowledge block.
 * Returns "" when retrieval finds nothing; callers then answer ungrounded.
 */
export async function getContextString(
  retrieval: RetrievalClient,
  query: string,
  topK: number,
  options: ContextOptions = {}
): Promise<string> {
  const chunks = await retrieval.query(query, topK);
  if (chunks.length === 0) {
    return "";
  }

  const context = assembleContext(chunks, options);

  logger.info("Context assembled", {
    stage: "context",
    retrieved: chunks.length,
    included: context.included,
    dropped: context.dropped,
    length: context.text.length,
  });

  return context.text;
}
