// ============================================
// Vocabulary — keyword lists per routing category
// Loaded once, compiled to stem form, immutable afterwards
// ============================================

import fs from "fs";
import path from "path";
import { z } from "zod";
import { normalizeTerm } from "../nlp/tokenize.js";
import { configError } from "../lib/errors.js";
import type { VoteCategory } from "./types.js";

export const VocabularySchema = z.object({
  scheduling: z.array(z.string().trim().min(1)).min(1),
  qna: z.array(z.string().trim().min(1)).min(1),
});

export type Vocabulary = z.infer<typeof VocabularySchema>;

/**
 * Stemmed lookup tables for one category.
 * Multi-word terms are kept as stem sequences, longest first.
 */
type CompiledCategory = {
  singles: ReadonlySet<string>;
  phrases: readonly (readonly string[])[];
};

export type CompiledVocabulary = Readonly<Record<VoteCategory, CompiledCategory>>;

/**
 * Categories in match precedence order.
 * A term listed under both is counted for scheduling.
 */
export const CATEGORY_ORDER: readonly VoteCategory[] = ["scheduling", "qna"];

function compileCategory(terms: string[]): CompiledCategory {
  const singles = new Set<string>();
  const phrases: string[][] = [];

  for (const term of terms) {
    const stems = normalizeTerm(term);
    if (stems.length === 1) {
      singles.add(stems[0]!);
    } else if (stems.length > 1) {
      phrases.push(stems);
    }
  }

  phrases.sort((a, b) => b.length - a.length);
  return { singles, phrases };
}

/**
 * Compile raw term lists into stem lookups.
 */
export function compileVocabulary(vocabulary: Vocabulary): CompiledVocabulary {
  return Object.freeze({
    scheduling: compileCategory(vocabulary.scheduling),
    qna: compileCategory(vocabulary.qna),
  });
}

/**
 * Read and validate a vocabulary file.
 * Relative paths resolve against the working directory.
 */
export function loadVocabulary(filePath: string): Vocabulary {
  const resolved = path.resolve(process.cwd(), filePath);

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, "utf-8"));
  } catch (err) {
    throw configError(`Could not read vocabulary file: ${resolved}`, { cause: String(err) });
  }

  const result = VocabularySchema.safeParse(raw);
  if (!result.success) {
    throw configError("Invalid vocabulary file", {
      path: resolved,
      issues: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
  }

  return result.data;
}
