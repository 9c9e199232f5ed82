// ============================================
// Tokenizer — lowercase word/number tokens with Porter stems
// ============================================

import { stemmer } from "stemmer";

/**
 * A lexical unit of a message.
 */
export type Token = {
  /** Zero-based position among the tokens of the text */
  position: number;
  /** Lowercased surface form */
  text: string;
  /** Porter stem of `text` */
  stem: string;
};

// Alphabetic run with at most one internal apostrophe ("don't", "patient's"), or a digit run.
const TOKEN_PATTERN = /[A-Za-z]+(?:'[A-Za-z]+)?|[0-9]+/g;

/**
 * Tokenize text lazily.
 * The returned iterable can be walked any number of times; each walk rescans the text.
 */
export function tokenize(text: string): Iterable<Token> {
  return {
    *[Symbol.iterator]() {
      let position = 0;
      for (const match of text.matchAll(TOKEN_PATTERN)) {
        const lowered = match[0].toLowerCase();
        yield { position: position++, text: lowered, stem: stemmer(lowered) };
      }
    },
  };
}

/**
 * Reduce a term (a word or a multi-word phrase) to its stem sequence.
 * Applied identically to vocabulary entries and to message text.
 */
export function normalizeTerm(term: string): string[] {
  return Array.from(tokenize(term), (token) => token.stem);
}
