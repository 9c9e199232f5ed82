// ============================================
// Text Normalization — unwrap extracted text, rewrap to fixed width
// ============================================

export const WRAP_WIDTH = 120;

/**
 * Clean raw extracted text:
 * 1. rejoin words hyphenated across a line wrap
 * 2. turn single soft line breaks into spaces, keeping breaks after . ! ? ; :
 * 3. collapse runs of spaces and tabs
 * 4. collapse 3+ newlines to a paragraph break
 */
export function normalizeText(raw: string): string {
  return raw
    .replace(/\r\n?/g, "\n")
    .replace(/(\w)-\n(\w)/g, "$1$2")
    .replace(/(?<![.!?;:\n])\n(?!\n)/g, " ")
    .replace(/[ \t]+/g, " ")
    .trim()
    .replace(/\n{3,}/g, "\n\n");
}

/**
 * Paragraphs separated by blank lines, trimmed, empties dropped.
 */
export function splitParagraphs(text: string): string[] {
  return text
    .split("\n\n")
    .map((p) => p.trim())
    .filter(Boolean);
}

/**
 * Greedy word wrap. Words are never split, hyphenated or not;
 * a word longer than the width gets a line of its own.
 */
export function wrapParagraph(paragraph: string, width: number = WRAP_WIDTH): string[] {
  const words = paragraph.split(/\s+/).filter(Boolean);
  const lines: string[] = [];
  let current = "";

  for (const word of words) {
    if (!current) {
      current = word;
    } else if (current.length + 1 + word.length <= width) {
      current += " " + word;
    } else {
      lines.push(current);
      current = word;
    }
  }

  if (current) {
    lines.push(current);
  }
  return lines;
}

/**
 * Normalize raw text into wrapped lines with one blank line between paragraphs.
 */
export function toLines(raw: string, width: number = WRAP_WIDTH): string[] {
  const lines: string[] = [];

  for (const paragraph of splitParagraphs(normalizeText(raw))) {
    if (lines.length > 0) {
      lines.push("");
    }
    lines.push(...wrapParagraph(paragraph, width));
  }

  return lines;
}
