// ============================================
// Chunker — overlapping line windows
// ============================================

import { ClinicError } from "../lib/errors.js";

export const DEFAULT_CHUNK_SIZE = 9;
export const DEFAULT_STRIDE = 3;

export interface IngestionChunk {
  /** `{documentId}_{index}` */
  id: string;
  /** 1-based, sequential within a document */
  index: number;
  /** Window lines joined by newlines */
  text: string;
  /** First line of the window (inclusive) */
  lineStart: number;
  /** End of the window (exclusive) */
  lineEnd: number;
}

export type ChunkOptions = {
  /** Lines per window */
  chunkSize?: number;
  /** Lines each window shares with the one before it */
  stride?: number;
};

/**
 * Walk the lines in steps of `chunkSize`. Each window starts `stride` lines
 * before its step (clamped to the first line) and holds `chunkSize` lines:
 * `[max(0, i - stride), min(N, start + chunkSize))`.
 * Yields ceil(lines / chunkSize) chunks. After the first pair, windows abut
 * rather than overlap, and up to `stride - 1` trailing lines can fall past the last window.
 */
export function buildChunks(lines: readonly string[], documentId: string, options: ChunkOptions = {}): IngestionChunk[] {
  const { chunkSize = DEFAULT_CHUNK_SIZE, stride = DEFAULT_STRIDE } = options;

  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new ClinicError({ code: "VALIDATION_ERROR", message: `chunkSize must be a positive integer, got ${chunkSize}` });
  }
  if (!Number.isInteger(stride) || stride < 0 || stride >= chunkSize) {
    throw new ClinicError({
      code: "VALIDATION_ERROR",
      message: `stride must be an integer in [0, chunkSize), got ${stride}`,
    });
  }

  const chunks: IngestionChunk[] = [];

  for (let i = 0; i < lines.length; i += chunkSize) {
    const lineStart = Math.max(0, i - stride);
    const lineEnd = Math.min(lines.length, lineStart + chunkSize);
    const index = chunks.length + 1;

    chunks.push({
      id: `${documentId}_${index}`,
      index,
      text: lines.slice(lineStart, lineEnd).join("\n"),
      lineStart,
      lineEnd,
    });
  }

  return chunks;
}
