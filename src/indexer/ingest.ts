// ============================================
// Document Ingestion — extract, normalize, chunk, embed, upsert
// Offline batch job; embedding failures are retried, not abandoned
// ============================================

import fs from "fs/promises";
import path from "path";
import pRetry from "p-retry";
import { logger } from "../lib/logger.js";
import { ingestionError } from "../lib/errors.js";
import { extractDocumentText, getDocumentKind } from "./extractText.js";
import { toLines, WRAP_WIDTH } from "./normalize.js";
import { buildChunks, DEFAULT_CHUNK_SIZE, DEFAULT_STRIDE } from "./chunker.js";
import type { EmbeddingService } from "../retrieval/embeddings.js";
import type { VectorIndex, VectorRecord } from "../retrieval/vectorIndex.js";

export const DEFAULT_RETRY_DELAY_MS = 10_000;

/** Records sent per upsert call */
const UPSERT_BATCH_SIZE = 50;

export type IngestOptions = {
  embeddings: EmbeddingService;
  index: VectorIndex;
  namespace: string;
  chunkSize?: number;
  stride?: number;
  wrapWidth?: number;
  /** Fixed wait between embedding attempts */
  retryDelayMs?: number;
  /** Cap on embedding retries per chunk; unbounded when omitted */
  maxRetries?: number;
};

export type IngestSummary = {
  documents: number;
  chunks: number;
  failed: Array<{ file: string; error: string }>;
};

/**
 * Stable document id from a file name: stem, lowercased, spaces and hyphens as underscores.
 * e.g. "Cardiology Services-2024.pdf" -> "cardiology_services_2024"
 */
export function documentIdFromPath(filePath: string): string {
  return path
    .parse(filePath)
    .name.toLowerCase()
    .replace(/[\s-]+/g, "_");
}

/**
 * Ingest one document from disk. Returns the number of chunks upserted.
 */
export async function ingestDocument(filePath: string, options: IngestOptions): Promise<number> {
  const documentId = documentIdFromPath(filePath);

  logger.info("Ingesting document", {
    stage: "ingest",
    filePath,
    documentId,
    namespace: options.namespace,
  });

  const extracted = await extractDocumentText(filePath);

  logger.info("Extraction finished", {
    stage: "ingest",
    documentId,
    kind: extracted.kind,
    pages: extracted.pages,
    characters: extracted.text.length,
  });

  return ingestText(extracted.text, { documentId, sourceFile: path.basename(filePath) }, options);
}

/**
 * Ingest already-extracted text under a document id.
 * Every chunk is embedded before anything is written. New chunks are upserted
 * first and only then are the document's leftover chunks deleted, so a failed
 * write never leaves the document missing and a shorter revision leaves no stale tail.
 */
export async function ingestText(
  text: string,
  source: { documentId: string; sourceFile: string },
  options: IngestOptions
): Promise<number> {
  const {
    embeddings,
    index,
    namespace,
    chunkSize = DEFAULT_CHUNK_SIZE,
    stride = DEFAULT_STRIDE,
    wrapWidth = WRAP_WIDTH,
  } = options;
  const { documentId, sourceFile } = source;

  const lines = toLines(text, wrapWidth);
  const chunks = buildChunks(lines, documentId, { chunkSize, stride });

  logger.info("Document chunked", {
    stage: "ingest",
    documentId,
    lines: lines.length,
    chunks: chunks.length,
  });

  const records: VectorRecord[] = [];
  for (const chunk of chunks) {
    const values = await embedWithRetry(chunk.text, chunk.id, embeddings, options);
    records.push({
      id: chunk.id,
      values,
      metadata: {
        text: chunk.text,
        source_file: sourceFile,
        document_id: documentId,
        chunk_index: chunk.index,
        line_start: chunk.lineStart,
        line_end: chunk.lineEnd,
      },
    });
  }

  try {
    for (let i = 0; i < records.length; i += UPSERT_BATCH_SIZE) {
      await index.upsert(namespace, records.slice(i, i + UPSERT_BATCH_SIZE));
    }
    // Upserts overwrite chunks with the same id; only ids past the new count are stale
    const removed = await index.deleteDocument(
      namespace,
      documentId,
      records.map((r) => r.id)
    );

    logger.info("Document upserted", {
      stage: "ingest",
      documentId,
      namespace,
      staleRemoved: removed,
      upserted: records.length,
    });
  } catch (err) {
    throw ingestionError("INGESTION_FAILED", `Failed to store chunks for ${documentId}`, err, {
      documentId,
      namespace,
    });
  }

  return records.length;
}

/**
 * Embed a chunk, waiting a fixed delay between failed attempts.
 */
async function embedWithRetry(
  text: string,
  chunkId: string,
  embeddings: EmbeddingService,
  options: Pick<IngestOptions, "retryDelayMs" | "maxRetries">
): Promise<number[]> {
  const { retryDelayMs = DEFAULT_RETRY_DELAY_MS, maxRetries } = options;
  const unbounded = maxRetries === undefined;

  return pRetry(() => embeddings.embed(text), {
    forever: unbounded,
    retries: unbounded ? 0 : maxRetries,
    factor: 1,
    minTimeout: retryDelayMs,
    maxTimeout: retryDelayMs,
    randomize: false,
    onFailedAttempt(error) {
      logger.warn("Embedding failed, retrying", {
        stage: "ingest",
        chunkId,
        attempt: error.attemptNumber,
        retriesLeft: unbounded ? "unbounded" : error.retriesLeft,
        delayMs: retryDelayMs,
        error: error.message,
      });
    },
  });
}

/**
 * Ingest a single file, or every supported file in a directory.
 * A document that fails is logged and skipped; the rest still run.
 */
export async function ingestDirectory(target: string, options: IngestOptions): Promise<IngestSummary> {
  const stat = await fs.stat(target);
  const files = stat.isDirectory()
    ? (await fs.readdir(target))
        .filter((name) => getDocumentKind(name) !== null)
        .sort()
        .map((name) => path.join(target, name))
    : [target];

  if (files.length === 0) {
    logger.warn("No supported documents found", { stage: "ingest", target });
  }

  const summary: IngestSummary = { documents: 0, chunks: 0, failed: [] };

  for (const file of files) {
    try {
      summary.chunks += await ingestDocument(file, options);
      summary.documents += 1;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error("Document ingestion failed", {
        stage: "ingest",
        file,
        error: err,
      });
      summary.failed.push({ file: path.basename(file), error: message });
    }
  }

  logger.info("Ingestion complete", {
    stage: "ingest",
    namespace: options.namespace,
    documents: summary.documents,
    chunks: summary.chunks,
    failed: summary.failed.length,
  });

  return summary;
}
