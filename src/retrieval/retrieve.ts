// ============================================
// Retrieval — query embedding + namespaced vector search
// Best-effort: failures yield no context, never an error
// ============================================

import { logger } from "../lib/logger.js";
import { ChunkMetadataSchema, type VectorIndex } from "./vectorIndex.js";
import type { EmbeddingService } from "./embeddings.js";

/**
 * A passage returned for a query.
 */
export type RetrievedChunk = {
  id: string;
  text: string;
  /** Similarity reported by the index */
  score: number;
  source: {
    file: string;
    documentId?: string;
    chunkIndex?: number;
  };
};

export type RetrievalHealth =
  | { status: "healthy"; index: string; namespace: string; namespaceVectors: number }
  | { status: "unhealthy"; index: string; namespace: string; error: string };

export interface RetrievalClient {
  readonly namespace: string;
  /** Top-k passages in index ranking order; empty on empty query or failure */
  query(text: string, topK?: number): Promise<RetrievedChunk[]>;
  healthCheck(): Promise<RetrievalHealth>;
}

export type RetrievalClientOptions = {
  embeddings: EmbeddingService;
  index: VectorIndex;
  namespace: string;
  defaultTopK?: number;
};

export function createRetrievalClient(options: RetrievalClientOptions): RetrievalClient {
  const { embeddings, index, namespace, defaultTopK = 3 } = options;

  async function query(text: string, topK: number = defaultTopK): Promise<RetrievedChunk[]> {
    if (!text || !text.trim()) {
      logger.warn("Empty query text provided to retrieval", { stage: "retrieval" });
      return [];
    }

    try {
      logger.info("Retrieval query", {
        stage: "retrieval",
        query: text.slice(0, 100),
        topK,
        namespace,
      });

      const vector = await embeddings.embed(text);
      const matches = await index.query(namespace, vector, topK);

      const chunks: RetrievedChunk[] = [];
      for (const match of matches) {
        const metadata = ChunkMetadataSchema.safeParse(match.metadata);
        if (!metadata.success) {
          logger.debug("Skipping match without text", { stage: "retrieval", id: match.id });
          continue;
        }

        chunks.push({
          id: match.id,
          text: metadata.data.text,
          score: match.score,
          source: {
            file: metadata.data.source_file,
            documentId: metadata.data.document_id,
            chunkIndex: metadata.data.chunk_index,
          },
        });
      }

      logger.info("Retrieval complete", {
        stage: "retrieval",
        matches: matches.length,
        chunks: chunks.length,
        topScore: chunks[0]?.score,
      });

      return chunks;
    } catch (err) {
      logger.warn("Retrieval failed, continuing without context", {
        stage: "retrieval",
        error: err,
      });
      return [];
    }
  }

  async function healthCheck(): Promise<RetrievalHealth> {
    try {
      const { vectorCount } = await index.describeNamespace(namespace);
      return { status: "healthy", index: index.name, namespace, namespaceVectors: vectorCount };
    } catch (err) {
      logger.error("Retrieval health check failed", { stage: "retrieval", error: err });
      return {
        status: "unhealthy",
        index: index.name,
        namespace,
        error: err instanceof Error ? err.message : String(err),
      };
    }
  }

  return { namespace, query, healthCheck };
}
