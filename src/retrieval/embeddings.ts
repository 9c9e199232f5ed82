// ============================================
// Embeddings — OpenAI embedding generation
// Pin versions for retrieval determinism.
// ============================================

import type OpenAI from "openai";
import { logger } from "../lib/logger.js";
import { embeddingError } from "../lib/errors.js";

/**
 * Embedding model version.
 * PINNED for retrieval determinism - bump carefully.
 * Ingestion and retrieval must use the same model.
 */
export const EMBEDDING_MODEL = "text-embedding-3-small";
export const EMBEDDING_DIMENSIONS = 1536;

/** Longest input sent to the embedding model, in characters */
const MAX_INPUT_CHARS = 8000;

/**
 * Text → dense vector capability.
 */
export interface EmbeddingService {
  embed(text: string): Promise<number[]>;
}

export function createOpenAIEmbeddings(client: OpenAI, model: string = EMBEDDING_MODEL): EmbeddingService {
  return {
    async embed(text) {
      try {
        const response = await client.embeddings.create({
          model,
          input: text.slice(0, MAX_INPUT_CHARS),
          dimensions: EMBEDDING_DIMENSIONS,
        });
        const embedding = response.data[0]?.embedding;
        if (!embedding) {
          throw new Error("No embedding returned from OpenAI");
        }
        return embedding;
      } catch (err) {
        logger.error("Embedding generation failed", {
          stage: "retrieval",
          textPreview: text.slice(0, 50),
          error: err,
        });
        throw embeddingError("Embedding generation failed", err);
      }
    },
  };
}
