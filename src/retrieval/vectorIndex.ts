// ============================================
// Vector Index — namespaced nearest-neighbour store
// Backed by a pgvector table in Supabase
// ============================================

import { z } from "zod";
import type { SupabaseClient } from "@supabase/supabase-js";
import { logger } from "../lib/logger.js";
import { retrievalError } from "../lib/errors.js";

/**
 * Metadata stored alongside every ingested chunk.
 */
export const ChunkMetadataSchema = z.object({
  text: z.string().min(1),
  source_file: z.string().default("unknown"),
  document_id: z.string().optional(),
  chunk_index: z.number().int().optional(),
  line_start: z.number().int().optional(),
  line_end: z.number().int().optional(),
});

export type ChunkMetadata = z.infer<typeof ChunkMetadataSchema>;

export type VectorRecord = {
  id: string;
  values: number[];
  metadata: ChunkMetadata;
};

/**
 * A nearest-neighbour hit. Metadata is returned as stored; callers validate it.
 */
export type VectorMatch = {
  id: string;
  score: number;
  metadata: Record<string, unknown>;
};

export interface VectorIndex {
  readonly name: string;
  upsert(namespace: string, records: VectorRecord[]): Promise<void>;
  /** Matches ordered by descending similarity */
  query(namespace: string, vector: number[], topK: number): Promise<VectorMatch[]>;
  /** Remove the chunks of a document, except the ids in `keep`; returns how many were removed */
  deleteDocument(namespace: string, documentId: string, keep?: readonly string[]): Promise<number>;
  describeNamespace(namespace: string): Promise<{ vectorCount: number }>;
}

// ============================================
// Supabase / pgvector implementation
// ============================================

const MatchRowSchema = z.object({
  id: z.string(),
  content: z.string().nullable().optional(),
  metadata: z.record(z.unknown()).nullable(),
  similarity: z.number(),
});

export type SupabaseVectorIndexOptions = {
  /** Table holding chunk rows */
  table: string;
  /** Similarity-search function, see supabase/migrations */
  matchRpc: string;
};

export function createSupabaseVectorIndex(
  supabase: SupabaseClient,
  options: SupabaseVectorIndexOptions
): VectorIndex {
  const { table, matchRpc } = options;

  return {
    name: table,

    async upsert(namespace, records) {
      if (records.length === 0) return;

      const rows = records.map((r) => ({
        id: r.id,
        namespace,
        content: r.metadata.text,
        metadata: r.metadata,
        embedding: r.values,
      }));

      const { error } = await supabase.from(table).upsert(rows, { onConflict: "id" });
      if (error) {
        throw retrievalError("Vector upsert failed", error, { table, namespace, count: rows.length });
      }
    },

    async query(namespace, vector, topK) {
      const { data, error } = await supabase.rpc(matchRpc, {
        query_embedding: vector,
        match_count: topK,
        match_namespace: namespace,
      });

      if (error) {
        throw retrievalError("Vector query failed", error, { table, namespace });
      }

      const parsed = z.array(MatchRowSchema).safeParse(data ?? []);
      if (!parsed.success) {
        throw retrievalError("Malformed vector query response", parsed.error, { table, namespace });
      }

      return parsed.data.map((row) => ({
        id: row.id,
        score: row.similarity,
        metadata: row.metadata ?? {},
      }));
    },

    async deleteDocument(namespace, documentId, keep = []) {
      let request = supabase
        .from(table)
        .delete({ count: "exact" })
        .eq("namespace", namespace)
        .eq("metadata->>document_id", documentId);
      if (keep.length > 0) {
        request = request.not("id", "in", `(${keep.map(quoteFilterValue).join(",")})`);
      }

      const { error, count } = await request;

      if (error) {
        throw retrievalError("Vector delete failed", error, { table, namespace, documentId });
      }

      logger.debug("Deleted document chunks", {
        stage: "indexer",
        namespace,
        documentId,
        kept: keep.length,
        count: count ?? 0,
      });
      return count ?? 0;
    },

    async describeNamespace(namespace) {
      const { error, count } = await supabase
        .from(table)
        .select("id", { count: "exact", head: true })
        .eq("namespace", namespace);

      if (error) {
        throw retrievalError("Vector stats query failed", error, { table, namespace });
      }
      return { vectorCount: count ?? 0 };
    },
  };
}

/** Quote a value for a PostgREST `in` list */
function quoteFilterValue(value: string): string {
  return `"${value.replace(/(["\\])/g, "\\$1")}"`;
}
