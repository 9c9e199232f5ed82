import "dotenv/config";
import fs from "fs";
import { config } from "../config/env.js";
import { getSupabase } from "../db/supabase.js";
import { getOpenAIClient } from "../llm/client.js";
import { createOpenAIEmbeddings } from "../retrieval/embeddings.js";
import { createSupabaseVectorIndex } from "../retrieval/vectorIndex.js";
import { ingestDirectory } from "../indexer/ingest.js";

/**
 * Ingest a document, or a directory of documents, into the knowledge index.
 */
async function main(target: string, namespace: string) {
  console.log(`\n📚 Ingesting ${target} into namespace "${namespace}"`);

  const index = createSupabaseVectorIndex(getSupabase(), {
    table: config.rag.table,
    matchRpc: config.rag.matchRpc,
  });

  const summary = await ingestDirectory(target, {
    embeddings: createOpenAIEmbeddings(getOpenAIClient()),
    index,
    namespace,
    chunkSize: config.ingest.chunkSize,
    stride: config.ingest.stride,
    retryDelayMs: config.ingest.retryDelayMs,
    maxRetries: config.ingest.maxRetries,
  });

  const { vectorCount } = await index.describeNamespace(namespace);

  console.log(`\n✅ Documents: ${summary.documents}`);
  console.log(`   Chunks:    ${summary.chunks}`);
  console.log(`   Namespace now holds ${vectorCount} chunks`);

  if (summary.failed.length > 0) {
    console.log(`\n⚠️  ${summary.failed.length} document(s) failed:`);
    for (const { file, error } of summary.failed) {
      console.log(`   - ${file}: ${error}`);
    }
    process.exitCode = 1;
  }
}

// Main
const target = process.argv[2];
const namespace = process.argv[3] ?? config.rag.namespace;

if (!target) {
  console.error("Usage: npx tsx src/scripts/ingestDocuments.ts <file-or-directory> [namespace]");
  process.exit(1);
}

if (!fs.existsSync(target)) {
  console.error(`Path not found: ${target}`);
  process.exit(1);
}

main(target, namespace).catch((err: unknown) => {
  console.error("❌ Ingestion failed:", err);
  process.exit(1);
});
