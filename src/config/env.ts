import { z } from "zod";

// ============================================
// Environment configuration with validation
// Fails fast on startup if config is invalid
// ============================================

const numberFromEnv = (fallback: string) => z.string().default(fallback).transform(Number).pipe(z.number().finite());

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // OpenAI
  OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),
  ROUTER_MODEL: z.string().default("gpt-4o-mini"),
  CHAT_MODEL: z.string().default("gpt-4o-mini"),

  // Supabase (optional - only needed when retrieval or ingestion runs)
  SUPABASE_URL: z.string().url("SUPABASE_URL must be a valid URL").optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().optional(),

  // Router
  VOCABULARY_PATH: z.string().default("config/vocabulary.json"),
  ROUTER_MIN_RULE_CONFIDENCE: numberFromEnv("0.6").pipe(z.number().min(0).max(1)),
  ROUTER_DISPATCH_CONFIDENCE: numberFromEnv("0.6").pipe(z.number().min(0).max(1)),

  // Retrieval
  RAG_ENABLED: z
    .string()
    .default("false")
    .transform((v) => v === "true" || v === "1"),
  VECTOR_TABLE: z.string().default("knowledge_chunks"),
  VECTOR_MATCH_RPC: z.string().default("match_knowledge_chunks"),
  VECTOR_NAMESPACE: z.string().min(1).default("clinic"),
  RAG_TOP_K: numberFromEnv("3").pipe(z.number().int().positive()),
  CONTEXT_CHAR_LIMIT: numberFromEnv("8000").pipe(z.number().int().positive()),

  // Ingestion
  INGEST_CHUNK_SIZE: numberFromEnv("9").pipe(z.number().int().positive()),
  INGEST_STRIDE: numberFromEnv("3").pipe(z.number().int().nonnegative()),
  INGEST_RETRY_DELAY_MS: numberFromEnv("10000").pipe(z.number().int().nonnegative()),
  INGEST_MAX_RETRIES: z
    .string()
    .optional()
    .transform((v) => (v ? Number(v) : undefined))
    .pipe(z.number().int().nonnegative().optional()),

  // Appointments
  MAX_APPOINTMENT_DAYS_AHEAD: numberFromEnv("90").pipe(z.number().int().positive()),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error("❌ Invalid environment configuration:");
    for (const issue of result.error.issues) {
      console.error(`   ${issue.path.join(".")}: ${issue.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

// Validate on module load
export const env = validateEnv();

// Derived config for convenience
export const config = {
  isDev: env.NODE_ENV === "development",
  isProd: env.NODE_ENV === "production",

  openai: {
    apiKey: env.OPENAI_API_KEY,
    routerModel: env.ROUTER_MODEL,
    chatModel: env.CHAT_MODEL,
  },

  supabase: {
    url: env.SUPABASE_URL,
    serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY,
    isConfigured: Boolean(env.SUPABASE_URL && env.SUPABASE_SERVICE_ROLE_KEY),
  },

  router: {
    vocabularyPath: env.VOCABULARY_PATH,
    minRuleConfidence: env.ROUTER_MIN_RULE_CONFIDENCE,
    dispatchConfidence: env.ROUTER_DISPATCH_CONFIDENCE,
  },

  rag: {
    enabled: env.RAG_ENABLED,
    table: env.VECTOR_TABLE,
    matchRpc: env.VECTOR_MATCH_RPC,
    namespace: env.VECTOR_NAMESPACE,
    topK: env.RAG_TOP_K,
    contextCharLimit: env.CONTEXT_CHAR_LIMIT,
  },

  ingest: {
    chunkSize: env.INGEST_CHUNK_SIZE,
    stride: env.INGEST_STRIDE,
    retryDelayMs: env.INGEST_RETRY_DELAY_MS,
    maxRetries: env.INGEST_MAX_RETRIES,
  },

  appointments: {
    maxDaysAhead: env.MAX_APPOINTMENT_DAYS_AHEAD,
  },
} as const;
