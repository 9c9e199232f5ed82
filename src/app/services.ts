// ============================================
// Service wiring — build the router, retrieval and handlers from configuration
// ============================================

import { config } from "../config/env.js";
import { logger } from "../lib/logger.js";
import { getSupabase } from "../db/supabase.js";
import { createOpenAIGeneration, getOpenAIClient, type GenerationService } from "../llm/client.js";
import { createIntentRouterFromFile, type IntentRouter } from "../router/routeMessage.js";
import { createOpenAIEmbeddings } from "../retrieval/embeddings.js";
import { createSupabaseVectorIndex } from "../retrieval/vectorIndex.js";
import { createRetrievalClient, type RetrievalClient } from "../retrieval/retrieve.js";
import { getContextString } from "../retrieval/context.js";
import { createInMemoryAppointmentStore } from "../appointments/memoryStore.js";
import { handleMessage, type ChatResponse } from "../chat/handleMessage.js";
import type { ConversationState } from "../chat/conversation.js";
import type { AppointmentStore } from "../appointments/types.js";
import type { RoutingDecision } from "../router/types.js";

export type ClinicServices = {
  router: IntentRouter;
  generation: GenerationService;
  /** Undefined when retrieval is disabled or the vector store is not configured */
  retrieval?: RetrievalClient;
  appointments: AppointmentStore;
  /** Dispatch decision for a message */
  routeDecision(message: string): Promise<RoutingDecision>;
  /** Delimiter-wrapped knowledge for a query, or "" */
  getContextString(query: string, topK?: number): Promise<string>;
  handleMessage(message: string, state: ConversationState, patientId: string): Promise<ChatResponse>;
};

/**
 * Wire the configured services. An appointment store can be supplied;
 * the in-memory store is used otherwise.
 */
export function createClinicServices(options: { appointments?: AppointmentStore } = {}): ClinicServices {
  const generation = createOpenAIGeneration(getOpenAIClient(), config.openai.chatModel);

  const router = createIntentRouterFromFile(config.router.vocabularyPath, {
    generation,
    model: config.openai.routerModel,
    minRuleConfidence: config.router.minRuleConfidence,
    dispatchConfidence: config.router.dispatchConfidence,
  });

  const retrieval = createConfiguredRetrieval();
  const appointments = options.appointments ?? createInMemoryAppointmentStore();

  logger.info("Services ready", {
    stage: "startup",
    retrieval: retrieval ? retrieval.namespace : "disabled",
    chatModel: config.openai.chatModel,
    routerModel: config.openai.routerModel,
  });

  return {
    router,
    generation,
    retrieval,
    appointments,

    routeDecision: (message) => router.route(message),

    async getContextString(query, topK = config.rag.topK) {
      if (!retrieval) return "";
      return getContextString(retrieval, query, topK, { charLimit: config.rag.contextCharLimit });
    },

    handleMessage: (message, state, patientId) =>
      handleMessage(message, state, {
        router,
        generation,
        appointments,
        patientId,
        retrieval,
        topK: config.rag.topK,
        contextCharLimit: config.rag.contextCharLimit,
        model: config.openai.chatModel,
        maxDaysAhead: config.appointments.maxDaysAhead,
      }),
  };
}

function createConfiguredRetrieval(): RetrievalClient | undefined {
  if (!config.rag.enabled) {
    return undefined;
  }
  if (!config.supabase.isConfigured) {
    logger.warn("RAG_ENABLED is set but Supabase is not configured; answering without retrieval", {
      stage: "config",
    });
    return undefined;
  }

  return createRetrievalClient({
    embeddings: createOpenAIEmbeddings(getOpenAIClient()),
    index: createSupabaseVectorIndex(getSupabase(), {
      table: config.rag.table,
      matchRpc: config.rag.matchRpc,
    }),
    namespace: config.rag.namespace,
    defaultTopK: config.rag.topK,
  });
}
