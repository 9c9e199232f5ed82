// ============================================
// Public API
// ============================================

export { createClinicServices, type ClinicServices } from "./app/services.js";

// Routing
export {
  createIntentRouter,
  createIntentRouterFromFile,
  serializeRoutingResult,
  type IntentRouter,
  type IntentRouterOptions,
} from "./router/routeMessage.js";
export { classifyWithKeywords } from "./router/heuristics.js";
export { compileVocabulary, loadVocabulary, type Vocabulary } from "./router/vocabulary.js";
export { classifyWithLLM } from "./llm/routerLLM.js";
export type { Intent, RoutingDecision, RoutingResult, RoutingRecord, NextService } from "./router/types.js";

// Retrieval
export { createRetrievalClient, type RetrievalClient, type RetrievedChunk } from "./retrieval/retrieve.js";
export { assembleContext, getContextString, KNOWLEDGE_DELIMITER } from "./retrieval/context.js";
export { createOpenAIEmbeddings, type EmbeddingService } from "./retrieval/embeddings.js";
export { createSupabaseVectorIndex, type VectorIndex } from "./retrieval/vectorIndex.js";

// Ingestion
export { ingestDocument, ingestDirectory, ingestText, documentIdFromPath } from "./indexer/ingest.js";

// Conversation
export { handleMessage, type ChatDeps, type ChatResponse } from "./chat/handleMessage.js";
export { createConversation, appendMessage, recentMessages, type ConversationState } from "./chat/conversation.js";
export { answerQuestion } from "./handlers/qna.js";
export { handleAppointmentMessage, detectAppointmentOperation } from "./handlers/appointments.js";
export { generateAvailableSlots, type TimeSlot } from "./appointments/slots.js";
export { parseAppointmentAction, type AppointmentAction } from "./appointments/actions.js";
export { createInMemoryAppointmentStore } from "./appointments/memoryStore.js";
export type { Appointment, AppointmentStore } from "./appointments/types.js";

// LLM
export { createOpenAIGeneration, type GenerationService, type GenerationResult } from "./llm/client.js";

// Errors
export { ClinicError, type ErrorCode } from "./lib/errors.js";
