// ============================================
// Chat Orchestration — route a message, then answer it
// ============================================

import crypto from "crypto";
import { createRequestLogger } from "../lib/logger.js";
import { answerQuestion } from "../handlers/qna.js";
import { handleAppointmentMessage } from "../handlers/appointments.js";
import { answerGeneral } from "../handlers/general.js";
import type { ConversationState } from "./conversation.js";
import type { IntentRouter } from "../router/routeMessage.js";
import type { RoutingDecision } from "../router/types.js";
import type { AppointmentOutcome } from "../appointments/operations.js";
import type { AppointmentStore } from "../appointments/types.js";
import type { GenerationService } from "../llm/client.js";
import type { RetrievalClient } from "../retrieval/retrieve.js";

export type ChatDeps = {
  router: IntentRouter;
  generation: GenerationService;
  appointments: AppointmentStore;
  patientId: string;
  retrieval?: RetrievalClient;
  topK?: number;
  contextCharLimit?: number;
  model?: string;
  maxDaysAhead?: number;
  now?: () => Date;
};

export type ChatResponse = {
  reply: string;
  state: ConversationState;
  routing: RoutingDecision;
  appointment?: AppointmentOutcome;
};

/**
 * Handle one user turn. The returned state includes the user message and the reply;
 * the input state is not modified. Messages no service claims get a general reply
 * followed by the service menu.
 */
export async function handleMessage(message: string, state: ConversationState, deps: ChatDeps): Promise<ChatResponse> {
  const requestId = crypto.randomUUID().slice(0, 8);
  const log = createRequestLogger(requestId, "chat");
  const startTime = Date.now();
  const text = message.trim();

  const routing = await deps.router.route(text);

  log.info("Message routed", {
    conversationId: state.id,
    nextService: routing.nextService,
    intent: routing.intent,
    confidence: routing.confidence,
    source: routing.rawResult.source,
  });

  let response: ChatResponse;

  switch (routing.nextService) {
    case "appointment_service": {
      const result = await handleAppointmentMessage(text, state, {
        generation: deps.generation,
        store: deps.appointments,
        patientId: deps.patientId,
        retrieval: deps.retrieval,
        topK: deps.topK,
        model: deps.model,
        maxDaysAhead: deps.maxDaysAhead,
        now: deps.now,
        log,
      });
      response = {
        reply: result.reply,
        state: result.state,
        routing,
        ...(result.appointment && { appointment: result.appointment }),
      };
      break;
    }

    case "qna_service": {
      const result = await answerQuestion(text, state, {
        generation: deps.generation,
        retrieval: deps.retrieval,
        topK: deps.topK,
        contextCharLimit: deps.contextCharLimit,
        model: deps.model,
        log,
      });
      response = { reply: result.reply, state: result.state, routing };
      break;
    }

    case "frontend": {
      const result = await answerGeneral(text, state, {
        generation: deps.generation,
        model: deps.model,
        log,
      });
      response = { reply: result.reply, state: result.state, routing };
      break;
    }
  }

  log.info("Message handled", {
    conversationId: state.id,
    nextService: routing.nextService,
    latencyMs: Date.now() - startTime,
  });

  return response;
}
