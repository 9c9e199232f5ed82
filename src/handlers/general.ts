// ============================================
// General Handler — replies for messages no service claimed
// ============================================

import { logger, type RequestLogger } from "../lib/logger.js";
import { wrapError } from "../lib/errors.js";
import { CHOOSE_SERVICE_REPLY, GENERAL_SYSTEM_PROMPT, SERVICE_CHOICE_NOTE } from "../llm/prompts.js";
import { appendExchange, recentMessages, type ConversationState } from "../chat/conversation.js";
import type { ChatMessage, GenerationService } from "../llm/client.js";

export type GeneralDeps = {
  generation: GenerationService;
  model?: string;
  log?: RequestLogger;
};

export type GeneralResult = {
  reply: string;
  state: ConversationState;
  /** False when the fixed service menu was returned instead of a generated reply */
  generated: boolean;
};

/**
 * Answer with the general assistant, then offer the clinic's services.
 * Empty messages and generation failures get the service menu alone.
 */
export async function answerGeneral(message: string, state: ConversationState, deps: GeneralDeps): Promise<GeneralResult> {
  const log = deps.log?.withStage("general") ?? logger;

  const menu = (): GeneralResult => ({
    reply: CHOOSE_SERVICE_REPLY,
    state: appendExchange(state, message, CHOOSE_SERVICE_REPLY),
    generated: false,
  });

  if (!message.trim()) {
    return menu();
  }

  const messages: ChatMessage[] = [
    { role: "system", content: GENERAL_SYSTEM_PROMPT },
    ...recentMessages(state),
    { role: "user", content: message },
  ];

  try {
    const result = await deps.generation.generate({ messages, model: deps.model, temperature: 0.7, maxTokens: 1000 });
    if (!result.text) {
      return menu();
    }

    const reply = `${result.text}\n\n${SERVICE_CHOICE_NOTE}`;
    return { reply, state: appendExchange(state, message, reply), generated: true };
  } catch (err) {
    log.warn("General reply failed, offering the service menu", { stage: "general", error: wrapError(err) });
    return menu();
  }
}
