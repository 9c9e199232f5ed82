// ============================================
// Q&A Handler — medical questions, grounded in retrieved knowledge when available
// ============================================

import { logger, type RequestLogger } from "../lib/logger.js";
import { getUserMessage, wrapError } from "../lib/errors.js";
import { QNA_SYSTEM_PROMPT, knowledgeMessage } from "../llm/prompts.js";
import { getContextString, DEFAULT_CONTEXT_CHAR_LIMIT } from "../retrieval/context.js";
import { appendExchange, recentMessages, type ConversationState } from "../chat/conversation.js";
import type { ChatMessage, GenerationService } from "../llm/client.js";
import type { RetrievalClient } from "../retrieval/retrieve.js";

export type QnaDeps = {
  generation: GenerationService;
  /** Knowledge lookup; answers are ungrounded without it */
  retrieval?: RetrievalClient;
  topK?: number;
  contextCharLimit?: number;
  model?: string;
  log?: RequestLogger;
};

export type QnaResult = {
  reply: string;
  state: ConversationState;
  /** Whether retrieved knowledge was included in the prompt */
  grounded: boolean;
};

export async function answerQuestion(message: string, state: ConversationState, deps: QnaDeps): Promise<QnaResult> {
  const { generation, retrieval, topK = 3, contextCharLimit = DEFAULT_CONTEXT_CHAR_LIMIT, model } = deps;
  const log = deps.log?.withStage("qna") ?? logger;

  const context = retrieval ? await getContextString(retrieval, message, topK, { charLimit: contextCharLimit }) : "";

  const messages: ChatMessage[] = [{ role: "system", content: QNA_SYSTEM_PROMPT }];
  if (context) {
    messages.push({ role: "system", content: knowledgeMessage(context) });
  }
  messages.push(...recentMessages(state), { role: "user", content: message });

  let reply: string;
  try {
    const result = await generation.generate({ messages, model, temperature: 0, maxTokens: 1000 });
    reply = result.text;
  } catch (err) {
    const error = wrapError(err);
    log.error("Q&A generation failed", { stage: "qna", error });
    reply = getUserMessage(error);
  }

  log.info("Question answered", {
    stage: "qna",
    grounded: Boolean(context),
    historyLength: state.messages.length,
    replyLength: reply.length,
  });

  return { reply, state: appendExchange(state, message, reply), grounded: Boolean(context) };
}
