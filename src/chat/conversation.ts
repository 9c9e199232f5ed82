// ============================================
// Conversation State — immutable per-conversation history
// ============================================

import crypto from "crypto";
import type { ChatMessage, ChatRole } from "../llm/client.js";

export type ConversationState = {
  readonly id: string;
  readonly messages: ReadonlyArray<Readonly<ChatMessage>>;
};

/**
 * Start an empty conversation.
 */
export function createConversation(id: string = crypto.randomUUID()): ConversationState {
  return { id, messages: [] };
}

/**
 * New state with a message appended; the input state is left untouched.
 */
export function appendMessage(state: ConversationState, role: ChatRole, content: string): ConversationState {
  return {
    id: state.id,
    messages: [...state.messages, { role, content }],
  };
}

/**
 * Append a user turn and the assistant's reply.
 */
export function appendExchange(state: ConversationState, userMessage: string, reply: string): ConversationState {
  return appendMessage(appendMessage(state, "user", userMessage), "assistant", reply);
}

/**
 * The last `count` messages (all of them when `count` is omitted), as mutable copies
 * ready to hand to a generation request.
 */
export function recentMessages(state: ConversationState, count?: number): ChatMessage[] {
  const messages = count === undefined ? state.messages : state.messages.slice(Math.max(0, state.messages.length - count));
  return messages.map((m) => ({ role: m.role, content: m.content }));
}
