// ============================================
// Conversation State Tests
// ============================================

import { describe, it, expect } from "vitest";
import { appendExchange, appendMessage, createConversation, recentMessages } from "../src/chat/conversation.js";

describe("conversation state", () => {
  it("starts empty with a generated id", () => {
    const a = createConversation();
    const b = createConversation();

    expect(a.messages).toEqual([]);
    expect(a.id).not.toBe(b.id);
  });

  it("returns a new state on append", () => {
    const initial = createConversation("c1");
    const next = appendMessage(initial, "user", "hello");

    expect(initial.messages).toEqual([]);
    expect(next).toEqual({ id: "c1", messages: [{ role: "user", content: "hello" }] });
  });

  it("appends a user turn and its reply", () => {
    const state = appendExchange(createConversation("c1"), "hi", "Hello! How can I help?");

    expect(state.messages).toEqual([
      { role: "user", content: "hi" },
      { role: "assistant", content: "Hello! How can I help?" },
    ]);
  });

  it("returns the most recent messages as copies", () => {
    let state = createConversation("c1");
    state = appendExchange(state, "one", "two");
    state = appendExchange(state, "three", "four");

    const recent = recentMessages(state, 3);
    expect(recent.map((m) => m.content)).toEqual(["two", "three", "four"]);

    recent[0] = { role: "user", content: "changed" };
    expect(state.messages[1]?.content).toBe("two");
  });

  it("returns every message when no count is given or the count exceeds the history", () => {
    const state = appendExchange(createConversation("c1"), "a", "b");

    expect(recentMessages(state)).toHaveLength(2);
    expect(recentMessages(state, 10)).toHaveLength(2);
  });
});
