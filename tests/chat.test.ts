// ============================================
// Chat Orchestration Tests
// ============================================

import { describe, it, expect, vi } from "vitest";
import { handleMessage, type ChatDeps } from "../src/chat/handleMessage.js";
import { createIntentRouter } from "../src/router/routeMessage.js";
import { loadVocabulary } from "../src/router/vocabulary.js";
import { createInMemoryAppointmentStore } from "../src/appointments/memoryStore.js";
import { createConversation } from "../src/chat/conversation.js";
import { CHOOSE_SERVICE_REPLY, GENERAL_SYSTEM_PROMPT, QNA_SYSTEM_PROMPT, SERVICE_CHOICE_NOTE } from "../src/llm/prompts.js";
import { fakeGeneration, text } from "./fakes.js";

const vocabulary = loadVocabulary("config/vocabulary.json");

function setup(reply: string | Error) {
  const generation = fakeGeneration(typeof reply === "string" ? text(reply) : reply);
  const router = createIntentRouter({ vocabulary });
  const deps: ChatDeps = {
    router,
    generation: generation.service,
    appointments: createInMemoryAppointmentStore(),
    patientId: "patient-1",
    now: () => new Date(2024, 10, 11, 10, 15),
  };
  return { deps, router, requests: generation.requests };
}

describe("handleMessage", () => {
  it("sends scheduling messages to the appointment assistant", async () => {
    const { deps, requests } = setup("Which doctor would you like to see?");

    const response = await handleMessage("I want to book an appointment", createConversation("c1"), deps);

    expect(response.routing.nextService).toBe("appointment_service");
    expect(response.reply).toBe("Which doctor would you like to see?");
    expect(requests[0]?.tools?.[0]?.function.name).toBe("book_appointment");
  });

  it("returns the appointment outcome when one ran", async () => {
    const { deps } = setup("unused");

    const response = await handleMessage("Show my appointments", createConversation("c1"), deps);

    expect(response.routing.nextService).toBe("appointment_service");
    expect(response.appointment).toEqual({ action: "list_appointments", success: true, appointments: [] });
  });

  it("sends questions to the Q&A assistant", async () => {
    const { deps, requests } = setup("We are open 8am to 6pm on weekdays.");

    const response = await handleMessage("What are your operating hours?", createConversation("c1"), deps);

    expect(response.routing.nextService).toBe("qna_service");
    expect(response.reply).toBe("We are open 8am to 6pm on weekdays.");
    expect(requests[0]?.messages[0]).toEqual({ role: "system", content: QNA_SYSTEM_PROMPT });
    expect(response.appointment).toBeUndefined();
  });

  it("asks the user to choose when the message is empty", async () => {
    const { deps, requests } = setup("unused");

    const response = await handleMessage("   ", createConversation("c1"), deps);

    expect(response.routing.nextService).toBe("frontend");
    expect(response.routing.rawResult.source).toBe("guard");
    expect(response.reply).toBe(CHOOSE_SERVICE_REPLY);
    expect(requests).toHaveLength(0);
    expect(response.state.messages).toEqual([
      { role: "user", content: "" },
      { role: "assistant", content: CHOOSE_SERVICE_REPLY },
    ]);
  });

  it("answers unclear messages with the general assistant and offers the services", async () => {
    const { deps, requests } = setup("Hello! How are you feeling today?");

    const response = await handleMessage("Hello there", createConversation("c1"), deps);

    const reply = `Hello! How are you feeling today?\n\n${SERVICE_CHOICE_NOTE}`;
    expect(response.routing.nextService).toBe("frontend");
    expect(response.reply).toBe(reply);
    expect(requests).toHaveLength(1);
    expect(requests[0]?.temperature).toBe(0.7);
    expect(requests[0]?.messages).toEqual([
      { role: "system", content: GENERAL_SYSTEM_PROMPT },
      { role: "user", content: "Hello there" },
    ]);
    expect(response.state.messages).toEqual([
      { role: "user", content: "Hello there" },
      { role: "assistant", content: reply },
    ]);
  });

  it("falls back to the service menu when the general reply fails", async () => {
    const { deps, requests } = setup(new Error("model unavailable"));

    const response = await handleMessage("Hello there", createConversation("c1"), deps);

    expect(requests).toHaveLength(1);
    expect(response.reply).toBe(CHOOSE_SERVICE_REPLY);
    expect(response.state.messages[1]).toEqual({ role: "assistant", content: CHOOSE_SERVICE_REPLY });
  });

  it("routes the trimmed message", async () => {
    const { deps, router } = setup("ok");
    const route = vi.spyOn(router, "route");

    await handleMessage("  What are your operating hours?  ", createConversation("c1"), deps);

    expect(route).toHaveBeenCalledWith("What are your operating hours?");
  });

  it("leaves the input state untouched", async () => {
    const { deps } = setup("We are open 8am to 6pm on weekdays.");
    const state = createConversation("c1");

    const response = await handleMessage("What are your operating hours?", state, deps);

    expect(state.messages).toEqual([]);
    expect(response.state.id).toBe("c1");
    expect(response.state.messages).toHaveLength(2);
  });
});
