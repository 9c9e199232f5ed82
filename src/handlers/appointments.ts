// ============================================
// Appointment Handler — direct store operations, otherwise a tool-enabled assistant turn
// ============================================

import { logger, type RequestLogger } from "../lib/logger.js";
import { getUserMessage, wrapError } from "../lib/errors.js";
import { buildAppointmentSystemPrompt } from "../llm/prompts.js";
import { getContextString } from "../retrieval/context.js";
import { appendExchange, recentMessages, type ConversationState } from "../chat/conversation.js";
import { BOOK_APPOINTMENT_TOOL, parseAppointmentAction, stripActionJson, type AppointmentAction } from "../appointments/actions.js";
import { generateAvailableSlots, DEFAULT_MAX_DAYS_AHEAD } from "../appointments/slots.js";
import { parseDateTime } from "../appointments/format.js";
import {
  bookAppointment,
  cancelAppointment,
  listAppointments,
  updateAppointment,
  type AppointmentOutcome,
  type OperationResult,
} from "../appointments/operations.js";
import type { AppointmentStore } from "../appointments/types.js";
import type { ChatMessage, GenerationService } from "../llm/client.js";
import type { RetrievalClient } from "../retrieval/retrieve.js";

export type AppointmentOperation = "cancel" | "update" | "list" | "create" | "general";

// Checked in this order; the first list with a match wins
const OPERATION_KEYWORDS: ReadonlyArray<[AppointmentOperation, readonly string[]]> = [
  ["cancel", ["cancel", "delete", "remove appointment"]],
  ["update", ["reschedule", "change", "move", "update", "modify appointment"]],
  [
    "list",
    [
      "my appointment",
      "list appointment",
      "show appointment",
      "show my",
      "list my",
      "view appointment",
      "view my",
      "upcoming appointments",
      "appointment history",
      "see my appointments",
      "all appointments",
      "next appointment",
      "check my appointments",
      "display appointments",
      "get my appointments",
      "what appointments",
    ],
  ],
  [
    "create",
    [
      "book",
      "schedule",
      "make appointment",
      "need appointment",
      "want appointment",
      "see a doctor",
      "consultation",
      "check-up",
      "available",
      "time slot",
    ],
  ],
  ["general", ["appointment"]],
];

const OPERATION_PATTERNS = OPERATION_KEYWORDS.map(
  ([operation, keywords]) => [operation, keywords.map(keywordPattern)] as const
);

/**
 * Whole-word match for a keyword, allowing plural and verb endings on its last
 * word ("booking", "cancellation", "rescheduling"). "remove" does not match "move".
 */
function keywordPattern(keyword: string): RegExp {
  const escaped = keyword.replace(/[.*+?^${}()|[\]\\]/g, "\\$&").replace(/\s+/g, "\\s+");
  const stem = escaped.endsWith("e") ? `${escaped.slice(0, -1)}e?` : escaped;
  return new RegExp(`\\b${stem}(?:s|es|d|ed|ing|led|ling|lation)?\\b`);
}

/** Phrases that start a fresh booking; history is trimmed so earlier doctors are not reused */
const NEW_REQUEST_KEYWORDS = [
  "another appointment",
  "new appointment",
  "different doctor",
  "see a different",
  "book another",
  "schedule another",
  "need to see",
  "want to see",
  "appointment for",
];
const NEW_REQUEST_HISTORY = 4;

/** Text that claims a booking happened */
const BOOKING_CLAIMS = ["booked", "scheduled", "appointment has been", "confirmed your appointment"];

/** "#12", "appointment 12", "appointment number 12", "appointment no. 12" */
const APPOINTMENT_ID = /(?:#\s*|\bappointment\s+(?:number\s+|no\.?\s*)?)(\d+)\b/i;
const SLOTS_SHOWN = 10;

/**
 * Which appointment operation a message asks for, by keyword precedence
 * cancel > update > list > create > general. Null when appointments are not mentioned.
 */
export function detectAppointmentOperation(message: string): AppointmentOperation | null {
  const text = message.toLowerCase();
  for (const [operation, patterns] of OPERATION_PATTERNS) {
    if (patterns.some((p) => p.test(text))) {
      return operation;
    }
  }
  return null;
}

export type AppointmentDeps = {
  generation: GenerationService;
  store: AppointmentStore;
  patientId: string;
  /** Doctor and schedule knowledge for the assistant prompt */
  retrieval?: RetrievalClient;
  topK?: number;
  model?: string;
  maxDaysAhead?: number;
  now?: () => Date;
  log?: RequestLogger;
};

export type AppointmentResult = {
  reply: string;
  state: ConversationState;
  operation: AppointmentOperation | null;
  /** Present when an appointment action ran */
  appointment?: AppointmentOutcome;
};

export async function handleAppointmentMessage(
  message: string,
  state: ConversationState,
  deps: AppointmentDeps
): Promise<AppointmentResult> {
  const log = deps.log?.withStage("appointments") ?? logger;
  const operation = detectAppointmentOperation(message);

  const finish = (reply: string, appointment?: AppointmentOutcome): AppointmentResult => ({
    reply,
    state: appendExchange(state, message, reply),
    operation,
    ...(appointment && { appointment }),
  });

  log.info("Handling appointment message", { stage: "appointments", operation });

  try {
    // List and cancel-by-number need no assistant turn
    if (operation === "list") {
      const { reply, outcome } = await listAppointments(deps.store, deps.patientId);
      return finish(reply, outcome);
    }

    const idMatch = message.match(APPOINTMENT_ID);
    if (operation === "cancel" && idMatch?.[1]) {
      const { reply, outcome } = await cancelAppointment(deps.store, deps.patientId, Number(idMatch[1]));
      return finish(reply, outcome);
    }

    return await runAssistantTurn(message, state, deps, finish);
  } catch (err) {
    const error = wrapError(err);
    log.error("Appointment request failed", { stage: "appointments", operation, error });
    return finish(getUserMessage(error));
  }
}

async function runAssistantTurn(
  message: string,
  state: ConversationState,
  deps: AppointmentDeps,
  finish: (reply: string, appointment?: AppointmentOutcome) => AppointmentResult
): Promise<AppointmentResult> {
  const { generation, retrieval, topK = 3, model } = deps;
  const now = deps.now?.() ?? new Date();

  const knowledge = retrieval ? await getContextString(retrieval, message, topK) : "";

  const isNewRequest = NEW_REQUEST_KEYWORDS.some((k) => message.toLowerCase().includes(k));
  const history = recentMessages(state, isNewRequest ? NEW_REQUEST_HISTORY : undefined);

  const messages: ChatMessage[] = [
    { role: "system", content: buildAppointmentSystemPrompt(now, knowledge || undefined) },
    ...history,
    { role: "user", content: message },
  ];

  const result = await generation.generate({
    messages,
    model,
    tools: [BOOK_APPOINTMENT_TOOL],
    temperature: 0.3,
    maxTokens: 1000,
  });

  const action = parseAppointmentAction(result);
  if (!action) {
    let reply = result.text;
    if (BOOKING_CLAIMS.some((k) => reply.toLowerCase().includes(k))) {
      reply += "\n\n⚠️ Note: To complete the booking, please confirm all details.";
    }
    return finish(reply);
  }

  const { reply, outcome } = await applyAction(action, deps, now);
  const assistantText = stripActionJson(result.text);
  return finish(combineReplies(assistantText, reply, outcome), outcome);
}

async function applyAction(action: AppointmentAction, deps: AppointmentDeps, now: Date): Promise<OperationResult> {
  const { store, patientId, maxDaysAhead = DEFAULT_MAX_DAYS_AHEAD } = deps;

  switch (action.action) {
    case "book_appointment":
      return bookAppointment(store, patientId, action.appointment_details);

    case "show_slots": {
      const request = action.slot_request;
      const slots = generateAvailableSlots({
        start: request.start_date ? parseDateTime(request.start_date) : now,
        daysAhead: request.days_ahead,
        doctorName: request.doctor_name,
        now,
        maxDaysAhead,
      }).slice(0, SLOTS_SHOWN);

      const reply =
        slots.length === 0
          ? "There are no open slots in that range. Would you like to try other dates?"
          : "📅 **Available Appointments:**\n" + slots.map((s, i) => `${i + 1}. ${s.formatted}`).join("\n");
      return { reply, outcome: { action: "show_slots", success: true, slots } };
    }

    case "list_appointments":
      return listAppointments(store, patientId);

    case "cancel_appointment":
      return cancelAppointment(store, patientId, action.appointment_id);

    case "update_appointment": {
      const { updates } = action;
      return updateAppointment(store, patientId, action.appointment_id, {
        scheduledTime: updates.scheduled_time ? parseDateTime(updates.scheduled_time) : undefined,
        durationMinutes: updates.duration_minutes,
        isVirtual: updates.is_virtual,
        notes: updates.notes,
      });
    }
  }
}

/**
 * Assistant prose (with its JSON removed) followed by the operation's reply.
 * Without prose, a slot list gets a short lead-in and anything else stands on its own.
 */
function combineReplies(assistantText: string, operationReply: string, outcome: AppointmentOutcome): string {
  if (!assistantText) {
    return outcome.slots?.length ? `Here are the available appointment slots:\n\n${operationReply}` : operationReply;
  }
  return `${assistantText}\n\n${operationReply}`;
}
