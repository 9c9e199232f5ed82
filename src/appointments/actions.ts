// ============================================
// Appointment Actions — structured requests extracted from assistant output
// ============================================

import { z } from "zod";
import type { ChatCompletionTool } from "openai/resources/chat/completions.js";
import { logger } from "../lib/logger.js";
import { parseDateTime } from "./format.js";
import { APPOINTMENT_TYPES, DEFAULT_DURATION_MINUTES } from "./types.js";
import type { GenerationResult } from "../llm/client.js";

// ============================================
// Tool Definition (OpenAI function calling schema)
// ============================================

export const BOOK_APPOINTMENT_TOOL_NAME = "book_appointment";

export const BOOK_APPOINTMENT_TOOL: ChatCompletionTool = {
  type: "function",
  function: {
    name: BOOK_APPOINTMENT_TOOL_NAME,
    description:
      "Book a NEW medical appointment. The user must say which doctor they want for THIS appointment; do not assume the doctor from a previous booking.",
    parameters: {
      type: "object",
      properties: {
        doctor_name: {
          type: "string",
          description: "Full name of the doctor (e.g. 'Dr. Jane Smith')",
        },
        scheduled_time: {
          type: "string",
          description: "Appointment date and time in ISO format (e.g. '2025-03-14T10:00:00')",
        },
        reason: {
          type: "string",
          description: "Reason for the appointment",
        },
        appointment_type: {
          type: "string",
          enum: [...APPOINTMENT_TYPES],
          description: "Type of appointment",
        },
        is_virtual: {
          type: "boolean",
          description: "Whether this is a virtual appointment",
        },
        duration_minutes: {
          type: "integer",
          description: `Duration in minutes (default ${DEFAULT_DURATION_MINUTES})`,
        },
      },
      required: ["doctor_name", "scheduled_time", "reason"],
    },
  },
};

// ============================================
// Schemas
// ============================================

const dateTimeString = z
  .string()
  .min(1)
  .refine((value) => !Number.isNaN(parseDateTime(value).getTime()), "Invalid date/time");

const appointmentId = z.coerce.number().int().positive();

export const AppointmentDetailsSchema = z.object({
  doctor_name: z.string().min(1),
  scheduled_time: dateTimeString,
  reason: z.string().default(""),
  appointment_type: z.enum(APPOINTMENT_TYPES).default("consultation"),
  is_virtual: z.boolean().default(false),
  duration_minutes: z.number().int().positive().default(DEFAULT_DURATION_MINUTES),
});

export const AppointmentActionSchema = z.discriminatedUnion("action", [
  z.object({
    action: z.literal("book_appointment"),
    appointment_details: AppointmentDetailsSchema,
  }),
  z.object({
    action: z.literal("show_slots"),
    slot_request: z
      .object({
        start_date: dateTimeString.optional(),
        days_ahead: z.number().int().positive().optional(),
        doctor_name: z.string().optional(),
      })
      .default({}),
  }),
  z.object({
    action: z.literal("list_appointments"),
  }),
  z.object({
    action: z.literal("cancel_appointment"),
    appointment_id: appointmentId,
  }),
  z.object({
    action: z.literal("update_appointment"),
    appointment_id: appointmentId,
    updates: z.object({
      scheduled_time: dateTimeString.optional(),
      duration_minutes: z.number().int().positive().optional(),
      is_virtual: z.boolean().optional(),
      notes: z.string().optional(),
    }),
  }),
]);

export type AppointmentDetails = z.infer<typeof AppointmentDetailsSchema>;
export type AppointmentAction = z.infer<typeof AppointmentActionSchema>;
export type AppointmentActionName = AppointmentAction["action"];

// ============================================
// Extraction
// ============================================

const EMBEDDED_OBJECT = /\{[\s\S]*\}/;

/**
 * Remove an embedded JSON object from assistant text.
 */
export function stripActionJson(text: string): string {
  return text.replace(EMBEDDED_OBJECT, "").trim();
}

/**
 * The structured action in a generation result, or null when there is none.
 * A book_appointment tool call takes precedence over JSON embedded in the text.
 */
export function parseAppointmentAction(result: GenerationResult): AppointmentAction | null {
  if (result.type === "tool_call" && result.name === BOOK_APPOINTMENT_TOOL_NAME) {
    const args = parseObject(result.arguments);
    if (args !== undefined) {
      const action = validate({ action: "book_appointment", appointment_details: args });
      if (action) return action;
    }
  }

  const match = result.text.match(EMBEDDED_OBJECT);
  if (!match) return null;

  const candidate = parseObject(match[0]);
  return candidate === undefined ? null : validate(candidate);
}

function parseObject(json: string): unknown {
  try {
    return JSON.parse(json);
  } catch (err) {
    logger.debug("Ignoring non-JSON appointment payload", {
      stage: "appointments",
      error: err instanceof Error ? err.message : String(err),
    });
    return undefined;
  }
}

function validate(candidate: unknown): AppointmentAction | null {
  const parsed = AppointmentActionSchema.safeParse(candidate);
  if (!parsed.success) {
    logger.warn("Appointment action failed validation", {
      stage: "appointments",
      issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
    return null;
  }
  return parsed.data;
}
