// ============================================
// Appointment Action Parsing Tests
// ============================================

import { describe, it, expect } from "vitest";
import { parseAppointmentAction, stripActionJson } from "../src/appointments/actions.js";
import type { GenerationResult } from "../src/llm/client.js";

const toolCall = (args: string, text = ""): GenerationResult => ({
  type: "tool_call",
  name: "book_appointment",
  arguments: args,
  text,
});
const reply = (text: string): GenerationResult => ({ type: "text", text });

describe("parseAppointmentAction", () => {
  it("reads a book_appointment tool call and applies defaults", () => {
    const action = parseAppointmentAction(
      toolCall('{"doctor_name": "Dr. Rivera", "scheduled_time": "2024-11-22T10:00:00", "reason": "Shoulder pain"}')
    );

    expect(action).toEqual({
      action: "book_appointment",
      appointment_details: {
        doctor_name: "Dr. Rivera",
        scheduled_time: "2024-11-22T10:00:00",
        reason: "Shoulder pain",
        appointment_type: "consultation",
        is_virtual: false,
        duration_minutes: 30,
      },
    });
  });

  it("reads an action embedded in assistant text", () => {
    const action = parseAppointmentAction(
      reply('Let me cancel that for you.\n{"action": "cancel_appointment", "appointment_id": "7"}')
    );
    expect(action).toEqual({ action: "cancel_appointment", appointment_id: 7 });
  });

  it("reads a reschedule request", () => {
    const action = parseAppointmentAction(
      reply('{"action": "update_appointment", "appointment_id": 5, "updates": {"scheduled_time": "2024-11-12T15:00:00"}}')
    );
    expect(action).toEqual({
      action: "update_appointment",
      appointment_id: 5,
      updates: { scheduled_time: "2024-11-12T15:00:00" },
    });
  });

  it("defaults an empty slot request", () => {
    expect(parseAppointmentAction(reply('{"action": "show_slots"}'))).toEqual({ action: "show_slots", slot_request: {} });
  });

  it.each([
    ["plain text", "Which doctor would you like to see?"],
    ["unknown action", '{"action": "delete_everything"}'],
    ["malformed JSON", '{"action": "list_appointments",}'],
    ["invalid appointment type", '{"action": "book_appointment", "appointment_details": {"doctor_name": "Dr. A", "scheduled_time": "2024-11-22T10:00:00", "appointment_type": "surgery"}}'],
    ["unparseable time", '{"action": "book_appointment", "appointment_details": {"doctor_name": "Dr. A", "scheduled_time": "soon"}}'],
    ["missing appointment id", '{"action": "cancel_appointment"}'],
  ])("returns null for %s", (_label, content) => {
    expect(parseAppointmentAction(reply(content))).toBeNull();
  });

  it("ignores a tool call with incomplete arguments", () => {
    expect(parseAppointmentAction(toolCall('{"doctor_name": "Dr. Rivera"}'))).toBeNull();
  });

  it("falls back to text when tool arguments are not JSON", () => {
    const action = parseAppointmentAction(toolCall("{oops", '{"action": "list_appointments"}'));
    expect(action).toEqual({ action: "list_appointments" });
  });
});

describe("stripActionJson", () => {
  it("removes the JSON object and trims", () => {
    expect(stripActionJson('Booking now.\n\n{"action": "list_appointments"}\n')).toBe("Booking now.");
  });

  it("leaves text without JSON unchanged", () => {
    expect(stripActionJson("Happy to help.")).toBe("Happy to help.");
  });
});
