// ============================================
// Appointment Operations — store mutations with user-facing replies
// ============================================

import { logger } from "../lib/logger.js";
import {
  formatAppointmentList,
  formatBookingConfirmation,
  formatCancellation,
  formatUpdate,
  parseDateTime,
} from "./format.js";
import {
  CLINIC_LOCATION,
  VIRTUAL_LOCATION,
  type Appointment,
  type AppointmentChanges,
  type AppointmentStore,
} from "./types.js";
import type { AppointmentActionName, AppointmentDetails } from "./actions.js";
import type { TimeSlot } from "./slots.js";

/**
 * Structured result of an appointment operation, returned alongside the reply.
 */
export type AppointmentOutcome = {
  action: AppointmentActionName;
  success: boolean;
  appointment?: Appointment;
  appointments?: Appointment[];
  slots?: TimeSlot[];
  error?: string;
};

export type OperationResult = {
  reply: string;
  outcome: AppointmentOutcome;
};

export async function listAppointments(store: AppointmentStore, patientId: string): Promise<OperationResult> {
  const appointments = await store.listForPatient(patientId);

  if (appointments.length === 0) {
    return {
      reply: "You don't have any appointments scheduled yet. Would you like to book one?",
      outcome: { action: "list_appointments", success: true, appointments },
    };
  }

  return {
    reply: formatAppointmentList(appointments),
    outcome: { action: "list_appointments", success: true, appointments },
  };
}

export async function cancelAppointment(
  store: AppointmentStore,
  patientId: string,
  appointmentId: number
): Promise<OperationResult> {
  const existing = await store.findById(patientId, appointmentId);

  if (!existing) {
    return notFound("cancel_appointment", appointmentId);
  }
  if (existing.status === "cancelled") {
    return {
      reply: `Appointment #${appointmentId} is already cancelled.`,
      outcome: { action: "cancel_appointment", success: false, error: "Already cancelled" },
    };
  }

  const cancelled = await store.update(patientId, appointmentId, { status: "cancelled" });
  if (!cancelled) {
    return notFound("cancel_appointment", appointmentId);
  }

  logger.info("Appointment cancelled", { stage: "appointments", appointmentId, patientId });
  return {
    reply: formatCancellation(cancelled),
    outcome: { action: "cancel_appointment", success: true, appointment: cancelled },
  };
}

export type UpdateRequest = {
  scheduledTime?: Date;
  durationMinutes?: number;
  isVirtual?: boolean;
  notes?: string;
};

export async function updateAppointment(
  store: AppointmentStore,
  patientId: string,
  appointmentId: number,
  request: UpdateRequest
): Promise<OperationResult> {
  const existing = await store.findById(patientId, appointmentId);

  if (!existing) {
    return notFound("update_appointment", appointmentId);
  }
  if (existing.status === "cancelled") {
    return {
      reply: `Appointment #${appointmentId} is cancelled. Would you like to book a new one instead?`,
      outcome: { action: "update_appointment", success: false, error: "Appointment is cancelled" },
    };
  }

  const changes: AppointmentChanges = {};
  if (request.scheduledTime) changes.scheduledTime = request.scheduledTime;
  if (request.durationMinutes !== undefined) changes.durationMinutes = request.durationMinutes;
  if (request.notes !== undefined) changes.notes = request.notes;
  if (request.isVirtual !== undefined) {
    changes.isVirtual = request.isVirtual;
    changes.location = request.isVirtual ? VIRTUAL_LOCATION : CLINIC_LOCATION;
  }

  const updated = await store.update(patientId, appointmentId, changes);
  if (!updated) {
    return notFound("update_appointment", appointmentId);
  }

  logger.info("Appointment updated", {
    stage: "appointments",
    appointmentId,
    patientId,
    fields: Object.keys(changes),
  });
  return {
    reply: formatUpdate(updated, existing.scheduledTime),
    outcome: { action: "update_appointment", success: true, appointment: updated },
  };
}

export async function bookAppointment(
  store: AppointmentStore,
  patientId: string,
  details: AppointmentDetails
): Promise<OperationResult> {
  const appointment = await store.create({
    patientId,
    doctorName: details.doctor_name,
    appointmentType: details.appointment_type,
    scheduledTime: parseDateTime(details.scheduled_time),
    durationMinutes: details.duration_minutes,
    reason: details.reason,
    isVirtual: details.is_virtual,
    location: details.is_virtual ? VIRTUAL_LOCATION : CLINIC_LOCATION,
  });

  logger.info("Appointment booked", {
    stage: "appointments",
    appointmentId: appointment.id,
    patientId,
    doctor: appointment.doctorName,
  });
  return {
    reply: formatBookingConfirmation(appointment),
    outcome: { action: "book_appointment", success: true, appointment },
  };
}

function notFound(action: AppointmentActionName, appointmentId: number): OperationResult {
  return {
    reply: `I couldn't find appointment #${appointmentId} for your account. Please check the appointment number.`,
    outcome: { action, success: false, error: "Appointment not found" },
  };
}
