// ============================================
// In-memory appointment store
// ============================================

import type { Appointment, AppointmentStore } from "./types.js";

const DEFAULT_LIST_LIMIT = 10;

/**
 * Process-local store for development and tests. Contents are lost on exit.
 */
export function createInMemoryAppointmentStore(initial: Appointment[] = []): AppointmentStore {
  const appointments = new Map<number, Appointment>(initial.map((a) => [a.id, { ...a }]));
  let nextId = Math.max(0, ...initial.map((a) => a.id)) + 1;

  const owned = (patientId: string, id: number): Appointment | undefined => {
    const appointment = appointments.get(id);
    return appointment?.patientId === patientId ? appointment : undefined;
  };

  return {
    async listForPatient(patientId, limit = DEFAULT_LIST_LIMIT) {
      return [...appointments.values()]
        .filter((a) => a.patientId === patientId && a.status !== "cancelled")
        .sort((a, b) => b.scheduledTime.getTime() - a.scheduledTime.getTime())
        .slice(0, limit)
        .map((a) => ({ ...a }));
    },

    async findById(patientId, id) {
      const appointment = owned(patientId, id);
      return appointment ? { ...appointment } : null;
    },

    async create(input) {
      const appointment: Appointment = { ...input, id: nextId++, status: "scheduled" };
      appointments.set(appointment.id, appointment);
      return { ...appointment };
    },

    async update(patientId, id, changes) {
      const existing = owned(patientId, id);
      if (!existing) return null;

      const updated: Appointment = { ...existing, ...changes };
      appointments.set(id, updated);
      return { ...updated };
    },
  };
}
