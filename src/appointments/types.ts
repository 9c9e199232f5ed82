// ============================================
// Appointment Types
// ============================================

export const APPOINTMENT_TYPES = ["consultation", "follow-up", "emergency", "check-up"] as const;
export type AppointmentType = (typeof APPOINTMENT_TYPES)[number];

export type AppointmentStatus = "scheduled" | "confirmed" | "completed" | "cancelled";

export const DEFAULT_DURATION_MINUTES = 30;
export const CLINIC_LOCATION = "Main Clinic";
export const VIRTUAL_LOCATION = "Virtual";

export interface Appointment {
  id: number;
  patientId: string;
  doctorName: string;
  appointmentType: AppointmentType;
  scheduledTime: Date;
  durationMinutes: number;
  reason: string;
  isVirtual: boolean;
  location: string;
  status: AppointmentStatus;
  notes?: string;
}

export type NewAppointment = Omit<Appointment, "id" | "status">;

export type AppointmentChanges = Partial<
  Pick<Appointment, "scheduledTime" | "durationMinutes" | "isVirtual" | "location" | "status" | "notes">
>;

/**
 * Persistence boundary for appointments. Implementations are scoped per patient:
 * an appointment belonging to another patient is reported as missing.
 */
export interface AppointmentStore {
  /** Non-cancelled appointments, latest first */
  listForPatient(patientId: string, limit?: number): Promise<Appointment[]>;
  findById(patientId: string, id: number): Promise<Appointment | null>;
  create(input: NewAppointment): Promise<Appointment>;
  /** Returns the updated appointment, or null when it does not exist */
  update(patientId: string, id: number, changes: AppointmentChanges): Promise<Appointment | null>;
}
