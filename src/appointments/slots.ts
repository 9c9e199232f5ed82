// ============================================
// Available slots — generic weekday availability
// ============================================

import { formatDateTime, toLocalIsoString } from "./format.js";

/** First and last slot hours (inclusive), slots every 30 minutes */
const OPENING_HOUR = 9;
const LAST_SLOT_HOUR = 16;
const SLOT_MINUTES = [0, 30];

export const MAX_SLOTS = 20;
export const DEFAULT_DAYS_AHEAD = 7;
export const DEFAULT_MAX_DAYS_AHEAD = 90;

export type TimeSlot = {
  /** Local time, "YYYY-MM-DDTHH:MM:SS" */
  datetime: string;
  formatted: string;
  available: true;
  doctor: string;
};

export type SlotRequest = {
  /** First day to consider; defaults to today */
  start?: Date;
  daysAhead?: number;
  doctorName?: string;
  /** Slots before this instant are skipped */
  now?: Date;
  /** Upper bound on `daysAhead` */
  maxDaysAhead?: number;
};

/**
 * Weekday slots from 09:00 to 16:30, starting at midnight of `start`,
 * skipping anything already past. At most MAX_SLOTS are returned.
 */
export function generateAvailableSlots(request: SlotRequest = {}): TimeSlot[] {
  const {
    now = new Date(),
    daysAhead = DEFAULT_DAYS_AHEAD,
    doctorName,
    maxDaysAhead = DEFAULT_MAX_DAYS_AHEAD,
  } = request;
  const start = request.start ?? now;
  const days = Math.max(0, Math.min(daysAhead, maxDaysAhead));
  const doctor = doctorName || "Any available doctor";

  const slots: TimeSlot[] = [];

  for (let offset = 0; offset < days && slots.length < MAX_SLOTS; offset++) {
    const day = new Date(start.getFullYear(), start.getMonth(), start.getDate() + offset);
    if (day.getDay() === 0 || day.getDay() === 6) continue;

    for (let hour = OPENING_HOUR; hour <= LAST_SLOT_HOUR; hour++) {
      for (const minute of SLOT_MINUTES) {
        const slot = new Date(day.getFullYear(), day.getMonth(), day.getDate(), hour, minute);
        if (slot < now) continue;

        slots.push({
          datetime: toLocalIsoString(slot),
          formatted: formatDateTime(slot),
          available: true,
          doctor,
        });
      }
    }
  }

  return slots.slice(0, MAX_SLOTS);
}
