// ============================================
// Appointment formatting — fixed English date text, independent of host locale
// ============================================

import type { Appointment } from "./types.js";

const WEEKDAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];
const MONTHS = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

const pad = (n: number) => String(n).padStart(2, "0");

/**
 * "Monday, November 11 at 10:30 AM", or with `withYear` "Monday, November 11, 2024 at 10:30 AM".
 */
export function formatDateTime(date: Date, withYear = false): string {
  const hours = date.getHours() % 12 || 12;
  const meridiem = date.getHours() < 12 ? "AM" : "PM";
  const day = `${WEEKDAYS[date.getDay()]}, ${MONTHS[date.getMonth()]} ${pad(date.getDate())}`;
  const year = withYear ? `, ${date.getFullYear()}` : "";
  return `${day}${year} at ${pad(hours)}:${pad(date.getMinutes())} ${meridiem}`;
}

/**
 * Local wall-clock time as "YYYY-MM-DDTHH:MM:SS" (no offset).
 */
export function toLocalIsoString(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Parse a date or date-time. A bare "YYYY-MM-DD" is local midnight rather than UTC.
 */
export function parseDateTime(value: string): Date {
  const dateOnly = value.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (dateOnly) {
    return new Date(Number(dateOnly[1]), Number(dateOnly[2]) - 1, Number(dateOnly[3]));
  }
  return new Date(value);
}

function titleCase(value: string): string {
  return value.replace(/(^|-)([a-z])/g, (_, sep: string, c: string) => sep + c.toUpperCase());
}

export function formatAppointmentList(appointments: Appointment[]): string {
  let text = `📅 **Your Appointments** (${appointments.length} total):\n\n`;

  for (const a of appointments) {
    text += `**Appointment #${a.id}**\n`;
    text += `   • Doctor: ${a.doctorName}\n`;
    text += `   • Type: ${titleCase(a.appointmentType)}\n`;
    text += `   • Date: ${formatDateTime(a.scheduledTime, true)}\n`;
    text += `   • Status: ${titleCase(a.status)}\n`;
    if (a.reason) {
      text += `   • Reason: ${a.reason}\n`;
    }
    text += `   • Location: ${a.location}\n\n`;
  }

  return text + "💡 You can cancel or reschedule any appointment by telling me the appointment number.";
}

export function formatBookingConfirmation(a: Appointment): string {
  return `✅ Appointment booked successfully!

📅 **Appointment #${a.id}**
- **Doctor:** ${a.doctorName}
- **Type:** ${titleCase(a.appointmentType)}
- **Date & Time:** ${formatDateTime(a.scheduledTime, true)}
- **Duration:** ${a.durationMinutes} minutes
- **Location:** ${a.location}
- **Reason:** ${a.reason}

If you need to reschedule or cancel, just let me know!`;
}

export function formatCancellation(a: Appointment): string {
  return `❌ **Appointment Cancelled**

Appointment #${a.id} with ${a.doctorName} on ${formatDateTime(a.scheduledTime, true)} has been cancelled.

If you'd like to book a new appointment, just let me know!`;
}

export function formatUpdate(a: Appointment, previousTime: Date): string {
  let text = `✅ **Appointment Updated**

Appointment #${a.id} with ${a.doctorName} is now on ${formatDateTime(a.scheduledTime, true)}
(${a.durationMinutes} minutes, ${a.location}).`;

  if (previousTime.getTime() !== a.scheduledTime.getTime()) {
    text += `\n📅 Changed from: ${formatDateTime(previousTime, true)}`;
  }
  return text;
}
