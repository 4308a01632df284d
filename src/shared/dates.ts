import { FieldValue } from "./types";

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
// Date part followed by nothing, or by a " " / "T" separated time of any shape
const DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/;

function isCalendarDate(year: number, month: number, day: number): boolean {
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Strict YYYY-MM-DD check, including month and day ranges
 */
export function isIsoDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;
  return isCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
}

/**
 * Derive the calendar date used for daily lookups from a local timestamp.
 * Accepts "2024-01-02", "2024-01-02 07:30:00" and ISO date-times; the date
 * part is taken as written, without any timezone shift.
 */
export function toLookupDate(value: FieldValue): string | null {
  if (typeof value !== "string") return null;

  const match = DATE_PREFIX.exec(value.trim());
  if (!match) return null;

  const [, year, month, day] = match;
  if (!isCalendarDate(Number(year), Number(month), Number(day))) return null;
  return `${year}-${month}-${day}`;
}

/**
 * Format a Date as YYYY-MM-DD in local time
 */
export function formatLocalDate(date: Date): string {
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function todayIsoDate(now: Date = new Date()): string {
  return formatLocalDate(now);
}

/**
 * Every date from start to end, both included
 */
export function eachDateInRange(startDate: string, endDate: string): string[] {
  if (!isIsoDate(startDate)) {
    throw new Error(`Invalid start date: ${startDate}`);
  }
  if (!isIsoDate(endDate)) {
    throw new Error(`Invalid end date: ${endDate}`);
  }
  if (startDate > endDate) {
    throw new Error(`Start date ${startDate} is after end date ${endDate}`);
  }

  const dates: string[] = [];
  const current = new Date(`${startDate}T00:00:00Z`);
  const end = new Date(`${endDate}T00:00:00Z`);

  while (current.getTime() <= end.getTime()) {
    dates.push(current.toISOString().split("T")[0]);
    current.setUTCDate(current.getUTCDate() + 1);
  }

  return dates;
}
