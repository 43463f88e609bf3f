/**
 * Calendar-date helpers for fixed UTC offsets.
 *
 * Dates travel through the system as YYYY-MM-DD strings; instants as Date.
 * A location's local day starts at local midnight for its configured offset.
 */

import { InvalidDateError } from "./errors.js";

const MS_PER_HOUR = 3_600_000;
const MS_PER_DAY = 86_400_000;

export interface DateParts {
  year: number;
  month: number; // 1-12
  day: number;
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

export function parseIsoDate(date: string): DateParts {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(date);
  if (!match) {
    throw new InvalidDateError(date, `Invalid date format: ${date}; expected YYYY-MM-DD`);
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  // Reject 2025-02-30 and friends: Date.UTC silently rolls them over.
  const roundTrip = new Date(Date.UTC(year, month - 1, day));
  if (
    roundTrip.getUTCFullYear() !== year ||
    roundTrip.getUTCMonth() !== month - 1 ||
    roundTrip.getUTCDate() !== day
  ) {
    throw new InvalidDateError(date, `Invalid calendar date: ${date}`);
  }

  return { year, month, day };
}

export function formatIsoDate(parts: DateParts): string {
  return `${parts.year}-${pad2(parts.month)}-${pad2(parts.day)}`;
}

export function addDays(date: string, days: number): string {
  const { year, month, day } = parseIsoDate(date);
  const shifted = new Date(Date.UTC(year, month - 1, day) + days * MS_PER_DAY);
  return formatIsoDate({
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
  });
}

/**
 * Day of week for a calendar date (0 = Sunday, 6 = Saturday).
 */
export function weekdayOf(date: string): number {
  const { year, month, day } = parseIsoDate(date);
  return new Date(Date.UTC(year, month - 1, day)).getUTCDay();
}

/**
 * The UTC instant at which `date` begins for a fixed UTC offset.
 */
export function localMidnightUtc(date: string, utcOffsetHours: number): Date {
  const { year, month, day } = parseIsoDate(date);
  return new Date(Date.UTC(year, month - 1, day) - utcOffsetHours * MS_PER_HOUR);
}

/**
 * Convert a local wall-clock date and time (HH:MM or HH:MM:SS) to a UTC instant.
 */
export function localDateTimeToUtc(date: string, time: string, utcOffsetHours: number): Date {
  const match = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/.exec(time.trim());
  if (!match) {
    throw new InvalidDateError(`${date} ${time}`, `Invalid time format: ${time}; expected HH:MM`);
  }
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = match[3] ? Number(match[3]) : 0;
  if (hours > 23 || minutes > 59 || seconds > 59) {
    throw new InvalidDateError(`${date} ${time}`, `Invalid time of day: ${time}`);
  }

  const midnight = localMidnightUtc(date, utcOffsetHours);
  return new Date(midnight.getTime() + ((hours * 60 + minutes) * 60 + seconds) * 1000);
}

/**
 * Local wall-clock HH:MM of an instant for a fixed UTC offset.
 */
export function formatLocalTime(instant: Date, utcOffsetHours: number): string {
  const shifted = new Date(instant.getTime() + utcOffsetHours * MS_PER_HOUR);
  return `${pad2(shifted.getUTCHours())}:${pad2(shifted.getUTCMinutes())}`;
}

/**
 * Today's calendar date at a fixed UTC offset.
 */
export function todayAtOffset(utcOffsetHours: number, now: Date = new Date()): string {
  const shifted = new Date(now.getTime() + utcOffsetHours * MS_PER_HOUR);
  return formatIsoDate({
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
  });
}
