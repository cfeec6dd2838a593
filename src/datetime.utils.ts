import type { ClockWindow, DayOfWeek, MinuteWindow } from "./types.js";

export const DAY_OF_WEEK_MAP = {
  sunday: 0, // JavaScript Date week starts on Sunday
  monday: 1,
  tuesday: 2,
  wednesday: 3,
  thursday: 4,
  friday: 5,
  saturday: 6,
} as const satisfies Record<DayOfWeek, number>;

const DAY_NAMES = [
  "sunday",
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
] as const satisfies readonly DayOfWeek[];

const DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const CLOCK_PATTERN = /^(\d{2}):(\d{2})$/;

/**
 * Parse a day string (YYYY-MM-DD) to a UTC Date.
 */
export function parseDayString(day: string): Date {
  return new Date(`${day}T00:00:00Z`);
}

/**
 * Whether `value` is a real calendar day in YYYY-MM-DD form.
 *
 * @example
 * ```typescript
 * isDayString("2026-02-28"); // true
 * isDayString("2026-02-30"); // false
 * ```
 */
export function isDayString(value: string): boolean {
  const match = DAY_PATTERN.exec(value);
  if (!match) return false;
  const date = parseDayString(value);
  return !Number.isNaN(date.getTime()) && formatDayUTC(date) === value;
}

/**
 * Formats a UTC date as YYYY-MM-DD.
 */
export function formatDayUTC(date: Date): string {
  const year = date.getUTCFullYear();
  const month = (date.getUTCMonth() + 1).toString().padStart(2, "0");
  const day = date.getUTCDate().toString().padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/**
 * Day of the week of a YYYY-MM-DD string. Timezone-agnostic.
 */
export function toDayOfWeek(day: string): DayOfWeek {
  return DAY_NAMES[parseDayString(day).getUTCDay()] ?? "sunday";
}

export function isWeekend(day: string): boolean {
  const dow = toDayOfWeek(day);
  return dow === "saturday" || dow === "sunday";
}

/**
 * Shifts a day string by a (possibly negative) number of days.
 *
 * @example
 * ```typescript
 * addDays("2026-01-30", 3); // "2026-02-02"
 * ```
 */
export function addDays(day: string, days: number): string {
  const date = parseDayString(day);
  date.setUTCDate(date.getUTCDate() + days);
  return formatDayUTC(date);
}

/**
 * Number of days from `from` forward to the next `target` weekday
 * (0 when `from` already falls on it).
 */
export function daysUntilWeekday(from: string, target: DayOfWeek): number {
  const current = parseDayString(from).getUTCDay();
  return (DAY_OF_WEEK_MAP[target] - current + 7) % 7;
}

/**
 * Parses a 24h `"HH:MM"` clock string to minutes after midnight.
 * Returns `null` for anything malformed or out of range.
 */
export function parseClock(value: string): number | null {
  const match = CLOCK_PATTERN.exec(value);
  if (!match) return null;
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) return null;
  return hours * 60 + minutes;
}

/**
 * Converts a clock window to minutes. Returns `null` when either end is
 * malformed or the window does not move forward.
 */
export function toMinuteWindow(window: ClockWindow): MinuteWindow | null {
  const start = parseClock(window.start);
  const end = parseClock(window.end);
  if (start === null || end === null || end <= start) return null;
  return { start, end };
}

/**
 * Whether `outer` fully contains `inner`.
 */
export function windowCovers(outer: MinuteWindow, inner: MinuteWindow): boolean {
  return outer.start <= inner.start && outer.end >= inner.end;
}
