/**
 * Calendar primitives shared by the roster engine.
 *
 * @packageDocumentation
 */

import * as z from "zod";

// ============================================================================
// Time Primitives
// ============================================================================

/**
 * Day of the week identifier.
 */
export type DayOfWeek =
  | "monday"
  | "tuesday"
  | "wednesday"
  | "thursday"
  | "friday"
  | "saturday"
  | "sunday";

/**
 * Zod schema for {@link DayOfWeek}.
 */
export const DayOfWeekSchema = z.union([
  z.literal("monday"),
  z.literal("tuesday"),
  z.literal("wednesday"),
  z.literal("thursday"),
  z.literal("friday"),
  z.literal("saturday"),
  z.literal("sunday"),
]);

/**
 * A wall-clock window on a single day, both ends in 24h `"HH:MM"` form.
 *
 * @example
 * ```typescript
 * const opening: ClockWindow = { start: "08:30", end: "17:30" };
 * ```
 */
export interface ClockWindow {
  start: string;
  end: string;
}

/**
 * The same window expressed in minutes after midnight.
 */
export interface MinuteWindow {
  start: number;
  end: number;
}

/**
 * A resolved scheduling period.
 *
 * `days` holds every calendar day of the period (YYYY-MM-DD), `weekStarts`
 * the first day of each week. Both are chronological.
 */
export interface ResolvedPeriod {
  start: string;
  end: string;
  weekStartDay: DayOfWeek;
  days: string[];
  weekStarts: string[];
}
