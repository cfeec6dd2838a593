import type { MinuteWindow } from "../types.js";
import type * as z from "zod";
import type { BreakPolicySchema } from "./request.schemas.js";

export type BreakPolicy = z.infer<typeof BreakPolicySchema>;

/** Longest run of consecutive working days anyone may be given. */
export const MAX_CONSECUTIVE_WORK_DAYS = 5;

/** Weekly day cap for the lead role outside extended-hours mode. */
export const LEAD_MAX_DAYS_PER_WEEK = 5;

/** Weeks of history summed by the clerk hours fairness key. */
export const HISTORY_LOOKBACK_WEEKS = 4;

/** How far back an off-streak is counted. */
export const OFF_STREAK_LOOKBACK_DAYS = 7;

/** A Beach-Shop-only day counts as this fraction of a worked day. */
export const SECONDARY_ONLY_DAY_WEIGHT = 0.5;

export function roundHours(hours: number): number {
  return Math.round(hours * 100) / 100;
}

/**
 * Paid hours of one shift: its span, less the unpaid break once the span
 * reaches the policy threshold.
 *
 * @example
 * ```typescript
 * paidHours({ start: 510, end: 1050 }, { thresholdHours: 6, unpaidMinutes: 60 }); // 8
 * ```
 */
export function paidHours(window: MinuteWindow, policy: BreakPolicy): number {
  const span = window.end - window.start;
  const paid = span / 60 >= policy.thresholdHours ? span - policy.unpaidMinutes : span;
  return roundHours(Math.max(0, paid) / 60);
}

/**
 * Renders an hour count for violation text: `8`, `7.5`, `12.25`.
 */
export function formatHours(hours: number): string {
  return String(roundHours(hours));
}

/**
 * Compares two sort keys element by element. Keys of different lengths
 * compare on their shared prefix, then by length.
 */
export function compareKeys(a: readonly (number | string)[], b: readonly (number | string)[]): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const left = a[i];
    const right = b[i];
    if (left === right || left === undefined || right === undefined) continue;
    if (typeof left === "number" && typeof right === "number") return left - right;
    return String(left) < String(right) ? -1 : 1;
  }
  return a.length - b.length;
}

/**
 * Key for per-employee, per-day sets and maps.
 */
export function employeeDayKey(employeeId: string, date: string): string {
  return `${employeeId}|${date}`;
}
