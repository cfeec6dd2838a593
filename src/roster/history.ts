import { addDays, toMinuteWindow, DAY_OF_WEEK_MAP, parseDayString } from "../datetime.utils.js";
import type { DayOfWeek } from "../types.js";
import { ROTATING_ROLE, type Assignment, type HistoricalAggregates } from "./types.js";
import { paidHours, roundHours, type BreakPolicy } from "./utils.js";

const DEFAULT_BREAK_POLICY: BreakPolicy = { thresholdHours: 6, unpaidMinutes: 60 };

/**
 * Read-only lookups over {@link HistoricalAggregates}.
 */
export class HistoryIndex {
  readonly #hours: Record<string, Record<string, number>>;
  readonly #leaderDays: Record<string, Record<string, number>>;
  readonly #workedDays = new Map<string, Set<string>>();

  constructor(history: HistoricalAggregates = {}) {
    this.#hours = history.weeklyHours ?? {};
    this.#leaderDays = history.weeklyLeaderDays ?? {};

    for (const byEmployee of Object.values(history.weeklyWorkedDays ?? {})) {
      for (const [employeeId, days] of Object.entries(byEmployee)) {
        const set = this.#workedDays.get(employeeId) ?? new Set<string>();
        for (const day of days) set.add(day);
        this.#workedDays.set(employeeId, set);
      }
    }
  }

  hours(weekStart: string, employeeId: string): number {
    return this.#hours[weekStart]?.[employeeId] ?? 0;
  }

  leaderDays(weekStart: string, employeeId: string): number {
    return this.#leaderDays[weekStart]?.[employeeId] ?? 0;
  }

  workedOn(employeeId: string, day: string): boolean {
    return this.#workedDays.get(employeeId)?.has(day) ?? false;
  }
}

/**
 * Start of the week containing `day`.
 */
export function weekStartOf(day: string, weekStartDay: DayOfWeek): string {
  const offset = (parseDayString(day).getUTCDay() - DAY_OF_WEEK_MAP[weekStartDay] + 7) % 7;
  return addDays(day, -offset);
}

export interface HistoryOptions {
  weekStartDay: DayOfWeek;
  /** Only assignments dated strictly before this day are summarised. */
  before: string;
  breakPolicy?: BreakPolicy;
}

type FinalizedShift = Pick<Assignment, "date" | "location" | "start" | "end" | "employeeId" | "role">;

/**
 * Summarises previously finalized assignments into {@link HistoricalAggregates}.
 *
 * Hours use the same accounting as generation: an employee's day counts
 * its longest paid shift, never the sum of overlapping shifts. Leadership
 * days count Greystones team-leader days.
 *
 * @example
 * ```typescript
 * const history = buildHistoricalAggregates(previous.assignments, {
 *   weekStartDay: "monday",
 *   before: "2026-01-05",
 * });
 * generateRoster(request, { history });
 * ```
 */
export function buildHistoricalAggregates(
  assignments: readonly FinalizedShift[],
  options: HistoryOptions,
): HistoricalAggregates {
  const policy = options.breakPolicy ?? DEFAULT_BREAK_POLICY;
  const dailyHours = new Map<string, { weekStart: string; employeeId: string; hours: number }>();
  const leaderDays = new Set<string>();
  const weeklyWorkedDays: Record<string, Record<string, string[]>> = {};

  for (const shift of assignments) {
    if (shift.date >= options.before) continue;
    const window = toMinuteWindow(shift);
    if (!window) continue;

    const weekStart = weekStartOf(shift.date, options.weekStartDay);
    const key = `${shift.employeeId}|${shift.date}`;
    const hours = paidHours(window, policy);
    const existing = dailyHours.get(key);
    if (!existing) {
      dailyHours.set(key, { weekStart, employeeId: shift.employeeId, hours });
      const byEmployee = (weeklyWorkedDays[weekStart] ??= {});
      (byEmployee[shift.employeeId] ??= []).push(shift.date);
    } else if (hours > existing.hours) {
      existing.hours = hours;
    }

    if (shift.role === ROTATING_ROLE && shift.location === "greystones") {
      leaderDays.add(`${weekStart}|${shift.employeeId}|${shift.date}`);
    }
  }

  const weeklyHours: Record<string, Record<string, number>> = {};
  for (const { weekStart, employeeId, hours } of dailyHours.values()) {
    const byEmployee = (weeklyHours[weekStart] ??= {});
    byEmployee[employeeId] = roundHours((byEmployee[employeeId] ?? 0) + hours);
  }

  const weeklyLeaderDays: Record<string, Record<string, number>> = {};
  for (const entry of leaderDays) {
    const [weekStart = "", employeeId = ""] = entry.split("|");
    const byEmployee = (weeklyLeaderDays[weekStart] ??= {});
    byEmployee[employeeId] = (byEmployee[employeeId] ?? 0) + 1;
  }

  for (const byEmployee of Object.values(weeklyWorkedDays)) {
    for (const days of Object.values(byEmployee)) days.sort();
  }

  return { weeklyHours, weeklyLeaderDays, weeklyWorkedDays };
}
