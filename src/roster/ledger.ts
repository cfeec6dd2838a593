import { addDays, toMinuteWindow } from "../datetime.utils.js";
import type { ClockWindow, ResolvedPeriod } from "../types.js";
import type { HistoryIndex } from "./history.js";
import { ROTATING_ROLE, type Assignment } from "./types.js";
import {
  OFF_STREAK_LOOKBACK_DAYS,
  employeeDayKey,
  paidHours,
  roundHours,
  type BreakPolicy,
} from "./utils.js";

/**
 * Running state for one generation call: every assignment made so far and
 * the hour, day and leadership counts derived from them.
 *
 * Weekly hours are the sum over days of each day's longest paid shift, so a
 * Greystones shift plus a Beach Shop pull on the same day counts once.
 * Weeks outside the period fall back to the supplied history.
 */
export class RosterLedger {
  readonly #period: ResolvedPeriod;
  readonly #policy: BreakPolicy;
  readonly #history: HistoryIndex;
  readonly #weekStarts: ReadonlySet<string>;

  readonly #assignments: Assignment[] = [];
  readonly #byDate = new Map<string, Assignment[]>();
  readonly #dailyHours = new Map<string, number>();
  readonly #leaderDays = new Set<string>();

  constructor(period: ResolvedPeriod, policy: BreakPolicy, history: HistoryIndex) {
    this.#period = period;
    this.#policy = policy;
    this.#history = history;
    this.#weekStarts = new Set(period.weekStarts);
  }

  record(assignment: Assignment): void {
    this.#assignments.push(assignment);
    const onDay = this.#byDate.get(assignment.date) ?? [];
    onDay.push(assignment);
    this.#byDate.set(assignment.date, onDay);

    const key = employeeDayKey(assignment.employeeId, assignment.date);
    const hours = this.shiftHours(assignment);
    this.#dailyHours.set(key, Math.max(this.#dailyHours.get(key) ?? 0, hours));

    if (assignment.role === ROTATING_ROLE && assignment.location === "greystones") {
      this.#leaderDays.add(key);
    }
  }

  get assignments(): readonly Assignment[] {
    return this.#assignments;
  }

  onDay(date: string): readonly Assignment[] {
    return this.#byDate.get(date) ?? [];
  }

  shiftHours(window: ClockWindow): number {
    const minutes = toMinuteWindow(window);
    return minutes ? paidHours(minutes, this.#policy) : 0;
  }

  /** Whether the employee already holds a shift on `date` in this run. */
  isWorking(employeeId: string, date: string): boolean {
    return this.#dailyHours.has(employeeDayKey(employeeId, date));
  }

  /** Whether the employee works `date`, in this run or in history. */
  workedOn(employeeId: string, date: string): boolean {
    return this.isWorking(employeeId, date) || this.#history.workedOn(employeeId, date);
  }

  dayHours(employeeId: string, date: string): number {
    return this.#dailyHours.get(employeeDayKey(employeeId, date)) ?? 0;
  }

  hoursInWeek(employeeId: string, weekStart: string): number {
    if (!this.#weekStarts.has(weekStart)) return this.#history.hours(weekStart, employeeId);
    let total = 0;
    for (let i = 0; i < 7; i++) total += this.dayHours(employeeId, addDays(weekStart, i));
    return roundHours(total);
  }

  /** Weekly hours if a shift worth `hours` were added on `date`. */
  hoursInWeekWith(employeeId: string, weekStart: string, date: string, hours: number): number {
    const existing = this.dayHours(employeeId, date);
    return roundHours(this.hoursInWeek(employeeId, weekStart) - existing + Math.max(existing, hours));
  }

  daysInWeek(employeeId: string, weekStart: string, predicate?: (date: string) => boolean): number {
    let count = 0;
    for (let i = 0; i < 7; i++) {
      const date = addDays(weekStart, i);
      if (this.isWorking(employeeId, date) && (!predicate || predicate(date))) count++;
    }
    return count;
  }

  /** Greystones team-leader days in a week, from history when the week precedes the period. */
  leaderDaysInWeek(employeeId: string, weekStart: string): number {
    if (!this.#weekStarts.has(weekStart)) return this.#history.leaderDays(weekStart, employeeId);
    let count = 0;
    for (let i = 0; i < 7; i++) {
      if (this.#leaderDays.has(employeeDayKey(employeeId, addDays(weekStart, i)))) count++;
    }
    return count;
  }

  /**
   * Greystones team-leader days across this run so far, plus the week before
   * the period from history.
   */
  cumulativeLeaderDays(employeeId: string): number {
    const first = this.#period.weekStarts[0] ?? this.#period.start;
    let count = this.#history.leaderDays(addDays(first, -7), employeeId);
    for (const weekStart of this.#period.weekStarts) {
      count += this.leaderDaysInWeek(employeeId, weekStart);
    }
    return count;
  }

  /**
   * Length of the consecutive working run that `date` would join, counting
   * `date` itself.
   */
  runLengthWith(employeeId: string, date: string): number {
    let back = 0;
    while (this.workedOn(employeeId, addDays(date, -(back + 1)))) back++;
    let forward = 0;
    while (this.#isInPeriod(addDays(date, forward + 1)) && this.workedOn(employeeId, addDays(date, forward + 1))) {
      forward++;
    }
    return back + 1 + forward;
  }

  /** Days off immediately before `date`, looking back at most a week. */
  offStreakBefore(employeeId: string, date: string): number {
    let streak = 0;
    while (streak < OFF_STREAK_LOOKBACK_DAYS && !this.workedOn(employeeId, addDays(date, -(streak + 1)))) {
      streak++;
    }
    return streak;
  }

  #isInPeriod(date: string): boolean {
    return date >= this.#period.start && date <= this.#period.end;
  }
}
