import { toMinuteWindow, windowCovers } from "../datetime.utils.js";
import type { ClockWindow } from "../types.js";
import type { CalendarDay } from "./calendar.js";
import type { RosterContext } from "./context.js";
import { orderCandidates } from "./fairness.js";
import { LEAD_ROLE, type Employee, type Location, type Role } from "./types.js";
import { LEAD_MAX_DAYS_PER_WEEK, MAX_CONSECUTIVE_WORK_DAYS, employeeDayKey } from "./utils.js";

/**
 * One position to fill on one day.
 */
export interface Slot {
  day: CalendarDay;
  role: Role;
  location: Location;
  window: ClockWindow;
  /** Let the weekly hour ceiling be exceeded. */
  ignoreMax?: boolean;
  /** Let someone already working that day take this slot too. */
  allowDoubleBooking?: boolean;
}

/**
 * Why a candidate cannot take a slot, in the order the checks run.
 */
export type Ineligibility =
  | "role"
  | "requested_day_off"
  | "already_scheduled"
  | "rest_day"
  | "student_weekday"
  | "consecutive_days"
  | "lead_day_cap"
  | "max_hours"
  | "availability";

export function isAvailable(employee: Employee, day: CalendarDay, window: ClockWindow): boolean {
  const needed = toMinuteWindow(window);
  if (!needed) return false;
  const offered = employee.availability[day.dayOfWeek] ?? [];
  return offered.some((w) => {
    const minutes = toMinuteWindow(w);
    return minutes !== null && windowCovers(minutes, needed);
  });
}

export function exceedsConsecutiveCap(
  ctx: RosterContext,
  employee: Employee,
  date: string,
): boolean {
  if (ctx.ledger.isWorking(employee.id, date)) return false;
  return ctx.ledger.runLengthWith(employee.id, date) > MAX_CONSECUTIVE_WORK_DAYS;
}

/** Weekly hours the employee would reach by taking this shift. */
export function projectedWeekHours(ctx: RosterContext, employee: Employee, slot: Slot): number {
  const hours = ctx.ledger.shiftHours(slot.window);
  return ctx.ledger.hoursInWeekWith(employee.id, slot.day.weekStart, slot.day.date, hours);
}

/**
 * Runs every eligibility check for one candidate against one slot.
 * Returns the first failing check, or `null` when the candidate may take it.
 */
export function checkEligibility(
  ctx: RosterContext,
  employee: Employee,
  slot: Slot,
): Ineligibility | null {
  const { day } = slot;
  const key = employeeDayKey(employee.id, day.date);

  if (employee.role !== slot.role) return "role";
  if (ctx.blackouts.has(key)) return "requested_day_off";
  if (!slot.allowDoubleBooking && ctx.ledger.isWorking(employee.id, day.date)) {
    return "already_scheduled";
  }
  if (ctx.restDays.has(key)) return "rest_day";
  if (ctx.request.extendedHours && employee.student && !day.weekend) return "student_weekday";
  if (exceedsConsecutiveCap(ctx, employee, day.date)) return "consecutive_days";
  if (
    employee.role === LEAD_ROLE &&
    !ctx.request.extendedHours &&
    !ctx.ledger.isWorking(employee.id, day.date) &&
    ctx.ledger.daysInWeek(employee.id, day.weekStart) >= LEAD_MAX_DAYS_PER_WEEK
  ) {
    return "lead_day_cap";
  }
  if (!slot.ignoreMax && projectedWeekHours(ctx, employee, slot) > employee.maxHoursPerWeek) {
    return "max_hours";
  }
  if (!isAvailable(employee, day, slot.window)) return "availability";
  return null;
}

/**
 * Every employee who may take the slot, best candidate first.
 *
 * @example
 * ```typescript
 * const [manager] = findEligible(ctx, {
 *   day,
 *   role: "store_manager",
 *   location: "greystones",
 *   window: ctx.request.hours.greystones,
 * });
 * ```
 */
export function findEligible(ctx: RosterContext, slot: Slot): Employee[] {
  const eligible = ctx.employees.filter((e) => checkEligibility(ctx, e, slot) === null);
  return orderCandidates(ctx, eligible, slot);
}
