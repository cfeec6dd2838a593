import { isDayString, toMinuteWindow } from "../datetime.utils.js";
import type { RosterContext } from "./context.js";
import { exceedsConsecutiveCap, isAvailable, projectedWeekHours, type Slot } from "./eligibility.js";
import {
  LOCATION_LABELS,
  LOCATION_ROLES,
  ROLE_LABELS,
  type AdHocBooking,
  type Assignment,
  type Role,
} from "./types.js";
import { MAX_CONSECUTIVE_WORK_DAYS, employeeDayKey, formatHours } from "./utils.js";

export type AdHocOutcome =
  | { accepted: true; assignment: Assignment }
  | { accepted: false; reason: string };

function reject(reason: string): AdHocOutcome {
  return { accepted: false, reason };
}

/**
 * Checks one booking and, when every check passes, records it on the ledger
 * with `source: "ad_hoc"`. Checks run in a fixed order and the first failure
 * names the reason.
 */
export function reconcileBooking(ctx: RosterContext, booking: AdHocBooking): AdHocOutcome {
  const employee = ctx.employeesById.get(booking.employeeId);
  if (!employee) return reject(`unknown employee "${booking.employeeId}"`);

  if (!isDayString(booking.date)) return reject(`invalid date "${booking.date}"`);
  const day = ctx.calendar.byDate.get(booking.date);
  if (!day) return reject("date is outside the scheduling period");
  if (!day.greystonesOpen) return reject(`Greystones is closed (${day.closedReason ?? "closed"})`);

  const allowed: readonly Role[] = LOCATION_ROLES[booking.location];
  if (!allowed.includes(employee.role)) {
    return reject(`${ROLE_LABELS[employee.role]} cannot work at ${LOCATION_LABELS[booking.location]}`);
  }
  if (booking.location === "beach_shop" && !day.beachShopOpen) {
    return reject("Beach Shop is closed on this date");
  }

  if (ctx.blackouts.has(employeeDayKey(employee.id, day.date))) {
    return reject("employee has requested this day off");
  }
  if (ctx.ledger.isWorking(employee.id, day.date)) {
    return reject("employee is already scheduled on this date");
  }

  if (!toMinuteWindow(booking)) return reject(`invalid time range ${booking.start}-${booking.end}`);
  const window = { start: booking.start, end: booking.end };
  if (!isAvailable(employee, day, window)) return reject("outside employee availability");

  if (exceedsConsecutiveCap(ctx, employee, day.date)) {
    return reject(`would exceed ${MAX_CONSECUTIVE_WORK_DAYS} consecutive work days`);
  }

  const slot: Slot = { day, role: employee.role, location: booking.location, window };
  const projected = projectedWeekHours(ctx, employee, slot);
  if (projected > employee.maxHoursPerWeek) {
    return reject(
      `would exceed weekly max hours (${formatHours(projected)}h > ${formatHours(employee.maxHoursPerWeek)}h)`,
    );
  }

  const assignment: Assignment = {
    date: day.date,
    location: booking.location,
    start: booking.start,
    end: booking.end,
    employeeId: employee.id,
    employeeName: employee.name,
    role: employee.role,
    source: "ad_hoc",
  };
  if (booking.note !== undefined) assignment.note = booking.note;
  ctx.ledger.record(assignment);
  return { accepted: true, assignment };
}

/**
 * Violation text for a rejected booking.
 *
 * @example
 * ```typescript
 * describeConflict(ctx, booking, "outside employee availability");
 * // "Ad-hoc booking for Avery at Greystones 09:00-13:00: outside employee availability"
 * ```
 */
export function describeConflict(
  ctx: RosterContext,
  booking: AdHocBooking,
  reason: string,
): string {
  const who = ctx.employeesById.get(booking.employeeId)?.name ?? booking.employeeId;
  const where = LOCATION_LABELS[booking.location];
  return `Ad-hoc booking for ${who} at ${where} ${booking.start}-${booking.end}: ${reason}`;
}
