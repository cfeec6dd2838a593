import { addDays } from "../datetime.utils.js";
import type { DayOfWeek } from "../types.js";
import type { CalendarDay } from "./calendar.js";
import type { RosterContext } from "./context.js";
import { checkEligibility, type Slot } from "./eligibility.js";
import { LEAD_ROLE, MANDATORY_ROLE, type Employee, type Role } from "./types.js";
import { employeeDayKey } from "./utils.js";

/**
 * Preferred make-up days per role. Each role's order leans toward the days
 * its daily pass is least likely to have filled.
 */
const MAKE_UP_DAYS = {
  team_leader: ["saturday", "sunday", "friday", "monday", "thursday", "tuesday", "wednesday"],
  store_clerk: ["tuesday", "wednesday", "thursday", "friday", "monday", "saturday", "sunday"],
  boat_captain: ["thursday", "friday", "saturday", "sunday", "monday", "tuesday", "wednesday"],
  store_manager: ["thursday", "friday", "wednesday", "tuesday", "monday", "saturday", "sunday"],
} as const satisfies Record<Role, readonly DayOfWeek[]>;

function hasRequestedTimeOff(ctx: RosterContext, employee: Employee, weekStart: string): boolean {
  for (let i = 0; i < 7; i++) {
    if (ctx.blackouts.has(employeeDayKey(employee.id, addDays(weekStart, i)))) return true;
  }
  return false;
}

function makeUpSlot(ctx: RosterContext, employee: Employee, day: CalendarDay): Slot {
  return {
    day,
    role: employee.role,
    location: employee.role === MANDATORY_ROLE ? "boat" : "greystones",
    window: ctx.request.hours.greystones,
  };
}

/** The lead and mandatory roles each hold one shift per day at their location. */
function singleRoleTaken(ctx: RosterContext, slot: Slot): boolean {
  if (slot.role !== LEAD_ROLE && slot.role !== MANDATORY_ROLE) return false;
  return ctx.ledger
    .onDay(slot.day.date)
    .some((a) => a.role === slot.role && a.location === slot.location);
}

/**
 * Tops up weekly minimum hours after the daily passes.
 *
 * For each week with at least one open day, every employee still under
 * their minimum (and with no requested day off that week) gets extra
 * full-window shifts on their role's preferred make-up days, subject to
 * every eligibility check and the weekly maximum, until the minimum is met
 * or no day remains. Skipped entirely in extended-hours mode.
 *
 * @returns The number of shifts added.
 */
export function backfillWeeklyMinimums(ctx: RosterContext): number {
  if (ctx.request.extendedHours) return 0;
  let added = 0;

  for (const weekStart of ctx.calendar.period.weekStarts) {
    const openDays = ctx.calendar.days.filter((d) => d.weekStart === weekStart && d.greystonesOpen);
    if (openDays.length === 0) continue;

    for (const employee of ctx.employees) {
      if (ctx.ledger.hoursInWeek(employee.id, weekStart) >= employee.minHoursPerWeek) continue;
      if (hasRequestedTimeOff(ctx, employee, weekStart)) continue;

      const preference: readonly DayOfWeek[] = MAKE_UP_DAYS[employee.role];
      const candidates = openDays.toSorted(
        (a, b) => preference.indexOf(a.dayOfWeek) - preference.indexOf(b.dayOfWeek),
      );

      for (const day of candidates) {
        if (ctx.ledger.hoursInWeek(employee.id, weekStart) >= employee.minHoursPerWeek) break;
        const slot = makeUpSlot(ctx, employee, day);
        if (singleRoleTaken(ctx, slot)) continue;
        if (checkEligibility(ctx, employee, slot) !== null) continue;

        ctx.ledger.record({
          date: day.date,
          location: slot.location,
          start: slot.window.start,
          end: slot.window.end,
          employeeId: employee.id,
          employeeName: employee.name,
          role: employee.role,
          source: "generated",
        });
        added++;
      }
    }
  }

  return added;
}
