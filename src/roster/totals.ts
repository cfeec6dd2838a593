import { addDays, isWeekend, toMinuteWindow } from "../datetime.utils.js";
import type { CalendarDay, RosterCalendar } from "./calendar.js";
import type { RosterContext } from "./context.js";
import {
  FLOOR_ROLE,
  LEAD_ROLE,
  MANDATORY_ROLE,
  ROTATING_ROLE,
  type Assignment,
  type Employee,
  type EmployeeTotals,
  type WeekTotals,
} from "./types.js";
import {
  LEAD_MAX_DAYS_PER_WEEK,
  SECONDARY_ONLY_DAY_WEIGHT,
  employeeDayKey,
  formatHours,
  paidHours,
  roundHours,
  type BreakPolicy,
} from "./utils.js";
import type { ViolationReporter } from "./violation-reporter.js";

interface WorkedDay {
  hours: number;
  /** Every shift that day is at the Beach Shop. */
  beachShopOnly: boolean;
}

/** Per employee, per date: the longest paid shift and where it was worked. */
function indexWorkedDays(
  assignments: readonly Assignment[],
  policy: BreakPolicy,
): Map<string, WorkedDay> {
  const days = new Map<string, WorkedDay>();
  for (const a of assignments) {
    const window = toMinuteWindow(a);
    const hours = window ? paidHours(window, policy) : 0;
    const key = employeeDayKey(a.employeeId, a.date);
    const existing = days.get(key);
    days.set(key, {
      hours: Math.max(existing?.hours ?? 0, hours),
      beachShopOnly: (existing?.beachShopOnly ?? true) && a.location === "beach_shop",
    });
  }
  return days;
}

function weekDates(weekStart: string): string[] {
  return Array.from({ length: 7 }, (_, i) => addDays(weekStart, i));
}

/**
 * Hours, days and location counts per employee, re-derived from the final
 * assignments.
 */
export function computeTotals(
  employees: readonly Employee[],
  assignments: readonly Assignment[],
  calendar: RosterCalendar,
  policy: BreakPolicy,
): Record<string, EmployeeTotals> {
  const worked = indexWorkedDays(assignments, policy);
  const totals: Record<string, EmployeeTotals> = {};

  for (const employee of employees) {
    const weeks = calendar.period.weekStarts.map((weekStart): WeekTotals => {
      let hours = 0;
      let days = 0;
      let weekendDays = 0;
      for (const date of weekDates(weekStart)) {
        const day = worked.get(employeeDayKey(employee.id, date));
        if (!day) continue;
        hours += day.hours;
        days += day.beachShopOnly ? SECONDARY_ONLY_DAY_WEIGHT : 1;
        if (isWeekend(date)) weekendDays++;
      }
      return { weekStart, hours: roundHours(hours), days, weekendDays };
    });

    const mine = assignments.filter((a) => a.employeeId === employee.id);
    totals[employee.id] = {
      weeks,
      weekendDays: weeks.reduce((sum, w) => sum + w.weekendDays, 0),
      locations: {
        greystones: mine.filter((a) => a.location === "greystones").length,
        beach_shop: mine.filter((a) => a.location === "beach_shop").length,
        boat: mine.filter((a) => a.location === "boat").length,
      },
    };
  }

  return totals;
}

// ============================================================================
// Violations
// ============================================================================

function reportDayStaffing(
  ctx: RosterContext,
  day: CalendarDay,
  assignments: readonly Assignment[],
  reporter: ViolationReporter,
): void {
  const { coverage, leadershipRules, extendedHours } = ctx.request;
  const generated = assignments.filter((a) => a.date === day.date && a.source === "generated");
  const greystones = generated.filter((a) => a.location === "greystones");

  const leadPresent = greystones.some((a) => a.role === LEAD_ROLE);
  const leaders = greystones.filter((a) => a.role === ROTATING_ROLE).length;
  const floor = greystones.filter((a) => a.role === ROTATING_ROLE || a.role === FLOOR_ROLE).length;

  const target = day.weekend ? coverage.greystonesWeekendStaff : coverage.greystonesWeekdayStaff;
  if (floor < target) {
    reporter.reportStaffing("coverage_gap", day.date, `Greystones floor staffed ${floor} of ${target}`);
  }

  const required = leadPresent
    ? leadershipRules.minTeamLeadersEveryOpenDay
    : leadershipRules.teamLeadersIfManagerOff;
  if (leaders < required) {
    const suffix = leadPresent ? "" : " with no Store Manager on duty";
    reporter.reportStaffing(
      "leader_gap",
      day.date,
      `${leaders} of ${required} Team Leaders scheduled${suffix}`,
    );
  }
  if (extendedHours && !leadPresent) {
    reporter.reportStaffing(
      "leader_gap",
      day.date,
      "No Store Manager scheduled in extended-hours mode",
    );
  }

  if (!generated.some((a) => a.location === "boat" && a.role === MANDATORY_ROLE)) {
    reporter.reportStaffing("role_missing", day.date, "No Boat Captain available");
  }

  if (day.beachShopOpen) {
    const staffed = generated.filter((a) => a.location === "beach_shop").length;
    if (staffed < coverage.beachShopStaff) {
      reporter.reportStaffing(
        "beach_shop_gap",
        day.date,
        `Beach Shop staffed ${staffed} of ${coverage.beachShopStaff}`,
      );
    }
  }
}

function reportLeadWeek(
  ctx: RosterContext,
  lead: Employee,
  weekStart: string,
  workedDates: ReadonlySet<string>,
  reporter: ViolationReporter,
): void {
  const dates = weekDates(weekStart);
  const openDates = dates.filter((d) => ctx.calendar.byDate.get(d)?.greystonesOpen ?? false);
  const { extendedHours, leadershipRules } = ctx.request;

  if (
    leadershipRules.managerTwoConsecutiveDaysOffPerWeek &&
    !extendedHours &&
    openDates.length === 7
  ) {
    const hasPair = dates.some((date, i) => {
      const next = dates[i + 1];
      return next !== undefined && !workedDates.has(date) && !workedDates.has(next);
    });
    if (!hasPair) {
      reporter.reportWeekly(
        "manager_consecutive_days_off",
        weekStart,
        `${lead.name} has no two consecutive days off`,
      );
    }
  }

  const requestedOff = openDates.filter((d) => ctx.blackouts.has(employeeDayKey(lead.id, d))).length;
  const expected = extendedHours
    ? openDates.length - requestedOff
    : Math.max(0, Math.min(LEAD_MAX_DAYS_PER_WEEK, openDates.length) - requestedOff);
  const worked = dates.filter((d) => workedDates.has(d)).length;
  if (worked < expected) {
    reporter.reportWeekly(
      "manager_expected_days",
      weekStart,
      `${lead.name} worked ${worked} of ${expected} expected days`,
    );
  }
}

function reportWeeklyHours(
  ctx: RosterContext,
  employee: Employee,
  week: WeekTotals,
  reporter: ViolationReporter,
): void {
  if (week.hours > employee.maxHoursPerWeek) {
    reporter.reportWeekly(
      "hours_max_violation",
      week.weekStart,
      `${employee.name} scheduled ${formatHours(week.hours)}h, maximum is ${formatHours(employee.maxHoursPerWeek)}h`,
    );
  }

  if (ctx.request.extendedHours || week.hours >= employee.minHoursPerWeek) return;
  const dates = weekDates(week.weekStart);
  const anyOpen = dates.some((d) => ctx.calendar.byDate.get(d)?.greystonesOpen ?? false);
  const requestedOff = dates.some((d) => ctx.blackouts.has(employeeDayKey(employee.id, d)));
  if (anyOpen && !requestedOff) {
    reporter.reportWeekly(
      "hours_min_violation",
      week.weekStart,
      `${employee.name} scheduled ${formatHours(week.hours)}h, minimum is ${formatHours(employee.minHoursPerWeek)}h`,
    );
  }
}

/**
 * Re-derives every staffing and compliance violation from the final
 * assignments. Only generated shifts count toward daily coverage.
 */
export function reportViolations(
  ctx: RosterContext,
  assignments: readonly Assignment[],
  totals: Record<string, EmployeeTotals>,
  reporter: ViolationReporter,
): void {
  for (const day of ctx.calendar.days) {
    if (day.greystonesOpen) reportDayStaffing(ctx, day, assignments, reporter);
  }

  for (const employee of ctx.employees) {
    if (employee.role === LEAD_ROLE) {
      const workedDates = new Set(
        assignments.filter((a) => a.employeeId === employee.id).map((a) => a.date),
      );
      for (const weekStart of ctx.calendar.period.weekStarts) {
        reportLeadWeek(ctx, employee, weekStart, workedDates, reporter);
      }
    }

    for (const week of totals[employee.id]?.weeks ?? []) {
      reportWeeklyHours(ctx, employee, week, reporter);
    }
  }
}
