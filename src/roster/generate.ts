import { describeConflict, reconcileBooking } from "./ad-hoc.js";
import { allocateDay } from "./allocation.js";
import { backfillWeeklyMinimums } from "./backfill.js";
import { createRosterContext } from "./context.js";
import { parseRosterRequest } from "./request.schemas.js";
import { computeTotals, reportViolations } from "./totals.js";
import {
  LOCATION_ORDER,
  type AdHocBooking,
  type Assignment,
  type GenerateOptions,
  type RosterRequestInput,
  type RosterResult,
} from "./types.js";
import { ViolationReporterImpl } from "./violation-reporter.js";

interface IndexedBooking {
  booking: AdHocBooking;
  /** Position in the request's booking list. */
  index: number;
}

function compareAssignments(a: Assignment, b: Assignment): number {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  const location = LOCATION_ORDER[a.location] - LOCATION_ORDER[b.location];
  if (location !== 0) return location;
  if (a.employeeName !== b.employeeName) return a.employeeName < b.employeeName ? -1 : 1;
  if (a.start !== b.start) return a.start < b.start ? -1 : 1;
  if (a.employeeId !== b.employeeId) return a.employeeId < b.employeeId ? -1 : 1;
  return 0;
}

/**
 * Generates a roster for a multi-week period.
 *
 * Runs the daily allocation pass for every open day (reconciling that day's
 * ad-hoc bookings straight after it), reconciles bookings on any other date,
 * tops up weekly minimum hours, then re-derives totals and violations from
 * the final assignments.
 *
 * Pure and synchronous: the same request, history and reroll token always
 * produce the same result.
 *
 * @throws RosterInputError when the request fails validation.
 *
 * @example
 * ```typescript
 * const result = generateRoster({
 *   period: { startDate: "2026-07-06", weeks: 2 },
 *   employees,
 * });
 * for (const v of result.violations) console.log(v.date, v.kind, v.detail);
 * ```
 */
export function generateRoster(
  input: RosterRequestInput,
  options: GenerateOptions = {},
): RosterResult {
  const request = parseRosterRequest(input);
  const ctx = createRosterContext(request, options);
  const { calendar, ledger, logger } = ctx;
  const reporter = new ViolationReporterImpl();

  logger.debug("Resolved calendar", {
    start: calendar.period.start,
    end: calendar.period.end,
    openDays: calendar.openDays.length,
    employees: ctx.employees.length,
  });

  const bookingsByDate = new Map<string, IndexedBooking[]>();
  request.adHocBookings.forEach((booking, index) => {
    const list = bookingsByDate.get(booking.date) ?? [];
    list.push({ booking, index });
    bookingsByDate.set(booking.date, list);
  });

  const reconcile = ({ booking, index }: IndexedBooking): void => {
    const outcome = reconcileBooking(ctx, booking);
    if (!outcome.accepted) {
      reporter.reportAdHocConflict(
        booking.date,
        describeConflict(ctx, booking, outcome.reason),
        index,
      );
    }
  };

  for (const day of calendar.days) {
    if (day.greystonesOpen) allocateDay(ctx, day);
    for (const booking of bookingsByDate.get(day.date) ?? []) reconcile(booking);
    bookingsByDate.delete(day.date);
  }
  logger.debug("Daily allocation complete", { assignments: ledger.assignments.length });

  for (const bookings of bookingsByDate.values()) {
    for (const booking of bookings) reconcile(booking);
  }
  logger.debug("Ad-hoc bookings reconciled", { bookings: request.adHocBookings.length });

  const added = backfillWeeklyMinimums(ctx);
  logger.debug("Weekly minimum backfill complete", { added });

  const assignments = ledger.assignments.toSorted(compareAssignments);
  const totalsByEmployee = computeTotals(ctx.employees, assignments, calendar, request.breakPolicy);
  reportViolations(ctx, assignments, totalsByEmployee, reporter);
  const violations = reporter.getViolations();
  logger.debug("Violations derived", { violations: violations.length });

  return {
    period: calendar.period,
    assignments,
    violations,
    totalsByEmployee,
  };
}
