import { createRosterContext, type RosterContext } from "../../src/roster/context.js";
import type { CalendarDay } from "../../src/roster/calendar.js";
import type { Slot } from "../../src/roster/eligibility.js";
import { parseRosterRequest } from "../../src/roster/request.schemas.js";
import type {
  Assignment,
  Employee,
  GenerateOptions,
  Role,
  RosterRequestInput,
  RosterResult,
} from "../../src/roster/types.js";
import type { DayOfWeek } from "../../src/types.js";

export type EmployeeInput = RosterRequestInput["employees"][number];

const ALL_DAYS: DayOfWeek[] = [
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
  "sunday",
];

// ============================================================================
// Request builders
// ============================================================================

/** Availability covering 08:00-18:00 on the given days (every day by default). */
export function availableOn(
  days: DayOfWeek[] = ALL_DAYS,
  start = "08:00",
  end = "18:00",
): EmployeeInput["availability"] {
  const availability: EmployeeInput["availability"] = {};
  for (const day of days) availability[day] = [{ start, end }];
  return availability;
}

/**
 * An employee with no hour floor, a 40h ceiling, tier B and all-day
 * availability unless overridden.
 */
export function employee(
  id: string,
  role: Role,
  overrides: Partial<EmployeeInput> = {},
): EmployeeInput {
  return {
    id,
    name: id,
    role,
    minHoursPerWeek: 0,
    maxHoursPerWeek: 40,
    availability: availableOn(),
    ...overrides,
  };
}

/**
 * A one-week request starting Monday 2026-01-05 (off-season, so the open
 * weekdays alone decide which days open).
 */
export function rosterRequest(overrides: Partial<RosterRequestInput> = {}): RosterRequestInput {
  return {
    period: { startDate: "2026-01-05", weeks: 1 },
    employees: [],
    ...overrides,
  };
}

/** Manager, two team leaders, three clerks (tiers A, B, C) and a captain. */
export function standardTeam(): EmployeeInput[] {
  return [
    employee("mgr", "store_manager", { name: "Mara" }),
    employee("tl-a", "team_leader", { name: "Tess", priorityTier: "A" }),
    employee("tl-b", "team_leader", { name: "Theo" }),
    employee("c1", "store_clerk", { name: "Cora", priorityTier: "A" }),
    employee("c2", "store_clerk", { name: "Cole", priorityTier: "B" }),
    employee("c3", "store_clerk", { name: "Cyd", priorityTier: "C" }),
    employee("cap", "boat_captain", { name: "Cap" }),
  ];
}

export function contextFor(
  input: RosterRequestInput,
  options: GenerateOptions = {},
): RosterContext {
  return createRosterContext(parseRosterRequest(input), options);
}

// ============================================================================
// Context helpers
// ============================================================================

export function dayOf(ctx: RosterContext, date: string): CalendarDay {
  const day = ctx.calendar.byDate.get(date);
  if (!day) throw new Error(`${date} is not in the period`);
  return day;
}

export function employeeOf(ctx: RosterContext, id: string): Employee {
  const found = ctx.employeesById.get(id);
  if (!found) throw new Error(`Unknown employee ${id}`);
  return found;
}

export function greystonesSlot(
  ctx: RosterContext,
  date: string,
  role: Role,
  extra: Partial<Slot> = {},
): Slot {
  return {
    day: dayOf(ctx, date),
    role,
    location: "greystones",
    window: ctx.request.hours.greystones,
    ...extra,
  };
}

/** Records a full Greystones shift directly on the ledger. */
export function recordShift(ctx: RosterContext, id: string, date: string): void {
  const worker = employeeOf(ctx, id);
  ctx.ledger.record({
    date,
    location: "greystones",
    start: ctx.request.hours.greystones.start,
    end: ctx.request.hours.greystones.end,
    employeeId: worker.id,
    employeeName: worker.name,
    role: worker.role,
    source: "generated",
  });
}

// ============================================================================
// Result helpers
// ============================================================================

export function shiftsOf(result: RosterResult, id: string): Assignment[] {
  return result.assignments.filter((a) => a.employeeId === id);
}

export function datesOf(result: RosterResult, id: string, role?: Role): string[] {
  return shiftsOf(result, id)
    .filter((a) => role === undefined || a.role === role)
    .map((a) => a.date);
}

/** Sorted ids of everyone working a location on a date. */
export function staffAt(result: RosterResult, date: string, location: Assignment["location"]): string[] {
  return result.assignments
    .filter((a) => a.date === date && a.location === location)
    .map((a) => a.employeeId)
    .toSorted();
}
