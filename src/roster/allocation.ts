import type { CalendarDay } from "./calendar.js";
import type { RosterContext } from "./context.js";
import { findEligible, type Slot } from "./eligibility.js";
import {
  FLOOR_ROLE,
  LEAD_ROLE,
  MANDATORY_ROLE,
  ROTATING_ROLE,
  type Employee,
  type Location,
  type Role,
} from "./types.js";

/** How many of a day's positions were filled, per pass. */
export interface DayAllocation {
  date: string;
  lead: number;
  leaders: number;
  floor: number;
  mandatory: number;
  beachShop: number;
}

function assign(ctx: RosterContext, employee: Employee, slot: Slot, role: Role = slot.role): void {
  ctx.ledger.record({
    date: slot.day.date,
    location: slot.location,
    start: slot.window.start,
    end: slot.window.end,
    employeeId: employee.id,
    employeeName: employee.name,
    role,
    source: "generated",
  });
}

function fill(ctx: RosterContext, slot: Slot, count: number): Employee[] {
  if (count <= 0) return [];
  const chosen = findEligible(ctx, slot).slice(0, count);
  for (const employee of chosen) assign(ctx, employee, slot);
  return chosen;
}

function greystonesSlot(ctx: RosterContext, day: CalendarDay, role: Role): Slot {
  return { day, role, location: "greystones", window: ctx.request.hours.greystones };
}

/**
 * Staffs the Beach Shop: unassigned clerks, then unassigned team leaders,
 * then at most one Greystones floor member working a second shift.
 */
function staffBeachShop(ctx: RosterContext, day: CalendarDay): number {
  const need = ctx.request.coverage.beachShopStaff;
  const location: Location = "beach_shop";
  const window = ctx.request.hours.beachShop;

  let filled = fill(ctx, { day, role: FLOOR_ROLE, location, window }, need).length;
  filled += fill(ctx, { day, role: ROTATING_ROLE, location, window }, need - filled).length;
  if (filled >= need) return filled;

  const onFloor = new Set(
    ctx.ledger
      .onDay(day.date)
      .filter((a) => a.location === "greystones" && (a.role === FLOOR_ROLE || a.role === ROTATING_ROLE))
      .map((a) => a.employeeId),
  );
  for (const role of [FLOOR_ROLE, ROTATING_ROLE] as const) {
    const slot: Slot = { day, role, location, window, allowDoubleBooking: true };
    const [pulled] = findEligible(ctx, slot).filter((e) => onFloor.has(e.id));
    if (pulled) {
      assign(ctx, pulled, slot);
      return filled + 1;
    }
  }
  return filled;
}

/**
 * Fills one open day in fixed order: the lead role, the rotating-role
 * minimum, the Greystones floor, the mandatory single role, then the Beach
 * Shop. Shortfalls are left for the violation pass to report.
 */
export function allocateDay(ctx: RosterContext, day: CalendarDay): DayAllocation {
  const { coverage, leadershipRules, extendedHours } = ctx.request;

  const lead = fill(ctx, { ...greystonesSlot(ctx, day, LEAD_ROLE), ignoreMax: extendedHours }, 1);

  const leaderMinimum =
    lead.length > 0
      ? leadershipRules.minTeamLeadersEveryOpenDay
      : leadershipRules.teamLeadersIfManagerOff;
  const leaders = fill(
    ctx,
    { ...greystonesSlot(ctx, day, ROTATING_ROLE), ignoreMax: true },
    leaderMinimum,
  );

  const target = day.weekend ? coverage.greystonesWeekendStaff : coverage.greystonesWeekdayStaff;
  const floorNeed = Math.max(0, target - leaders.length);
  const clerks = fill(ctx, greystonesSlot(ctx, day, FLOOR_ROLE), floorNeed);
  const extraLeaders = fill(ctx, greystonesSlot(ctx, day, ROTATING_ROLE), floorNeed - clerks.length);

  const boat: Slot = {
    day,
    role: MANDATORY_ROLE,
    location: "boat",
    window: ctx.request.hours.greystones,
  };
  let mandatory = fill(ctx, boat, 1).length;
  if (mandatory === 0) mandatory = fill(ctx, { ...boat, ignoreMax: true }, 1).length;

  const beachShop = day.beachShopOpen ? staffBeachShop(ctx, day) : 0;

  return {
    date: day.date,
    lead: lead.length,
    leaders: leaders.length + extraLeaders.length,
    floor: leaders.length + clerks.length + extraLeaders.length,
    mandatory,
    beachShop,
  };
}
