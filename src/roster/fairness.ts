import { createHash } from "node:crypto";
import { addDays } from "../datetime.utils.js";
import type { RosterContext } from "./context.js";
import type { Slot } from "./eligibility.js";
import { FLOOR_ROLE, ROTATING_ROLE, TIER_RANK, type Employee } from "./types.js";
import { HISTORY_LOOKBACK_WEEKS, compareKeys, roundHours } from "./utils.js";

type SortKey = readonly (number | string)[];

/**
 * Reroll tiebreak: a stable hash of the token and the employee id.
 * Changing the token reshuffles otherwise-equal candidates.
 */
export function rerollKey(token: string | number, employeeId: string): string {
  return createHash("sha256").update(`${token}:${employeeId}`).digest("hex");
}

// ============================================================================
// Individual keys (lower sorts first)
// ============================================================================

/**
 * Prefers candidates who stay within their weekly maximum. Among those the
 * higher priority tier wins; among overtime candidates the smallest overrun
 * wins, then the lower priority tier.
 */
function maxHoursKey(ctx: RosterContext, employee: Employee, slot: Slot): SortKey {
  const hours = ctx.ledger.shiftHours(slot.window);
  const projected = ctx.ledger.hoursInWeekWith(
    employee.id,
    slot.day.weekStart,
    slot.day.date,
    hours,
  );
  const overtime = projected > employee.maxHoursPerWeek;
  const tier = TIER_RANK[employee.priorityTier];
  return [
    overtime ? 1 : 0,
    overtime ? roundHours(projected - employee.maxHoursPerWeek) : 0,
    overtime ? 2 - tier : tier,
  ];
}

/**
 * The rotating pair member with fewer leadership days in the week before
 * `weekStart`, or `null` when they are level.
 */
function preferredRotationMember(ctx: RosterContext, weekStart: string): string | null {
  if (!ctx.rotatingPair) return null;
  const [first, second] = ctx.rotatingPair;
  const priorWeek = addDays(weekStart, -7);
  const firstDays = ctx.ledger.leaderDaysInWeek(first.id, priorWeek);
  const secondDays = ctx.ledger.leaderDaysInWeek(second.id, priorWeek);
  if (firstDays < secondDays) return first.id;
  if (secondDays < firstDays) return second.id;
  return null;
}

/**
 * Steers the rotating pair toward a 4/3-style weekly split that alternates:
 * whoever led less last week should lead one more day this week.
 */
function rotationKey(ctx: RosterContext, employee: Employee, slot: Slot): SortKey {
  if (slot.role !== ROTATING_ROLE || !ctx.rotatingPair) return [0];
  const [first, second] = ctx.rotatingPair;
  if (employee.id !== first.id && employee.id !== second.id) return [0];

  const other = employee.id === first.id ? second : first;
  const { weekStart } = slot.day;
  const mine = ctx.ledger.leaderDaysInWeek(employee.id, weekStart) + 1;
  const theirs = ctx.ledger.leaderDaysInWeek(other.id, weekStart);

  const preferred = preferredRotationMember(ctx, weekStart);
  if (preferred === null) return [Math.abs(mine - theirs)];
  const lead = preferred === employee.id ? mine - theirs : theirs - mine;
  return [Math.abs(lead - 1)];
}

/**
 * Hard bound on the rotating pair: 1 when giving a Greystones leadership
 * slot to this candidate would put the pair more than one leadership day
 * apart, counted over the run and the prior week.
 */
function rotationGapKey(ctx: RosterContext, employee: Employee, slot: Slot): SortKey {
  if (slot.role !== ROTATING_ROLE || slot.location !== "greystones" || !ctx.rotatingPair) {
    return [0];
  }
  const [first, second] = ctx.rotatingPair;
  if (employee.id !== first.id && employee.id !== second.id) return [0];

  const other = employee.id === first.id ? second : first;
  const gap =
    ctx.ledger.cumulativeLeaderDays(employee.id) + 1 - ctx.ledger.cumulativeLeaderDays(other.id);
  return [gap > 1 ? 1 : 0];
}

/** Trailing weeks plus the current week; zero in extended-hours mode. */
function historicalHoursKey(ctx: RosterContext, employee: Employee, slot: Slot): SortKey {
  if (ctx.request.extendedHours) return [0];
  let total = 0;
  for (let k = 0; k <= HISTORY_LOOKBACK_WEEKS; k++) {
    total += ctx.ledger.hoursInWeek(employee.id, addDays(slot.day.weekStart, -7 * k));
  }
  return [roundHours(total)];
}

/** Three or more days off first (longest first), then two, then the rest. */
function offStreakKey(ctx: RosterContext, employee: Employee, slot: Slot): SortKey {
  const streak = ctx.ledger.offStreakBefore(employee.id, slot.day.date);
  if (streak >= 3) return [0, -streak];
  if (streak === 2) return [1, 0];
  return [2, 0];
}

/**
 * Extends yesterday's run before starting a new one, and avoids leaving a
 * lone day off between two worked days.
 */
function continuityKey(ctx: RosterContext, employee: Employee, slot: Slot): SortKey {
  const { date } = slot.day;
  if (ctx.ledger.workedOn(employee.id, addDays(date, -1))) return [0];
  if (ctx.ledger.workedOn(employee.id, addDays(date, -2))) return [2];
  return [1];
}

function weekHoursKey(ctx: RosterContext, employee: Employee, slot: Slot): SortKey {
  return [ctx.ledger.hoursInWeek(employee.id, slot.day.weekStart)];
}

// ============================================================================
// Composite ordering
// ============================================================================

/**
 * Full sort key for one candidate. Floor-role slots weigh hours first;
 * leadership and single-person slots weigh rest patterns first, after the
 * rotating pair's gap bound.
 */
export function candidateKey(ctx: RosterContext, employee: Employee, slot: Slot): SortKey {
  const reroll = rerollKey(ctx.request.rerollToken, employee.id);
  const tail = [...weekHoursKey(ctx, employee, slot), reroll, employee.name, employee.id];

  if (slot.role === FLOOR_ROLE) {
    return [
      ...maxHoursKey(ctx, employee, slot),
      ...historicalHoursKey(ctx, employee, slot),
      ...offStreakKey(ctx, employee, slot),
      ...continuityKey(ctx, employee, slot),
      ...tail,
    ];
  }
  return [
    ...rotationGapKey(ctx, employee, slot),
    ...offStreakKey(ctx, employee, slot),
    ...continuityKey(ctx, employee, slot),
    ...maxHoursKey(ctx, employee, slot),
    ...rotationKey(ctx, employee, slot),
    ...tail,
  ];
}

/**
 * Comparator over candidates for one slot. Keys are computed on demand;
 * use {@link orderCandidates} to sort a list.
 */
export function compareCandidates(
  ctx: RosterContext,
  slot: Slot,
): (a: Employee, b: Employee) => number {
  return (a, b) => compareKeys(candidateKey(ctx, a, slot), candidateKey(ctx, b, slot));
}

export function orderCandidates(
  ctx: RosterContext,
  candidates: readonly Employee[],
  slot: Slot,
): Employee[] {
  const keys = new Map(candidates.map((e) => [e.id, candidateKey(ctx, e, slot)]));
  return candidates.toSorted((a, b) => compareKeys(keys.get(a.id) ?? [], keys.get(b.id) ?? []));
}
