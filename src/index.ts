/**
 * Deterministic multi-week roster generation for a seasonal retail operation.
 *
 * Staffs a main store (Greystones), a secondary seasonal shop (Beach Shop)
 * and a boat from a fixed roster, honouring availability, requested days
 * off, weekly hour bands, leadership rules and fatigue limits. Every rule
 * that cannot be met is returned as a {@link Violation}; only malformed
 * requests throw.
 *
 * @remarks
 * ## Core Concepts
 *
 * **Request**: A single validated object ({@link parseRosterRequest}) with
 * the period, the roster, opening hours, coverage targets, leadership rules,
 * requested days off and ad-hoc bookings. Defaults fill everything but the
 * period and the employees.
 *
 * **Passes**: {@link generateRoster} runs a greedy daily pass for every open
 * day, reconciles ad-hoc bookings, tops up weekly minimum hours, then
 * re-derives totals and violations from the final assignments.
 *
 * **Fairness**: Candidates for a slot are ordered by hours, rest patterns,
 * leadership rotation and history, with a reroll token breaking ties. The
 * same token always yields the same roster.
 *
 * **History**: Summaries of earlier finalized rosters
 * ({@link buildHistoricalAggregates}) carry fatigue and fairness across
 * periods. They are only read.
 *
 * @example Generate a roster
 * ```typescript
 * import { generateRoster } from "seasonal-roster";
 *
 * const result = generateRoster({
 *   period: { startDate: "2026-07-06", weeks: 2 },
 *   scheduleBeachShop: true,
 *   employees: [
 *     {
 *       id: "mgr",
 *       name: "Morgan",
 *       role: "store_manager",
 *       minHoursPerWeek: 32,
 *       maxHoursPerWeek: 40,
 *       availability: { monday: [{ start: "08:00", end: "18:00" }] },
 *     },
 *   ],
 * });
 * ```
 *
 * @example Carry history into the next period
 * ```typescript
 * import { buildHistoricalAggregates, generateRoster } from "seasonal-roster";
 *
 * const history = buildHistoricalAggregates(previous.assignments, {
 *   weekStartDay: "monday",
 *   before: "2026-07-20",
 * });
 * const next = generateRoster(request, { history, logger: console });
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Time primitives
// ============================================================================

export type { ClockWindow, DayOfWeek, MinuteWindow, ResolvedPeriod } from "./types.js";

export { DayOfWeekSchema } from "./types.js";

// ============================================================================
// Errors
// ============================================================================

export { RosterInputError } from "./errors.js";

export type { RosterInputIssue } from "./errors.js";

// ============================================================================
// Request
// ============================================================================

export {
  parseRosterRequest,
  RosterRequestSchema,
  EmployeeSchema,
  AdHocBookingSchema,
  UnavailabilityEntrySchema,
  SeasonAnchorsSchema,
  RoleSchema,
  LocationSchema,
  PriorityTierSchema,
} from "./roster/request.schemas.js";

export type {
  RosterRequest,
  RosterRequestInput,
  Employee,
  AdHocBooking,
  UnavailabilityEntry,
  SeasonAnchors,
  Role,
  Location,
  PriorityTier,
  HistoricalAggregates,
  GenerateOptions,
  RosterLogger,
} from "./roster/types.js";

// ============================================================================
// Generation
// ============================================================================

export { generateRoster } from "./roster/generate.js";

export { buildHistoricalAggregates, weekStartOf } from "./roster/history.js";

export type { HistoryOptions } from "./roster/history.js";

// ============================================================================
// Result
// ============================================================================

export type {
  Assignment,
  AssignmentSource,
  Violation,
  ViolationKind,
  WeekTotals,
  EmployeeTotals,
  RosterResult,
} from "./roster/types.js";

// ============================================================================
// Building blocks
// ============================================================================

export {
  resolveCalendar,
  resolveSeasonAnchors,
  canonicalSeasonAnchors,
  resolvePeriod,
} from "./roster/calendar.js";

export type { CalendarDay, RosterCalendar, SeasonRegime } from "./roster/calendar.js";

export { createRosterContext } from "./roster/context.js";

export type { RosterContext } from "./roster/context.js";

export { RosterLedger } from "./roster/ledger.js";

export { HistoryIndex } from "./roster/history.js";

export { findEligible, checkEligibility } from "./roster/eligibility.js";

export type { Slot, Ineligibility } from "./roster/eligibility.js";

export { compareCandidates, rerollKey } from "./roster/fairness.js";

export { paidHours } from "./roster/utils.js";

export type { BreakPolicy } from "./roster/utils.js";

// ============================================================================
// Constants
// ============================================================================

export {
  LEAD_ROLE,
  ROTATING_ROLE,
  FLOOR_ROLE,
  MANDATORY_ROLE,
  LOCATION_LABELS,
  ROLE_LABELS,
} from "./roster/types.js";
