import type * as z from "zod";
import type { ClockWindow, ResolvedPeriod } from "../types.js";
import type {
  AdHocBookingSchema,
  EmployeeSchema,
  LocationSchema,
  PriorityTierSchema,
  RoleSchema,
  RosterRequestSchema,
  SeasonAnchorsSchema,
  UnavailabilityEntrySchema,
} from "./request.schemas.js";

// ============================================================================
// Closed enums and their ordering tables
// ============================================================================

export type Role = z.infer<typeof RoleSchema>;
export type PriorityTier = z.infer<typeof PriorityTierSchema>;
export type Location = z.infer<typeof LocationSchema>;

/** Lead role: at most one per open day. */
export const LEAD_ROLE = "store_manager" satisfies Role;
/** The leadership role shared by the rotating pair. Counts toward the floor. */
export const ROTATING_ROLE = "team_leader" satisfies Role;
/** General floor role. */
export const FLOOR_ROLE = "store_clerk" satisfies Role;
/** Single-person role that must be filled whenever anyone qualifies. */
export const MANDATORY_ROLE = "boat_captain" satisfies Role;

export const ROLE_PRECEDENCE = {
  store_manager: 0,
  team_leader: 1,
  boat_captain: 2,
  store_clerk: 3,
} as const satisfies Record<Role, number>;

export const TIER_RANK = {
  A: 0,
  B: 1,
  C: 2,
} as const satisfies Record<PriorityTier, number>;

export const LOCATION_ORDER = {
  greystones: 0,
  beach_shop: 1,
  boat: 2,
} as const satisfies Record<Location, number>;

export const LOCATION_LABELS = {
  greystones: "Greystones",
  beach_shop: "Beach Shop",
  boat: "Boat",
} as const satisfies Record<Location, string>;

export const ROLE_LABELS = {
  store_manager: "Store Manager",
  team_leader: "Team Leader",
  store_clerk: "Store Clerk",
  boat_captain: "Boat Captain",
} as const satisfies Record<Role, string>;

/** Which roles may staff each location. */
export const LOCATION_ROLES = {
  greystones: ["store_manager", "team_leader", "store_clerk"],
  beach_shop: ["team_leader", "store_clerk"],
  boat: ["boat_captain"],
} as const satisfies Record<Location, readonly Role[]>;

// ============================================================================
// Inputs
// ============================================================================

/** Validated request with defaults applied. */
export type RosterRequest = z.infer<typeof RosterRequestSchema>;
/** What callers may pass before defaults are applied. */
export type RosterRequestInput = z.input<typeof RosterRequestSchema>;

export type Employee = z.infer<typeof EmployeeSchema>;
export type UnavailabilityEntry = z.infer<typeof UnavailabilityEntrySchema>;
export type AdHocBooking = z.infer<typeof AdHocBookingSchema>;
export type SeasonAnchors = z.infer<typeof SeasonAnchorsSchema>;

/**
 * Read-only summaries of previously finalized schedules, keyed by week-start
 * date and then employee id.
 *
 * Supplied by the persistence layer (see {@link buildHistoricalAggregates})
 * and used only to bias fairness and to carry fatigue tracking across
 * periods.
 *
 * @example
 * ```typescript
 * const history: HistoricalAggregates = {
 *   weeklyHours: { "2025-12-29": { clerk_a: 24 } },
 *   weeklyLeaderDays: { "2025-12-29": { lead_a: 5, lead_b: 4 } },
 *   weeklyWorkedDays: { "2025-12-29": { clerk_a: ["2026-01-03", "2026-01-04"] } },
 * };
 * ```
 */
export interface HistoricalAggregates {
  weeklyHours?: Record<string, Record<string, number>>;
  weeklyLeaderDays?: Record<string, Record<string, number>>;
  weeklyWorkedDays?: Record<string, Record<string, string[]>>;
}

/**
 * Receives one line per generation pass. `console` satisfies it.
 */
export interface RosterLogger {
  debug(message: string, context?: Record<string, unknown>): void;
}

export interface GenerateOptions {
  history?: HistoricalAggregates;
  logger?: RosterLogger;
}

// ============================================================================
// Outputs
// ============================================================================

export type AssignmentSource = "generated" | "ad_hoc";

/**
 * One shift worked by one employee.
 *
 * @category Output
 */
export interface Assignment extends ClockWindow {
  date: string;
  location: Location;
  employeeId: string;
  employeeName: string;
  role: Role;
  source: AssignmentSource;
  note?: string;
}

export type ViolationKind =
  | "coverage_gap"
  | "leader_gap"
  | "role_missing"
  | "beach_shop_gap"
  | "manager_consecutive_days_off"
  | "manager_expected_days"
  | "hours_min_violation"
  | "hours_max_violation"
  | "ad_hoc_conflict";

/**
 * A rule the roster could not honour. Never thrown; always returned.
 *
 * @category Output
 */
export interface Violation {
  date: string;
  kind: ViolationKind;
  detail: string;
}

export interface WeekTotals {
  weekStart: string;
  hours: number;
  /** Beach-Shop-only days count as half a day. */
  days: number;
  weekendDays: number;
}

/**
 * @category Output
 */
export interface EmployeeTotals {
  weeks: WeekTotals[];
  weekendDays: number;
  locations: Record<Location, number>;
}

/**
 * @category Output
 */
export interface RosterResult {
  period: ResolvedPeriod;
  assignments: Assignment[];
  violations: Violation[];
  totalsByEmployee: Record<string, EmployeeTotals>;
}
