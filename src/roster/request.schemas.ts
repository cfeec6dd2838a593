/**
 * Zod schemas for roster generation requests.
 *
 * These schemas define the contract between callers (an API layer, a stored
 * payload, a test) and the engine. TypeScript types are derived from them
 * with `z.infer` so the two never drift.
 *
 * @see types.ts for the derived TypeScript types
 */

import * as z from "zod";
import { DAY_OF_WEEK_MAP, isDayString, parseClock, toMinuteWindow } from "../datetime.utils.js";
import { RosterInputError } from "../errors.js";
import { DayOfWeekSchema, type DayOfWeek } from "../types.js";

// --------------------------------------------------------------------------
// Primitives
// --------------------------------------------------------------------------

const ALL_DAYS: DayOfWeek[] = [
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
  "sunday",
];

export const DayStringSchema = z
  .string()
  .refine(isDayString, { message: "Expected a calendar date in YYYY-MM-DD form" });

export const ClockSchema = z
  .string()
  .refine((value) => parseClock(value) !== null, { message: "Expected a 24h time in HH:MM form" });

export const ClockWindowSchema = z
  .object({
    start: ClockSchema,
    end: ClockSchema,
  })
  .refine((window) => toMinuteWindow(window) !== null, {
    message: "Window end must be after its start",
  });

const WindowListSchema = z.array(ClockWindowSchema);

// --------------------------------------------------------------------------
// Closed enums
// --------------------------------------------------------------------------

export const RoleSchema = z.enum(["store_manager", "team_leader", "store_clerk", "boat_captain"]);

export const PriorityTierSchema = z.enum(["A", "B", "C"]);

export const LocationSchema = z.enum(["greystones", "beach_shop", "boat"]);

// --------------------------------------------------------------------------
// Roster
// --------------------------------------------------------------------------

export const AvailabilitySchema = z
  .object({
    monday: WindowListSchema.optional(),
    tuesday: WindowListSchema.optional(),
    wednesday: WindowListSchema.optional(),
    thursday: WindowListSchema.optional(),
    friday: WindowListSchema.optional(),
    saturday: WindowListSchema.optional(),
    sunday: WindowListSchema.optional(),
  })
  .strict();

export const EmployeeSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  role: RoleSchema,
  minHoursPerWeek: z.number().min(0),
  maxHoursPerWeek: z.number().min(0),
  priorityTier: PriorityTierSchema.default("B"),
  student: z.boolean().default(false),
  availability: AvailabilitySchema,
});

// --------------------------------------------------------------------------
// Calendar and staffing configuration
// --------------------------------------------------------------------------

export const PeriodSchema = z.object({
  startDate: DayStringSchema,
  weeks: z.number().int().min(1).max(26).default(2),
});

export const SeasonAnchorsSchema = z.object({
  victoriaDay: DayStringSchema,
  springShoulderEnd: DayStringSchema,
  labourDay: DayStringSchema,
  seasonClose: DayStringSchema,
});

export const LocationHoursSchema = z.object({
  greystones: ClockWindowSchema,
  beachShop: ClockWindowSchema,
});

export const CoverageSchema = z.object({
  greystonesWeekdayStaff: z.number().int().min(0),
  greystonesWeekendStaff: z.number().int().min(0),
  beachShopStaff: z.number().int().min(0),
});

export const LeadershipRulesSchema = z.object({
  minTeamLeadersEveryOpenDay: z.number().int().min(0),
  teamLeadersIfManagerOff: z.number().int().min(0),
  managerTwoConsecutiveDaysOffPerWeek: z.boolean(),
});

export const BreakPolicySchema = z.object({
  /** Shifts spanning at least this many hours lose the unpaid break. */
  thresholdHours: z.number().min(0),
  unpaidMinutes: z.number().int().min(0),
});

// --------------------------------------------------------------------------
// Caller-supplied day entries
// --------------------------------------------------------------------------

export const UnavailabilityEntrySchema = z.object({
  employeeId: z.string().min(1),
  date: DayStringSchema,
  reason: z.string().optional(),
});

/**
 * Dates and times stay plain strings here: a malformed booking becomes an
 * `ad_hoc_conflict` violation instead of rejecting the whole request.
 */
export const AdHocBookingSchema = z.object({
  employeeId: z.string(),
  date: z.string(),
  start: z.string(),
  end: z.string(),
  location: LocationSchema,
  note: z.string().optional(),
});

// --------------------------------------------------------------------------
// Request
// --------------------------------------------------------------------------

export const RosterRequestSchema = z
  .object({
    period: PeriodSchema,
    weekStartDay: DayOfWeekSchema.default("monday"),
    weekEndDay: DayOfWeekSchema.default("sunday"),
    openWeekdays: z.array(DayOfWeekSchema).default(ALL_DAYS),
    seasonAnchors: SeasonAnchorsSchema.optional(),
    hours: LocationHoursSchema.default({
      greystones: { start: "08:30", end: "17:30" },
      beachShop: { start: "12:00", end: "16:00" },
    }),
    coverage: CoverageSchema.default({
      greystonesWeekdayStaff: 3,
      greystonesWeekendStaff: 4,
      beachShopStaff: 2,
    }),
    leadershipRules: LeadershipRulesSchema.default({
      minTeamLeadersEveryOpenDay: 1,
      teamLeadersIfManagerOff: 2,
      managerTwoConsecutiveDaysOffPerWeek: true,
    }),
    breakPolicy: BreakPolicySchema.default({ thresholdHours: 6, unpaidMinutes: 60 }),
    employees: z.array(EmployeeSchema),
    unavailability: z.array(UnavailabilityEntrySchema).default([]),
    adHocBookings: z.array(AdHocBookingSchema).default([]),
    /** Seed for the fairness tiebreak. Changing it redistributes ties. */
    rerollToken: z.union([z.string(), z.number()]).default(0),
    /** Shoulder-season operating mode. */
    extendedHours: z.boolean().default(false),
    scheduleBeachShop: z.boolean().default(false),
  })
  .superRefine((request, ctx) => {
    const expectedEnd = (DAY_OF_WEEK_MAP[request.weekStartDay] + 6) % 7;
    if (DAY_OF_WEEK_MAP[request.weekEndDay] !== expectedEnd) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["weekEndDay"],
        message: `A week starting on ${request.weekStartDay} must end on the day before it, not ${request.weekEndDay}`,
      });
    }

    if (request.extendedHours && request.scheduleBeachShop) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["extendedHours"],
        message: "Extended-hours mode cannot be combined with Beach Shop scheduling",
      });
    }

    const seen = new Set<string>();
    request.employees.forEach((employee, index) => {
      if (seen.has(employee.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["employees", index, "id"],
          message: `Duplicate employee id "${employee.id}"`,
        });
      }
      seen.add(employee.id);
    });
  });

/**
 * Validates a raw request and applies defaults.
 *
 * @throws RosterInputError when the request cannot be scheduled at all:
 * schema violations, a week pair that does not span seven days, extended-hours
 * mode together with the Beach Shop, or duplicate employee ids.
 */
export function parseRosterRequest(input: unknown): z.infer<typeof RosterRequestSchema> {
  const result = RosterRequestSchema.safeParse(input);
  if (result.success) return result.data;

  const issues = result.error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
  throw new RosterInputError(
    `Invalid roster request: ${issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join("; ")}`,
    issues,
  );
}
