import { describe, expect, it } from "vitest";
import { generateRoster } from "../../src/roster/generate.js";
import type { RosterRequestInput } from "../../src/roster/types.js";
import { datesOf, employee, rosterRequest, staffAt } from "./helpers.js";

function lightStaffing(overrides: Partial<RosterRequestInput>): RosterRequestInput {
  return rosterRequest({
    coverage: { greystonesWeekdayStaff: 1, greystonesWeekendStaff: 1, beachShopStaff: 0 },
    leadershipRules: {
      minTeamLeadersEveryOpenDay: 0,
      teamLeadersIfManagerOff: 0,
      managerTwoConsecutiveDaysOffPerWeek: true,
    },
    ...overrides,
  });
}

function clerks(minHours: number) {
  return [
    employee("c1", "store_clerk", { name: "Cora", priorityTier: "A" }),
    employee("c2", "store_clerk", { name: "Cole", priorityTier: "C", minHoursPerWeek: minHours }),
    employee("cap", "boat_captain", { name: "Cap" }),
  ];
}

describe("weekly minimum-hours backfill", () => {
  it("should add make-up shifts on the clerk's preferred days until the minimum is met", () => {
    const result = generateRoster(
      lightStaffing({ openWeekdays: ["monday", "tuesday", "wednesday"], employees: clerks(16) }),
    );

    expect(datesOf(result, "c1")).toEqual(["2026-01-05", "2026-01-06", "2026-01-07"]);
    expect(datesOf(result, "c2")).toEqual(["2026-01-06", "2026-01-07"]);
    expect(result.violations).toEqual([]);
  });

  it("should report the shortfall when no day is left", () => {
    const result = generateRoster(
      lightStaffing({ openWeekdays: ["monday", "tuesday", "wednesday"], employees: clerks(40) }),
    );

    expect(datesOf(result, "c2")).toEqual(["2026-01-05", "2026-01-06", "2026-01-07"]);
    expect(result.violations).toEqual([
      {
        date: "2026-01-05",
        kind: "hours_min_violation",
        detail: "Cole scheduled 24h, minimum is 40h",
      },
    ]);
  });

  it("should skip and waive weeks with a requested day off", () => {
    const result = generateRoster(
      lightStaffing({
        openWeekdays: ["monday", "tuesday", "wednesday"],
        employees: clerks(16),
        unavailability: [{ employeeId: "c2", date: "2026-01-09" }],
      }),
    );

    expect(datesOf(result, "c2")).toEqual([]);
    expect(result.violations).toEqual([]);
  });

  it("should waive weeks with no open day", () => {
    const result = generateRoster(lightStaffing({ openWeekdays: [], employees: clerks(16) }));

    expect(result.assignments).toEqual([]);
    expect(result.violations).toEqual([]);
  });

  it("should do nothing in extended-hours mode", () => {
    const result = generateRoster(
      lightStaffing({
        openWeekdays: ["monday", "tuesday", "wednesday"],
        employees: clerks(16),
        extendedHours: true,
      }),
    );

    expect(datesOf(result, "c2")).toEqual([]);
    expect(result.violations.filter((v) => v.kind === "hours_min_violation")).toEqual([]);
  });

  it("should follow each role's make-up day order", () => {
    const result = generateRoster(
      lightStaffing({
        openWeekdays: ["wednesday", "saturday"],
        employees: [
          ...clerks(8),
          employee("tl", "team_leader", { name: "Tess", minHoursPerWeek: 8 }),
        ],
      }),
    );

    expect(datesOf(result, "c2")).toEqual(["2026-01-07"]);
    expect(datesOf(result, "tl")).toEqual(["2026-01-10"]);
  });

  it("should never put a second captain on the Boat", () => {
    const result = generateRoster(
      lightStaffing({
        openWeekdays: ["monday", "tuesday", "wednesday", "thursday", "friday"],
        employees: [
          employee("cap-1", "boat_captain", { name: "Cap", minHoursPerWeek: 32 }),
          employee("cap-2", "boat_captain", { name: "Kit", minHoursPerWeek: 32 }),
        ],
      }),
    );

    const dates = ["2026-01-05", "2026-01-06", "2026-01-07", "2026-01-08", "2026-01-09"];
    expect(dates.map((date) => staffAt(result, date, "boat").length)).toEqual([1, 1, 1, 1, 1]);
    expect(datesOf(result, "cap-1").length + datesOf(result, "cap-2").length).toBe(5);
  });
});
