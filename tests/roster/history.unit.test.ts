import { describe, expect, it } from "vitest";
import { generateRoster } from "../../src/roster/generate.js";
import { HistoryIndex, buildHistoricalAggregates, weekStartOf } from "../../src/roster/history.js";
import type { Assignment, Location, Role } from "../../src/roster/types.js";
import { addDays } from "../../src/datetime.utils.js";
import { rosterRequest, standardTeam } from "./helpers.js";

function shift(
  employeeId: string,
  role: Role,
  date: string,
  location: Location = "greystones",
  start = "08:30",
  end = "17:30",
): Assignment {
  return {
    date,
    location,
    start,
    end,
    employeeId,
    employeeName: employeeId,
    role,
    source: "generated",
  };
}

function longestRun(dates: string[]): number {
  const sorted = [...new Set(dates)].toSorted();
  let longest = 0;
  let run = 0;
  sorted.forEach((date, i) => {
    run = i > 0 && addDays(sorted[i - 1] ?? "", 1) === date ? run + 1 : 1;
    longest = Math.max(longest, run);
  });
  return longest;
}

describe("weekStartOf", () => {
  it("should find the start of the containing week", () => {
    expect(weekStartOf("2026-01-07", "monday")).toBe("2026-01-05");
    expect(weekStartOf("2026-01-05", "monday")).toBe("2026-01-05");
    expect(weekStartOf("2026-01-07", "sunday")).toBe("2026-01-04");
  });
});

describe("buildHistoricalAggregates", () => {
  const history = buildHistoricalAggregates(
    [
      shift("tl-a", "team_leader", "2025-12-29"),
      shift("tl-a", "team_leader", "2025-12-29", "beach_shop", "12:00", "16:00"),
      shift("tl-a", "team_leader", "2025-12-30"),
      shift("tl-a", "team_leader", "2025-12-31", "beach_shop", "12:00", "16:00"),
      shift("c1", "store_clerk", "2026-01-03", "greystones", "08:30", "13:30"),
      shift("c1", "store_clerk", "2026-01-05"),
    ],
    { weekStartDay: "monday", before: "2026-01-05" },
  );

  it("should sum each day's longest shift per week", () => {
    expect(history.weeklyHours).toEqual({ "2025-12-29": { "tl-a": 20, c1: 5 } });
  });

  it("should count Greystones team-leader days", () => {
    expect(history.weeklyLeaderDays).toEqual({ "2025-12-29": { "tl-a": 2 } });
  });

  it("should list worked days and skip anything on or after the cutoff", () => {
    expect(history.weeklyWorkedDays).toEqual({
      "2025-12-29": {
        "tl-a": ["2025-12-29", "2025-12-30", "2025-12-31"],
        c1: ["2026-01-03"],
      },
    });
  });

  it("should be readable through HistoryIndex", () => {
    const index = new HistoryIndex(history);

    expect(index.hours("2025-12-29", "tl-a")).toBe(20);
    expect(index.hours("2025-12-22", "tl-a")).toBe(0);
    expect(index.leaderDays("2025-12-29", "tl-a")).toBe(2);
    expect(index.workedOn("c1", "2026-01-03")).toBe(true);
    expect(index.workedOn("c1", "2026-01-04")).toBe(false);
  });
});

describe("carrying history between periods", () => {
  const first = generateRoster(rosterRequest({ employees: standardTeam() }));
  const history = buildHistoricalAggregates(first.assignments, {
    weekStartDay: "monday",
    before: "2026-01-12",
  });

  it("should match the generated totals", () => {
    for (const [id, totals] of Object.entries(first.totalsByEmployee)) {
      const hours = totals.weeks[0]?.hours ?? 0;
      expect(history.weeklyHours?.["2026-01-05"]?.[id] ?? 0).toBe(hours);
    }
  });

  it("should keep consecutive-day runs capped across the period boundary", () => {
    const second = generateRoster(
      rosterRequest({ period: { startDate: "2026-01-12", weeks: 1 }, employees: standardTeam() }),
      { history },
    );

    for (const member of standardTeam()) {
      const dates = [...first.assignments, ...second.assignments]
        .filter((a) => a.employeeId === member.id)
        .map((a) => a.date);
      expect(longestRun(dates)).toBeLessThanOrEqual(5);
    }
  });
});
