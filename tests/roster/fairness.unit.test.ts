import { describe, expect, it } from "vitest";
import { findEligible } from "../../src/roster/eligibility.js";
import { compareCandidates, orderCandidates, rerollKey } from "../../src/roster/fairness.js";
import type { Slot } from "../../src/roster/eligibility.js";
import type { RosterContext } from "../../src/roster/context.js";
import {
  contextFor,
  dayOf,
  employee,
  employeeOf,
  greystonesSlot,
  rosterRequest,
} from "./helpers.js";

function boatSlot(ctx: RosterContext, date: string): Slot {
  return {
    day: dayOf(ctx, date),
    role: "boat_captain",
    location: "boat",
    window: ctx.request.hours.greystones,
  };
}

function ids(ctx: RosterContext, slot: Slot): string[] {
  return findEligible(ctx, slot).map((e) => e.id);
}

describe("rerollKey", () => {
  it("should hash the token and employee id together", () => {
    expect(rerollKey(0, "x")).toBe(
      "dbcdd5257900b0eeebb3c43d1da7b80ae15279c34dcf5d4b96723855e6313230",
    );
  });

  it("should treat numeric and string tokens alike", () => {
    expect(rerollKey(7, "c1")).toBe(rerollKey("7", "c1"));
  });

  it("should change with the token", () => {
    expect(rerollKey("a", "c1")).not.toBe(rerollKey("b", "c1"));
  });
});

describe("candidate ordering", () => {
  it("should prefer within-limit candidates, then the smallest overrun with the lowest tier", () => {
    const ctx = contextFor(
      rosterRequest({
        employees: [
          employee("tier-a", "store_clerk", { priorityTier: "A", maxHoursPerWeek: 4 }),
          employee("tier-c", "store_clerk", { priorityTier: "C", maxHoursPerWeek: 4 }),
          employee("near", "store_clerk", { priorityTier: "A", maxHoursPerWeek: 6 }),
          employee("roomy", "store_clerk", { priorityTier: "B", maxHoursPerWeek: 40 }),
        ],
      }),
    );

    expect(ids(ctx, greystonesSlot(ctx, "2026-01-05", "store_clerk", { ignoreMax: true }))).toEqual([
      "roomy",
      "near",
      "tier-c",
      "tier-a",
    ]);
  });

  it("should favour clerks with fewer hours over the trailing weeks", () => {
    const ctx = contextFor(
      rosterRequest({
        employees: [employee("busy", "store_clerk"), employee("quiet", "store_clerk")],
      }),
      {
        history: {
          weeklyHours: {
            "2025-12-29": { busy: 30, quiet: 10 },
            "2025-12-22": { quiet: 16 },
          },
        },
      },
    );

    expect(ids(ctx, greystonesSlot(ctx, "2026-01-05", "store_clerk"))).toEqual(["quiet", "busy"]);
  });

  it("should ignore history older than four weeks", () => {
    const ctx = contextFor(
      rosterRequest({
        employees: [
          employee("a-old", "store_clerk", { priorityTier: "A" }),
          employee("b-new", "store_clerk", { priorityTier: "A" }),
        ],
      }),
      {
        history: {
          weeklyHours: {
            "2025-12-01": { "a-old": 40 },
            "2025-12-08": { "b-new": 8 },
          },
        },
      },
    );

    expect(ids(ctx, greystonesSlot(ctx, "2026-01-05", "store_clerk"))).toEqual(["a-old", "b-new"]);
  });

  it("should put a long off streak first for non-floor roles", () => {
    const ctx = contextFor(
      rosterRequest({
        employees: [
          employee("cap-rested", "boat_captain", { priorityTier: "C" }),
          employee("cap-recent", "boat_captain", { priorityTier: "A" }),
        ],
      }),
      {
        history: {
          weeklyWorkedDays: {
            "2025-12-29": { "cap-rested": ["2026-01-01"], "cap-recent": ["2026-01-04"] },
          },
        },
      },
    );

    expect(ids(ctx, boatSlot(ctx, "2026-01-05"))).toEqual(["cap-rested", "cap-recent"]);
  });

  it("should extend yesterday's run rather than isolate a single day off", () => {
    const ctx = contextFor(
      rosterRequest({
        employees: [
          employee("cap-gap", "boat_captain", { priorityTier: "A" }),
          employee("cap-run", "boat_captain", { priorityTier: "C" }),
        ],
      }),
      {
        history: {
          weeklyWorkedDays: {
            "2025-12-29": { "cap-gap": ["2026-01-03"], "cap-run": ["2026-01-04"] },
          },
        },
      },
    );

    expect(ids(ctx, boatSlot(ctx, "2026-01-05"))).toEqual(["cap-run", "cap-gap"]);
  });

  describe("team leader rotation", () => {
    const pair = () => [employee("tl-a", "team_leader"), employee("tl-b", "team_leader")];

    it("should give the first day to whoever led less in the prior week", () => {
      const ctx = contextFor(rosterRequest({ employees: pair() }), {
        history: { weeklyLeaderDays: { "2025-12-29": { "tl-a": 4, "tl-b": 3 } } },
      });

      expect(ids(ctx, greystonesSlot(ctx, "2026-01-05", "team_leader"))).toEqual(["tl-b", "tl-a"]);
    });

    it("should flip when the prior week flips", () => {
      const ctx = contextFor(rosterRequest({ employees: pair() }), {
        history: { weeklyLeaderDays: { "2025-12-29": { "tl-a": 3, "tl-b": 4 } } },
      });

      expect(ids(ctx, greystonesSlot(ctx, "2026-01-05", "team_leader"))).toEqual(["tl-a", "tl-b"]);
    });
  });

  it("should break remaining ties with the reroll hash", () => {
    const ctx = contextFor(
      rosterRequest({
        employees: ["c1", "c2", "c3", "c4"].map((id) => employee(id, "store_clerk")),
        rerollToken: "summer",
      }),
    );

    expect(ids(ctx, greystonesSlot(ctx, "2026-01-05", "store_clerk"))).toEqual(["c3", "c2", "c1", "c4"]);
  });

  it("should agree with the pairwise comparator", () => {
    const ctx = contextFor(
      rosterRequest({
        employees: ["c1", "c2", "c3", "c4"].map((id) => employee(id, "store_clerk")),
      }),
    );
    const slot = greystonesSlot(ctx, "2026-01-05", "store_clerk");
    const everyone = ["c1", "c2", "c3", "c4"].map((id) => employeeOf(ctx, id));

    expect(everyone.toSorted(compareCandidates(ctx, slot)).map((e) => e.id)).toEqual(
      orderCandidates(ctx, everyone, slot).map((e) => e.id),
    );
    expect(orderCandidates(ctx, everyone, slot).map((e) => e.id)).toEqual(["c4", "c3", "c2", "c1"]);
  });
});
