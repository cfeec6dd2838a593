import type { Violation, ViolationKind } from "./types.js";

export interface ViolationReporter {
  // Staffing shortfalls on one open day
  reportStaffing(kind: StaffingKind, date: string, detail: string): void;

  // Per-employee, per-week compliance, dated at the week start
  reportWeekly(kind: WeeklyKind, weekStart: string, detail: string): void;

  // Bookings that could not be honoured, one per booking position
  reportAdHocConflict(date: string, detail: string, bookingIndex: number): void;

  // Query methods
  hasViolations(): boolean;
  getViolations(): Violation[];
}

export type StaffingKind = Extract<
  ViolationKind,
  "coverage_gap" | "leader_gap" | "role_missing" | "beach_shop_gap"
>;

export type WeeklyKind = Extract<
  ViolationKind,
  | "manager_consecutive_days_off"
  | "manager_expected_days"
  | "hours_min_violation"
  | "hours_max_violation"
>;

/**
 * Deterministic identity of a violation.
 * Format: {kind}:{date}:{detail}, or {kind}:#{bookingIndex} for ad-hoc conflicts
 */
function violationId(violation: Violation): string {
  return `${violation.kind}:${violation.date}:${violation.detail}`;
}

function compareViolations(a: Violation, b: Violation): number {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  if (a.kind !== b.kind) return a.kind < b.kind ? -1 : 1;
  if (a.detail !== b.detail) return a.detail < b.detail ? -1 : 1;
  return 0;
}

/**
 * Collects violations, dropping exact duplicates. Ad-hoc conflicts are kept
 * per booking even when two read the same. {@link getViolations}
 * returns them ordered by date, kind and detail.
 */
export class ViolationReporterImpl implements ViolationReporter {
  #violations = new Map<string, Violation>();

  reportStaffing(kind: StaffingKind, date: string, detail: string): void {
    this.#add({ date, kind, detail });
  }

  reportWeekly(kind: WeeklyKind, weekStart: string, detail: string): void {
    this.#add({ date: weekStart, kind, detail });
  }

  reportAdHocConflict(date: string, detail: string, bookingIndex: number): void {
    this.#add({ date, kind: "ad_hoc_conflict", detail }, `ad_hoc_conflict:#${bookingIndex}`);
  }

  hasViolations(): boolean {
    return this.#violations.size > 0;
  }

  getViolations(): Violation[] {
    return [...this.#violations.values()].toSorted(compareViolations);
  }

  #add(violation: Violation, id = violationId(violation)): void {
    if (!this.#violations.has(id)) this.#violations.set(id, violation);
  }
}
