import {
  addDays,
  daysUntilWeekday,
  formatDayUTC,
  isWeekend,
  parseDayString,
  toDayOfWeek,
} from "../datetime.utils.js";
import type { DayOfWeek, ResolvedPeriod } from "../types.js";
import type { RosterRequest, SeasonAnchors } from "./types.js";

/**
 * Which part of the year a day falls in.
 *
 * - `peak`: every day may open.
 * - `shoulder`: weekends only, unless extended-hours mode is on.
 * - `off_season`: outside every anchor interval; the open-weekday set alone decides.
 */
export type SeasonRegime = "off_season" | "shoulder" | "peak";

export interface CalendarDay {
  date: string;
  dayOfWeek: DayOfWeek;
  weekStart: string;
  weekIndex: number;
  weekend: boolean;
  season: SeasonRegime;
  greystonesOpen: boolean;
  beachShopOpen: boolean;
  /** Why Greystones is closed, when it is. */
  closedReason?: string;
}

export interface RosterCalendar {
  period: ResolvedPeriod;
  anchors: SeasonAnchors;
  days: CalendarDay[];
  /** Chronological days on which Greystones opens. */
  openDays: string[];
  byDate: ReadonlyMap<string, CalendarDay>;
}

// ============================================================================
// Season anchors
// ============================================================================

function dayInYear(year: number, month: number, day: number): string {
  return formatDayUTC(new Date(Date.UTC(year, month - 1, day)));
}

/**
 * Canonical season anchors for a year.
 *
 * Victoria Day is the last Monday on or before May 24, Labour Day the first
 * Monday in September; the shoulder seasons end on June 30 and October 31.
 *
 * @example
 * ```typescript
 * canonicalSeasonAnchors(2026);
 * // { victoriaDay: "2026-05-18", springShoulderEnd: "2026-06-30",
 * //   labourDay: "2026-09-07", seasonClose: "2026-10-31" }
 * ```
 */
export function canonicalSeasonAnchors(year: number): SeasonAnchors {
  const may24 = dayInYear(year, 5, 24);
  const daysSinceMonday = (parseDayString(may24).getUTCDay() + 6) % 7;
  const september1 = dayInYear(year, 9, 1);

  return {
    victoriaDay: addDays(may24, -daysSinceMonday),
    springShoulderEnd: dayInYear(year, 6, 30),
    labourDay: addDays(september1, daysUntilWeekday(september1, "monday")),
    seasonClose: dayInYear(year, 10, 31),
  };
}

/**
 * Uses the caller's anchors only when every one of them falls in `year`;
 * otherwise (or when none are supplied) derives the canonical anchors.
 */
export function resolveSeasonAnchors(year: number, supplied?: SeasonAnchors): SeasonAnchors {
  if (!supplied) return canonicalSeasonAnchors(year);
  const anchors = [
    supplied.victoriaDay,
    supplied.springShoulderEnd,
    supplied.labourDay,
    supplied.seasonClose,
  ];
  const current = anchors.every((day) => parseDayString(day).getUTCFullYear() === year);
  return current ? supplied : canonicalSeasonAnchors(year);
}

export function seasonRegime(day: string, anchors: SeasonAnchors): SeasonRegime {
  if (day >= anchors.victoriaDay && day <= anchors.springShoulderEnd) return "shoulder";
  if (day > anchors.springShoulderEnd && day <= anchors.labourDay) return "peak";
  if (day > anchors.labourDay && day <= anchors.seasonClose) return "shoulder";
  return "off_season";
}

// ============================================================================
// Period
// ============================================================================

/**
 * Resolves the period's days. The first day is snapped forward to the next
 * `weekStartDay` on or after `startDate`.
 *
 * @example
 * ```typescript
 * resolvePeriod("2026-01-07", 1, "monday").start; // "2026-01-12"
 * ```
 */
export function resolvePeriod(
  startDate: string,
  weeks: number,
  weekStartDay: DayOfWeek,
): ResolvedPeriod {
  const start = addDays(startDate, daysUntilWeekday(startDate, weekStartDay));
  const days: string[] = [];
  const weekStarts: string[] = [];

  for (let i = 0; i < weeks * 7; i++) {
    const day = addDays(start, i);
    if (i % 7 === 0) weekStarts.push(day);
    days.push(day);
  }

  return {
    start,
    end: addDays(start, weeks * 7 - 1),
    weekStartDay,
    days,
    weekStarts,
  };
}

// ============================================================================
// Calendar
// ============================================================================

type CalendarConfig = Pick<
  RosterRequest,
  "period" | "weekStartDay" | "openWeekdays" | "seasonAnchors" | "extendedHours" | "scheduleBeachShop"
>;

function greystonesClosure(
  dayOfWeek: DayOfWeek,
  weekend: boolean,
  season: SeasonRegime,
  config: CalendarConfig,
): string | undefined {
  if (!config.openWeekdays.includes(dayOfWeek)) {
    return `${dayOfWeek} is not an open weekday`;
  }
  if (season === "shoulder" && !weekend && !config.extendedHours) {
    return "shoulder season opens on weekends only";
  }
  return undefined;
}

/**
 * Computes the period's day sequence and which locations open on each day.
 */
export function resolveCalendar(config: CalendarConfig): RosterCalendar {
  const period = resolvePeriod(config.period.startDate, config.period.weeks, config.weekStartDay);
  const year = parseDayString(config.period.startDate).getUTCFullYear();
  const anchors = resolveSeasonAnchors(year, config.seasonAnchors);

  const days = period.days.map((date, index): CalendarDay => {
    const weekIndex = Math.floor(index / 7);
    const dayOfWeek = toDayOfWeek(date);
    const weekend = isWeekend(date);
    const season = seasonRegime(date, anchors);
    const closedReason = greystonesClosure(dayOfWeek, weekend, season, config);
    const greystonesOpen = closedReason === undefined;

    const day: CalendarDay = {
      date,
      dayOfWeek,
      weekStart: period.weekStarts[weekIndex] ?? period.start,
      weekIndex,
      weekend,
      season,
      greystonesOpen,
      beachShopOpen:
        greystonesOpen && config.scheduleBeachShop && (weekend || season === "peak"),
    };
    if (closedReason) day.closedReason = closedReason;
    return day;
  });

  return {
    period,
    anchors,
    days,
    openDays: days.filter((d) => d.greystonesOpen).map((d) => d.date),
    byDate: new Map(days.map((d) => [d.date, d])),
  };
}
