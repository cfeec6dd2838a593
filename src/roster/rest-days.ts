import { addDays, isWeekend } from "../datetime.utils.js";
import type { RosterCalendar } from "./calendar.js";
import { LEAD_ROLE, type Employee } from "./types.js";
import { employeeDayKey } from "./utils.js";

/**
 * Chooses each lead-role employee's back-to-back days off for every week.
 *
 * Within a week the adjacent pair is picked that forces the fewest open,
 * not-already-requested days off, then the fewest weekend days, then the
 * earliest. The pair's open days that are not already requested off are
 * returned as `employeeId|date` keys and later treated as forced rest.
 *
 * A week whose days are all open and requested off costs nothing; a
 * week with a closed day inside a pair needs only one forced day.
 */
export function planLeadRestDays(
  calendar: RosterCalendar,
  employees: readonly Employee[],
  blackouts: ReadonlySet<string>,
): Set<string> {
  const rest = new Set<string>();
  const leads = employees.filter((e) => e.role === LEAD_ROLE);

  for (const weekStart of calendar.period.weekStarts) {
    const week = Array.from({ length: 7 }, (_, i) => addDays(weekStart, i));

    for (const lead of leads) {
      const needsRest = (date: string) =>
        (calendar.byDate.get(date)?.greystonesOpen ?? false) && !blackouts.has(employeeDayKey(lead.id, date));

      let best: { forced: string[]; weekendDays: number } | undefined;
      for (let i = 0; i < 6; i++) {
        const pair = week.slice(i, i + 2);
        const forced = pair.filter(needsRest);
        const weekendDays = pair.filter(isWeekend).length;
        if (
          !best ||
          forced.length < best.forced.length ||
          (forced.length === best.forced.length && weekendDays < best.weekendDays)
        ) {
          best = { forced, weekendDays };
        }
      }

      for (const date of best?.forced ?? []) rest.add(employeeDayKey(lead.id, date));
    }
  }

  return rest;
}
