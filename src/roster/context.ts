import { resolveCalendar, type RosterCalendar } from "./calendar.js";
import { HistoryIndex } from "./history.js";
import { RosterLedger } from "./ledger.js";
import { planLeadRestDays } from "./rest-days.js";
import {
  ROTATING_ROLE,
  type Employee,
  type GenerateOptions,
  type RosterLogger,
  type RosterRequest,
} from "./types.js";
import { employeeDayKey } from "./utils.js";

const silentLogger: RosterLogger = {
  debug() {},
};

/**
 * Everything one generation call reads and writes. Created fresh per call
 * and discarded afterwards; nothing is shared between calls.
 */
export interface RosterContext {
  readonly request: RosterRequest;
  readonly calendar: RosterCalendar;
  readonly history: HistoryIndex;
  readonly ledger: RosterLedger;
  /** Sorted by id. */
  readonly employees: readonly Employee[];
  readonly employeesById: ReadonlyMap<string, Employee>;
  /** Requested days off, as `employeeId|date`. */
  readonly blackouts: ReadonlySet<string>;
  /** Forced lead-role rest days, as `employeeId|date`. */
  readonly restDays: ReadonlySet<string>;
  /** The two rotating-role employees, when the roster has exactly two. */
  readonly rotatingPair: readonly [Employee, Employee] | null;
  readonly logger: RosterLogger;
}

export function createRosterContext(
  request: RosterRequest,
  options: GenerateOptions = {},
): RosterContext {
  const calendar = resolveCalendar(request);
  const history = new HistoryIndex(options.history);
  const employees = request.employees.toSorted((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  const blackouts = new Set(
    request.unavailability.map((entry) => employeeDayKey(entry.employeeId, entry.date)),
  );

  const restDays =
    request.leadershipRules.managerTwoConsecutiveDaysOffPerWeek && !request.extendedHours
      ? planLeadRestDays(calendar, employees, blackouts)
      : new Set<string>();

  const rotating = employees.filter((e) => e.role === ROTATING_ROLE);
  const [first, second] = rotating;
  const rotatingPair: readonly [Employee, Employee] | null =
    rotating.length === 2 && first && second ? [first, second] : null;

  return {
    request,
    calendar,
    history,
    ledger: new RosterLedger(calendar.period, request.breakPolicy, history),
    employees,
    employeesById: new Map(employees.map((e) => [e.id, e])),
    blackouts,
    restDays,
    rotatingPair,
    logger: options.logger ?? silentLogger,
  };
}
