import {
  WEEKDAY_ABBREVIATIONS,
  isWeekdayAbbrev,
  parseDateKey,
  type CalendarDay,
  type DateKey,
  type WeekdayAbbrev
} from "../lib/calendar.js";
import type { RoutineTemplate } from "../lib/taskStore.js";

type NamedFrequency = "daily" | "weekdays" | "weekends" | "weekly" | "biweekly" | "monthly" | "quarterly" | "yearly";

export type FrequencyRule =
  | { kind: NamedFrequency }
  | { kind: "custom"; days: ReadonlySet<WeekdayAbbrev> }
  | { kind: "unrecognized"; raw: string };

const NAMED_FREQUENCIES: Readonly<Record<string, NamedFrequency>> = {
  daily: "daily",
  weekdays: "weekdays",
  weekends: "weekends",
  weekly: "weekly",
  "bi-weekly": "biweekly",
  biweekly: "biweekly",
  monthly: "monthly",
  quarterly: "quarterly",
  yearly: "yearly",
  annually: "yearly"
};

const FULL_DAY_NAMES = ["sunday", "monday", "tuesday", "wednesday", "thursday", "friday", "saturday"] as const;

const QUARTER_START_MONTHS: ReadonlySet<number> = new Set([1, 4, 7, 10]);

function normalizeDay(token: string): WeekdayAbbrev | null {
  const t = token.trim().toLowerCase();
  if (isWeekdayAbbrev(t)) return t;
  const full = FULL_DAY_NAMES.findIndex((name) => name === t);
  return full >= 0 ? WEEKDAY_ABBREVIATIONS[full] : null;
}

function parseDayList(raw: string): Set<WeekdayAbbrev> {
  const out = new Set<WeekdayAbbrev>();
  for (const token of raw.split(",")) {
    const day = normalizeDay(token);
    if (day) out.add(day);
  }
  return out;
}

/**
 * Explicit day-of-week constraint. `null` means unconstrained; an empty set
 * (a list with no recognizable day) matches no day at all.
 */
export function parseDaysOfWeek(raw: string | null | undefined): ReadonlySet<WeekdayAbbrev> | null {
  if (!raw || !raw.trim()) return null;
  return parseDayList(raw);
}

export function parseFrequency(raw: string): FrequencyRule {
  const value = raw.trim().toLowerCase();
  const named = NAMED_FREQUENCIES[value];
  if (named) return { kind: named };
  if (value.includes(",")) {
    const days = parseDayList(value);
    if (days.size > 0) return { kind: "custom", days };
  }
  return { kind: "unrecognized", raw };
}

export type RecurrenceInput = Pick<RoutineTemplate, "frequency" | "daysOfWeek">;

function matchesRule(rule: FrequencyRule, day: CalendarDay): boolean {
  switch (rule.kind) {
    case "daily":
      return true;
    case "weekdays":
      return day.weekday !== "sat" && day.weekday !== "sun";
    case "weekends":
      return day.weekday === "sat" || day.weekday === "sun";
    case "weekly":
      return true;
    case "biweekly":
      // Anchored to the Monday of even ISO weeks, whatever the day list says.
      return day.isoWeek % 2 === 0 && day.weekday === "mon";
    case "monthly":
      return day.day === 1;
    case "quarterly":
      return day.day === 1 && QUARTER_START_MONTHS.has(day.month);
    case "yearly":
      return day.day === 1 && day.month === 1;
    case "custom":
      return rule.days.has(day.weekday);
    case "unrecognized":
      return false;
  }
}

/** Whether `template` has an occurrence on `date`. Pure. */
export function isDue(template: RecurrenceInput, date: DateKey | CalendarDay): boolean {
  const day = typeof date === "string" ? parseDateKey(date) : date;

  const gate = parseDaysOfWeek(template.daysOfWeek);
  if (gate && !gate.has(day.weekday)) return false;

  return matchesRule(parseFrequency(template.frequency), day);
}
