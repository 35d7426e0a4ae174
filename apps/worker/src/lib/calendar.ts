import { format, getDate, getDay, getISOWeek, getMonth, isValid, parse } from "date-fns";

/** Calendar date with no time component, `YYYY-MM-DD`. */
export type DateKey = string;

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date()
};

export const WEEKDAY_ABBREVIATIONS = ["sun", "mon", "tue", "wed", "thu", "fri", "sat"] as const;
export type WeekdayAbbrev = (typeof WEEKDAY_ABBREVIATIONS)[number];

export function isWeekdayAbbrev(value: string): value is WeekdayAbbrev {
  return (WEEKDAY_ABBREVIATIONS as readonly string[]).includes(value);
}

export type CalendarDay = {
  key: DateKey;
  year: number;
  // 1-12
  month: number;
  day: number;
  weekday: WeekdayAbbrev;
  isoWeek: number;
};

const DATE_KEY_FORMAT = "yyyy-MM-dd";

/**
 * Decomposes a date key. The key is interpreted as a wall-calendar date, so the
 * result does not depend on the host's time zone.
 */
export function parseDateKey(key: string): CalendarDay {
  const d = parse(key, DATE_KEY_FORMAT, new Date(2000, 0, 1));
  if (!isValid(d) || format(d, DATE_KEY_FORMAT) !== key) {
    throw new Error(`Invalid calendar date "${key}" (expected YYYY-MM-DD)`);
  }
  return {
    key,
    year: d.getFullYear(),
    month: getMonth(d) + 1,
    day: getDate(d),
    weekday: WEEKDAY_ABBREVIATIONS[getDay(d)],
    isoWeek: getISOWeek(d)
  };
}

export function days(n: number): number {
  return n * 24 * 60 * 60 * 1000;
}

export function assertTimeZone(timeZone: string): void {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
  } catch (e) {
    throw new Error(`Unknown time zone "${timeZone}"`, { cause: e });
  }
}

/** Maps instants onto the wall clock of one IANA time zone. */
export class Calendar {
  private readonly fmt: Intl.DateTimeFormat;

  constructor(readonly timeZone: string) {
    assertTimeZone(timeZone);
    this.fmt = new Intl.DateTimeFormat("en-US", {
      timeZone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      hourCycle: "h23"
    });
  }

  private parts(at: Date): Record<string, string> {
    const out: Record<string, string> = {};
    for (const p of this.fmt.formatToParts(at)) out[p.type] = p.value;
    return out;
  }

  dateKey(at: Date): DateKey {
    const p = this.parts(at);
    return `${p.year}-${p.month}-${p.day}`;
  }

  minuteOfDay(at: Date): number {
    const p = this.parts(at);
    return Number(p.hour) * 60 + Number(p.minute);
  }
}
