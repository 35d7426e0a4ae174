import { describe, it, expect } from "vitest";
import { isDue, parseDaysOfWeek, parseFrequency } from "./recurrence.js";

function t(frequency: string, daysOfWeek: string | null = null) {
  return { frequency, daysOfWeek };
}

// 2024-03-04 is a Monday in ISO week 10.
describe("isDue", () => {
  it("daily is due every day", () => {
    expect(isDue(t("daily"), "2024-03-04")).toBe(true);
    expect(isDue(t("daily"), "2024-03-10")).toBe(true);
  });

  it("weekdays covers Monday to Friday only", () => {
    expect(isDue(t("weekdays"), "2024-03-04")).toBe(true);
    expect(isDue(t("weekdays"), "2024-03-08")).toBe(true);
    expect(isDue(t("weekdays"), "2024-03-09")).toBe(false);
    expect(isDue(t("weekdays"), "2024-03-10")).toBe(false);
  });

  it("weekends covers Saturday and Sunday only", () => {
    expect(isDue(t("weekends"), "2024-03-09")).toBe(true);
    expect(isDue(t("weekends"), "2024-03-10")).toBe(true);
    expect(isDue(t("weekends"), "2024-03-08")).toBe(false);
  });

  it("weekly follows the day-of-week gate", () => {
    expect(isDue(t("weekly", "mon"), "2024-03-04")).toBe(true);
    expect(isDue(t("weekly", "mon"), "2024-03-05")).toBe(false);
    expect(isDue(t("weekly"), "2024-03-05")).toBe(true);
  });

  it("bi-weekly is due on Mondays of even ISO weeks", () => {
    expect(isDue(t("bi-weekly"), "2024-03-04")).toBe(true);
    expect(isDue(t("biweekly"), "2024-03-04")).toBe(true);
    expect(isDue(t("bi-weekly"), "2024-03-05")).toBe(false);
    expect(isDue(t("bi-weekly"), "2024-03-11")).toBe(false);
  });

  it("bi-weekly stays on the even-week Monday when a day list is given", () => {
    const days = ["2024-03-04", "2024-03-05", "2024-03-06", "2024-03-07", "2024-03-08"];
    expect(days.filter((d) => isDue(t("bi-weekly", "mon,tue,wed,thu,fri"), d))).toEqual(["2024-03-04"]);
    expect(isDue(t("bi-weekly", "mon,tue,wed,thu,fri"), "2024-03-11")).toBe(false);
  });

  it("bi-weekly restricted to a non-Monday is never due", () => {
    for (const d of ["2024-03-06", "2024-03-13", "2024-03-20", "2024-03-04"]) {
      expect(isDue(t("bi-weekly", "wed"), d)).toBe(false);
    }
  });

  it("monthly is due on the first of the month", () => {
    expect(isDue(t("monthly"), "2024-03-01")).toBe(true);
    expect(isDue(t("monthly"), "2024-03-02")).toBe(false);
  });

  it("quarterly is due on the first day of Jan, Apr, Jul and Oct", () => {
    expect(isDue(t("quarterly"), "2024-01-01")).toBe(true);
    expect(isDue(t("quarterly"), "2024-04-01")).toBe(true);
    expect(isDue(t("quarterly"), "2024-10-01")).toBe(true);
    expect(isDue(t("quarterly"), "2024-05-01")).toBe(false);
    expect(isDue(t("quarterly"), "2024-04-02")).toBe(false);
  });

  it("yearly and annually are due on January 1st", () => {
    expect(isDue(t("yearly"), "2025-01-01")).toBe(true);
    expect(isDue(t("annually"), "2025-01-01")).toBe(true);
    expect(isDue(t("yearly"), "2024-02-01")).toBe(false);
    expect(isDue(t("annually"), "2025-01-02")).toBe(false);
  });

  it("custom lists match the weekday", () => {
    expect(isDue(t("mon,wed,fri"), "2024-03-06")).toBe(true);
    expect(isDue(t("mon,wed,fri"), "2024-03-07")).toBe(false);
    expect(isDue(t("Mon, Thu"), "2024-03-07")).toBe(true);
    expect(isDue(t("monday,thursday"), "2024-03-07")).toBe(true);
  });

  it("parses frequency names case-insensitively", () => {
    expect(isDue(t("DAILY"), "2024-03-04")).toBe(true);
    expect(isDue(t(" Monthly "), "2024-03-01")).toBe(true);
  });

  it("never fires an unrecognized frequency", () => {
    expect(isDue(t("fortnightly"), "2024-03-04")).toBe(false);
    expect(isDue(t("fortnightly"), "2024-03-01")).toBe(false);
    expect(isDue(t(""), "2024-03-04")).toBe(false);
  });

  it("applies the day-of-week gate before the frequency rule", () => {
    expect(isDue(t("daily", "tue"), "2024-03-04")).toBe(false);
    expect(isDue(t("daily", "tue"), "2024-03-05")).toBe(true);
    // 2024-03-01 is a Friday, 2024-02-01 a Thursday.
    expect(isDue(t("monthly", "fri"), "2024-03-01")).toBe(true);
    expect(isDue(t("monthly", "fri"), "2024-02-01")).toBe(false);
  });

  it("treats a day list with no recognizable day as matching nothing", () => {
    expect(isDue(t("daily", "someday"), "2024-03-04")).toBe(false);
    expect(isDue(t("daily", "   "), "2024-03-04")).toBe(true);
  });

  it("rejects malformed dates", () => {
    expect(() => isDue(t("daily"), "2024-02-30")).toThrow('Invalid calendar date "2024-02-30"');
  });
});

describe("parseFrequency", () => {
  it("maps aliases onto one rule", () => {
    expect(parseFrequency("Bi-Weekly")).toEqual({ kind: "biweekly" });
    expect(parseFrequency("annually")).toEqual({ kind: "yearly" });
  });

  it("keeps the raw value of an unrecognized frequency", () => {
    expect(parseFrequency("every other day")).toEqual({ kind: "unrecognized", raw: "every other day" });
  });

  it("reads comma lists as custom days and ignores unknown tokens", () => {
    expect(parseFrequency("tue,xyz,sat")).toEqual({ kind: "custom", days: new Set(["tue", "sat"]) });
    expect(parseFrequency("xyz,abc")).toEqual({ kind: "unrecognized", raw: "xyz,abc" });
  });
});

describe("parseDaysOfWeek", () => {
  it("returns null when unconstrained", () => {
    expect(parseDaysOfWeek(null)).toBeNull();
    expect(parseDaysOfWeek("")).toBeNull();
  });

  it("normalizes tokens", () => {
    expect(parseDaysOfWeek(" MON ,wednesday")).toEqual(new Set(["mon", "wed"]));
  });
});
