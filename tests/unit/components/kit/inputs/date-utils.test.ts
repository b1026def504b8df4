// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/components/kit/inputs/date-utils`
 * Purpose: Verifies date formatting and parsing, week numbering and period math for DatePicker.
 * Invariants: parseDate returns null for days that do not exist; week 1 contains January 1.
 * Side-effects: none
 * Links: src/components/kit/inputs/date-utils.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import {
  formatDate,
  getDecadeStart,
  getPeriodStart,
  getWeekOfYear,
  isPeriodBetween,
  isSamePeriod,
  orderRange,
  parseDate,
} from "@/components/kit/inputs/date-utils";

const monday = new Date(2026, 9, 19);

describe("formatDate", () => {
  it.each([
    ["YYYY-MM-DD", "2026-10-19"],
    ["D/M/YYYY", "19/10/2026"],
    ["YYYY-[Q]Q", "2026-Q4"],
    ["gggg-[W]ww", "2026-W43"],
    ["[Day] D", "Day 19"],
  ])("%s -> %s", (format, expected) => {
    expect(formatDate(monday, format)).toBe(expected);
  });

  it("puts the last days of December into week 1 of the next year", () => {
    expect(formatDate(new Date(2025, 11, 31), "gggg-[W]ww")).toBe("2026-W01");
  });
});

describe("getWeekOfYear", () => {
  it("counts weeks from the week holding January 1", () => {
    expect(getWeekOfYear(monday, 0)).toEqual({ year: 2026, week: 43 });
    expect(getWeekOfYear(monday, 1)).toEqual({ year: 2026, week: 43 });
    expect(getWeekOfYear(new Date(2026, 0, 1), 0)).toEqual({ year: 2026, week: 1 });
  });
});

describe("parseDate", () => {
  it("reads the tokens of the format", () => {
    expect(parseDate("2026-10-19", "YYYY-MM-DD")).toEqual(monday);
    expect(parseDate(" 3/2/2026 ", "D/M/YYYY")).toEqual(new Date(2026, 1, 3));
    expect(parseDate("2026-Q3", "YYYY-[Q]Q")).toEqual(new Date(2026, 6, 1));
    expect(parseDate("2026", "YYYY")).toEqual(new Date(2026, 0, 1));
  });

  it("reads a week as the first day of that week", () => {
    expect(parseDate("2026-W01", "gggg-[W]ww")).toEqual(new Date(2025, 11, 28));
    expect(parseDate("2026-W43", "gggg-[W]ww", 1)).toEqual(monday);
  });

  it("rejects text that does not match or names no real day", () => {
    expect(parseDate("tomorrow", "YYYY-MM-DD")).toBeNull();
    expect(parseDate("2026-02-30", "YYYY-MM-DD")).toBeNull();
    expect(parseDate("2026-13-01", "YYYY-MM-DD")).toBeNull();
    expect(parseDate("2026-W53", "gggg-[W]ww")).toBeNull();
  });
});

describe("periods", () => {
  const wednesday = new Date(2026, 9, 21, 15, 30);

  it("finds the start of each period", () => {
    expect(getPeriodStart(wednesday, "date")).toEqual(new Date(2026, 9, 21));
    expect(getPeriodStart(wednesday, "week")).toEqual(new Date(2026, 9, 18));
    expect(getPeriodStart(wednesday, "week", 1)).toEqual(monday);
    expect(getPeriodStart(wednesday, "month")).toEqual(new Date(2026, 9, 1));
    expect(getPeriodStart(wednesday, "quarter")).toEqual(new Date(2026, 9, 1));
    expect(getPeriodStart(wednesday, "year")).toEqual(new Date(2026, 0, 1));
  });

  it("compares dates by period", () => {
    expect(isSamePeriod(monday, wednesday, "week")).toBe(true);
    expect(isSamePeriod(monday, wednesday, "date")).toBe(false);
    expect(isSamePeriod(null, null, "date")).toBe(true);
    expect(isSamePeriod(monday, null, "date")).toBe(false);
  });

  it("checks ranges in either order", () => {
    const start = new Date(2026, 9, 10);
    expect(isPeriodBetween(monday, wednesday, start, "date")).toBe(true);
    expect(isPeriodBetween(new Date(2026, 9, 9), start, wednesday, "date")).toBe(false);
    expect(orderRange(wednesday, start)).toEqual([start, wednesday]);
  });

  it("rounds a year down to its decade", () => {
    expect(getDecadeStart(2026)).toBe(2020);
    expect(getDecadeStart(2030)).toBe(2030);
  });
});
