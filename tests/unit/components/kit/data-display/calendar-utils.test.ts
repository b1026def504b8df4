// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/components/kit/data-display/calendar-utils`
 * Purpose: Verifies the month grid, month arithmetic and range checks behind Calendar.
 * Invariants: The month grid is always 6 weeks of 7 days starting on weekStart.
 * Side-effects: none
 * Links: src/components/kit/data-display/calendar-utils.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import { getYearOptions } from "@/components/kit/data-display/Calendar";
import {
  addMonths,
  daysInMonth,
  getMonthMatrix,
  isInRange,
  isMonthInRange,
  isSameDay,
  isSameMonth,
  rotateWeekDays,
  setYearMonth,
} from "@/components/kit/data-display/calendar-utils";

describe("getMonthMatrix", () => {
  it("starts on Sunday before the first of the month", () => {
    const matrix = getMonthMatrix(2025, 0, 0);
    expect(matrix).toHaveLength(6);
    expect(matrix.every((week) => week.length === 7)).toBe(true);
    expect(isSameDay(matrix[0]?.[0] ?? new Date(0), new Date(2024, 11, 29))).toBe(true);
    expect(isSameDay(matrix[5]?.[6] ?? new Date(0), new Date(2025, 1, 8))).toBe(true);
  });

  it("honours a Monday week start", () => {
    const matrix = getMonthMatrix(2025, 0, 1);
    expect(isSameDay(matrix[0]?.[0] ?? new Date(0), new Date(2024, 11, 30))).toBe(true);
  });
});

describe("month arithmetic", () => {
  it("clamps the day to the target month", () => {
    expect(isSameDay(addMonths(new Date(2025, 0, 31), 1), new Date(2025, 1, 28))).toBe(true);
    expect(isSameDay(addMonths(new Date(2024, 0, 31), 1), new Date(2024, 1, 29))).toBe(true);
  });

  it("crosses years", () => {
    expect(isSameMonth(addMonths(new Date(2025, 11, 15), 1), new Date(2026, 0, 1))).toBe(true);
  });

  it("setYearMonth keeps the day", () => {
    expect(isSameDay(setYearMonth(new Date(2025, 2, 15), 2024, 1), new Date(2024, 1, 15))).toBe(
      true
    );
  });

  it("daysInMonth handles leap years", () => {
    expect(daysInMonth(2024, 1)).toBe(29);
    expect(daysInMonth(2025, 1)).toBe(28);
  });
});

describe("ranges", () => {
  const range = [new Date(2025, 0, 15), new Date(2025, 2, 1)] as const;

  it("isInRange is inclusive and day-granular", () => {
    expect(isInRange(new Date(2025, 0, 15, 23, 59), range)).toBe(true);
    expect(isInRange(new Date(2025, 0, 14), range)).toBe(false);
    expect(isInRange(new Date(2025, 2, 1), range)).toBe(true);
    expect(isInRange(new Date(2025, 2, 2), range)).toBe(false);
    expect(isInRange(new Date(2030, 0, 1), undefined)).toBe(true);
  });

  it("isMonthInRange checks overlap", () => {
    expect(isMonthInRange(2025, 0, range)).toBe(true);
    expect(isMonthInRange(2025, 2, range)).toBe(true);
    expect(isMonthInRange(2024, 11, range)).toBe(false);
    expect(isMonthInRange(2025, 3, range)).toBe(false);
  });
});

describe("rotateWeekDays", () => {
  it("starts the row on weekStart", () => {
    expect(rotateWeekDays(["Su", "Mo", "Tu", "We", "Th", "Fr", "Sa"], 1)).toEqual([
      "Mo",
      "Tu",
      "We",
      "Th",
      "Fr",
      "Sa",
      "Su",
    ]);
  });
});

describe("getYearOptions", () => {
  it("spans ten years around the current one", () => {
    const years = getYearOptions(2025, undefined);
    expect(years[0]).toBe(2015);
    expect(years.at(-1)).toBe(2035);
  });

  it("follows the valid range", () => {
    expect(getYearOptions(2025, [new Date(2024, 5, 1), new Date(2026, 0, 1)])).toEqual([
      2024, 2025, 2026,
    ]);
  });
});
