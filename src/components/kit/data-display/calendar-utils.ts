// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/data-display/calendar-utils`
 * Purpose: Local-time date math for Calendar: the 6x7 month grid, day comparison, month arithmetic and range checks.
 * Invariants:
 * - getMonthMatrix always returns 6 weeks of 7 days, starting on `weekStart`.
 * - addMonths clamps the day of month (Jan 31 + 1 month -> last day of February).
 * Side-effects: none
 * @public
 */

export type DateRange = readonly [Date, Date];

export function getMonthMatrix(year: number, month: number, weekStart = 0): Date[][] {
  const first = new Date(year, month, 1);
  const offset = (first.getDay() - weekStart + 7) % 7;
  return Array.from({ length: 6 }, (_, week) =>
    Array.from(
      { length: 7 },
      (_, day) => new Date(year, month, 1 - offset + week * 7 + day)
    )
  );
}

export function isSameDay(a: Date, b: Date): boolean {
  return (
    a.getFullYear() === b.getFullYear() &&
    a.getMonth() === b.getMonth() &&
    a.getDate() === b.getDate()
  );
}

export function isSameMonth(a: Date, b: Date): boolean {
  return a.getFullYear() === b.getFullYear() && a.getMonth() === b.getMonth();
}

export function daysInMonth(year: number, month: number): number {
  return new Date(year, month + 1, 0).getDate();
}

export function addMonths(date: Date, amount: number): Date {
  const target = new Date(date.getFullYear(), date.getMonth() + amount, 1);
  const day = Math.min(date.getDate(), daysInMonth(target.getFullYear(), target.getMonth()));
  return new Date(
    target.getFullYear(),
    target.getMonth(),
    day,
    date.getHours(),
    date.getMinutes(),
    date.getSeconds(),
    date.getMilliseconds()
  );
}

/** Moves `date` to another year and month, keeping the day where it exists. */
export function setYearMonth(date: Date, year: number, month: number): Date {
  return addMonths(date, (year - date.getFullYear()) * 12 + (month - date.getMonth()));
}

const startOfDay = (date: Date) =>
  new Date(date.getFullYear(), date.getMonth(), date.getDate()).getTime();

/** Day-granular inclusive range check. */
export function isInRange(date: Date, range: DateRange | undefined): boolean {
  if (!range) return true;
  const day = startOfDay(date);
  return day >= startOfDay(range[0]) && day <= startOfDay(range[1]);
}

/** Whether any day of the given month falls inside the range. */
export function isMonthInRange(
  year: number,
  month: number,
  range: DateRange | undefined
): boolean {
  if (!range) return true;
  const first = new Date(year, month, 1).getTime();
  const last = new Date(year, month, daysInMonth(year, month)).getTime();
  return last >= startOfDay(range[0]) && first <= startOfDay(range[1]);
}

/** Weekday labels rotated to start on `weekStart`. */
export function rotateWeekDays<T>(days: readonly T[], weekStart: number): T[] {
  const shift = ((weekStart % days.length) + days.length) % days.length;
  return [...days.slice(shift), ...days.slice(0, shift)];
}
