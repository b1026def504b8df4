// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/inputs/date-utils`
 * Purpose: Date formatting, parsing and period math for DatePicker and RangePicker.
 * Scope: Tokens YYYY M MM D DD Q gggg w ww; text inside [brackets] is literal. Local time only.
 * Invariants:
 * - Week 1 is the week (starting on `weekStart`) that contains January 1; `gggg` is the year that week belongs to.
 * - parseDate returns null for text that does not match the format or names a day that does not exist.
 * - getPeriodStart is idempotent for every picker.
 * Side-effects: none
 * @public
 */

import { daysInMonth } from "../data-display/calendar-utils";

export type PickerMode = "date" | "week" | "month" | "quarter" | "year";

export type PanelMode = "date" | "month" | "quarter" | "year";

export const DEFAULT_DATE_FORMATS: Record<PickerMode, string> = {
  date: "YYYY-MM-DD",
  week: "gggg-[W]ww",
  month: "YYYY-MM",
  quarter: "YYYY-[Q]Q",
  year: "YYYY",
};

const TOKEN = /\[[^\]]*\]|YYYY|gggg|MM|M|DD|D|ww|w|Q/g;

const DAY_MS = 86_400_000;

const pad = (value: number, width = 2) => String(value).padStart(width, "0");

const dayIndex = (date: Date) =>
  Date.UTC(date.getFullYear(), date.getMonth(), date.getDate()) / DAY_MS;

export function startOfWeek(date: Date, weekStart = 0): Date {
  const offset = (date.getDay() - weekStart + 7) % 7;
  return new Date(date.getFullYear(), date.getMonth(), date.getDate() - offset);
}

export function getQuarter(date: Date): number {
  return Math.floor(date.getMonth() / 3) + 1;
}

/** Week-year and week number of `date`. */
export function getWeekOfYear(date: Date, weekStart = 0): { year: number; week: number } {
  const start = startOfWeek(date, weekStart);
  const year = new Date(start.getFullYear(), start.getMonth(), start.getDate() + 6).getFullYear();
  const first = startOfWeek(new Date(year, 0, 1), weekStart);
  return { year, week: Math.round((dayIndex(start) - dayIndex(first)) / 7) + 1 };
}

export function formatDate(date: Date, format: string, weekStart = 0): string {
  return format.replace(TOKEN, (token) => {
    switch (token) {
      case "YYYY":
        return pad(date.getFullYear(), 4);
      case "MM":
        return pad(date.getMonth() + 1);
      case "M":
        return String(date.getMonth() + 1);
      case "DD":
        return pad(date.getDate());
      case "D":
        return String(date.getDate());
      case "Q":
        return String(getQuarter(date));
      case "gggg":
        return pad(getWeekOfYear(date, weekStart).year, 4);
      case "ww":
        return pad(getWeekOfYear(date, weekStart).week);
      case "w":
        return String(getWeekOfYear(date, weekStart).week);
      default:
        return token.slice(1, -1);
    }
  });
}

const escapeRegExp = (text: string) => text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const tokenPattern: Record<string, string> = {
  YYYY: "(\\d{4})",
  gggg: "(\\d{4})",
  MM: "(\\d{2})",
  M: "(\\d{1,2})",
  DD: "(\\d{2})",
  D: "(\\d{1,2})",
  ww: "(\\d{2})",
  w: "(\\d{1,2})",
  Q: "([1-4])",
};

export function parseDate(text: string, format: string, weekStart = 0): Date | null {
  const tokens: string[] = [];
  let pattern = "";
  let last = 0;
  for (const match of format.matchAll(TOKEN)) {
    const token = match[0];
    const index = match.index ?? 0;
    pattern += escapeRegExp(format.slice(last, index));
    const group = tokenPattern[token];
    if (group === undefined) {
      pattern += escapeRegExp(token.slice(1, -1));
    } else {
      pattern += group;
      tokens.push(token);
    }
    last = index + token.length;
  }
  pattern += escapeRegExp(format.slice(last));

  const result = new RegExp(`^${pattern}$`).exec(text.trim());
  if (!result) return null;

  const fields: Partial<Record<"year" | "month" | "day" | "quarter" | "weekYear" | "week", number>> =
    {};
  tokens.forEach((token, position) => {
    const raw = Number(result[position + 1] ?? "");
    switch (token) {
      case "YYYY":
        fields.year = raw;
        break;
      case "gggg":
        fields.weekYear = raw;
        break;
      case "MM":
      case "M":
        fields.month = raw;
        break;
      case "DD":
      case "D":
        fields.day = raw;
        break;
      case "ww":
      case "w":
        fields.week = raw;
        break;
      default:
        fields.quarter = raw;
    }
  });

  if (fields.week !== undefined) {
    const year = fields.weekYear ?? fields.year;
    if (year === undefined || fields.week < 1 || fields.week > 53) return null;
    const first = startOfWeek(new Date(year, 0, 1), weekStart);
    const date = new Date(first.getFullYear(), first.getMonth(), first.getDate() + (fields.week - 1) * 7);
    return getWeekOfYear(date, weekStart).year === year ? date : null;
  }

  const year = fields.year ?? fields.weekYear;
  if (year === undefined) return null;
  const month = fields.month ?? (fields.quarter === undefined ? 1 : (fields.quarter - 1) * 3 + 1);
  const day = fields.day ?? 1;
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month - 1)) return null;
  return new Date(year, month - 1, day);
}

/** First day of the day, week, month, quarter or year containing `date`, at midnight. */
export function getPeriodStart(date: Date, picker: PickerMode, weekStart = 0): Date {
  switch (picker) {
    case "date":
      return new Date(date.getFullYear(), date.getMonth(), date.getDate());
    case "week":
      return startOfWeek(date, weekStart);
    case "month":
      return new Date(date.getFullYear(), date.getMonth(), 1);
    case "quarter":
      return new Date(date.getFullYear(), (getQuarter(date) - 1) * 3, 1);
    case "year":
      return new Date(date.getFullYear(), 0, 1);
  }
}

export function isSamePeriod(
  a: Date | null,
  b: Date | null,
  picker: PickerMode,
  weekStart = 0
): boolean {
  if (a === null || b === null) return a === b;
  return (
    getPeriodStart(a, picker, weekStart).getTime() ===
    getPeriodStart(b, picker, weekStart).getTime()
  );
}

/** Whether `date`'s period lies between the two ends, inclusive, in either order. */
export function isPeriodBetween(
  date: Date,
  a: Date,
  b: Date,
  picker: PickerMode,
  weekStart = 0
): boolean {
  const time = getPeriodStart(date, picker, weekStart).getTime();
  const first = getPeriodStart(a, picker, weekStart).getTime();
  const second = getPeriodStart(b, picker, weekStart).getTime();
  return time >= Math.min(first, second) && time <= Math.max(first, second);
}

export function orderRange(a: Date, b: Date): [Date, Date] {
  return a.getTime() <= b.getTime() ? [a, b] : [b, a];
}

/** Panel a picker opens on. */
export function getPickerPanel(picker: PickerMode): PanelMode {
  return picker === "week" ? "date" : picker;
}

/** First year of the decade shown around `year`. */
export function getDecadeStart(year: number): number {
  return Math.floor(year / 10) * 10;
}
