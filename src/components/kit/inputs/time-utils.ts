// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/inputs/time-utils`
 * Purpose: Time formatting, parsing and column building for TimePicker.
 * Scope: Tokens H HH h hh m mm s ss a A; text inside [brackets] is literal.
 * Invariants:
 * - parseTime(formatTime(v, f), f) returns v for any valid v and format carrying all three units.
 * - parseTime returns null for text that does not match the format or is out of range.
 * Side-effects: none
 * @public
 */

export interface TimeValue {
  hour: number;
  minute: number;
  second: number;
}

export type TimeColumn = "hour" | "minute" | "second" | "meridiem";

export interface TimeUnit {
  value: number;
  label: string;
  disabled: boolean;
}

const TOKEN = /\[[^\]]*\]|HH|H|hh|h|mm|m|ss|s|A|a/g;

const pad = (value: number) => String(value).padStart(2, "0");

function to12Hour(hour: number): number {
  return hour % 12 === 0 ? 12 : hour % 12;
}

export function formatTime(value: TimeValue, format: string): string {
  return format.replace(TOKEN, (token) => {
    switch (token) {
      case "HH":
        return pad(value.hour);
      case "H":
        return String(value.hour);
      case "hh":
        return pad(to12Hour(value.hour));
      case "h":
        return String(to12Hour(value.hour));
      case "mm":
        return pad(value.minute);
      case "m":
        return String(value.minute);
      case "ss":
        return pad(value.second);
      case "s":
        return String(value.second);
      case "A":
        return value.hour < 12 ? "AM" : "PM";
      case "a":
        return value.hour < 12 ? "am" : "pm";
      default:
        return token.slice(1, -1);
    }
  });
}

const escapeRegExp = (text: string) => text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const tokenPattern: Record<string, string> = {
  HH: "(\\d{2})",
  H: "(\\d{1,2})",
  hh: "(\\d{2})",
  h: "(\\d{1,2})",
  mm: "(\\d{2})",
  m: "(\\d{1,2})",
  ss: "(\\d{2})",
  s: "(\\d{1,2})",
  A: "(AM|PM|am|pm)",
  a: "(AM|PM|am|pm)",
};

export function parseTime(text: string, format: string): TimeValue | null {
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

  let hour = 0;
  let minute = 0;
  let second = 0;
  let twelveHour = false;
  let pm = false;
  tokens.forEach((token, position) => {
    const raw = result[position + 1] ?? "";
    switch (token) {
      case "HH":
      case "H":
        hour = Number(raw);
        break;
      case "hh":
      case "h":
        hour = Number(raw);
        twelveHour = true;
        break;
      case "mm":
      case "m":
        minute = Number(raw);
        break;
      case "ss":
      case "s":
        second = Number(raw);
        break;
      default:
        pm = raw.toLowerCase() === "pm";
    }
  });

  if (twelveHour) {
    if (hour < 1 || hour > 12) return null;
    hour = (hour % 12) + (pm ? 12 : 0);
  }
  if (hour > 23 || minute > 59 || second > 59) return null;
  return { hour, minute, second };
}

/** Columns a format shows, in panel order. */
export function getTimeColumns(format: string): TimeColumn[] {
  const tokens = (format.match(TOKEN) ?? []).filter((token) => !token.startsWith("["));
  const columns: TimeColumn[] = [];
  if (tokens.some((token) => token.toLowerCase().startsWith("h"))) columns.push("hour");
  if (tokens.some((token) => token.startsWith("m"))) columns.push("minute");
  if (tokens.some((token) => token.startsWith("s"))) columns.push("second");
  if (tokens.some((token) => token === "a" || token === "A")) columns.push("meridiem");
  return columns;
}

/** Units 0..count-1 every `step`, flagged when listed in `disabled`. */
export function getTimeUnits(
  count: number,
  step = 1,
  disabled: readonly number[] = []
): TimeUnit[] {
  const units: TimeUnit[] = [];
  const stride = step > 0 ? step : 1;
  for (let value = 0; value < count; value += stride) {
    units.push({ value, label: pad(value), disabled: disabled.includes(value) });
  }
  return units;
}

export function isSameTime(a: TimeValue | null, b: TimeValue | null): boolean {
  if (a === null || b === null) return a === b;
  return a.hour === b.hour && a.minute === b.minute && a.second === b.second;
}

export function timeFromDate(date: Date): TimeValue {
  return { hour: date.getHours(), minute: date.getMinutes(), second: date.getSeconds() };
}
