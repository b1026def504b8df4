// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/data-display/statistic-utils`
 * Purpose: Number grouping and countdown duration formatting for Statistic.
 * Scope: Pure string functions. No React.
 * Invariants:
 * - Precision pads or truncates decimals; it never rounds.
 * - Countdown units consume the duration from largest to smallest, so `HH` holds whole hours beyond days only when `D` is present.
 * - Text inside `[...]` is copied verbatim.
 * Side-effects: none
 * @public
 */

export interface StatisticFormatOptions {
  precision?: number | undefined;
  groupSeparator?: string | undefined;
  decimalSeparator?: string | undefined;
}

export interface StatisticParts {
  int: string;
  /** Includes the decimal separator; empty when there is no fraction. */
  decimal: string;
}

export function formatStatisticValue(
  value: number | string,
  {
    precision,
    groupSeparator = ",",
    decimalSeparator = ".",
  }: StatisticFormatOptions = {}
): StatisticParts {
  const text = String(value);
  const cells = /^(-?)(\d*)(\.(\d+))?$/.exec(text);
  if (!cells || text === "-") return { int: text, decimal: "" };

  const sign = cells[1] ?? "";
  const int = (cells[2] || "0").replace(/\B(?=(\d{3})+(?!\d))/g, groupSeparator);
  let decimal = cells[4] ?? "";
  if (precision !== undefined) {
    decimal = decimal.padEnd(precision, "0").slice(0, Math.max(precision, 0));
  }

  return {
    int: `${sign}${int}`,
    decimal: decimal ? `${decimalSeparator}${decimal}` : "",
  };
}

const timeUnits: ReadonlyArray<readonly [string, number]> = [
  ["Y", 1000 * 60 * 60 * 24 * 365],
  ["M", 1000 * 60 * 60 * 24 * 30],
  ["D", 1000 * 60 * 60 * 24],
  ["H", 1000 * 60 * 60],
  ["m", 1000 * 60],
  ["s", 1000],
  ["S", 1],
];

const escaped = /\[[^\]]*]/g;

/** Formats a duration in ms, e.g. `formatCountdown(3661000, "HH:mm:ss")` -> `01:01:01`. */
export function formatCountdown(duration: number, format = "HH:mm:ss"): string {
  const kept = (format.match(escaped) ?? []).map((text) => text.slice(1, -1));
  let left = Math.max(0, duration);

  const replaced = timeUnits.reduce((current, [name, unit]) => {
    if (!current.includes(name)) return current;
    const value = Math.floor(left / unit);
    left -= value * unit;
    return current.replace(new RegExp(`${name}+`, "g"), (match) =>
      String(value).padStart(match.length, "0")
    );
  }, format.replace(escaped, "[]"));

  let index = 0;
  return replaced.replace(/\[]/g, () => {
    const text = kept[index] ?? "";
    index += 1;
    return text;
  });
}
