// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/components/kit/inputs/time-utils`
 * Purpose: Verifies time formatting and parsing, panel columns and cell building for TimePicker.
 * Invariants: parseTime returns null for out-of-range or mismatched text; 12 AM is hour 0.
 * Side-effects: none
 * Links: src/components/kit/inputs/time-utils.ts, src/components/kit/inputs/TimePicker.tsx
 * @public
 */

import { describe, expect, it } from "vitest";

import { applyCell, buildColumn } from "@/components/kit/inputs/TimePicker";
import {
  formatTime,
  getTimeColumns,
  getTimeUnits,
  isSameTime,
  parseTime,
} from "@/components/kit/inputs/time-utils";

const afternoon = { hour: 13, minute: 5, second: 9 };

describe("formatTime", () => {
  it.each([
    ["HH:mm:ss", "13:05:09"],
    ["H:m:s", "13:5:9"],
    ["h:mm a", "1:05 pm"],
    ["hh:mm A", "01:05 PM"],
    ["[at] H", "at 13"],
  ])("%s -> %s", (format, expected) => {
    expect(formatTime(afternoon, format)).toBe(expected);
  });

  it("shows midnight as 12 AM", () => {
    expect(formatTime({ hour: 0, minute: 0, second: 0 }, "h A")).toBe("12 AM");
  });
});

describe("parseTime", () => {
  it("reads 24 hour text", () => {
    expect(parseTime("13:05:09", "HH:mm:ss")).toEqual(afternoon);
  });

  it("reads 12 hour text", () => {
    expect(parseTime("1:05 pm", "h:mm a")).toEqual({
      hour: 13,
      minute: 5,
      second: 0,
    });
    expect(parseTime("12:00 AM", "h:mm A")).toEqual({
      hour: 0,
      minute: 0,
      second: 0,
    });
  });

  it("rejects out of range and mismatched text", () => {
    expect(parseTime("13:00 pm", "h:mm a")).toBeNull();
    expect(parseTime("25:00:00", "HH:mm:ss")).toBeNull();
    expect(parseTime("1:5", "HH:mm")).toBeNull();
  });
});

describe("getTimeColumns", () => {
  it("derives columns from the format", () => {
    expect(getTimeColumns("HH:mm:ss")).toEqual(["hour", "minute", "second"]);
    expect(getTimeColumns("h:mm a")).toEqual(["hour", "minute", "meridiem"]);
    expect(getTimeColumns("mm:ss")).toEqual(["minute", "second"]);
  });
});

describe("getTimeUnits", () => {
  it("steps and flags disabled units", () => {
    expect(getTimeUnits(60, 15, [30])).toEqual([
      { value: 0, label: "00", disabled: false },
      { value: 15, label: "15", disabled: false },
      { value: 30, label: "30", disabled: true },
      { value: 45, label: "45", disabled: false },
    ]);
  });
});

describe("isSameTime", () => {
  it("compares values and nulls", () => {
    expect(isSameTime(null, null)).toBe(true);
    expect(isSameTime(afternoon, null)).toBe(false);
    expect(isSameTime(afternoon, { ...afternoon })).toBe(true);
  });
});

describe("buildColumn", () => {
  const options = {
    use12Hours: true,
    hourStep: 1,
    minuteStep: 1,
    secondStep: 1,
    disabled: {},
  };

  it("labels 12 hour cells and maps them into the current half day", () => {
    const cells = buildColumn("hour", afternoon, options);
    expect(cells).toHaveLength(12);
    expect(cells[0]).toEqual({
      value: 12,
      label: "12",
      disabled: false,
      selected: false,
    });
    expect(cells[1]).toEqual({
      value: 13,
      label: "01",
      disabled: false,
      selected: true,
    });
  });

  it("marks the meridiem", () => {
    expect(buildColumn("meridiem", afternoon, options)).toEqual([
      { value: 0, label: "AM", disabled: false, selected: false },
      { value: 12, label: "PM", disabled: false, selected: true },
    ]);
  });

  it("selects nothing for an empty value", () => {
    const cells = buildColumn("minute", null, { ...options, use12Hours: false });
    expect(cells.some((cell) => cell.selected)).toBe(false);
  });

  it("passes the shown hour to disabledMinutes", () => {
    const cells = buildColumn("minute", afternoon, {
      ...options,
      disabled: { disabledMinutes: (hour) => (hour === 13 ? [0, 1] : []) },
    });
    expect(cells[0]?.disabled).toBe(true);
    expect(cells[2]?.disabled).toBe(false);
  });
});

describe("applyCell", () => {
  it("replaces one unit", () => {
    expect(applyCell(afternoon, "minute", 30)).toEqual({
      hour: 13,
      minute: 30,
      second: 9,
    });
    expect(applyCell(null, "hour", 7)).toEqual({ hour: 7, minute: 0, second: 0 });
  });

  it("switches half day with the meridiem", () => {
    expect(applyCell(afternoon, "meridiem", 0)).toEqual({
      hour: 1,
      minute: 5,
      second: 9,
    });
  });
});
