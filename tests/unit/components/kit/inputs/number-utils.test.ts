// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/components/kit/inputs/number-utils`
 * Purpose: Verifies precision detection, half-away-from-zero rounding, stepping and parsing for InputNumber.
 * Invariants: Stepping never lands outside [min, max]; float noise never leaks into stepped values.
 * Side-effects: none
 * Links: src/components/kit/inputs/number-utils.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import {
  clampValue,
  getPrecision,
  parseNumber,
  stepValue,
  toFixedPrecision,
} from "@/components/kit/inputs/number-utils";

describe("getPrecision", () => {
  it.each([
    [10, 0],
    [1.25, 2],
    [1e-7, 7],
    [1.5e-7, 8],
    [Number.NaN, 0],
  ])("%s has %s decimals", (value, expected) => {
    expect(getPrecision(value)).toBe(expected);
  });
});

describe("toFixedPrecision", () => {
  it("rounds half away from zero", () => {
    expect(toFixedPrecision(1.005, 2)).toBe("1.01");
    expect(toFixedPrecision(2.5, 0)).toBe("3");
    expect(toFixedPrecision(-2.5, 0)).toBe("-3");
  });

  it("never prints negative zero", () => {
    expect(toFixedPrecision(-0.001, 2)).toBe("0.00");
  });
});

describe("clampValue", () => {
  it("respects optional bounds", () => {
    expect(clampValue(5, 0, 3)).toBe(3);
    expect(clampValue(-1, 0)).toBe(0);
    expect(clampValue(7)).toBe(7);
  });
});

describe("stepValue", () => {
  it("hides float noise", () => {
    expect(stepValue(0.1, 0.2, 1)).toBe(0.3);
  });

  it("steps from zero when empty", () => {
    expect(stepValue(null, 1, -1)).toBe(-1);
  });

  it("keeps the value's own decimals", () => {
    expect(stepValue(1.5, 1, 1)).toBe(2.5);
  });

  it("clamps to the bounds", () => {
    expect(stepValue(9, 2, 1, { max: 10 })).toBe(10);
    expect(stepValue(1, 2, -1, { min: 0 })).toBe(0);
  });

  it("applies an explicit precision", () => {
    expect(stepValue(1.26, 1, 1, { precision: 1 })).toBe(2.3);
  });
});

describe("parseNumber", () => {
  it("separates empty from invalid text", () => {
    expect(parseNumber("  ")).toBeNull();
    expect(parseNumber(" 3.5 ")).toBe(3.5);
    expect(parseNumber("1e3")).toBe(1000);
    expect(parseNumber("abc")).toBeUndefined();
  });
});
