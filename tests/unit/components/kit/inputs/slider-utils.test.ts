// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/components/kit/inputs/slider-utils`
 * Purpose: Verifies slider value mapping, snapping to steps and marks, keyboard offsets and handle picking.
 * Invariants: Snapped values stay within [min, max]; a null step snaps to marks only.
 * Side-effects: none
 * Links: src/components/kit/inputs/slider-utils.ts, src/components/kit/inputs/Slider.tsx
 * @public
 */

import { describe, expect, it } from "vitest";

import { arrowOffset } from "@/components/kit/inputs/Slider";
import {
  closestHandle,
  getDotValues,
  getMarkValues,
  offsetValue,
  percentToValue,
  snapValue,
  valueToPercent,
} from "@/components/kit/inputs/slider-utils";

const marks = { 0: "0°C", 37: "37°C", 100: "100°C" };

describe("percent mapping", () => {
  it("maps both ways", () => {
    expect(valueToPercent(25, 0, 100)).toBe(25);
    expect(valueToPercent(5, 5, 5)).toBe(0);
    expect(percentToValue(50, 10, 20)).toBe(15);
  });
});

describe("getMarkValues", () => {
  it("sorts numeric keys", () => {
    expect(getMarkValues({ 100: "b", 0: "a", 37: "c" })).toEqual([0, 37, 100]);
    expect(getMarkValues(undefined)).toEqual([]);
  });
});

describe("snapValue", () => {
  it("rounds to the nearest step", () => {
    expect(snapValue(23, { min: 0, max: 100, step: 10 })).toBe(20);
    expect(snapValue(150, { min: 0, max: 100, step: 10 })).toBe(100);
  });

  it("snaps to marks when step is null", () => {
    expect(snapValue(33, { min: 0, max: 100, step: null, marks })).toBe(37);
  });

  it("picks the closer of mark and step", () => {
    expect(snapValue(33, { min: 0, max: 100, step: 10, marks })).toBe(30);
    expect(snapValue(36, { min: 0, max: 100, step: 10, marks })).toBe(37);
  });
});

describe("offsetValue", () => {
  it("moves by one step within bounds", () => {
    expect(offsetValue(20, 1, { min: 0, max: 100, step: 10 })).toBe(30);
    expect(offsetValue(95, 1, { min: 0, max: 100, step: 10 })).toBe(100);
  });

  it("jumps between marks when step is null", () => {
    const options = { min: 0, max: 100, step: null, marks };
    expect(offsetValue(37, 1, options)).toBe(100);
    expect(offsetValue(37, -1, options)).toBe(0);
    expect(offsetValue(100, 1, options)).toBe(100);
  });
});

describe("getDotValues", () => {
  it("merges steps and marks", () => {
    expect(getDotValues({ min: 0, max: 10, step: 5, marks: { 3: "x" } })).toEqual([
      0, 3, 5, 10,
    ]);
  });
});

describe("closestHandle", () => {
  it("picks the nearest handle", () => {
    expect(closestHandle([20, 80], 30)).toBe(0);
    expect(closestHandle([20, 80], 60)).toBe(1);
  });

  it("breaks ties by direction", () => {
    expect(closestHandle([50, 50], 60)).toBe(1);
    expect(closestHandle([50, 50], 40)).toBe(0);
  });
});

describe("arrowOffset", () => {
  it("maps arrows for a horizontal slider", () => {
    expect(arrowOffset("ArrowRight", false, false)).toBe(1);
    expect(arrowOffset("ArrowLeft", false, false)).toBe(-1);
    expect(arrowOffset("ArrowUp", false, false)).toBe(1);
  });

  it("flips horizontal arrows when reversed", () => {
    expect(arrowOffset("ArrowRight", false, true)).toBe(-1);
    expect(arrowOffset("ArrowUp", false, true)).toBe(1);
  });

  it("flips vertical arrows when reversed", () => {
    expect(arrowOffset("ArrowUp", true, true)).toBe(-1);
    expect(arrowOffset("ArrowDown", true, false)).toBe(-1);
  });

  it("ignores other keys", () => {
    expect(arrowOffset("Enter", false, false)).toBeUndefined();
  });
});
