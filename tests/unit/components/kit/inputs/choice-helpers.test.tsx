// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/components/kit/inputs/choice-helpers`
 * Purpose: Verifies option normalization and value helpers of Checkbox, Segmented, Rate and the Input counter.
 * Side-effects: none
 * Links: src/components/kit/inputs/
 * @vitest-environment jsdom
 */

import { render, screen } from "@testing-library/react";
import { describe, expect, it } from "vitest";

import { normalizeCheckboxOptions, toggleGroupValue } from "@/components/kit/inputs/Checkbox";
import { renderCount } from "@/components/kit/inputs/Input";
import { getKeyboardValue, getPointerValue, getStarFill } from "@/components/kit/inputs/Rate";
import { normalizeSegmentedOptions } from "@/components/kit/inputs/Segmented";

describe("toggleGroupValue", () => {
  const order = ["apple", "pear", "orange"];

  it("keeps option order", () => {
    expect(toggleGroupValue(["orange"], "apple", order)).toEqual(["apple", "orange"]);
    expect(toggleGroupValue(["apple", "orange"], "apple", order)).toEqual(["orange"]);
  });

  it("puts unknown values last", () => {
    expect(toggleGroupValue(["kiwi"], "pear", order)).toEqual(["pear", "kiwi"]);
  });
});

describe("normalizeCheckboxOptions", () => {
  it("wraps plain values", () => {
    expect(normalizeCheckboxOptions(["a", { label: "B", value: "b", disabled: true }])).toEqual([
      { label: "a", value: "a" },
      { label: "B", value: "b", disabled: true },
    ]);
  });
});

describe("normalizeSegmentedOptions", () => {
  it("adds titles from string labels", () => {
    expect(normalizeSegmentedOptions([1, { label: "Weekly", value: "w" }])).toEqual([
      { label: "1", value: 1, title: "1" },
      { label: "Weekly", value: "w", title: "Weekly" },
    ]);
  });
});

describe("Rate helpers", () => {
  it("getStarFill", () => {
    expect(getStarFill(0, 2.5)).toBe("full");
    expect(getStarFill(2, 2.5)).toBe("half");
    expect(getStarFill(3, 2.5)).toBe("zero");
  });

  it("getPointerValue picks halves on the first half of a star", () => {
    expect(getPointerValue(2, 0.3, true)).toBe(2.5);
    expect(getPointerValue(2, 0.7, true)).toBe(3);
    expect(getPointerValue(2, 0.3, false)).toBe(3);
  });

  it("getKeyboardValue snaps to the step grid and stays within 0..count", () => {
    expect(getKeyboardValue(2.5, 1, 1, 5)).toBe(3);
    expect(getKeyboardValue(2.5, 1, -1, 5)).toBe(2);
    expect(getKeyboardValue(2, 0.5, 1, 5)).toBe(2.5);
    expect(getKeyboardValue(5, 1, 1, 5)).toBe(5);
    expect(getKeyboardValue(0, 0.5, -1, 5)).toBe(0);
  });
});

describe("renderCount", () => {
  it("renders nothing when disabled", () => {
    expect(renderCount(false, "abc", 10)).toBeNull();
  });

  it("shows count over maxLength", () => {
    render(<>{renderCount(true, "abc", 10)}</>);
    expect(screen.getByText("3 / 10")).toBeInTheDocument();
  });

  it("uses a custom formatter and max", () => {
    render(
      <>
        {renderCount(
          { max: 5, formatter: ({ count, maxLength }) => `${count} of ${maxLength}` },
          "abcdef",
          undefined
        )}
      </>
    );
    expect(screen.getByText("6 of 5")).toBeInTheDocument();
  });
});
