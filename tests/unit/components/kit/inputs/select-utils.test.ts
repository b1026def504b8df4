// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/components/kit/inputs/select-utils`
 * Purpose: Verifies option filtering, flattening, keyboard movement and value helpers behind Select and AutoComplete.
 * Invariants: Empty groups are dropped; keyboard movement skips disabled options and wraps.
 * Side-effects: none
 * Links: src/components/kit/inputs/select-utils.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import type { SelectItem, SelectOption } from "@/components/kit/inputs/select-utils";
import {
  filterSelectItems,
  flattenSelectItems,
  getFirstEnabledValue,
  getNextActiveValue,
  getOptionText,
  splitBySeparators,
  toValueList,
  truncateLabel,
} from "@/components/kit/inputs/select-utils";

const fruit: SelectItem[] = [
  { value: "apple", label: "Apple" },
  {
    label: "Citrus",
    options: [
      { value: "lemon", label: "Lemon" },
      { value: "lime", label: "Lime" },
    ],
  },
  { value: "grape", label: "Grape" },
];

describe("getOptionText", () => {
  it("prefers a text label, then the title, then the value", () => {
    expect(getOptionText({ value: 1, label: 5 })).toBe("5");
    expect(getOptionText({ value: 1, label: null, title: "One" })).toBe("One");
    expect(getOptionText({ value: 2 })).toBe("2");
  });
});

describe("filterSelectItems", () => {
  it("matches labels case-insensitively and keeps order", () => {
    expect(filterSelectItems(fruit, "LE")).toEqual([
      { value: "apple", label: "Apple" },
      { label: "Citrus", options: [{ value: "lemon", label: "Lemon" }] },
    ]);
  });

  it("drops groups left without options", () => {
    expect(filterSelectItems(fruit, "gr")).toEqual([{ value: "grape", label: "Grape" }]);
  });

  it("returns everything when filtering is off", () => {
    expect(filterSelectItems(fruit, "zzz", false)).toEqual(fruit);
  });

  it("uses a custom filter on the raw option", () => {
    const byValue = (input: string, option: SelectOption) => String(option.value).startsWith(input);
    expect(filterSelectItems(fruit, "li", byValue)).toEqual([
      { label: "Citrus", options: [{ value: "lime", label: "Lime" }] },
    ]);
  });

  it("sorts loose options first and then each group", () => {
    const sorted = filterSelectItems(fruit, "", true, (a, b) =>
      getOptionText(b).localeCompare(getOptionText(a))
    );

    expect(sorted).toEqual([
      { value: "grape", label: "Grape" },
      { value: "apple", label: "Apple" },
      {
        label: "Citrus",
        options: [
          { value: "lime", label: "Lime" },
          { value: "lemon", label: "Lemon" },
        ],
      },
    ]);
  });
});

describe("flattenSelectItems", () => {
  it("emits a title entry before grouped options", () => {
    expect(
      flattenSelectItems(fruit).map((entry) =>
        entry.type === "group" ? entry.key : `${entry.key}:${entry.grouped}`
      )
    ).toEqual(["apple:false", "__group-1", "lemon:true", "lime:true", "grape:false"]);
  });
});

describe("getNextActiveValue", () => {
  const options: SelectOption[] = [
    { value: "a" },
    { value: "b", disabled: true },
    { value: "c" },
  ];

  it("skips disabled options", () => {
    expect(getNextActiveValue(options, "a", 1)).toBe("c");
  });

  it("wraps at both ends", () => {
    expect(getNextActiveValue(options, "c", 1)).toBe("a");
    expect(getNextActiveValue(options, "a", -1)).toBe("c");
  });

  it("starts from the first or last option without a current value", () => {
    expect(getNextActiveValue(options, undefined, 1)).toBe("a");
    expect(getNextActiveValue(options, undefined, -1)).toBe("c");
  });

  it("returns undefined when nothing is enabled", () => {
    expect(getNextActiveValue([{ value: "x", disabled: true }], undefined, 1)).toBeUndefined();
    expect(getFirstEnabledValue([{ value: "x", disabled: true }])).toBeUndefined();
  });
});

describe("splitBySeparators", () => {
  it("splits on every separator and drops blanks", () => {
    expect(splitBySeparators("a, b;;c", [",", ";"])).toEqual(["a", "b", "c"]);
    expect(splitBySeparators(",", [","])).toEqual([]);
  });

  it("returns null for text without a separator", () => {
    expect(splitBySeparators("abc", [","])).toBeNull();
  });
});

describe("value helpers", () => {
  it("truncates long tag labels", () => {
    expect(truncateLabel("abcdef", 3)).toBe("abc...");
    expect(truncateLabel("abc", 3)).toBe("abc");
    expect(truncateLabel("abcdef", undefined)).toBe("abcdef");
  });

  it("normalizes single and list values", () => {
    expect(toValueList(null)).toEqual([]);
    expect(toValueList(undefined)).toEqual([]);
    expect(toValueList("a")).toEqual(["a"]);
    expect(toValueList(["a", "b"])).toEqual(["a", "b"]);
  });
});
