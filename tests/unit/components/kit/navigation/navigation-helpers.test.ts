// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/components/kit/navigation/navigation-helpers`
 * Purpose: Verifies breadcrumb path building, step status derivation and tab keyboard skipping.
 * Side-effects: none
 * Links: src/components/kit/navigation/
 * @public
 */

import { describe, expect, it } from "vitest";

import { getBreadcrumbPaths } from "@/components/kit/navigation/Breadcrumb";
import { getStepStatus } from "@/components/kit/navigation/Steps";
import { findEnabledTab, type TabItem } from "@/components/kit/navigation/Tabs";

describe("getBreadcrumbPaths", () => {
  it("joins path segments cumulatively", () => {
    expect(
      getBreadcrumbPaths([
        { title: "Home" },
        { title: "Users", path: "/users" },
        { title: "Detail", path: "42" },
      ])
    ).toEqual(["users", "users/42"]);
  });
});

describe("getStepStatus", () => {
  it("derives status from the current step", () => {
    expect(getStepStatus(0, 1)).toBe("finish");
    expect(getStepStatus(1, 1)).toBe("process");
    expect(getStepStatus(1, 1, "error")).toBe("error");
    expect(getStepStatus(2, 1)).toBe("wait");
  });

  it("an item status wins", () => {
    expect(getStepStatus(0, 1, "process", "error")).toBe("error");
  });
});

describe("findEnabledTab", () => {
  const tabs: TabItem[] = [
    { key: "a", label: "A" },
    { key: "b", label: "B", disabled: true },
    { key: "c", label: "C" },
  ];

  it("skips disabled tabs", () => {
    expect(findEnabledTab(tabs, 0, 1)).toBe(2);
  });

  it("wraps around", () => {
    expect(findEnabledTab(tabs, 2, 1)).toBe(0);
    expect(findEnabledTab(tabs, 0, -1)).toBe(2);
  });

  it("returns -1 when everything is disabled", () => {
    expect(
      findEnabledTab(
        tabs.map((tab) => ({ ...tab, disabled: true })),
        0,
        1
      )
    ).toBe(-1);
  });
});
