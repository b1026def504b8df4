// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/components/kit/navigation/menu-utils`
 * Purpose: Verifies menu item classification and key path lookup through groups and submenus.
 * Side-effects: none
 * Links: src/components/kit/navigation/menu-utils.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import {
  findKeyPath,
  findParentKeys,
  flattenMenuKeys,
  isMenuDivider,
  isMenuGroup,
  isMenuLeaf,
  isSubMenu,
  type MenuItem,
} from "@/components/kit/navigation/menu-utils";

const items: MenuItem[] = [
  { key: "home", label: "Home" },
  { type: "divider" },
  { type: "group", label: "Group", children: [{ key: "g1", label: "G1" }] },
  {
    key: "sub",
    label: "Sub",
    children: [
      { key: "s1", label: "S1" },
      { key: "sub2", label: "Sub 2", children: [{ key: "s2", label: "S2" }] },
    ],
  },
];

describe("type guards", () => {
  it("classify each item kind", () => {
    const [home, divider, group, sub] = items;
    expect(home && isMenuLeaf(home)).toBe(true);
    expect(divider && isMenuDivider(divider)).toBe(true);
    expect(group && isMenuGroup(group)).toBe(true);
    expect(sub && isSubMenu(sub)).toBe(true);
    expect(sub && isMenuLeaf(sub)).toBe(false);
  });
});

describe("flattenMenuKeys", () => {
  it("lists keys in document order, skipping dividers", () => {
    expect(flattenMenuKeys(items)).toEqual(["home", "g1", "sub", "s1", "sub2", "s2"]);
  });
});

describe("findKeyPath", () => {
  it("returns the key followed by its ancestors", () => {
    expect(findKeyPath(items, "s2")).toEqual(["s2", "sub2", "sub"]);
    expect(findKeyPath(items, "g1")).toEqual(["g1"]);
    expect(findKeyPath(items, "missing")).toEqual([]);
  });

  it("findParentKeys drops the key itself", () => {
    expect(findParentKeys(items, "s2")).toEqual(["sub2", "sub"]);
    expect(findParentKeys(items, "home")).toEqual([]);
  });
});
