// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/navigation/menu-utils`
 * Purpose: Menu item model and key lookups.
 * Scope: Pure functions over the item tree. No React.
 * Invariants: Key paths run from the item to the outermost submenu (`[item, parent, grandparent]`); groups and dividers never appear in a path.
 * Side-effects: none
 * @public
 */

import type { ReactNode } from "react";

export interface MenuItemType {
  type?: "item";
  key: string;
  label?: ReactNode;
  icon?: ReactNode;
  disabled?: boolean;
  danger?: boolean;
  /** Tooltip text in collapsed inline mode. */
  title?: string;
  extra?: ReactNode;
}

export interface SubMenuType {
  type?: "submenu";
  key: string;
  label?: ReactNode;
  icon?: ReactNode;
  disabled?: boolean;
  children: MenuItem[];
  popupClassName?: string;
}

export interface MenuItemGroupType {
  type: "group";
  key?: string;
  label?: ReactNode;
  children?: MenuItem[];
}

export interface MenuDividerType {
  type: "divider";
  key?: string;
  dashed?: boolean;
}

export type MenuItem =
  | MenuItemType
  | SubMenuType
  | MenuItemGroupType
  | MenuDividerType;

export function isMenuDivider(item: MenuItem): item is MenuDividerType {
  return item.type === "divider";
}

export function isMenuGroup(item: MenuItem): item is MenuItemGroupType {
  return item.type === "group";
}

export function isSubMenu(item: MenuItem): item is SubMenuType {
  return (
    item.type !== "group" &&
    item.type !== "divider" &&
    "children" in item &&
    Array.isArray(item.children)
  );
}

export function isMenuLeaf(item: MenuItem): item is MenuItemType {
  return !isMenuDivider(item) && !isMenuGroup(item) && !isSubMenu(item);
}

/** Keys of every item and submenu in document order. */
export function flattenMenuKeys(items: readonly MenuItem[]): string[] {
  return items.flatMap((item): string[] => {
    if (isMenuDivider(item)) return [];
    if (isMenuGroup(item)) return flattenMenuKeys(item.children ?? []);
    if (isSubMenu(item)) return [item.key, ...flattenMenuKeys(item.children)];
    return [item.key];
  });
}

/** `[key, parentKey, ...]`, or `[]` when the key is absent. */
export function findKeyPath(items: readonly MenuItem[], key: string): string[] {
  for (const item of items) {
    if (isMenuDivider(item)) continue;
    if (isMenuGroup(item)) {
      const path = findKeyPath(item.children ?? [], key);
      if (path.length > 0) return path;
      continue;
    }
    if (item.key === key) return [key];
    if (isSubMenu(item)) {
      const path = findKeyPath(item.children, key);
      if (path.length > 0) return [...path, item.key];
    }
  }
  return [];
}

/** Submenu keys that contain `key`, outermost last. */
export function findParentKeys(items: readonly MenuItem[], key: string): string[] {
  return findKeyPath(items, key).slice(1);
}
