// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/navigation/pagination-utils`
 * Purpose: Page math for Pagination: page count, visible pager list, jump targets, clamping.
 * Scope: Pure functions. No React.
 * Invariants:
 * - The first and last pages are always listed.
 * - Up to 2 pages (1 with showLessItems) are listed on each side of the current page.
 * - Jumpers move 5 pages (3 with showLessItems).
 * Side-effects: none
 * @public
 */

export type PageItem = number | "jump-prev" | "jump-next";

export function getPageCount(total: number, pageSize: number): number {
  if (total <= 0 || pageSize <= 0) return 0;
  return Math.floor((total - 1) / pageSize) + 1;
}

export function getPageItems(
  current: number,
  pageCount: number,
  showLessItems = false
): PageItem[] {
  const buffer = showLessItems ? 1 : 2;
  const range = (from: number, to: number): number[] =>
    Array.from({ length: Math.max(0, to - from + 1) }, (_, i) => from + i);

  if (pageCount <= 3 + buffer * 2) return range(1, pageCount);

  let left = Math.max(1, current - buffer);
  let right = Math.min(current + buffer, pageCount);
  if (current - 1 <= buffer) right = 1 + buffer * 2;
  if (pageCount - current <= buffer) left = pageCount - buffer * 2;

  const items: PageItem[] = range(left, right);
  if (current - 1 >= buffer * 2 && current !== 3) items.unshift("jump-prev");
  if (pageCount - current >= buffer * 2 && current !== pageCount - 2) {
    items.push("jump-next");
  }
  if (left !== 1) items.unshift(1);
  if (right !== pageCount) items.push(pageCount);
  return items;
}

export function getJumpTarget(
  current: number,
  pageCount: number,
  direction: "prev" | "next",
  showLessItems = false
): number {
  const distance = showLessItems ? 3 : 5;
  return direction === "prev"
    ? Math.max(1, current - distance)
    : Math.min(pageCount, current + distance);
}

/** Keeps `current` within the pages `total` spans at `pageSize`. */
export function clampPage(current: number, total: number, pageSize: number): number {
  const pageCount = getPageCount(total, pageSize);
  return Math.max(1, Math.min(current, pageCount));
}

/** 1-based inclusive item range shown on `current`. */
export function getItemRange(
  current: number,
  pageSize: number,
  total: number
): [number, number] {
  if (total === 0) return [0, 0];
  return [(current - 1) * pageSize + 1, Math.min(current * pageSize, total)];
}
