// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/layout/grid-utils`
 * Purpose: Pure 24-column grid math for Row and Col.
 * Scope: Gutter normalization, flex shorthand parsing and per-column inline styles. No React.
 * Invariants: Percentages are span / 24 * 100 with up to 8 decimals; a span of 0 hides the column.
 * Side-effects: none
 * @public
 */

import type { CSSProperties } from "react";

export const GRID_COLUMNS = 24;

export type Gutter = number | [number, number];

export interface ColLayout {
  span?: number | undefined;
  offset?: number | undefined;
  order?: number | undefined;
  push?: number | undefined;
  pull?: number | undefined;
  flex?: number | string | undefined;
}

export function normalizeGutter(gutter: Gutter | undefined): [number, number] {
  if (gutter === undefined) return [0, 0];
  return Array.isArray(gutter) ? gutter : [gutter, 0];
}

export function columnPercent(columns: number): string {
  const value = Number(((columns / GRID_COLUMNS) * 100).toFixed(8));
  return `${value}%`;
}

/** `2` -> `2 2 auto`, `"100px"` -> `0 0 100px`, `"auto"`/`"none"` and full shorthands pass through. */
export function parseFlex(flex: number | string): string {
  if (typeof flex === "number") return `${flex} ${flex} auto`;
  if (/^\d+(\.\d+)?(px|em|rem|%)$/.test(flex)) return `0 0 ${flex}`;
  return flex;
}

export function getColStyle(
  layout: ColLayout,
  gutter: [number, number]
): CSSProperties {
  const style: CSSProperties = {};
  const [horizontal] = gutter;

  if (horizontal > 0) {
    style.paddingInline = horizontal / 2;
  }
  if (layout.flex !== undefined) {
    style.flex = parseFlex(layout.flex);
    if (layout.flex === "auto") style.minWidth = 0;
  } else if (layout.span !== undefined && layout.span > 0) {
    const width = columnPercent(layout.span);
    style.flex = `0 0 ${width}`;
    style.maxWidth = width;
  }
  if (layout.offset) style.marginInlineStart = columnPercent(layout.offset);
  if (layout.order !== undefined) style.order = layout.order;
  if (layout.push) style.insetInlineStart = columnPercent(layout.push);
  if (layout.pull) style.insetInlineEnd = columnPercent(layout.pull);

  return style;
}

export function getRowStyle(gutter: [number, number]): CSSProperties {
  const [horizontal, vertical] = gutter;
  const style: CSSProperties = {};
  if (horizontal > 0) style.marginInline = -horizontal / 2;
  if (vertical > 0) style.rowGap = vertical;
  return style;
}
